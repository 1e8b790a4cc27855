import type { RawFrame } from '@/domain/models/RawFrame';

/**
 * ConnectionManager が受信フレームを渡す先。
 */
export interface FrameSink {
  /**
   * @returns 受け付けた場合は true。満杯またはクローズ済みなら false
   */
  push(frame: RawFrame): boolean;

  /** 停止処理でクローズ済みかどうか */
  readonly isClosed: boolean;
}
