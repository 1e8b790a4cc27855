import type { ParseError } from '@/domain/errors/CollectorError';
import type { MarketEvent } from '@/domain/models/MarketEvent';
import type { RawFrame } from '@/domain/models/RawFrame';

/**
 * 生フレームを型付きイベントに変換するルーター（インフラ層で実装される）。
 */
export interface EventRouter {
  /**
   * @param frame 受信フレーム
   * @returns 型付きイベント。形式不正の場合は問題のフィールド名を持つ ParseError（例外は投げない）
   */
  parse(frame: RawFrame): MarketEvent | ParseError;
}
