/**
 * トランスポートから受信したままのフレーム。
 * ConnectionManager が生成し、EventRouter に渡すまでの間だけ存在する。
 */
export interface RawFrame {
  /** フレームを受信したセッションの購読チャンネル */
  channel: string;
  /** 受信したバイト列（JSON テキスト） */
  payload: Buffer;
  /** 受信時刻（エポックミリ秒） */
  receivedAt: number;
}
