import type { ConnectionSession } from '@/application/session/ConnectionSession';

/**
 * アプリケーション層: マーケット WebSocket アダプタの共通インターフェイス
 *
 * 責務: アプリケーション層が「必要な契約」を定義する（実装はインフラ層が担当）。
 * 受信フレームはコンストラクタで渡された FrameSink に流す。
 */
export interface MarketDataAdapter {
  /** プロセスで唯一の論理セッション */
  readonly session: ConnectionSession;

  /**
   * 再接続付きで接続を開始する。
   */
  start(): Promise<void>;

  /**
   * 1 回だけ接続・認証・購読を行う。
   * @throws {TransportError} 接続・認証応答のタイムアウトなど回復可能な失敗
   * @throws {AuthenticationError} API キーが拒否された場合
   */
  connect(): Promise<ConnectionSession>;

  /**
   * 以降の再接続をやめる（接続中のソケットはそのまま）。
   */
  stopReconnecting(): void;

  /**
   * 購読解除してソケットを閉じる。再接続は行わない。
   */
  shutdown(): void;
}
