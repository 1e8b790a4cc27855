/**
 * インフラ層: 取引所非依存の WebSocket 接続ラッパ（インターフェース）
 *
 * 責務: WebSocket 接続の確立・管理・イベント処理を抽象化する。
 * 実装は `ws` パッケージを使用する（WsWebSocketConnection）。
 */
export interface WebSocketConnection {
  /**
   * 接続が確立されたときに呼ばれるコールバック
   */
  onOpen(callback: () => void): void;

  /**
   * メッセージを受信したときに呼ばれるコールバック
   * フラグメントや ArrayBuffer は Buffer にまとめてから渡す
   */
  onMessage(callback: (data: Buffer) => void): void;

  /**
   * 接続が閉じられたときに呼ばれるコールバック
   */
  onClose(callback: (code: number, reason: string) => void): void;

  /**
   * エラーが発生したときに呼ばれるコールバック
   */
  onError(callback: (error: Error) => void): void;

  /**
   * ping に対する pong を受信したときに呼ばれるコールバック
   */
  onPong(callback: () => void): void;

  send(data: string): void;

  /**
   * 生存確認の ping を送る（未接続なら何もしない）
   */
  ping(): void;

  close(): void;

  /**
   * すべてのコールバックを削除する（下層ソケットのリスナーは残る）
   */
  removeAllListeners(): void;

  /**
   * クロージングハンドシェイクを待たずに切断する
   */
  terminate(): void;
}
