/**
 * 構造化ログのインターフェース
 *
 * 実装は pino（PinoLogger）。テストでは LoggerMock に差し替える。
 * meta にはイベント種別・item_id・timestamp など照合に必要な値を入れる。
 */
export interface Logger {
  debug(msg: string, meta?: object): void;

  info(msg: string, meta?: object): void;

  warn(msg: string, meta?: object): void;

  error(msg: string, meta?: object): void;

  /**
   * 子ロガーを作成
   * component や kind を全ログに付与するために使用
   * @param bindings 子ロガーに付与するコンテキスト情報
   */
  child(bindings: object): Logger;
}
