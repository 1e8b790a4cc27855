/**
 * BitSkins WebSocket API に送信するコマンドの型定義。
 * すべて [action, data] 形式の JSON 配列で送る。
 */
export type BitSkinsCommand =
  | ['WS_AUTH_APIKEY', string]
  | ['WS_SUB', string]
  | ['WS_UNSUB', string];
