import WebSocket from 'ws';
import type { Logger } from '@/application/interfaces/Logger';
import { AuthenticationError, errorMessage, TransportError } from '@/domain/errors/CollectorError';
import type { WebSocketConnection } from '@/infra/websocket/interfaces/WebSocketConnection';
import { WsWebSocketConnection } from '@/infra/websocket/WsWebSocketConnection';
import type { BitSkinsCommand } from './messages/BitSkinsCommand';
import { envelopeSchema } from './messages/BitSkinsRawMessage';

/**
 * インフラ層: BitSkins WebSocket 接続・認証・購読（低レベル）
 *
 * 責務: BitSkins API の WebSocket プロトコル実装。
 * 接続の確立とコマンド送信のみを担当し、状態管理は BitSkinsConnectionManager が持つ。
 */
export class BitSkinsWebSocketClient {
  constructor(private readonly logger: Logger) {}

  /**
   * WebSocket 接続を確立する。
   * @param wsUrl WebSocket エンドポイント URL
   * @param timeoutMs ハンドシェイクのタイムアウト（ミリ秒）
   * @returns 接続が確立されたら解決される
   * @throws {TransportError} タイムアウトまたはソケットエラー
   */
  connect(wsUrl: string, timeoutMs: number): Promise<WebSocketConnection> {
    return new Promise<WebSocketConnection>((resolve, reject) => {
      const socket = new WebSocket(wsUrl, { handshakeTimeout: timeoutMs });
      const connection = new WsWebSocketConnection(socket);
      let settled = false;

      const timer = setTimeout(() => {
        if (settled) {
          return;
        }
        settled = true;
        connection.removeAllListeners();
        connection.terminate();
        reject(new TransportError('WebSocket handshake timed out', { wsUrl, timeoutMs }));
      }, timeoutMs);

      connection.onOpen(() => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        connection.removeAllListeners();
        resolve(connection);
      });

      connection.onError((error) => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        connection.removeAllListeners();
        reject(new TransportError('WebSocket connection failed', { wsUrl, cause: error.message }));
      });
    });
  }

  sendAuth(connection: WebSocketConnection, apiKey: string): void {
    this.send(connection, ['WS_AUTH_APIKEY', apiKey]);
    this.logger.debug('authentication requested');
  }

  subscribe(connection: WebSocketConnection, channel: string): void {
    this.send(connection, ['WS_SUB', channel]);
    this.logger.info('subscribed', { channel });
  }

  unsubscribe(connection: WebSocketConnection, channel: string): void {
    this.send(connection, ['WS_UNSUB', channel]);
    this.logger.info('unsubscribed', { channel });
  }

  private send(connection: WebSocketConnection, command: BitSkinsCommand): void {
    connection.send(JSON.stringify(command));
  }
}

/**
 * 認証コマンドへの最初の応答を判定する。
 * action が WS_AUTH で始まり data に error が無ければ成功（null）。
 * 形式として読めない応答は回線起因とみなし TransportError を返す。
 */
export function interpretAuthReply(data: Buffer): TransportError | AuthenticationError | null {
  let decoded: unknown;
  try {
    decoded = JSON.parse(data.toString('utf-8'));
  } catch (error) {
    return new TransportError('authentication reply is not valid JSON', { cause: errorMessage(error) });
  }

  const reply = envelopeSchema.safeParse(decoded);
  if (!reply.success) {
    return new TransportError('authentication reply is not an [action, data] array');
  }

  const [action, payload] = reply.data;
  const rejection = replyError(payload);
  if (action.startsWith('WS_AUTH') && rejection === null) {
    return null;
  }
  return new AuthenticationError('API key was rejected', {
    action,
    ...(rejection !== null && { error: rejection }),
  });
}

function replyError(payload: unknown): string | null {
  if (typeof payload !== 'object' || payload === null || !('error' in payload)) {
    return null;
  }
  const { error } = payload;
  if (error === null || error === undefined || error === false) {
    return null;
  }
  return typeof error === 'string' ? error : JSON.stringify(error);
}
