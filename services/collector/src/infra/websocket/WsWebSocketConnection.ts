import WebSocket from 'ws';
import type { WebSocketConnection } from './interfaces/WebSocketConnection';

/**
 * `ws` パッケージを使った WebSocket 接続の実装
 */
export class WsWebSocketConnection implements WebSocketConnection {
  private openCallbacks: Array<() => void> = [];
  private messageCallbacks: Array<(data: Buffer) => void> = [];
  private closeCallbacks: Array<(code: number, reason: string) => void> = [];
  private errorCallbacks: Array<(error: Error) => void> = [];
  private pongCallbacks: Array<() => void> = [];

  constructor(private readonly socket: WebSocket) {
    // ソケット側のリスナーは常に張ったままにする（error 未処理でプロセスが落ちないように）
    this.socket.on('open', () => {
      for (const cb of this.openCallbacks) {
        cb();
      }
    });

    this.socket.on('message', (data: WebSocket.RawData) => {
      const buffer = toBuffer(data);
      for (const cb of this.messageCallbacks) {
        cb(buffer);
      }
    });

    this.socket.on('close', (code: number, reason: Buffer) => {
      for (const cb of this.closeCallbacks) {
        cb(code, reason.toString('utf-8'));
      }
    });

    this.socket.on('error', (error: Error) => {
      for (const cb of this.errorCallbacks) {
        cb(error);
      }
    });

    this.socket.on('pong', () => {
      for (const cb of this.pongCallbacks) {
        cb();
      }
    });
  }

  onOpen(callback: () => void): void {
    this.openCallbacks.push(callback);
  }

  onMessage(callback: (data: Buffer) => void): void {
    this.messageCallbacks.push(callback);
  }

  onClose(callback: (code: number, reason: string) => void): void {
    this.closeCallbacks.push(callback);
  }

  onError(callback: (error: Error) => void): void {
    this.errorCallbacks.push(callback);
  }

  onPong(callback: () => void): void {
    this.pongCallbacks.push(callback);
  }

  send(data: string): void {
    this.socket.send(data);
  }

  ping(): void {
    if (this.socket.readyState === WebSocket.OPEN) {
      this.socket.ping();
    }
  }

  close(): void {
    this.socket.close();
  }

  removeAllListeners(): void {
    this.openCallbacks = [];
    this.messageCallbacks = [];
    this.closeCallbacks = [];
    this.errorCallbacks = [];
    this.pongCallbacks = [];
  }

  terminate(): void {
    this.socket.terminate();
  }
}

function toBuffer(data: WebSocket.RawData): Buffer {
  if (Buffer.isBuffer(data)) {
    return data;
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data);
  }
  return Buffer.from(data);
}
