import type { FrameSink } from '@/application/interfaces/FrameSink';
import type { Logger } from '@/application/interfaces/Logger';
import type { MarketDataAdapter } from '@/application/interfaces/MarketDataAdapter';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import { ConnectionSession } from '@/application/session/ConnectionSession';
import type { EventKindDefinition } from '@/domain/constants/EventKinds';
import {
  type AuthenticationError,
  CollectorError,
  errorMessage,
  TransportError,
} from '@/domain/errors/CollectorError';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import { type BackoffOptions, BackoffStrategy } from '@/infra/reconnect/BackoffStrategy';
import { ReconnectManager } from '@/infra/reconnect/ReconnectManager';
import { HeartbeatMonitor, type HeartbeatOptions } from '@/infra/websocket/HeartbeatMonitor';
import type { WebSocketConnection } from '@/infra/websocket/interfaces/WebSocketConnection';
import { BitSkinsWebSocketClient, interpretAuthReply } from './BitSkinsWebSocketClient';

export interface BitSkinsConnectionOptions {
  wsUrl: string;
  apiKey: string;
  handshakeTimeoutMs: number;
  authTimeoutMs: number;
  heartbeat: HeartbeatOptions;
  backoff?: Partial<BackoffOptions>;
  /** この時間ストリーミングが続いたら再接続の試行回数をリセットする */
  stabilityMs?: number;
  /** 認証失敗の通知先（プロセス終了は呼び出し側が行う） */
  onFatal?: (error: AuthenticationError) => void;
  logger?: Logger;
  metricsCollector?: MetricsCollector;
}

interface PendingAuth {
  settle(reply: Buffer): void;
  abort(error: TransportError): void;
}

/**
 * インフラ層: MarketDataAdapter 実装（BitSkins）
 *
 * 責務: 接続・認証・購読・ハートビート・再接続を束ね、ConnectionSession の状態を進める。
 * ストリーミング中に受けたフレームは RawFrame にして FrameSink に渡すだけで、中身は見ない。
 */
export class BitSkinsConnectionManager implements MarketDataAdapter {
  readonly session: ConnectionSession;
  private readonly client: BitSkinsWebSocketClient;
  private readonly heartbeat: HeartbeatMonitor;
  private readonly reconnectManager: ReconnectManager;
  private readonly logger: Logger;
  private readonly metricsCollector?: MetricsCollector;
  private connection: WebSocketConnection | null = null;
  private pendingAuth: PendingAuth | null = null;

  constructor(
    private readonly definition: EventKindDefinition,
    private readonly sink: FrameSink,
    private readonly options: BitSkinsConnectionOptions
  ) {
    this.logger = options.logger ?? LoggerFactory.forComponent('connection', { kind: definition.kind });
    this.metricsCollector = options.metricsCollector;
    this.session = new ConnectionSession(definition.kind, definition.channel);
    this.client = new BitSkinsWebSocketClient(this.logger);

    this.heartbeat = new HeartbeatMonitor(
      options.heartbeat,
      () => this.connection?.ping(),
      (silentForMs) => {
        this.logger.warn('heartbeat timed out', { silentForMs });
        this.handleDisconnect('heartbeat timeout');
      }
    );

    this.reconnectManager = new ReconnectManager(
      async () => {
        await this.connect();
      },
      {
        backoff: new BackoffStrategy(options.backoff),
        stabilityMs: options.stabilityMs,
        onFatal: options.onFatal,
        logger: this.logger,
        metricsCollector: this.metricsCollector,
      }
    );

    this.session.onStateChange((change) => {
      this.logger.info('connection state changed', {
        sessionId: this.session.id,
        generation: this.session.generation,
        from: change.from,
        to: change.to,
        ...(change.reason !== undefined && { reason: change.reason }),
      });
      this.metricsCollector?.setConnectionState(change.to);
    });
  }

  /**
   * 再接続付きで接続を開始する。
   * 初回接続に失敗しても例外は投げず、バックオフ後に再試行する。
   */
  async start(): Promise<void> {
    await this.reconnectManager.start();
  }

  async connect(): Promise<ConnectionSession> {
    this.teardown();
    if (this.session.state !== 'disconnected' && this.session.state !== 'failed') {
      this.session.transition('disconnected', 'reconnecting');
    }

    this.session.transition('connecting');
    let connection: WebSocketConnection;
    try {
      connection = await this.client.connect(this.options.wsUrl, this.options.handshakeTimeoutMs);
    } catch (error) {
      this.fail(error);
      throw error;
    }

    if (this.reconnectManager.isStopped) {
      connection.terminate();
      throw new TransportError('connection manager has been shut down');
    }

    this.connection = connection;
    connection.onMessage((data) => this.handleMessage(data));
    connection.onPong(() => this.heartbeat.touch());
    connection.onClose((code, reason) => {
      this.handleSocketLoss(reason === '' ? `socket closed (${code})` : `socket closed (${code}: ${reason})`);
    });
    connection.onError((error) => {
      this.logger.error('socket error', { err: error });
      this.handleSocketLoss(`socket error: ${error.message}`);
    });

    this.session.transition('authenticating');
    try {
      await this.authenticate(connection);
    } catch (error) {
      this.fail(error);
      this.teardown();
      throw error;
    }

    this.client.subscribe(connection, this.definition.channel);
    this.session.transition('subscribed');
    this.heartbeat.start();
    this.session.transition('streaming');
    return this.session;
  }

  stopReconnecting(): void {
    this.reconnectManager.stop();
  }

  shutdown(): void {
    this.reconnectManager.stop();
    this.pendingAuth?.abort(new TransportError('connection manager is shutting down'));
    this.heartbeat.stop();
    if (this.connection) {
      if (this.session.isStreaming) {
        this.client.unsubscribe(this.connection, this.definition.channel);
      }
      this.connection.removeAllListeners();
      this.connection.close();
      this.connection = null;
    }
    if (this.session.state !== 'disconnected') {
      this.session.transition('disconnected', 'shutdown');
    }
  }

  private authenticate(connection: WebSocketConnection): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pendingAuth = null;
        reject(new TransportError('authentication reply timed out', { timeoutMs: this.options.authTimeoutMs }));
      }, this.options.authTimeoutMs);

      // 同期的に応答が返ってきても取りこぼさないよう、送信前に待ち受けを登録する
      this.pendingAuth = {
        settle: (reply) => {
          clearTimeout(timer);
          this.pendingAuth = null;
          const failure = interpretAuthReply(reply);
          if (failure) {
            reject(failure);
          } else {
            resolve();
          }
        },
        abort: (error) => {
          clearTimeout(timer);
          this.pendingAuth = null;
          reject(error);
        },
      };
      this.client.sendAuth(connection, this.options.apiKey);
    });
  }

  private handleMessage(data: Buffer): void {
    this.heartbeat.touch();

    if (this.pendingAuth) {
      this.pendingAuth.settle(data);
      return;
    }

    if (!this.session.isStreaming) {
      this.logger.debug('frame ignored outside streaming state', { state: this.session.state });
      return;
    }

    const channel = this.definition.channel;
    this.metricsCollector?.incrementReceived(channel);
    const accepted = this.sink.push({ channel, payload: data, receivedAt: Date.now() });
    if (!accepted && this.sink.isClosed) {
      this.logger.debug('frame discarded after queue closed', { kind: this.definition.kind, channel });
    } else if (!accepted) {
      this.logger.warn('frame queue rejected frame, dropping', { kind: this.definition.kind, channel });
      this.metricsCollector?.incrementDropped(this.definition.kind, 'queue_overflow');
    }
  }

  private handleSocketLoss(reason: string): void {
    if (this.pendingAuth) {
      this.pendingAuth.abort(new TransportError(`connection lost during authentication: ${reason}`));
      return;
    }
    this.handleDisconnect(reason);
  }

  /**
   * 購読後の切断を処理する。状態を disconnected にして再接続をスケジュールする。
   */
  private handleDisconnect(reason: string): void {
    const state = this.session.state;
    if (state !== 'subscribed' && state !== 'streaming') {
      return;
    }
    this.logger.warn('connection lost', { reason });
    this.teardown();
    this.session.transition('disconnected', reason);
    this.metricsCollector?.incrementError('TRANSPORT_ERROR');
    this.reconnectManager.scheduleReconnect();
  }

  private fail(error: unknown): void {
    const state = this.session.state;
    if (state === 'connecting' || state === 'authenticating') {
      this.session.transition('failed', errorMessage(error));
    }
    this.metricsCollector?.incrementError(error instanceof CollectorError ? error.code : 'UNKNOWN_ERROR');
  }

  private teardown(): void {
    this.heartbeat.stop();
    if (this.connection) {
      this.connection.removeAllListeners();
      this.connection.terminate();
      this.connection = null;
    }
  }
}
