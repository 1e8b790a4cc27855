import { FakeWebSocketConnection } from '@test/unit/helpers/mocks/FakeWebSocketConnection';
import { LoggerMock } from '@test/unit/helpers/mocks/LoggerMock';
import { MetricsCollectorMock } from '@test/unit/helpers/mocks/MetricsCollectorMock';
import { afterEach, beforeEach, describe, expect, it, type MockInstance, vi } from 'vitest';
import { EVENT_KINDS } from '@/domain/constants/EventKinds';
import { AuthenticationError, TransportError } from '@/domain/errors/CollectorError';
import type { RawFrame } from '@/domain/models/RawFrame';
import {
  BitSkinsConnectionManager,
  type BitSkinsConnectionOptions,
} from '@/infra/adapters/bitskins/BitSkinsConnectionManager';
import { BitSkinsWebSocketClient } from '@/infra/adapters/bitskins/BitSkinsWebSocketClient';
import { BoundedQueue } from '@/infra/queue/BoundedQueue';

const AUTH_OK = ['WS_AUTH_APIKEY', { success: true }];

/**
 * 単体テスト: BitSkinsConnectionManager
 *
 * 優先度3: Infrastructure層の外部依存あり（接続は FakeWebSocketConnection に差し替え）
 * - 接続 → 認証 → 購読 → ストリーミングの状態遷移
 * - 認証失敗・タイムアウト
 * - 切断とハートビート切れからの再接続
 * - フレームのキュー投入とあふれ（停止処理後の破棄は除く）
 * - シャットダウン
 */
describe('BitSkinsConnectionManager', () => {
  let queue: BoundedQueue<RawFrame>;
  let loggerMock: LoggerMock;
  let metrics: MetricsCollectorMock;
  let connectSpy: MockInstance<BitSkinsWebSocketClient['connect']>;
  let manager: BitSkinsConnectionManager;

  function createManager(overrides: Partial<BitSkinsConnectionOptions> = {}): BitSkinsConnectionManager {
    return new BitSkinsConnectionManager(EVENT_KINDS.listed, queue, {
      wsUrl: 'wss://ws.example.test',
      apiKey: 'test-api-key',
      handshakeTimeoutMs: 1000,
      authTimeoutMs: 1000,
      heartbeat: { intervalMs: 100, timeoutMs: 300 },
      backoff: { baseDelayMs: 1000, maxDelayMs: 30000, factor: 2, jitter: 0 },
      stabilityMs: 60000,
      logger: loggerMock,
      metricsCollector: metrics,
      ...overrides,
    });
  }

  beforeEach(() => {
    vi.useFakeTimers();
    queue = new BoundedQueue<RawFrame>(2);
    loggerMock = new LoggerMock();
    metrics = new MetricsCollectorMock();
    connectSpy = vi.spyOn(BitSkinsWebSocketClient.prototype, 'connect');
    manager = createManager();
  });

  afterEach(() => {
    manager.shutdown();
    vi.restoreAllMocks();
    vi.useRealTimers();
  });

  describe('connect()', () => {
    it('認証・購読を経て streaming になる', async () => {
      const connection = new FakeWebSocketConnection().replyToAuth(AUTH_OK);
      connectSpy.mockResolvedValueOnce(connection);

      const session = await manager.connect();

      expect(session.state).toBe('streaming');
      expect(session.generation).toBe(1);
      expect(connectSpy).toHaveBeenCalledWith('wss://ws.example.test', 1000);
      expect(connection.sentCommands()).toEqual([
        ['WS_AUTH_APIKEY', 'test-api-key'],
        ['WS_SUB', 'listed'],
      ]);
      expect(metrics.states).toEqual(['connecting', 'authenticating', 'subscribed', 'streaming']);
      expect(loggerMock.info).toHaveBeenCalledWith('connection state changed', {
        sessionId: session.id,
        generation: 1,
        from: 'subscribed',
        to: 'streaming',
      });
    });

    it('認証が拒否されたら AuthenticationError で failed になり、ソケットを破棄する', async () => {
      const connection = new FakeWebSocketConnection().replyToAuth(['WS_AUTH_APIKEY', { error: 'invalid api key' }]);
      connectSpy.mockResolvedValueOnce(connection);

      await expect(manager.connect()).rejects.toThrow(AuthenticationError);

      expect(manager.session.state).toBe('failed');
      expect(connection.terminated).toBe(true);
      expect(metrics.incrementError).toHaveBeenCalledWith('AUTHENTICATION_ERROR');
    });

    it('認証応答が来なければ TransportError で失敗する', async () => {
      connectSpy.mockResolvedValueOnce(new FakeWebSocketConnection());

      const pending = manager.connect();
      const assertion = expect(pending).rejects.toThrow('authentication reply timed out');
      await vi.advanceTimersByTimeAsync(1000);

      await assertion;
      expect(manager.session.state).toBe('failed');
    });

    it('認証中に切断されたら TransportError で失敗する', async () => {
      const connection = new FakeWebSocketConnection();
      connectSpy.mockResolvedValueOnce(connection);

      const pending = manager.connect();
      await vi.advanceTimersByTimeAsync(0);
      connection.emitClose(1006);

      await expect(pending).rejects.toThrow('connection lost during authentication: socket closed (1006)');
      expect(manager.session.state).toBe('failed');
    });

    it('ハンドシェイクに失敗したら failed にしてエラーをそのまま投げる', async () => {
      const error = new TransportError('WebSocket handshake timed out');
      connectSpy.mockRejectedValueOnce(error);

      await expect(manager.connect()).rejects.toBe(error);
      expect(manager.session.state).toBe('failed');
      expect(metrics.incrementError).toHaveBeenCalledWith('TRANSPORT_ERROR');
    });
  });

  describe('フレームの受信', () => {
    it('ストリーミング中のメッセージを RawFrame としてキューに入れる', async () => {
      const connection = new FakeWebSocketConnection().replyToAuth(AUTH_OK);
      connectSpy.mockResolvedValueOnce(connection);
      await manager.connect();

      connection.emitMessage(['listed', { id: 1 }]);
      const frame = await queue.next();

      expect(frame?.channel).toBe('listed');
      expect(frame?.payload.toString('utf-8')).toBe('["listed",{"id":1}]');
      expect(frame?.receivedAt).toBe(Date.now());
      expect(metrics.incrementReceived).toHaveBeenCalledWith('listed');
    });

    it('キューが満杯なら新しいフレームを捨てて警告する', async () => {
      const connection = new FakeWebSocketConnection().replyToAuth(AUTH_OK);
      connectSpy.mockResolvedValueOnce(connection);
      await manager.connect();

      connection.emitMessage(['listed', { id: 1 }]);
      connection.emitMessage(['listed', { id: 2 }]);
      connection.emitMessage(['listed', { id: 3 }]);

      expect(queue.size).toBe(2);
      expect(loggerMock.warn).toHaveBeenCalledWith('frame queue rejected frame, dropping', {
        kind: 'listed',
        channel: 'listed',
      });
      expect(metrics.incrementDropped).toHaveBeenCalledWith('listed', 'queue_overflow');
    });

    it('停止処理でキューが閉じた後のフレームはあふれとして数えない', async () => {
      const connection = new FakeWebSocketConnection().replyToAuth(AUTH_OK);
      connectSpy.mockResolvedValueOnce(connection);
      await manager.connect();
      queue.close();

      connection.emitMessage(['listed', { id: 1 }]);

      expect(queue.size).toBe(0);
      expect(loggerMock.warn).not.toHaveBeenCalled();
      expect(loggerMock.debug).toHaveBeenCalledWith('frame discarded after queue closed', {
        kind: 'listed',
        channel: 'listed',
      });
      expect(metrics.incrementDropped).not.toHaveBeenCalled();
    });
  });

  describe('切断と再接続', () => {
    it('ストリーミング中に切断されたらバックオフ後に再接続する', async () => {
      const first = new FakeWebSocketConnection().replyToAuth(AUTH_OK);
      const second = new FakeWebSocketConnection().replyToAuth(AUTH_OK);
      connectSpy.mockResolvedValueOnce(first).mockResolvedValueOnce(second);
      await manager.start();

      first.emitClose(1001, 'going away');

      expect(manager.session.state).toBe('disconnected');
      expect(metrics.incrementReconnect).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(1000);

      expect(manager.session.state).toBe('streaming');
      expect(manager.session.generation).toBe(2);
      expect(second.sentCommands()).toEqual([
        ['WS_AUTH_APIKEY', 'test-api-key'],
        ['WS_SUB', 'listed'],
      ]);
    });

    it('切断後の古い接続からのメッセージはキューに入らない', async () => {
      const first = new FakeWebSocketConnection().replyToAuth(AUTH_OK);
      connectSpy.mockResolvedValueOnce(first).mockResolvedValueOnce(new FakeWebSocketConnection().replyToAuth(AUTH_OK));
      await manager.start();

      first.emitClose(1006);
      first.emitMessage(['listed', { id: 1 }]);

      expect(queue.size).toBe(0);
      expect(first.listenerCount).toBe(0);
    });

    it('受信が途絶えたらハートビート切れとして切断する', async () => {
      const connection = new FakeWebSocketConnection().replyToAuth(AUTH_OK);
      connectSpy.mockResolvedValueOnce(connection).mockResolvedValueOnce(new FakeWebSocketConnection().replyToAuth(AUTH_OK));
      await manager.start();

      await vi.advanceTimersByTimeAsync(300);
      expect(connection.pings).toBe(3);
      expect(manager.session.state).toBe('streaming');

      await vi.advanceTimersByTimeAsync(100);
      expect(manager.session.state).toBe('disconnected');
      expect(connection.terminated).toBe(true);
      expect(loggerMock.warn).toHaveBeenCalledWith('heartbeat timed out', { silentForMs: 400 });
    });

    it('pong を受けている間は切断しない', async () => {
      const connection = new FakeWebSocketConnection().replyToAuth(AUTH_OK);
      connectSpy.mockResolvedValueOnce(connection);
      await manager.start();

      for (let i = 0; i < 10; i++) {
        await vi.advanceTimersByTimeAsync(100);
        connection.emitPong();
      }

      expect(manager.session.state).toBe('streaming');
    });

    it('認証が拒否されたら再接続せず onFatal に通知する', async () => {
      const onFatal = vi.fn();
      manager = createManager({ onFatal });
      connectSpy.mockResolvedValue(new FakeWebSocketConnection().replyToAuth(['WS_AUTH_APIKEY', { error: 'denied' }]));

      await manager.start();
      await vi.advanceTimersByTimeAsync(60000);

      expect(onFatal).toHaveBeenCalledWith(expect.any(AuthenticationError));
      expect(connectSpy).toHaveBeenCalledTimes(1);
    });
  });

  describe('shutdown()', () => {
    it('購読を解除してソケットを閉じ、以降は再接続しない', async () => {
      const connection = new FakeWebSocketConnection().replyToAuth(AUTH_OK);
      connectSpy.mockResolvedValueOnce(connection);
      await manager.start();

      manager.shutdown();
      connection.emitClose(1000);
      await vi.advanceTimersByTimeAsync(60000);

      expect(connection.sentCommands()).toContainEqual(['WS_UNSUB', 'listed']);
      expect(connection.closed).toBe(true);
      expect(manager.session.state).toBe('disconnected');
      expect(connectSpy).toHaveBeenCalledTimes(1);
    });
  });
});
