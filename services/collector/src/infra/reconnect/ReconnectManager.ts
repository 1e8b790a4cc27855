import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import { AuthenticationError } from '@/domain/errors/CollectorError';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import { BackoffStrategy } from '@/infra/reconnect/BackoffStrategy';

export interface ReconnectManagerOptions {
  backoff?: BackoffStrategy;
  /** この時間ストリーミングが続いたらバックオフをリセットする（ミリ秒） */
  stabilityMs?: number;
  /** 認証失敗など再接続しても回復しないエラーの通知先 */
  onFatal?: (error: AuthenticationError) => void;
  logger?: Logger;
  metricsCollector?: MetricsCollector;
}

/**
 * インフラ層: 再接続スケジューラ（connect 関数を受け取って再試行）
 *
 * 責務: 再接続のスケジュール管理。接続関数を受け取り、失敗時に自動的に再接続を試みる。
 * 回数の上限は持たない。AuthenticationError のみ停止して onFatal に通知する。
 */
export class ReconnectManager {
  private readonly backoff: BackoffStrategy;
  private readonly stabilityMs: number;
  private readonly logger: Logger;
  private readonly metricsCollector?: MetricsCollector;
  private readonly onFatal?: (error: AuthenticationError) => void;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private stabilityTimer: NodeJS.Timeout | null = null;
  private stopped = false;

  /**
   * @param connectFn 再接続時に実行する接続関数
   */
  constructor(
    private readonly connectFn: () => Promise<void>,
    options: ReconnectManagerOptions = {}
  ) {
    this.backoff = options.backoff ?? new BackoffStrategy();
    this.stabilityMs = options.stabilityMs ?? 60000;
    this.logger = options.logger ?? LoggerFactory.forComponent('reconnect');
    this.metricsCollector = options.metricsCollector;
    this.onFatal = options.onFatal;
  }

  get isStopped(): boolean {
    return this.stopped;
  }

  /** 現在の連続失敗回数 */
  get attempts(): number {
    return this.backoff.attempts;
  }

  async start(): Promise<void> {
    this.stopped = false;
    await this.safeConnect();
  }

  /**
   * 再接続をスケジュールする。
   * 既に停止されている場合は何もしない。
   */
  scheduleReconnect(): void {
    if (this.stopped) {
      return;
    }
    this.clearStabilityTimer();
    const delay = this.backoff.getNextDelay();
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
    }
    this.logger.info('Reconnect scheduled', { delayMs: delay, attempt: this.backoff.attempts });
    this.metricsCollector?.incrementReconnect();
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      void this.safeConnect();
    }, delay);
  }

  stop(): void {
    this.stopped = true;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    this.clearStabilityTimer();
  }

  /**
   * 接続を試みる。
   * 成功時は安定判定タイマーを張り、失敗時は再接続をスケジュールする。
   */
  private async safeConnect(): Promise<void> {
    if (this.stopped) {
      return;
    }
    try {
      await this.connectFn();
      this.armStabilityTimer();
    } catch (error) {
      if (error instanceof AuthenticationError) {
        this.logger.error('Authentication rejected, giving up reconnection', { err: error });
        this.stop();
        this.onFatal?.(error);
        return;
      }

      this.logger.error('Reconnect attempt failed', { err: error });
      this.scheduleReconnect();
    }
  }

  private armStabilityTimer(): void {
    this.clearStabilityTimer();
    this.stabilityTimer = setTimeout(() => {
      this.stabilityTimer = null;
      this.backoff.reset();
      this.logger.debug('Connection stable, backoff reset', { stabilityMs: this.stabilityMs });
    }, this.stabilityMs);
  }

  private clearStabilityTimer(): void {
    if (this.stabilityTimer) {
      clearTimeout(this.stabilityTimer);
      this.stabilityTimer = null;
    }
  }
}
