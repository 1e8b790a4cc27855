import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import type { RateProvider, RateSource } from '@/application/interfaces/RateProvider';
import { errorMessage, RateSourceError } from '@/domain/errors/CollectorError';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';

export interface ExchangeRateCacheOptions {
  /** 換算先の通貨コード */
  currency: string;
  /** 一度も取得できていないときに使うレート */
  fallbackRate: number;
  refreshIntervalMs: number;
}

/**
 * インフラ層: 為替レートのキャッシュ
 *
 * 定期的に RateSource から取り直し、失敗したら最後に取れた値を使い続ける。
 * getRate() は同期で、Enricher のホットパスから呼ばれる。
 */
export class ExchangeRateCache implements RateProvider {
  private rate: number;
  private lastRefreshedAt: number | null = null;
  private timer: NodeJS.Timeout | null = null;
  private readonly logger: Logger;

  constructor(
    private readonly source: RateSource,
    private readonly options: ExchangeRateCacheOptions,
    logger?: Logger,
    private readonly metricsCollector?: MetricsCollector
  ) {
    this.rate = options.fallbackRate;
    this.logger = logger ?? LoggerFactory.forComponent('rates');
  }

  getRate(): number {
    return this.rate;
  }

  /** 最後に取得に成功した時刻。未取得なら null */
  get refreshedAt(): number | null {
    return this.lastRefreshedAt;
  }

  /**
   * レートを取り直す。失敗しても例外は投げない。
   * @returns 更新後（失敗時は据え置き）のレート
   */
  async refresh(): Promise<number> {
    const { currency } = this.options;
    try {
      const rate = await this.source.fetchRate(currency);
      this.rate = rate;
      this.lastRefreshedAt = Date.now();
      this.metricsCollector?.setExchangeRate(currency, rate);
      this.logger.info('exchange rate refreshed', { currency, rate });
    } catch (error) {
      const failure = error instanceof RateSourceError ? error : new RateSourceError(errorMessage(error));
      this.metricsCollector?.incrementError(failure.code);
      this.logger.warn('exchange rate refresh failed, keeping last rate', {
        currency,
        rate: this.rate,
        err: failure,
      });
    }
    return this.rate;
  }

  /**
   * 初回取得を待ってから定期更新を始める。
   */
  async start(): Promise<void> {
    this.metricsCollector?.setExchangeRate(this.options.currency, this.rate);
    await this.refresh();
    this.stop();
    this.timer = setInterval(() => {
      void this.refresh();
    }, this.options.refreshIntervalMs);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }
}
