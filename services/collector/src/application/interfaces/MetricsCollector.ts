import type { ConnectionState } from '@/application/session/ConnectionSession';

/**
 * メトリクスレジストリの最小インターフェース
 * prom-client の Registry 型を抽象化
 */
export interface MetricsRegistry {
  contentType: string;
}

export type DropReason = 'parse_error' | 'duplicate' | 'persist_failed' | 'queue_overflow';

/**
 * メトリクス収集インターフェース
 *
 * 責務: パイプライン各段の件数と接続状態を公開する
 */
export interface MetricsCollector {
  /**
   * 受信フレーム数をカウント
   * @param channel 購読チャンネル（listed, price_changed, delisted_or_sold）
   */
  incrementReceived(channel: string): void;

  /**
   * 保存件数をカウント
   * @param collection 保存先コレクション
   * @param status upsert の結果
   */
  incrementPersisted(collection: string, status: 'inserted' | 'updated'): void;

  /**
   * 破棄件数をカウント
   */
  incrementDropped(kind: string, reason: DropReason): void;

  /**
   * エラー数をカウント
   * @param errorType エラーコード（TRANSPORT_ERROR, PERSISTENCE_ERROR など）
   */
  incrementError(errorType: string): void;

  incrementReconnect(): void;

  setConnectionState(state: ConnectionState): void;

  setExchangeRate(currency: string, rate: number): void;

  /**
   * Prometheus 形式のメトリクス文字列を取得
   */
  getMetrics(): Promise<string>;

  getRegistry(): MetricsRegistry;
}
