import { Counter, Gauge, Registry } from 'prom-client';
import type { DropReason, MetricsCollector } from '@/application/interfaces/MetricsCollector';
import type { ConnectionState } from '@/application/session/ConnectionSession';

const CONNECTION_STATES: readonly ConnectionState[] = [
  'disconnected',
  'connecting',
  'authenticating',
  'subscribed',
  'streaming',
  'failed',
];

/**
 * Prometheus メトリクスコレクター実装
 * テストで別レジストリを使用するため、シングルトンにはしていない。
 *
 * 責務: prom-client を使用してメトリクスを収集・保持
 */
export class PrometheusMetricsCollector implements MetricsCollector {
  private readonly register: Registry;
  private readonly receivedCounter: Counter;
  private readonly persistedCounter: Counter;
  private readonly droppedCounter: Counter;
  private readonly errorCounter: Counter;
  private readonly reconnectCounter: Counter;
  private readonly connectionStateGauge: Gauge;
  private readonly exchangeRateGauge: Gauge;

  constructor(defaultLabels?: Record<string, string>) {
    this.register = new Registry();
    if (defaultLabels) {
      this.register.setDefaultLabels(defaultLabels);
    }

    this.receivedCounter = new Counter({
      name: 'collector_frames_received_total',
      help: 'Total number of frames received from the marketplace stream',
      labelNames: ['channel'],
      registers: [this.register],
    });

    this.persistedCounter = new Counter({
      name: 'collector_events_persisted_total',
      help: 'Total number of events upserted into MongoDB',
      labelNames: ['collection', 'status'],
      registers: [this.register],
    });

    this.droppedCounter = new Counter({
      name: 'collector_events_dropped_total',
      help: 'Total number of frames or events dropped before persistence',
      labelNames: ['kind', 'reason'],
      registers: [this.register],
    });

    this.errorCounter = new Counter({
      name: 'collector_errors_total',
      help: 'Total number of errors',
      labelNames: ['error_type'],
      registers: [this.register],
    });

    this.reconnectCounter = new Counter({
      name: 'collector_reconnects_total',
      help: 'Total number of scheduled reconnections',
      registers: [this.register],
    });

    // 現在の状態だけ 1、それ以外は 0
    this.connectionStateGauge = new Gauge({
      name: 'collector_connection_state',
      help: 'Current connection state (1 for the active state)',
      labelNames: ['state'],
      registers: [this.register],
    });

    this.exchangeRateGauge = new Gauge({
      name: 'collector_exchange_rate',
      help: 'USD exchange rate currently used for conversion',
      labelNames: ['currency'],
      registers: [this.register],
    });
  }

  incrementReceived(channel: string): void {
    this.receivedCounter.inc({ channel });
  }

  incrementPersisted(collection: string, status: 'inserted' | 'updated'): void {
    this.persistedCounter.inc({ collection, status });
  }

  incrementDropped(kind: string, reason: DropReason): void {
    this.droppedCounter.inc({ kind, reason });
  }

  incrementError(errorType: string): void {
    this.errorCounter.inc({ error_type: errorType });
  }

  incrementReconnect(): void {
    this.reconnectCounter.inc();
  }

  setConnectionState(state: ConnectionState): void {
    for (const candidate of CONNECTION_STATES) {
      this.connectionStateGauge.set({ state: candidate }, candidate === state ? 1 : 0);
    }
  }

  setExchangeRate(currency: string, rate: number): void {
    this.exchangeRateGauge.set({ currency }, rate);
  }

  async getMetrics(): Promise<string> {
    return await this.register.metrics();
  }

  getRegistry(): Registry {
    return this.register;
  }
}
