import { type Mock, vi } from 'vitest';
import type { DropReason, MetricsCollector, MetricsRegistry } from '@/application/interfaces/MetricsCollector';
import type { ConnectionState } from '@/application/session/ConnectionSession';

/**
 * テスト用メトリクスコレクターモック
 */
export class MetricsCollectorMock implements MetricsCollector {
  incrementReceived: Mock<(channel: string) => void> = vi.fn<(channel: string) => void>();
  incrementPersisted: Mock<(collection: string, status: 'inserted' | 'updated') => void> = vi.fn<(collection: string, status: 'inserted' | 'updated') => void>();
  incrementDropped: Mock<(kind: string, reason: DropReason) => void> = vi.fn<(kind: string, reason: DropReason) => void>();
  incrementError: Mock<(errorType: string) => void> = vi.fn<(errorType: string) => void>();
  incrementReconnect: Mock<() => void> = vi.fn<() => void>();
  setConnectionState: Mock<(state: ConnectionState) => void> = vi.fn<(state: ConnectionState) => void>();
  setExchangeRate: Mock<(currency: string, rate: number) => void> = vi.fn<(currency: string, rate: number) => void>();
  getMetrics: Mock<() => Promise<string>> = vi.fn<() => Promise<string>>(async () => '');
  getRegistry: Mock<() => MetricsRegistry> = vi.fn<() => MetricsRegistry>(() => ({ contentType: 'text/plain' }));

  /** setConnectionState に渡された状態の履歴 */
  get states(): ConnectionState[] {
    return this.setConnectionState.mock.calls.map(([state]) => state);
  }
}
