import { frameOf, listedItem, RECEIVED_AT } from '@test/unit/helpers/frames';
import { LoggerMock } from '@test/unit/helpers/mocks/LoggerMock';
import { MetricsCollectorMock } from '@test/unit/helpers/mocks/MetricsCollectorMock';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { Enricher } from '@/application/services/Enricher';
import { IngestEventUsecase } from '@/application/usecases/IngestEventUsecase';
import { EVENT_KINDS } from '@/domain/constants/EventKinds';
import { PersistenceError } from '@/domain/errors/CollectorError';
import type { EnrichedEvent } from '@/domain/models/MarketEvent';
import type { EventStore, PersistResult } from '@/domain/repositories/EventStore';
import { BitSkinsEventRouter } from '@/infra/adapters/bitskins/BitSkinsEventRouter';
import { Deduper } from '@/infra/dedupe/Deduper';

class EventStoreStub implements EventStore {
  persist = vi.fn<(event: EnrichedEvent) => Promise<PersistResult>>(async () => ({ status: 'inserted', attempts: 1 }));
  ensureIndexes = vi.fn<() => Promise<void>>(async () => undefined);
}

/**
 * 単体テスト: IngestEventUsecase
 *
 * 優先度2: Application層のオーケストレーション
 * - parse → enrich → dedupe → persist の流れ
 * - 各段で落ちたときのログとメトリクス
 */
describe('IngestEventUsecase', () => {
  let store: EventStoreStub;
  let loggerMock: LoggerMock;
  let metrics: MetricsCollectorMock;
  let usecase: IngestEventUsecase;

  beforeEach(() => {
    store = new EventStoreStub();
    loggerMock = new LoggerMock();
    metrics = new MetricsCollectorMock();
    usecase = new IngestEventUsecase(
      EVENT_KINDS.listed,
      new BitSkinsEventRouter(EVENT_KINDS.listed),
      new Enricher({ getRate: () => 0.92 }),
      new Deduper({ capacity: 100, windowMs: 60_000 }),
      store,
      loggerMock,
      metrics
    );
  });

  it('正しいフレームは付加情報付きで保存される', async () => {
    const outcome = await usecase.execute(frameOf('listed', ['listed', listedItem()]));

    expect(outcome.status).toBe('persisted');
    expect(store.persist).toHaveBeenCalledTimes(1);
    expect(store.persist.mock.calls[0]?.[0]).toMatchObject({
      kind: 'listed',
      itemId: '6237035',
      priceUsd: 0.33,
      priceEur: 0.304,
      wear: 'Factory New',
      timestamp: RECEIVED_AT,
    });
    expect(loggerMock.info).toHaveBeenCalledWith('event persisted', {
      kind: 'listed',
      itemId: '6237035',
      timestamp: RECEIVED_AT,
      write: 'inserted',
      attempts: 1,
      priceEur: 0.304,
      wear: 'Factory New',
    });
  });

  it('解析できないフレームは保存せず、理由を警告ログに残す', async () => {
    const outcome = await usecase.execute(frameOf('listed', 'not json'));

    expect(outcome.status).toBe('rejected');
    expect(store.persist).not.toHaveBeenCalled();
    expect(loggerMock.warn).toHaveBeenCalledWith('frame rejected', {
      kind: 'listed',
      field: 'payload',
      reason: 'payload is not valid JSON',
      receivedAt: RECEIVED_AT,
    });
    expect(metrics.incrementDropped).toHaveBeenCalledWith('listed', 'parse_error');
  });

  it('同じイベントの 2 回目は重複として捨てる', async () => {
    const frame = frameOf('listed', ['listed', listedItem()]);

    await usecase.execute(frame);
    const second = await usecase.execute(frame);

    expect(second.status).toBe('duplicate');
    expect(store.persist).toHaveBeenCalledTimes(1);
    expect(metrics.incrementDropped).toHaveBeenCalledWith('listed', 'duplicate');
  });

  it('保存に失敗したイベントは破棄し、再配信されたら再び保存を試みる', async () => {
    const error = new PersistenceError('Failed to persist event after 3 attempts');
    store.persist.mockResolvedValueOnce({ status: 'failed', attempts: 3, error });
    const frame = frameOf('listed', ['listed', listedItem()]);

    const first = await usecase.execute(frame);
    const second = await usecase.execute(frame);

    expect(first).toMatchObject({ status: 'failed', error });
    expect(second.status).toBe('persisted');
    expect(store.persist).toHaveBeenCalledTimes(2);
    expect(loggerMock.error).toHaveBeenCalledWith('event dropped', {
      kind: 'listed',
      itemId: '6237035',
      timestamp: RECEIVED_AT,
      attempts: 3,
      err: error,
    });
    expect(metrics.incrementDropped).toHaveBeenCalledWith('listed', 'persist_failed');
  });
});
