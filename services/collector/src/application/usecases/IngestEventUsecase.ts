import type { DuplicateFilter } from '@/application/interfaces/DuplicateFilter';
import type { EventRouter } from '@/application/interfaces/EventRouter';
import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import type { Enricher } from '@/application/services/Enricher';
import type { EventKindDefinition } from '@/domain/constants/EventKinds';
import { ParseError, type PersistenceError } from '@/domain/errors/CollectorError';
import type { EnrichedEvent } from '@/domain/models/MarketEvent';
import type { RawFrame } from '@/domain/models/RawFrame';
import type { EventStore } from '@/domain/repositories/EventStore';

export type IngestOutcome =
  | { status: 'persisted'; event: EnrichedEvent; write: 'inserted' | 'updated'; attempts: number }
  | { status: 'rejected'; error: ParseError }
  | { status: 'duplicate'; event: EnrichedEvent }
  | { status: 'failed'; event: EnrichedEvent; error: PersistenceError };

/**
 * アプリケーション層: 1 フレーム分の取り込みユースケース
 *
 * 責務: parse → enrich → dedupe → persist を順に実行する司令塔。
 * どの段で落ちてもフレーム単位で完結させ、例外を呼び出し元へ漏らさない。
 */
export class IngestEventUsecase {
  constructor(
    private readonly definition: EventKindDefinition,
    private readonly router: EventRouter,
    private readonly enricher: Enricher,
    private readonly deduper: DuplicateFilter,
    private readonly store: EventStore,
    private readonly logger: Logger,
    private readonly metricsCollector?: MetricsCollector
  ) {}

  async execute(frame: RawFrame): Promise<IngestOutcome> {
    const kind = this.definition.kind;

    const parsed = this.router.parse(frame);
    if (parsed instanceof ParseError) {
      this.logger.warn('frame rejected', {
        kind,
        field: parsed.field,
        reason: parsed.message,
        receivedAt: frame.receivedAt,
      });
      this.metricsCollector?.incrementDropped(kind, 'parse_error');
      return { status: 'rejected', error: parsed };
    }

    const event = this.enricher.enrich(parsed);
    const context = { kind, itemId: event.itemId, timestamp: event.timestamp };

    if (!this.deduper.accept(event)) {
      this.logger.info('duplicate event dropped', context);
      this.metricsCollector?.incrementDropped(kind, 'duplicate');
      return { status: 'duplicate', event };
    }

    const result = await this.store.persist(event);
    if (result.status === 'failed') {
      // 再配信されたときに Deduper で弾かれないよう記録を戻す
      this.deduper.forget(event);
      this.logger.error('event dropped', { ...context, attempts: result.attempts, err: result.error });
      this.metricsCollector?.incrementDropped(kind, 'persist_failed');
      return { status: 'failed', event, error: result.error };
    }

    this.logger.info('event persisted', {
      ...context,
      write: result.status,
      attempts: result.attempts,
      priceEur: event.priceEur,
      wear: event.wear,
    });
    return { status: 'persisted', event, write: result.status, attempts: result.attempts };
  }
}
