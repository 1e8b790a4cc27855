import { LRUCache } from 'lru-cache';
import type { DuplicateFilter } from '@/application/interfaces/DuplicateFilter';
import type { MarketEvent } from '@/domain/models/MarketEvent';

/** 保持するキーの上限 */
export const DEFAULT_DEDUPE_CAPACITY = 10_000;
/** 同一キーを重複とみなす時間（10 分） */
export const DEFAULT_DEDUPE_WINDOW_MS = 10 * 60 * 1000;

export interface DeduperOptions {
  capacity: number;
  windowMs: number;
}

/**
 * インフラ層: 直近イベントの重複フィルター
 *
 * キーは (kind, itemId, timestamp)。容量を超えると古いものから追い出され、
 * windowMs を過ぎたキーは再び初見として扱う。
 */
export class Deduper implements DuplicateFilter {
  private readonly seen: LRUCache<string, true>;

  constructor(options: DeduperOptions = { capacity: DEFAULT_DEDUPE_CAPACITY, windowMs: DEFAULT_DEDUPE_WINDOW_MS }) {
    this.seen = new LRUCache<string, true>({
      max: options.capacity,
      ttl: options.windowMs,
    });
  }

  get size(): number {
    return this.seen.size;
  }

  accept(event: MarketEvent): boolean {
    const key = dedupeKey(event);
    if (this.seen.has(key)) {
      return false;
    }
    this.seen.set(key, true);
    return true;
  }

  forget(event: MarketEvent): void {
    this.seen.delete(dedupeKey(event));
  }
}

export function dedupeKey(event: MarketEvent): string {
  return `${event.kind}:${event.itemId}:${event.timestamp}`;
}
