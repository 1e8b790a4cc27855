import type { PersistenceError } from '@/domain/errors/CollectorError';
import type { EnrichedEvent } from '@/domain/models/MarketEvent';

export type PersistResult =
  | { status: 'inserted' | 'updated'; attempts: number }
  | { status: 'failed'; attempts: number; error: PersistenceError };

/**
 * イベント保存先のインターフェイス（インフラ層で実装される）。
 */
export interface EventStore {
  /**
   * (item_id, timestamp) をキーに upsert する。同じイベントを何度渡しても 1 件にしかならない。
   * 失敗時も例外は投げず、status: 'failed' を返す。
   */
  persist(event: EnrichedEvent): Promise<PersistResult>;

  /**
   * 必要なインデックスを作成する。何度呼んでもよい。
   */
  ensureIndexes(): Promise<void>;
}
