import type { MarketEvent } from '@/domain/models/MarketEvent';

/**
 * 直近に処理したイベントの再配信を弾くフィルター。
 * 保存の重複防止は EventStore の upsert が担うので、ここは無駄な書き込みを減らすためだけにある。
 */
export interface DuplicateFilter {
  /**
   * 初見なら記録して true、ウィンドウ内で既出なら false を返す。
   */
  accept(event: MarketEvent): boolean;

  /**
   * 記録を取り消す（保存に失敗したイベントを再配信で拾えるようにする）。
   */
  forget(event: MarketEvent): void;
}
