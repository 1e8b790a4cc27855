import { listedEvent } from '@test/unit/helpers/events';
import { describe, expect, it } from 'vitest';
import { Deduper, dedupeKey } from '@/infra/dedupe/Deduper';

/**
 * 単体テスト: Deduper
 *
 * 優先度1: 重複判定
 * - (kind, itemId, timestamp) が同じイベントは 2 回目以降を拒否する
 * - forget() で記録を取り消せる
 * - 容量超過と時間窓による追い出し
 */
describe('Deduper', () => {
  it('キーは kind / itemId / timestamp をつないだ文字列', () => {
    expect(dedupeKey(listedEvent({ itemId: '42', timestamp: 1714564800000 }))).toBe('listed:42:1714564800000');
  });

  it('初見のイベントは受け付け、同じキーの 2 回目は拒否する', () => {
    const deduper = new Deduper();

    expect(deduper.accept(listedEvent())).toBe(true);
    expect(deduper.accept(listedEvent({ priceUsd: 0.5 }))).toBe(false);
    expect(deduper.size).toBe(1);
  });

  it('timestamp か itemId が違えば別イベントとして受け付ける', () => {
    const deduper = new Deduper();
    const event = listedEvent();

    expect(deduper.accept(event)).toBe(true);
    expect(deduper.accept({ ...event, timestamp: event.timestamp + 1 })).toBe(true);
    expect(deduper.accept({ ...event, itemId: '6237036' })).toBe(true);
  });

  it('forget() した後は同じイベントを再び受け付ける', () => {
    const deduper = new Deduper();
    const event = listedEvent();

    deduper.accept(event);
    deduper.forget(event);

    expect(deduper.accept(event)).toBe(true);
  });

  it('容量を超えると最も古いキーから追い出す', () => {
    const deduper = new Deduper({ capacity: 2, windowMs: 60_000 });

    deduper.accept(listedEvent({ itemId: '1' }));
    deduper.accept(listedEvent({ itemId: '2' }));
    deduper.accept(listedEvent({ itemId: '3' }));

    expect(deduper.size).toBe(2);
    expect(deduper.accept(listedEvent({ itemId: '1' }))).toBe(true);
    expect(deduper.accept(listedEvent({ itemId: '3' }))).toBe(false);
  });

  it('時間窓を過ぎたキーは初見として扱う', async () => {
    // lru-cache は読み込み時の performance を使うので実時間で待つ
    const deduper = new Deduper({ capacity: 10, windowMs: 20 });
    const event = listedEvent();

    deduper.accept(event);
    await new Promise((resolve) => setTimeout(resolve, 40));

    expect(deduper.accept(event)).toBe(true);
  });
});
