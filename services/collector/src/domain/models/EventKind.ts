/**
 * 収集対象となるマーケットイベント種別。
 * 1 プロセスは必ずいずれか 1 種別のみを扱う。
 */
export type EventKind = 'listed' | 'price_changed' | 'delisted_sold';

export const EVENT_KIND_VALUES = ['listed', 'price_changed', 'delisted_sold'] as const satisfies readonly EventKind[];
