import type { EventKind } from '@/domain/models/EventKind';

/**
 * 種別ごとの差分だけを持つ定義表。
 * パイプライン本体は 1 つで、この表の 1 行を渡して種別を切り替える。
 */
export interface EventKindDefinition {
  kind: EventKind;
  /** WS_SUB で購読するチャンネル名（フレームの action と一致する） */
  channel: string;
  /** 保存先コレクション */
  collection: string;
  /** 種別の主価格フィールド（インデックス対象） */
  primaryPriceField: 'price_usd' | 'new_price_usd';
  /** 共通インデックスに加えて張るフィールド */
  extraIndexedFields: readonly string[];
}

export const EVENT_KINDS = {
  listed: {
    kind: 'listed',
    channel: 'listed',
    collection: 'listed_items',
    primaryPriceField: 'price_usd',
    extraIndexedFields: ['float_value', 'skin_id'],
  },
  price_changed: {
    kind: 'price_changed',
    channel: 'price_changed',
    collection: 'price_changed_items',
    primaryPriceField: 'new_price_usd',
    extraIndexedFields: ['price_change_percent'],
  },
  delisted_sold: {
    kind: 'delisted_sold',
    channel: 'delisted_or_sold',
    collection: 'delisted_sold_items',
    primaryPriceField: 'price_usd',
    extraIndexedFields: ['reason'],
  },
} as const satisfies Record<EventKind, EventKindDefinition>;

export function definitionFor(kind: EventKind): EventKindDefinition {
  return EVENT_KINDS[kind];
}
