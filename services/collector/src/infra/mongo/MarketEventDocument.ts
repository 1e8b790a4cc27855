import type { EventKind } from '@/domain/models/EventKind';
import type { DelistReason, EnrichedEvent } from '@/domain/models/MarketEvent';
import type { WearBand } from '@/domain/models/WearBand';

/**
 * 3 コレクション共通のフィールド。
 * 下流の集計 API がこの snake_case の名前で読むため、変更しないこと。
 */
type CommonDocumentFields = {
  item_id: string;
  item_name: string;
  timestamp: Date;
  event_type: EventKind;
  wear: WearBand;
  wear_from_name: WearBand;
  float_value: number | null;
  price_eur: number;
  exchange_rate: number;
  processed_at: Date;
  skin_id: number | null;
  asset_id: string | null;
  class_id: string | null;
  paint_seed: number | null;
  app_id: number | null;
  tradehold: number | null;
  bot_steam_id: string | null;
  suggested_price_raw: number | null;
  suggested_price_usd: number | null;
  suggested_price_eur: number | null;
  raw_data: Record<string, unknown>;
};

export type ListedItemDocument = CommonDocumentFields & {
  price_raw: number;
  price_usd: number;
  collection_name: string | null;
};

export type PriceChangedItemDocument = CommonDocumentFields & {
  old_price_raw: number;
  new_price_raw: number;
  old_price_usd: number;
  new_price_usd: number;
  price_change_usd: number;
  price_change_percent: number | null;
  old_price_eur: number;
  price_change_eur: number;
};

export type DelistedSoldItemDocument = CommonDocumentFields & {
  price_raw: number;
  price_usd: number;
  reason: DelistReason;
};

export type MarketEventDocument = ListedItemDocument | PriceChangedItemDocument | DelistedSoldItemDocument;

export function toDocument(event: EnrichedEvent, processedAt: Date): MarketEventDocument {
  const common: CommonDocumentFields = {
    item_id: event.itemId,
    item_name: event.itemName,
    timestamp: new Date(event.timestamp),
    event_type: event.kind,
    wear: event.wear,
    wear_from_name: event.wearFromName,
    float_value: event.floatValue,
    price_eur: event.priceEur,
    exchange_rate: event.exchangeRate,
    processed_at: processedAt,
    skin_id: event.skinId,
    asset_id: event.attributes.assetId,
    class_id: event.attributes.classId,
    paint_seed: event.attributes.paintSeed,
    app_id: event.attributes.appId,
    tradehold: event.attributes.tradehold,
    bot_steam_id: event.attributes.botSteamId,
    suggested_price_raw: event.attributes.suggestedPriceRaw,
    suggested_price_usd: event.attributes.suggestedPriceUsd,
    suggested_price_eur: event.suggestedPriceEur,
    raw_data: event.rawData,
  };

  switch (event.kind) {
    case 'listed':
      return {
        ...common,
        price_raw: event.priceRaw,
        price_usd: event.priceUsd,
        collection_name: event.collectionName,
      };
    case 'price_changed':
      return {
        ...common,
        old_price_raw: event.oldPriceRaw,
        new_price_raw: event.newPriceRaw,
        old_price_usd: event.oldPriceUsd,
        new_price_usd: event.newPriceUsd,
        price_change_usd: event.priceChangeUsd,
        price_change_percent: event.priceChangePercent,
        old_price_eur: event.oldPriceEur,
        price_change_eur: event.priceChangeEur,
      };
    case 'delisted_sold':
      return { ...common, price_raw: event.priceRaw, price_usd: event.priceUsd, reason: event.reason };
  }
}
