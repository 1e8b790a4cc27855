import type { WearBand } from './WearBand';

/**
 * 全種別に共通するアイテム付帯情報。
 * マーケット側が送ってこない項目は null。
 */
export interface ItemAttributes {
  assetId: string | null;
  classId: string | null;
  paintSeed: number | null;
  appId: number | null;
  tradehold: number | null;
  botSteamId: string | null;
  /** 1/1000 USD 単位の参考価格 */
  suggestedPriceRaw: number | null;
  suggestedPriceUsd: number | null;
}

interface MarketEventBase {
  /** アイテム ID（ライフサイクルを通じて不変） */
  itemId: string;
  itemName: string;
  skinId: number | null;
  /** [0, 1] の状態値。欠損時は null */
  floatValue: number | null;
  /** イベント時刻（エポックミリ秒） */
  timestamp: number;
  attributes: ItemAttributes;
  /** 受信した data 部そのまま */
  rawData: Record<string, unknown>;
}

export interface ListedEvent extends MarketEventBase {
  kind: 'listed';
  collectionName: string | null;
  priceRaw: number;
  priceUsd: number;
}

export interface PriceChangedEvent extends MarketEventBase {
  kind: 'price_changed';
  oldPriceRaw: number;
  newPriceRaw: number;
  oldPriceUsd: number;
  newPriceUsd: number;
  priceChangeUsd: number;
  /** 旧価格が 0 の場合は算出不能のため null */
  priceChangePercent: number | null;
}

export type DelistReason = 'sold' | 'delisted' | 'unknown';

export interface DelistedSoldEvent extends MarketEventBase {
  kind: 'delisted_sold';
  priceRaw: number;
  priceUsd: number;
  reason: DelistReason;
}

/**
 * EventRouter が生成する型付きイベント（kind によるタグ付きユニオン）。
 */
export type MarketEvent = ListedEvent | PriceChangedEvent | DelistedSoldEvent;

/**
 * Enricher が付与する派生属性。
 */
export interface Enrichment {
  priceEur: number;
  /** 参考価格が無ければ null */
  suggestedPriceEur: number | null;
  wear: WearBand;
  wearFromName: WearBand;
  /** 換算に使った USD→EUR レート */
  exchangeRate: number;
}

export type EnrichedListedEvent = ListedEvent & Enrichment;
export type EnrichedPriceChangedEvent = PriceChangedEvent &
  Enrichment & {
    oldPriceEur: number;
    /** 換算後の新旧差（priceEur - oldPriceEur） */
    priceChangeEur: number;
  };
export type EnrichedDelistedSoldEvent = DelistedSoldEvent & Enrichment;

export type EnrichedEvent = EnrichedListedEvent | EnrichedPriceChangedEvent | EnrichedDelistedSoldEvent;
