import type { RateProvider } from '@/application/interfaces/RateProvider';
import type { EnrichedEvent, Enrichment, MarketEvent } from '@/domain/models/MarketEvent';
import { WEAR_BANDS, type WearBand } from '@/domain/models/WearBand';
import { convertUsd, roundTo } from './priceMath';

const NAME_SUFFIXES: ReadonlyArray<[string, WearBand]> = WEAR_BANDS.map(
  ({ band }): [string, WearBand] => [`(${band})`, band]
);

/**
 * float 値から状態区分を引く。欠損・範囲外は Unknown。
 */
export function wearFromFloat(floatValue: number | null): WearBand {
  if (floatValue === null || !Number.isFinite(floatValue) || floatValue < 0 || floatValue > 1) {
    return 'Unknown';
  }
  const last = WEAR_BANDS.length - 1;
  const range = WEAR_BANDS.find(
    ({ min, max }, index) => floatValue >= min && (floatValue < max || (index === last && floatValue <= max))
  );
  return range?.band ?? 'Unknown';
}

/**
 * "AK-47 | Redline (Field-Tested)" のような名前の末尾から状態区分を読む。
 */
export function wearFromName(itemName: string): WearBand {
  const match = NAME_SUFFIXES.find(([suffix]) => itemName.includes(suffix));
  return match ? match[1] : 'Unknown';
}

/**
 * アプリケーション層: イベントの派生属性付与
 *
 * 責務: 表示通貨（EUR）への換算と状態区分の付与。I/O はキャッシュ済みレートの参照のみ。
 */
export class Enricher {
  constructor(private readonly rates: RateProvider) {}

  enrich(event: MarketEvent): EnrichedEvent {
    const rate = this.rates.getRate();
    const suggestedPriceUsd = event.attributes.suggestedPriceUsd;
    const base = (priceUsd: number): Enrichment => ({
      priceEur: convertUsd(priceUsd, rate),
      suggestedPriceEur: suggestedPriceUsd === null ? null : convertUsd(suggestedPriceUsd, rate),
      wear: wearFromFloat(event.floatValue),
      wearFromName: wearFromName(event.itemName),
      exchangeRate: rate,
    });

    switch (event.kind) {
      case 'listed':
        return { ...event, ...base(event.priceUsd) };
      case 'price_changed': {
        const enrichment = base(event.newPriceUsd);
        const oldPriceEur = convertUsd(event.oldPriceUsd, rate);
        return {
          ...event,
          ...enrichment,
          oldPriceEur,
          priceChangeEur: roundTo(enrichment.priceEur - oldPriceEur, 3),
        };
      }
      case 'delisted_sold':
        return { ...event, ...base(event.priceUsd) };
    }
  }
}
