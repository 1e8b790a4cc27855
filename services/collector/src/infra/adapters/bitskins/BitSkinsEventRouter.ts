import type { ZodError } from 'zod';
import type { EventRouter } from '@/application/interfaces/EventRouter';
import { rawToUsd, priceChangePercent, roundTo } from '@/application/services/priceMath';
import type { EventKindDefinition } from '@/domain/constants/EventKinds';
import { errorMessage, ParseError } from '@/domain/errors/CollectorError';
import type { MarketEvent } from '@/domain/models/MarketEvent';
import type { RawFrame } from '@/domain/models/RawFrame';
import {
  delistedSoldPayloadSchema,
  envelopeSchema,
  type ItemPayload,
  listedPayloadSchema,
  priceChangedPayloadSchema,
  rawDataSchema,
} from './messages/BitSkinsRawMessage';

type CommonFields = Pick<
  MarketEvent,
  'itemId' | 'itemName' | 'skinId' | 'floatValue' | 'timestamp' | 'attributes' | 'rawData'
>;
type RawData = MarketEvent['rawData'];

/**
 * インフラ層: BitSkins フレームの解析（EventRouter 実装）
 *
 * 責務: RawFrame → MarketEvent への変換。1 インスタンスは 1 種別専用で、
 * フレームのチャンネルと action が種別のものかどうかも検証する。
 */
export class BitSkinsEventRouter implements EventRouter {
  constructor(private readonly definition: EventKindDefinition) {}

  parse(frame: RawFrame): MarketEvent | ParseError {
    if (frame.channel !== this.definition.channel) {
      return new ParseError('channel', `channel ${frame.channel} is not handled by ${this.definition.kind}`);
    }

    let decoded: unknown;
    try {
      decoded = JSON.parse(frame.payload.toString('utf-8'));
    } catch (error) {
      return new ParseError('payload', 'payload is not valid JSON', { cause: errorMessage(error) });
    }

    const envelope = envelopeSchema.safeParse(decoded);
    if (!envelope.success) {
      return new ParseError('action', 'frame is not an [action, data] array');
    }

    const [action, data] = envelope.data;
    if (action !== this.definition.channel) {
      return new ParseError('action', `unexpected action ${action}`, { action });
    }

    const rawData = rawDataSchema.safeParse(data);
    if (!rawData.success) {
      return new ParseError('data', 'data is not an object');
    }

    switch (this.definition.kind) {
      case 'listed':
        return this.toListed(rawData.data, frame.receivedAt);
      case 'price_changed':
        return this.toPriceChanged(rawData.data, frame.receivedAt);
      case 'delisted_sold':
        return this.toDelistedSold(rawData.data, frame.receivedAt);
    }
  }

  private toListed(data: RawData, receivedAt: number): MarketEvent | ParseError {
    const result = listedPayloadSchema.safeParse(data);
    if (!result.success) {
      return fromZodError(result.error);
    }
    const common = toCommonFields(result.data, data, receivedAt);
    if (common instanceof ParseError) {
      return common;
    }
    return {
      kind: 'listed',
      ...common,
      collectionName: result.data.collection_name,
      priceRaw: result.data.price,
      priceUsd: rawToUsd(result.data.price),
    };
  }

  private toPriceChanged(data: RawData, receivedAt: number): MarketEvent | ParseError {
    const result = priceChangedPayloadSchema.safeParse(data);
    if (!result.success) {
      return fromZodError(result.error);
    }
    const common = toCommonFields(result.data, data, receivedAt);
    if (common instanceof ParseError) {
      return common;
    }
    const oldPriceUsd = rawToUsd(result.data.old_price);
    const newPriceUsd = rawToUsd(result.data.price);
    return {
      kind: 'price_changed',
      ...common,
      oldPriceRaw: result.data.old_price,
      newPriceRaw: result.data.price,
      oldPriceUsd,
      newPriceUsd,
      priceChangeUsd: roundTo(newPriceUsd - oldPriceUsd, 3),
      priceChangePercent: priceChangePercent(oldPriceUsd, newPriceUsd),
    };
  }

  private toDelistedSold(data: RawData, receivedAt: number): MarketEvent | ParseError {
    const result = delistedSoldPayloadSchema.safeParse(data);
    if (!result.success) {
      return fromZodError(result.error);
    }
    const common = toCommonFields(result.data, data, receivedAt);
    if (common instanceof ParseError) {
      return common;
    }
    return {
      kind: 'delisted_sold',
      ...common,
      priceRaw: result.data.price,
      priceUsd: rawToUsd(result.data.price),
      reason: result.data.reason,
    };
  }
}

function toCommonFields(payload: ItemPayload, rawData: RawData, receivedAt: number): CommonFields | ParseError {
  const timestamp = resolveTimestamp(payload, receivedAt);
  if (timestamp === null) {
    return new ParseError('timestamp', 'timestamp is not a valid date');
  }
  return {
    itemId: payload.id,
    itemName: payload.name,
    skinId: payload.skin_id,
    floatValue: payload.float_value,
    timestamp,
    attributes: {
      assetId: payload.asset_id,
      classId: payload.class_id,
      paintSeed: payload.paint_seed,
      appId: payload.app_id,
      tradehold: payload.tradehold,
      botSteamId: payload.bot_steam_id,
      suggestedPriceRaw: payload.suggested_price,
      suggestedPriceUsd: payload.suggested_price === null ? null : rawToUsd(payload.suggested_price),
    },
    rawData,
  };
}

/**
 * ペイロードの時刻を優先し、無ければ受信時刻を使う。
 * 値はあるが解釈できない場合は null。
 */
function resolveTimestamp(payload: ItemPayload, receivedAt: number): number | null {
  const value = payload.timestamp ?? payload.ts ?? payload.created_at;
  if (value === null || value === undefined) {
    return receivedAt;
  }
  return toEpochMillis(value);
}

/**
 * エポック秒・エポックミリ秒・ISO 文字列を受け付ける。
 * 1e12 未満の数値は秒とみなす。
 */
export function toEpochMillis(value: number | string): number | null {
  let numeric: number | null = null;
  if (typeof value === 'number') {
    numeric = value;
  } else if (/^\d+(\.\d+)?$/.test(value.trim())) {
    numeric = Number(value);
  } else {
    const parsed = Date.parse(value);
    return Number.isNaN(parsed) ? null : parsed;
  }
  if (!Number.isFinite(numeric) || numeric <= 0) {
    return null;
  }
  return numeric < 1e12 ? Math.round(numeric * 1000) : Math.round(numeric);
}

function fromZodError(error: ZodError): ParseError {
  const issue = error.issues[0];
  const field = issue && issue.path.length > 0 ? issue.path.join('.') : 'data';
  return new ParseError(field, `${field}: ${issue?.message ?? 'invalid payload'}`);
}
