import { z } from 'zod';

/**
 * BitSkins WebSocket API から受信するメッセージのスキーマ。
 * フレームは [action, data] の配列で、データフレームでは action が購読チャンネル名になる。
 * 価格は 1/1000 USD 単位の整数（数値文字列のこともある）。
 */
export const envelopeSchema = z.tuple([z.string(), z.unknown()]).rest(z.unknown());

/** data 部はキー付きオブジェクトであること。保存時は受信したまま raw_data に残す */
export const rawDataSchema = z.record(z.string(), z.unknown());

const itemIdSchema = z
  .union([z.string(), z.number()])
  .transform((value) => String(value).trim())
  .pipe(z.string().min(1, 'must not be empty'));

const rawPriceSchema = z
  .union([
    z.number(),
    z
      .string()
      .trim()
      .regex(/^\d+(\.\d+)?$/, 'must be a non-negative decimal')
      .transform(Number),
  ])
  .pipe(z.number().finite().nonnegative());

const timestampSchema = z.union([z.number(), z.string()]).nullish();

function toNullableString(value: unknown): string | null {
  if (typeof value === 'string') {
    return value === '' ? null : value;
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  return null;
}

function toNullableNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string' && /^-?\d+(\.\d+)?$/.test(value.trim())) {
    return Number(value);
  }
  return null;
}

/** 価格として扱えない値（負数・非有限）は null */
function toNullablePrice(value: unknown): number | null {
  const numeric = toNullableNumber(value);
  return numeric !== null && numeric >= 0 ? numeric : null;
}

function toNullableInt(value: unknown): number | null {
  const numeric = toNullableNumber(value);
  return numeric !== null && Number.isInteger(numeric) ? numeric : null;
}

const itemPayloadSchema = z.object({
  id: itemIdSchema,
  name: z.string(),
  float_value: z
    .number()
    .finite()
    .nullish()
    .transform((value) => value ?? null),
  skin_id: z.unknown().transform(toNullableInt),
  asset_id: z.unknown().transform(toNullableString),
  class_id: z.unknown().transform(toNullableString),
  paint_seed: z.unknown().transform(toNullableInt),
  app_id: z.unknown().transform(toNullableInt),
  tradehold: z.unknown().transform(toNullableInt),
  bot_steam_id: z.unknown().transform(toNullableString),
  suggested_price: z.unknown().transform(toNullablePrice),
  timestamp: timestampSchema,
  ts: timestampSchema,
  created_at: timestampSchema,
});

export const listedPayloadSchema = itemPayloadSchema.extend({
  price: rawPriceSchema,
  collection_name: z.unknown().transform(toNullableString),
});

export const priceChangedPayloadSchema = itemPayloadSchema.extend({
  price: rawPriceSchema,
  old_price: rawPriceSchema,
});

export const delistedSoldPayloadSchema = itemPayloadSchema.extend({
  price: rawPriceSchema,
  reason: z.unknown().transform((value) => {
    const normalized = typeof value === 'string' ? value.trim().toLowerCase() : '';
    return normalized === 'sold' || normalized === 'delisted' ? normalized : 'unknown';
  }),
});

export type ItemPayload = z.infer<typeof itemPayloadSchema>;
