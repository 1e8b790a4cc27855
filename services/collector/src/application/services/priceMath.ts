/**
 * マーケットの生価格は 1/1000 USD 単位の整数で届く。
 */
export const RAW_PRICE_SCALE = 1000;

/**
 * 10 進での四捨五入（0.5 は 0 から遠い方へ）。
 * 2 進浮動小数の誤差で 1.0005 が 1.000 に落ちないよう、指数表記で桁をずらしてから丸める。
 */
export function roundTo(value: number, digits: number): number {
  if (!Number.isFinite(value)) {
    return value;
  }
  const sign = value < 0 ? -1 : 1;
  const magnitude = Math.abs(value);
  const text = String(magnitude);
  if (text.includes('e')) {
    const factor = 10 ** digits;
    return (sign * Math.round(magnitude * factor)) / factor;
  }
  const shifted = Math.round(Number(`${text}e${digits}`));
  const rounded = Number(`${shifted}e-${digits}`);
  return rounded === 0 ? 0 : sign * rounded;
}

export function rawToUsd(raw: number): number {
  return roundTo(raw / RAW_PRICE_SCALE, 3);
}

export function convertUsd(priceUsd: number, rate: number): number {
  return roundTo(priceUsd * rate, 3);
}

/**
 * 価格変化率（%）を小数 2 桁で返す。旧価格が 0 なら算出不能として null。
 */
export function priceChangePercent(oldPriceUsd: number, newPriceUsd: number): number | null {
  if (oldPriceUsd === 0) {
    return null;
  }
  return roundTo(((newPriceUsd - oldPriceUsd) / oldPriceUsd) * 100, 2);
}
