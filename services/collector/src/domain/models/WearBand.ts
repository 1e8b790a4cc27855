/**
 * float 値から導出される状態区分。
 */
export type WearBand =
  | 'Factory New'
  | 'Minimal Wear'
  | 'Field-Tested'
  | 'Well-Worn'
  | 'Battle-Scarred'
  | 'Unknown';

export interface WearBandRange {
  band: Exclude<WearBand, 'Unknown'>;
  /** 下限（含む） */
  min: number;
  /** 上限（含まない。最後の区分のみ 1.0 を含む） */
  max: number;
}

/**
 * 状態区分の境界表。CS2 マーケットで定着している区切りをそのまま使う。
 * 順序は float 値の昇順で、区間は重複しない。
 */
export const WEAR_BANDS: readonly WearBandRange[] = [
  { band: 'Factory New', min: 0.0, max: 0.07 },
  { band: 'Minimal Wear', min: 0.07, max: 0.15 },
  { band: 'Field-Tested', min: 0.15, max: 0.38 },
  { band: 'Well-Worn', min: 0.38, max: 0.45 },
  { band: 'Battle-Scarred', min: 0.45, max: 1.0 },
];
