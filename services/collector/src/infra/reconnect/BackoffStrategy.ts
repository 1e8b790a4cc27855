export interface BackoffOptions {
  /** 初回の遅延（ミリ秒） */
  baseDelayMs: number;
  /** 遅延の上限（ミリ秒） */
  maxDelayMs: number;
  /** 1 回ごとの倍率 */
  factor: number;
  /** ゆらぎの割合（0〜1）。0.2 なら最大 +20% */
  jitter: number;
}

export const DEFAULT_BACKOFF: BackoffOptions = {
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  factor: 2,
  jitter: 0.2,
};

/**
 * インフラ層: ジッター付き指数バックオフ
 *
 * 連続失敗中の遅延は前回値を下回らず、maxDelayMs を超えない。
 */
export class BackoffStrategy {
  private attempt = 0;
  private lastDelay = 0;
  private readonly options: BackoffOptions;

  /**
   * @param options バックオフ設定
   * @param random [0, 1) の乱数源（テストで固定するため差し替え可能）
   */
  constructor(
    options: Partial<BackoffOptions> = {},
    private readonly random: () => number = Math.random
  ) {
    this.options = { ...DEFAULT_BACKOFF, ...options };
  }

  /** 現在の連続失敗回数 */
  get attempts(): number {
    return this.attempt;
  }

  /**
   * 次の再接続までの遅延時間（ミリ秒）を取得する。
   */
  getNextDelay(): number {
    const { baseDelayMs, maxDelayMs, factor, jitter } = this.options;
    const exponential = baseDelayMs * factor ** this.attempt;
    const jittered = exponential * (1 + jitter * this.random());
    const delay = Math.round(Math.min(maxDelayMs, Math.max(this.lastDelay, jittered)));
    this.attempt += 1;
    this.lastDelay = delay;
    return delay;
  }

  /**
   * カウンターをリセットする。安定してストリーミングできたときに呼び出される。
   */
  reset(): void {
    this.attempt = 0;
    this.lastDelay = 0;
  }
}
