/**
 * 換算レートの参照口。Enricher はこれだけに依存する。
 */
export interface RateProvider {
  /** 現在保持している USD→表示通貨 のレート */
  getRate(): number;
}

/**
 * 外部の為替レート取得元。
 */
export interface RateSource {
  /**
   * @param currency 通貨コード（例: 'EUR'）
   * @returns 1 USD あたりのレート
   * @throws {RateSourceError} 取得・解釈できなかった場合
   */
  fetchRate(currency: string): Promise<number>;
}
