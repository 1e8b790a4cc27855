import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import type { RateSource } from '@/application/interfaces/RateProvider';
import { errorMessage, RateSourceError } from '@/domain/errors/CollectorError';

const rateValueSchema = z
  .union([
    z.number(),
    z
      .string()
      .trim()
      .regex(/^\d+(\.\d+)?$/)
      .transform(Number),
  ])
  .pipe(z.number().finite().positive());

/**
 * インフラ層: BitSkins REST API から為替レートを取得する
 *
 * GET /config/currency/list は `data`・`rates`・ルート直下のいずれかにレート表を返す。
 * 表は { EUR: 0.92 } 形式のほか [{ code: 'EUR', rate: 0.92 }] 形式も受け付ける。
 */
export class BitSkinsRateSource implements RateSource {
  private readonly client: AxiosInstance;

  constructor(baseUrl: string, apiKey: string, timeoutMs = 10000) {
    this.client = axios.create({
      baseURL: baseUrl,
      timeout: timeoutMs,
      headers: {
        'x-apikey': apiKey,
      },
    });
  }

  async fetchRate(currency: string): Promise<number> {
    let body: unknown;
    try {
      const response = await this.client.get<unknown>('/config/currency/list');
      body = response.data;
    } catch (error) {
      throw new RateSourceError('Currency list request failed', {
        currency,
        ...(axios.isAxiosError(error) && error.response && { status: error.response.status }),
        cause: errorMessage(error),
      });
    }

    const parsed = rateValueSchema.safeParse(findRate(extractRateTable(body), currency));
    if (!parsed.success) {
      throw new RateSourceError(`No usable ${currency} rate in currency list`, { currency });
    }
    return parsed.data;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function extractRateTable(body: unknown): unknown {
  if (!isRecord(body)) {
    return body;
  }
  if (isRecord(body.data) || Array.isArray(body.data)) {
    return body.data;
  }
  if (isRecord(body.rates) || Array.isArray(body.rates)) {
    return body.rates;
  }
  return body;
}

function findRate(table: unknown, currency: string): unknown {
  if (Array.isArray(table)) {
    const entry = table.find(
      (candidate) => isRecord(candidate) && (candidate.code === currency || candidate.currency === currency)
    );
    return isRecord(entry) ? (entry.rate ?? entry.value) : undefined;
  }
  if (isRecord(table)) {
    return table[currency];
  }
  return undefined;
}
