import { z } from 'zod';
import { definitionFor, type EventKindDefinition } from '@/domain/constants/EventKinds';
import { ConfigurationError } from '@/domain/errors/CollectorError';
import { EVENT_KIND_VALUES } from '@/domain/models/EventKind';
import type { BackoffOptions } from '@/infra/reconnect/BackoffStrategy';
import type { HeartbeatOptions } from '@/infra/websocket/HeartbeatMonitor';

const emptyAsUndefined = (value: unknown) => (value === '' ? undefined : value);

const positiveInt = (fallback: number) =>
  z.preprocess(emptyAsUndefined, z.coerce.number().int().positive().finite().default(fallback));

const positiveNumber = (fallback: number) =>
  z.preprocess(emptyAsUndefined, z.coerce.number().positive().finite().default(fallback));

const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

    EVENT_KIND: z.enum(EVENT_KIND_VALUES),
    BITSKINS_API_KEY: z.string().trim().min(1, 'BITSKINS_API_KEY is required'),
    WS_URL: z.preprocess(emptyAsUndefined, z.string().url().default('wss://ws.bitskins.com')),
    API_BASE_URL: z.preprocess(emptyAsUndefined, z.string().url().default('https://api.bitskins.com')),

    MONGODB_URI: z.preprocess(emptyAsUndefined, z.string().default('mongodb://localhost:27017')),
    DATABASE_NAME: z.preprocess(emptyAsUndefined, z.string().default('bitskins_bot')),

    EXCHANGE_RATE_REFRESH_MS: positiveInt(3_600_000),
    FALLBACK_EXCHANGE_RATE: positiveNumber(0.92),

    HANDSHAKE_TIMEOUT_MS: positiveInt(10_000),
    AUTH_TIMEOUT_MS: positiveInt(10_000),
    HEARTBEAT_INTERVAL_MS: positiveInt(15_000),
    HEARTBEAT_TIMEOUT_MS: positiveInt(45_000),

    RECONNECT_BASE_DELAY_MS: positiveInt(1_000),
    RECONNECT_MAX_DELAY_MS: positiveInt(30_000),
    RECONNECT_FACTOR: z.preprocess(emptyAsUndefined, z.coerce.number().min(1).finite().default(2)),
    RECONNECT_JITTER: z.preprocess(emptyAsUndefined, z.coerce.number().min(0).max(1).default(0.2)),
    RECONNECT_STABILITY_MS: positiveInt(60_000),

    DEDUPE_CAPACITY: positiveInt(10_000),
    DEDUPE_WINDOW_MS: positiveInt(600_000),
    PERSIST_MAX_ATTEMPTS: positiveInt(3),
    PERSIST_RETRY_DELAY_MS: z.preprocess(emptyAsUndefined, z.coerce.number().int().min(0).default(500)),
    FRAME_QUEUE_CAPACITY: positiveInt(1_000),

    METRICS_PORT: z.preprocess(emptyAsUndefined, z.coerce.number().int().min(1).max(65535).optional()),
  })
  .superRefine((env, ctx) => {
    if (env.HEARTBEAT_TIMEOUT_MS <= env.HEARTBEAT_INTERVAL_MS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['HEARTBEAT_TIMEOUT_MS'],
        message: 'must be greater than HEARTBEAT_INTERVAL_MS',
      });
    }
    if (env.RECONNECT_MAX_DELAY_MS < env.RECONNECT_BASE_DELAY_MS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['RECONNECT_MAX_DELAY_MS'],
        message: 'must not be less than RECONNECT_BASE_DELAY_MS',
      });
    }
  });

export type CollectorEnv = z.infer<typeof envSchema>;

export interface CollectorConfig {
  nodeEnv: CollectorEnv['NODE_ENV'];
  logLevel: CollectorEnv['LOG_LEVEL'];
  definition: EventKindDefinition;
  apiKey: string;
  wsUrl: string;
  apiBaseUrl: string;
  mongo: {
    uri: string;
    databaseName: string;
  };
  exchangeRate: {
    currency: string;
    fallbackRate: number;
    refreshIntervalMs: number;
  };
  connection: {
    handshakeTimeoutMs: number;
    authTimeoutMs: number;
    heartbeat: HeartbeatOptions;
    backoff: BackoffOptions;
    stabilityMs: number;
  };
  dedupe: {
    capacity: number;
    windowMs: number;
  };
  persist: {
    maxAttempts: number;
    retryDelayMs: number;
  };
  frameQueueCapacity: number;
  metricsPort: number | null;
}

/**
 * 環境変数を検証して設定オブジェクトに変換する。
 * @throws {ConfigurationError} 必須項目の欠落や値の不正。details.issues に変数名ごとの理由を持つ
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CollectorConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      variable: issue.path.join('.'),
      message: issue.message,
    }));
    throw new ConfigurationError(
      `Invalid environment variables: ${issues.map((issue) => issue.variable).join(', ')}`,
      { issues }
    );
  }

  const parsed = result.data;
  return {
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,
    definition: definitionFor(parsed.EVENT_KIND),
    apiKey: parsed.BITSKINS_API_KEY,
    wsUrl: parsed.WS_URL,
    apiBaseUrl: parsed.API_BASE_URL,
    mongo: {
      uri: parsed.MONGODB_URI,
      databaseName: parsed.DATABASE_NAME,
    },
    exchangeRate: {
      currency: 'EUR',
      fallbackRate: parsed.FALLBACK_EXCHANGE_RATE,
      refreshIntervalMs: parsed.EXCHANGE_RATE_REFRESH_MS,
    },
    connection: {
      handshakeTimeoutMs: parsed.HANDSHAKE_TIMEOUT_MS,
      authTimeoutMs: parsed.AUTH_TIMEOUT_MS,
      heartbeat: {
        intervalMs: parsed.HEARTBEAT_INTERVAL_MS,
        timeoutMs: parsed.HEARTBEAT_TIMEOUT_MS,
      },
      backoff: {
        baseDelayMs: parsed.RECONNECT_BASE_DELAY_MS,
        maxDelayMs: parsed.RECONNECT_MAX_DELAY_MS,
        factor: parsed.RECONNECT_FACTOR,
        jitter: parsed.RECONNECT_JITTER,
      },
      stabilityMs: parsed.RECONNECT_STABILITY_MS,
    },
    dedupe: {
      capacity: parsed.DEDUPE_CAPACITY,
      windowMs: parsed.DEDUPE_WINDOW_MS,
    },
    persist: {
      maxAttempts: parsed.PERSIST_MAX_ATTEMPTS,
      retryDelayMs: parsed.PERSIST_RETRY_DELAY_MS,
    },
    frameQueueCapacity: parsed.FRAME_QUEUE_CAPACITY,
    metricsPort: parsed.METRICS_PORT ?? null,
  };
}
