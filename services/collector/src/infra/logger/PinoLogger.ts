import pino from 'pino';
import type { Logger } from '@/application/interfaces/Logger';

export interface PinoLoggerOptions {
  level?: string;
  pretty?: boolean;
}

/**
 * pino を使用したロガー実装
 *
 * 開発環境では `pino-pretty` で人間可読形式、本番環境では JSON 1 行で出力する。
 * API キーは redact で伏せる。
 */
export class PinoLogger implements Logger {
  private readonly pinoLogger: pino.Logger;

  constructor(options?: PinoLoggerOptions | pino.Logger) {
    this.pinoLogger = isPinoLogger(options) ? options : createPino(options);
  }

  get level(): string {
    return this.pinoLogger.level;
  }

  debug(msg: string, meta?: object): void {
    this.pinoLogger.debug(meta ?? {}, msg);
  }

  info(msg: string, meta?: object): void {
    this.pinoLogger.info(meta ?? {}, msg);
  }

  warn(msg: string, meta?: object): void {
    this.pinoLogger.warn(meta ?? {}, msg);
  }

  error(msg: string, meta?: object): void {
    this.pinoLogger.error(meta ?? {}, msg);
  }

  child(bindings: object): Logger {
    return new PinoLogger(this.pinoLogger.child(bindings));
  }
}

function isPinoLogger(value: PinoLoggerOptions | pino.Logger | undefined): value is pino.Logger {
  return value !== undefined && 'child' in value && typeof value.child === 'function';
}

function createPino(options?: PinoLoggerOptions): pino.Logger {
  const level = options?.level ?? process.env.LOG_LEVEL ?? 'info';
  const usePretty = options?.pretty ?? process.env.NODE_ENV !== 'production';
  const redact = ['apiKey', '*.apiKey', 'headers["x-apikey"]'];

  if (usePretty) {
    return pino({
      level,
      redact,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss.l',
          ignore: 'pid,hostname',
        },
      },
    });
  }
  return pino({ level, redact });
}
