/**
 * コレクター内で発生するエラーの基底クラス。
 * code でエラー種別を判別し、details にログ用のコンテキストを持たせる。
 */
export class CollectorError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): { code: string; message: string; details?: Record<string, unknown> } {
    return {
      code: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    };
  }
}

/**
 * 接続・ハンドシェイク・ハートビート切れなど。再接続で回復する。
 */
export class TransportError extends CollectorError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'TRANSPORT_ERROR', details);
  }
}

/**
 * API キーが拒否された。再接続しても回復しないためプロセスを終了させる。
 */
export class AuthenticationError extends CollectorError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'AUTHENTICATION_ERROR', details);
  }
}

/**
 * フレームの形式不正。該当フレームのみ破棄する。
 */
export class ParseError extends CollectorError {
  constructor(
    public readonly field: string,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message, 'PARSE_ERROR', { field, ...details });
  }
}

/**
 * 保存失敗（リトライ上限到達後）。該当イベントのみ破棄する。
 */
export class PersistenceError extends CollectorError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'PERSISTENCE_ERROR', details);
  }
}

/**
 * 為替レートの取得失敗。最後に取得できたレートで継続する。
 */
export class RateSourceError extends CollectorError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'RATE_SOURCE_ERROR', details);
  }
}

export class ConfigurationError extends CollectorError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', details);
  }
}

/**
 * ログ出力用に unknown なエラーからメッセージを取り出す。
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
