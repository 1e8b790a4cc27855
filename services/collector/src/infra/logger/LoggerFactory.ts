import type { Logger } from '@/application/interfaces/Logger';
import { PinoLogger, type PinoLoggerOptions } from './PinoLogger';

/**
 * ロガーファクトリー
 *
 * プロセス全体で 1 つのルートロガーを共有し、各コンポーネントは child() で component を付けて使う。
 *
 * configure() されるまでは環境変数を直接読む:
 * - `LOG_LEVEL`: ログレベル。デフォルトは `info`
 * - `NODE_ENV`: production の場合は JSON 形式、それ以外は pretty 形式
 */
class LoggerFactory {
  private static instance: Logger | null = null;
  private static options: PinoLoggerOptions | undefined;

  /**
   * 検証済みの設定でルートロガーを作り直す。以後の forComponent() はこの設定を使う。
   */
  static configure(options: PinoLoggerOptions): void {
    LoggerFactory.options = options;
    LoggerFactory.instance = null;
  }

  static create(): Logger {
    if (LoggerFactory.instance === null) {
      LoggerFactory.instance = new PinoLogger(LoggerFactory.options);
    }

    return LoggerFactory.instance;
  }

  /**
   * コンポーネント名を付けた子ロガーを返す。
   */
  static forComponent(component: string, bindings: object = {}): Logger {
    return LoggerFactory.create().child({ component, ...bindings });
  }

  /**
   * ロガーインスタンスをリセット（主にテスト用）
   */
  static reset(): void {
    LoggerFactory.instance = null;
    LoggerFactory.options = undefined;
  }
}

export { LoggerFactory };
