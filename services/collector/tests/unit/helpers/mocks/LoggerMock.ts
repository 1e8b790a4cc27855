import { type Mock, vi } from 'vitest';
import type { Logger } from '@/application/interfaces/Logger';

type LogFn = (msg: string, meta?: object) => void;
type Level = 'debug' | 'info' | 'warn' | 'error';

/**
 * テスト用ロガーモック
 *
 * vitest の vi.fn() を使用して、ロガーメソッドの呼び出しを記録・検証できるようにする。
 * child() は自分自身を返すので、子ロガー経由の出力もこのインスタンスに記録される。
 */
export class LoggerMock implements Logger {
  debug: Mock<LogFn> = vi.fn<LogFn>();
  info: Mock<LogFn> = vi.fn<LogFn>();
  warn: Mock<LogFn> = vi.fn<LogFn>();
  error: Mock<LogFn> = vi.fn<LogFn>();
  child: Mock<(bindings: object) => Logger> = vi.fn<(bindings: object) => Logger>(() => this);

  /**
   * 指定レベルで出力されたメッセージを出力順に返す
   */
  messages(level: Level): string[] {
    return this[level].mock.calls.map(([msg]) => msg);
  }

  /**
   * 指定メッセージの最初の出力に付いた meta を返す
   */
  metaOf(level: Level, msg: string): object | undefined {
    return this[level].mock.calls.find(([logged]) => logged === msg)?.[1];
  }
}
