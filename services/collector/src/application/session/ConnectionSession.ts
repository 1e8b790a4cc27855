import { randomUUID } from 'node:crypto';
import type { EventKind } from '@/domain/models/EventKind';

export type ConnectionState =
  | 'disconnected'
  | 'connecting'
  | 'authenticating'
  | 'subscribed'
  | 'streaming'
  | 'failed';

const TRANSITIONS: Record<ConnectionState, readonly ConnectionState[]> = {
  disconnected: ['connecting'],
  connecting: ['authenticating', 'failed', 'disconnected'],
  authenticating: ['subscribed', 'failed', 'disconnected'],
  subscribed: ['streaming', 'failed', 'disconnected'],
  streaming: ['disconnected', 'failed'],
  failed: ['connecting', 'disconnected'],
};

export interface StateChange {
  from: ConnectionState;
  to: ConnectionState;
  at: number;
  reason?: string;
}

/**
 * 1 プロセスにつき 1 つの論理セッション。
 * ConnectionManager だけが状態を進め、他のコンポーネントは参照と購読のみ行う。
 * 再接続してもインスタンスは同じで、generation が接続ごとに増える。
 */
export class ConnectionSession {
  readonly id = randomUUID();
  private currentState: ConnectionState = 'disconnected';
  private since = Date.now();
  private currentGeneration = 0;
  private listeners: Array<(change: StateChange) => void> = [];

  constructor(
    readonly kind: EventKind,
    readonly channel: string
  ) {}

  get state(): ConnectionState {
    return this.currentState;
  }

  /** 現在の状態に入った時刻（エポックミリ秒） */
  get stateSince(): number {
    return this.since;
  }

  /** 接続試行の通し番号 */
  get generation(): number {
    return this.currentGeneration;
  }

  get isStreaming(): boolean {
    return this.currentState === 'streaming';
  }

  onStateChange(listener: (change: StateChange) => void): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((registered) => registered !== listener);
    };
  }

  /**
   * 状態を進める。許可されていない遷移はプログラムの誤りなので例外にする。
   */
  transition(to: ConnectionState, reason?: string): void {
    const from = this.currentState;
    if (!TRANSITIONS[from].includes(to)) {
      throw new Error(`Illegal connection state transition: ${from} -> ${to}`);
    }
    if (to === 'connecting') {
      this.currentGeneration += 1;
    }
    this.currentState = to;
    this.since = Date.now();
    const change: StateChange = reason === undefined ? { from, to, at: this.since } : { from, to, at: this.since, reason };
    for (const listener of this.listeners) {
      listener(change);
    }
  }
}
