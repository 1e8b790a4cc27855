/**
 * インフラ層: 容量上限付きの非同期キュー
 *
 * ソケットのコールバック（生産者 1 つ）と StreamConsumer（消費者 1 つ）の間に置く。
 * 満杯のときは新しい要素を受け付けず false を返す。
 */
export class BoundedQueue<T> {
  private items: T[] = [];
  private waiters: Array<(item: T | null) => void> = [];
  private closed = false;

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer: ${capacity}`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * @returns 受け付けた場合は true。満杯またはクローズ済みなら false
   */
  push(item: T): boolean {
    if (this.closed) {
      return false;
    }
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(item);
      return true;
    }
    if (this.items.length >= this.capacity) {
      return false;
    }
    this.items.push(item);
    return true;
  }

  /**
   * 次の要素を待つ。クローズ後は null で解決する。
   */
  next(): Promise<T | null> {
    if (this.items.length > 0) {
      const [head] = this.items.splice(0, 1);
      return Promise.resolve(head);
    }
    if (this.closed) {
      return Promise.resolve(null);
    }
    return new Promise<T | null>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /**
   * 以降の push を拒否し、待機中の next() を null で解決する。
   * @returns 未処理のまま破棄した要素数
   */
  close(): number {
    if (this.closed) {
      return 0;
    }
    this.closed = true;
    const discarded = this.items.length;
    this.items = [];
    for (const waiter of this.waiters) {
      waiter(null);
    }
    this.waiters = [];
    return discarded;
  }
}
