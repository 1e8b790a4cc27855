export interface HeartbeatOptions {
  /** ping を送る間隔（ミリ秒） */
  intervalMs: number;
  /** 最後の受信からこの時間を超えたら切断扱い（ミリ秒） */
  timeoutMs: number;
}

/**
 * インフラ層: ハートビート監視
 *
 * 一定間隔で ping を送り、メッセージか pong を最後に受けてから timeoutMs を超えたら onTimeout を呼ぶ。
 * タイムアウト後は自動的に停止する。
 */
export class HeartbeatMonitor {
  private timer: NodeJS.Timeout | null = null;
  private lastSeenAt = 0;

  constructor(
    private readonly options: HeartbeatOptions,
    private readonly sendPing: () => void,
    private readonly onTimeout: (silentForMs: number) => void
  ) {}

  get running(): boolean {
    return this.timer !== null;
  }

  start(): void {
    this.stop();
    this.lastSeenAt = Date.now();
    this.timer = setInterval(() => this.check(), this.options.intervalMs);
  }

  /**
   * 受信があったことを記録する。
   */
  touch(): void {
    this.lastSeenAt = Date.now();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  private check(): void {
    const silentForMs = Date.now() - this.lastSeenAt;
    if (silentForMs > this.options.timeoutMs) {
      this.stop();
      this.onTimeout(silentForMs);
      return;
    }
    this.sendPing();
  }
}
