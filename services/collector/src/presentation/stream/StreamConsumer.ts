import type { Logger } from '@/application/interfaces/Logger';
import type { IngestEventUsecase } from '@/application/usecases/IngestEventUsecase';
import type { RawFrame } from '@/domain/models/RawFrame';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import type { BoundedQueue } from '@/infra/queue/BoundedQueue';

/**
 * プレゼンテーション層: フレームキューの消費者
 *
 * 責務: キューから 1 件ずつ取り出して usecase に委譲する。
 * 前のフレームの保存が終わるまで次を取り出さないので、接続内の順序が保たれる。
 */
export class StreamConsumer {
  private loop: Promise<void> | null = null;
  private processed = 0;
  private readonly logger: Logger;

  constructor(
    private readonly queue: BoundedQueue<RawFrame>,
    private readonly usecase: IngestEventUsecase,
    logger?: Logger
  ) {
    this.logger = logger ?? LoggerFactory.forComponent('consumer');
  }

  /** 処理を終えたフレーム数 */
  get processedCount(): number {
    return this.processed;
  }

  start(): void {
    if (this.loop) {
      return;
    }
    this.loop = this.run();
  }

  /**
   * キューを閉じ、処理中のフレームが終わるのを待つ。
   * @returns 未処理のまま破棄したフレーム数
   */
  async stop(): Promise<number> {
    const discarded = this.queue.close();
    if (discarded > 0) {
      this.logger.warn('pending frames discarded on shutdown', { discarded });
    }
    await this.loop;
    return discarded;
  }

  private async run(): Promise<void> {
    this.logger.debug('stream consumer started');
    for (;;) {
      const frame = await this.queue.next();
      if (frame === null) {
        break;
      }
      try {
        await this.usecase.execute(frame);
      } catch (error) {
        this.logger.error('unexpected error while ingesting frame', {
          channel: frame.channel,
          receivedAt: frame.receivedAt,
          err: error,
        });
      }
      this.processed += 1;
    }
    this.logger.info('stream consumer stopped', { processed: this.processed });
  }
}
