import { type Collection, type Document, MongoClient } from 'mongodb';
import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import type { EventKindDefinition } from '@/domain/constants/EventKinds';
import { errorMessage, PersistenceError } from '@/domain/errors/CollectorError';
import type { EnrichedEvent } from '@/domain/models/MarketEvent';
import type { EventStore, PersistResult } from '@/domain/repositories/EventStore';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import { toDocument } from './MarketEventDocument';

export interface MongoEventStoreOptions {
  /** 1 イベントあたりの最大試行回数（初回を含む） */
  maxAttempts: number;
  /** 再試行までの待機時間（ミリ秒、固定） */
  retryDelayMs: number;
}

export const DEFAULT_STORE_OPTIONS: MongoEventStoreOptions = {
  maxAttempts: 3,
  retryDelayMs: 500,
};

/**
 * インフラ層: MongoDB への書き込み実装
 *
 * 責務: EnrichedEvent を種別のコレクションに upsert する（実装の詳細を担当）。
 * (item_id, timestamp) をキーにするので、再配信や再試行で重複ドキュメントはできない。
 */
export class MongoEventStore implements EventStore {
  private readonly client: MongoClient;
  private readonly collection: Collection<Document>;
  private readonly logger: Logger;
  private indexesReady = false;

  /**
   * @param mongoUri MongoDB 接続 URI
   * @param databaseName データベース名
   * @param definition 書き込む種別の定義
   * @param options 再試行の設定
   * @param logger ロガー（オプショナル、未指定の場合は LoggerFactory から取得）
   * @param metricsCollector メトリクスコレクター（オプショナル）
   */
  constructor(
    mongoUri: string,
    private readonly databaseName: string,
    private readonly definition: EventKindDefinition,
    private readonly options: MongoEventStoreOptions = DEFAULT_STORE_OPTIONS,
    logger?: Logger,
    private readonly metricsCollector?: MetricsCollector
  ) {
    this.client = new MongoClient(mongoUri);
    this.collection = this.client.db(databaseName).collection(definition.collection);
    this.logger = logger ?? LoggerFactory.forComponent('store', { kind: definition.kind });
  }

  async ensureIndexes(): Promise<void> {
    await this.collection.createIndex({ item_id: 1, timestamp: 1 }, { unique: true, name: 'item_id_timestamp_unique' });
    for (const field of indexedFields(this.definition)) {
      await this.collection.createIndex({ [field]: 1 });
    }
    this.indexesReady = true;
    this.logger.debug('indexes ensured', { collection: this.definition.collection });
  }

  /**
   * 起動時のインデックス作成。失敗しても例外は投げず、最初の書き込み時に作り直す。
   * 接続は MongoClient が最初の操作で張るので、ここで失敗しても起動は続けられる。
   * @returns 作成できた場合は true
   */
  async prepare(): Promise<boolean> {
    try {
      await this.ensureIndexes();
      return true;
    } catch (error) {
      const failure = new PersistenceError('Failed to ensure indexes at startup', {
        database: this.databaseName,
        collection: this.definition.collection,
        cause: errorMessage(error),
      });
      this.logger.warn('index creation deferred to first write', { err: failure });
      this.metricsCollector?.incrementError(failure.code);
      return false;
    }
  }

  async persist(event: EnrichedEvent): Promise<PersistResult> {
    const document = toDocument(event, new Date());
    const filter = { item_id: document.item_id, timestamp: document.timestamp };
    const context = { kind: event.kind, itemId: event.itemId, timestamp: event.timestamp };
    const { maxAttempts, retryDelayMs } = this.options;
    let lastError: unknown;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        if (!this.indexesReady) {
          await this.ensureIndexes();
        }
        const result = await this.collection.updateOne(
          filter,
          { $set: document, $setOnInsert: { created_at: document.processed_at } },
          { upsert: true }
        );
        const status = result.upsertedCount > 0 ? 'inserted' : 'updated';
        this.metricsCollector?.incrementPersisted(this.definition.collection, status);
        return { status, attempts: attempt };
      } catch (error) {
        lastError = error;
        if (attempt < maxAttempts) {
          this.logger.warn('persist failed, retrying', { ...context, attempt, maxAttempts, err: error });
          await new Promise((resolve) => setTimeout(resolve, retryDelayMs));
        }
      }
    }

    this.metricsCollector?.incrementError('PERSISTENCE_ERROR');
    return {
      status: 'failed',
      attempts: maxAttempts,
      error: new PersistenceError(`Failed to persist event after ${maxAttempts} attempts`, {
        collection: this.definition.collection,
        ...context,
        cause: errorMessage(lastError),
      }),
    };
  }

  /**
   * MongoDB 接続を閉じる。
   */
  async close(): Promise<void> {
    await this.client.close();
  }
}

/**
 * 単一フィールドのセカンダリインデックス対象。
 */
export function indexedFields(definition: EventKindDefinition): string[] {
  return ['timestamp', 'item_id', 'item_name', definition.primaryPriceField, 'wear', ...definition.extraIndexedFields];
}
