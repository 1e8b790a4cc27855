import 'dotenv/config';
import process from 'node:process';
import { Enricher } from '@/application/services/Enricher';
import { IngestEventUsecase } from '@/application/usecases/IngestEventUsecase';
import type { RawFrame } from '@/domain/models/RawFrame';
import { ConfigurationError } from '@/domain/errors/CollectorError';
import { BitSkinsConnectionManager } from '@/infra/adapters/bitskins/BitSkinsConnectionManager';
import { BitSkinsEventRouter } from '@/infra/adapters/bitskins/BitSkinsEventRouter';
import { loadConfig } from '@/infra/config/CollectorConfig';
import { Deduper } from '@/infra/dedupe/Deduper';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import { MetricsServer } from '@/infra/metrics/MetricsServer';
import { PrometheusMetricsCollector } from '@/infra/metrics/PrometheusMetricsCollector';
import { MongoEventStore } from '@/infra/mongo/MongoEventStore';
import { BoundedQueue } from '@/infra/queue/BoundedQueue';
import { BitSkinsRateSource } from '@/infra/rates/BitSkinsRateSource';
import { ExchangeRateCache } from '@/infra/rates/ExchangeRateCache';
import { StreamConsumer } from '@/presentation/stream/StreamConsumer';

/**
 * エントリーポイント: アプリケーションの起動処理、依存関係の注入、シグナルハンドリング
 *
 * 責務:
 * - `.env` 読み込みと環境変数の検証
 * - コンポーネントの生成と初期化
 * - シグナルハンドリング
 *
 * 注意: WebSocket の挙動や正規化ロジックは main.ts から完全に追い出し、ただ「配線するだけ」にする。
 */
async function bootstrap(): Promise<void> {
  const config = loadConfig(process.env);
  LoggerFactory.configure({ level: config.logLevel, pretty: config.nodeEnv !== 'production' });
  const { definition } = config;
  const kind = definition.kind;
  const logger = LoggerFactory.forComponent('main', { kind });

  const metricsCollector = new PrometheusMetricsCollector({ kind });

  // インフラ層: 保存先。起動時に MongoDB へ届かなくても止めず、書き込み時に接続とインデックス作成を再試行する
  const store = new MongoEventStore(
    config.mongo.uri,
    config.mongo.databaseName,
    definition,
    config.persist,
    LoggerFactory.forComponent('store', { kind }),
    metricsCollector
  );
  await store.prepare();

  const rates = new ExchangeRateCache(
    new BitSkinsRateSource(config.apiBaseUrl, config.apiKey),
    config.exchangeRate,
    LoggerFactory.forComponent('rates', { kind }),
    metricsCollector
  );
  await rates.start();

  // アプリケーション層: parse → enrich → dedupe → persist
  const usecase = new IngestEventUsecase(
    definition,
    new BitSkinsEventRouter(definition),
    new Enricher(rates),
    new Deduper(config.dedupe),
    store,
    LoggerFactory.forComponent('ingest', { kind }),
    metricsCollector
  );

  const queue = new BoundedQueue<RawFrame>(config.frameQueueCapacity);
  const consumer = new StreamConsumer(queue, usecase, LoggerFactory.forComponent('consumer', { kind }));

  let shuttingDown = false;
  const shutdown = async (exitCode: number): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info('Shutting down collector...', { exitCode });

    // 再接続を止め、処理中のフレームを書き終えてからソケットを閉じる
    manager.stopReconnecting();
    await consumer.stop();
    manager.shutdown();
    rates.stop();
    await metricsServer?.stop();
    await store.close();
    process.exit(exitCode);
  };

  const manager = new BitSkinsConnectionManager(definition, queue, {
    wsUrl: config.wsUrl,
    apiKey: config.apiKey,
    handshakeTimeoutMs: config.connection.handshakeTimeoutMs,
    authTimeoutMs: config.connection.authTimeoutMs,
    heartbeat: config.connection.heartbeat,
    backoff: config.connection.backoff,
    stabilityMs: config.connection.stabilityMs,
    onFatal: (error) => {
      logger.error('Authentication failed, exiting', { err: error });
      void shutdown(1);
    },
    logger: LoggerFactory.forComponent('connection', { kind }),
    metricsCollector,
  });

  const metricsServer =
    config.metricsPort === null
      ? null
      : new MetricsServer(
          metricsCollector,
          config.metricsPort,
          LoggerFactory.forComponent('metrics', { kind }),
          () => manager.session.isStreaming
        );
  metricsServer?.start();

  // 接続確立を待つ間に届いたシグナルも取りこぼさない
  process.on('SIGINT', () => void shutdown(0));
  process.on('SIGTERM', () => void shutdown(0));

  consumer.start();
  await manager.start();
}

bootstrap().catch((error: unknown) => {
  const logger = LoggerFactory.forComponent('main');
  if (error instanceof ConfigurationError) {
    logger.error('Invalid configuration', { issues: error.details?.issues });
  } else {
    logger.error('Failed to bootstrap collector', { err: error });
  }
  process.exit(1);
});
