import 'dotenv/config';
import process from 'node:process';
import type { Logger } from '@/application/interfaces/Logger';
import { IngestFrameUsecase } from '@/application/usecases/IngestFrameUsecase';
import { SelectInstrumentsUsecase } from '@/application/usecases/SelectInstrumentsUsecase';
import { errorKind } from '@/domain/errors/IngestorError';
import { DeribitFeedSession } from '@/infra/adapters/deribit/DeribitFeedSession';
import { DeribitFrameDecoder } from '@/infra/adapters/deribit/DeribitFrameDecoder';
import { DeribitInstrumentDiscovery } from '@/infra/adapters/deribit/DeribitInstrumentDiscovery';
import { loadIngestorConfig, loadStorageConfig } from '@/infra/config/loadConfig';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import { MetricsServer } from '@/infra/metrics/MetricsServer';
import { PrometheusMetricsCollector } from '@/infra/metrics/PrometheusMetricsCollector';
import { BackoffStrategy } from '@/infra/reconnect/BackoffStrategy';
import { ReconnectManager } from '@/infra/reconnect/ReconnectManager';
import { RedisRecordStore } from '@/infra/redis/RedisRecordStore';
import { ReportCommand } from '@/presentation/cli/ReportCommand';
import { IngestionLoop } from '@/presentation/ingestion/IngestionLoop';

/**
 * インジェスタを起動し、SIGINT/SIGTERM で止まるまで取り込み続ける。
 */
async function runIngestor(logger: Logger): Promise<void> {
  const config = loadIngestorConfig();

  const metricsCollector = new PrometheusMetricsCollector();
  const metricsServer =
    config.metricsPort === null ? null : new MetricsServer(metricsCollector, config.metricsPort, logger);

  // インフラ層
  const store = new RedisRecordStore(config.storage, logger);
  const session = new DeribitFeedSession({
    wsUrl: config.feed.wsUrl,
    connectTimeoutMs: config.feed.connectTimeoutMs,
    requestTimeoutMs: config.feed.requestTimeoutMs,
    idleTimeoutMs: config.feed.idleTimeoutMs,
    logger,
  });
  const discovery = new DeribitInstrumentDiscovery({
    restUrl: config.feed.restUrl,
    credentials: config.feed.credentials,
    requestTimeoutMs: config.feed.requestTimeoutMs,
    logger,
  });
  const reconnectManager = new ReconnectManager(new BackoffStrategy(config.backoff), logger, metricsCollector);

  // アプリケーション層
  const usecase = new IngestFrameUsecase(new DeribitFrameDecoder(), store, logger, metricsCollector);
  const selector = new SelectInstrumentsUsecase(config.discovery.subscriptionCap);

  const loop = new IngestionLoop(session, discovery, selector, usecase, reconnectManager, {
    credentials: config.feed.credentials,
    discovery: {
      currency: config.discovery.currency,
      kind: config.discovery.kind,
      includeExpired: config.discovery.includeExpired,
    },
    logger,
    metricsCollector,
  });

  const controller = new AbortController();
  const shutdown = (signal: NodeJS.Signals) => {
    logger.info('Shutting down ingestor...', { signal });
    controller.abort();
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  try {
    await metricsServer?.start();
    await loop.run(controller.signal);
  } finally {
    await metricsServer?.stop();
    await store.close();
  }
}

/**
 * 保存済みレコードのレポートを出力する。フィードの認証情報は不要。
 */
async function runReport(command: string, args: readonly string[], logger: Logger): Promise<void> {
  const store = new RedisRecordStore(loadStorageConfig(), logger);
  try {
    await new ReportCommand(store).run(command, args);
  } finally {
    await store.close();
  }
}

/**
 * エントリーポイント: 引数なしならインジェスト、サブコマンドがあればレポート
 */
async function bootstrap(logger: Logger): Promise<void> {
  const [command, ...args] = process.argv.slice(2);
  if (command === undefined) {
    await runIngestor(logger);
    return;
  }
  await runReport(command, args, logger);
}

const logger = LoggerFactory.create();

bootstrap(logger).catch((error: unknown) => {
  logger.error('Failed to bootstrap ingestor', { kind: errorKind(error), err: error });
  process.exitCode = 1;
});
