import type { FeedCredentials, FeedEvent, FeedSession } from '@/application/interfaces/FeedSession';
import type { InstrumentDiscovery } from '@/application/interfaces/InstrumentDiscovery';
import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import type { IngestFrameUsecase } from '@/application/usecases/IngestFrameUsecase';
import type { SelectInstrumentsUsecase } from '@/application/usecases/SelectInstrumentsUsecase';
import { CancelledError, NoInstrumentsError, errorKind } from '@/domain/errors/IngestorError';
import type { DiscoveryRequest, InstrumentDescriptor } from '@/domain/models/Instrument';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import type { ReconnectManager } from '@/infra/reconnect/ReconnectManager';

export interface IngestionLoopOptions {
  credentials: FeedCredentials;
  discovery: DiscoveryRequest;
  logger?: Logger;
  metricsCollector?: MetricsCollector;
}

/**
 * プレゼンテーション層: インジェストループ
 *
 * 責務:
 * - 起動時に 1 回だけ銘柄を探索して購読対象を決める
 * - 接続・認証・購読を ReconnectManager 経由で確立する
 * - 受信フレームを usecase に委譲し、アイドル時は ping を送る
 * - 接続レベルの失敗でセッションを閉じて確立からやり直す
 *
 * 1 セッション内ではフレームを 1 件ずつ順に処理する（ストアへの書き込み順 = 受信順）。
 */
export class IngestionLoop {
  private readonly logger: Logger;

  constructor(
    private readonly session: FeedSession,
    private readonly discovery: InstrumentDiscovery,
    private readonly selector: SelectInstrumentsUsecase,
    private readonly usecase: IngestFrameUsecase,
    private readonly reconnectManager: ReconnectManager,
    private readonly options: IngestionLoopOptions
  ) {
    this.logger =
      options.logger?.child({ component: 'IngestionLoop' }) ??
      LoggerFactory.create({ component: 'IngestionLoop' });
  }

  /**
   * signal が中断されるまで取り込み続ける。中断時は正常に解決する。
   * @throws {NoInstrumentsError} 購読対象がない場合（起動時のみ）
   */
  async run(signal: AbortSignal): Promise<void> {
    try {
      const instruments = await this.discoverInstruments(signal);

      while (!signal.aborted) {
        await this.reconnectManager.establish(() => this.openSession(instruments, signal), signal);
        await this.receiveUntilDisconnected(signal);
      }
    } catch (error) {
      if (!(error instanceof CancelledError)) {
        throw error;
      }
    } finally {
      await this.session.close();
    }
    this.logger.info('ingestion stopped');
  }

  private async discoverInstruments(signal: AbortSignal): Promise<string[]> {
    const request = this.options.discovery;

    let descriptors: InstrumentDescriptor[];
    try {
      descriptors = await this.discovery.fetchInstruments(request, signal);
    } catch (error) {
      if (error instanceof CancelledError) {
        throw error;
      }
      throw new NoInstrumentsError('instrument discovery failed', { cause: error });
    }

    const selected = this.selector.execute(descriptors);
    if (selected.length === 0) {
      throw new NoInstrumentsError(`no active ${request.currency} ${request.kind} instruments available`);
    }
    this.logger.info('instruments selected', { instruments: selected });
    return selected;
  }

  /**
   * 失敗時はセッションを閉じてから投げ直す（次の試行は disconnected から始まる）
   */
  private async openSession(instruments: readonly string[], signal: AbortSignal): Promise<void> {
    try {
      await this.session.connect(signal);
      await this.session.authenticate(this.options.credentials, signal);
      await this.session.subscribe(instruments, signal);
    } catch (error) {
      await this.session.close();
      throw error;
    }
  }

  /**
   * 接続が失われたら閉じて戻る。中断は CancelledError として伝播する
   */
  private async receiveUntilDisconnected(signal: AbortSignal): Promise<void> {
    for (;;) {
      if (signal.aborted) {
        throw new CancelledError();
      }
      let event: FeedEvent;
      try {
        event = await this.session.receiveFrame(signal);
        if (event.kind === 'idle') {
          await this.session.ping(signal);
          this.options.metricsCollector?.incrementPing();
          this.logger.debug('feed idle, ping sent');
          continue;
        }
      } catch (error) {
        if (error instanceof CancelledError) {
          throw error;
        }
        const kind = errorKind(error);
        this.logger.warn('feed connection lost, reconnecting', { kind, err: error });
        this.options.metricsCollector?.incrementError(kind);
        await this.session.close();
        return;
      }

      this.options.metricsCollector?.incrementReceived();
      await this.usecase.execute(event.frame);
    }
  }
}
