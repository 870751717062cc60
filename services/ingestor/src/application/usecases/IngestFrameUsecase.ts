import type { FrameDecoder } from '@/application/interfaces/FrameDecoder';
import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import { StorageError } from '@/domain/errors/IngestorError';
import type { Frame } from '@/domain/models/Frame';
import type { RecordStore } from '@/domain/repositories/RecordStore';

export type IngestOutcome = 'stored' | 'ignored' | 'malformed' | 'dropped';

/**
 * アプリケーション層: フレーム取り込みユースケース
 *
 * 責務: 受信フレームをデコードし、レコードをストアへ書き込む司令塔。
 * デコード失敗・書き込み失敗はここで封じ込め、呼び出し側へは投げない。
 */
export class IngestFrameUsecase {
  constructor(
    private readonly decoder: FrameDecoder,
    private readonly store: RecordStore,
    private readonly logger: Logger,
    private readonly metricsCollector?: MetricsCollector
  ) {}

  async execute(frame: Frame): Promise<IngestOutcome> {
    // 1. 正規化（インフラ層のデコーダーを使用）
    const result = this.decoder.classify(frame);
    if (result.kind === 'ignored') {
      return 'ignored';
    }
    if (result.kind === 'malformed') {
      this.logger.warn('skipping malformed frame', { kind: result.error.kind, err: result.error });
      this.metricsCollector?.incrementError(result.error.kind);
      return 'malformed';
    }

    // 2. 書き込み（失敗したレコードは破棄）
    const { record } = result;
    try {
      await this.store.insert(record);
    } catch (error) {
      const storageError =
        error instanceof StorageError ? error : new StorageError(record.instrumentName, { cause: error });
      this.logger.error('failed to store record', {
        instrument: record.instrumentName,
        kind: storageError.kind,
        err: storageError,
      });
      this.metricsCollector?.incrementError(storageError.kind);
      return 'dropped';
    }

    this.metricsCollector?.incrementStored(record.instrumentName);
    return 'stored';
  }
}
