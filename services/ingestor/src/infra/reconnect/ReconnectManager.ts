import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import { CancelledError, errorKind } from '@/domain/errors/IngestorError';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import { BackoffStrategy } from '@/infra/reconnect/BackoffStrategy';
import { sleep } from '@/infra/reconnect/sleep';

/**
 * インフラ層: 再接続スケジューラ（接続関数を受け取って再試行）
 *
 * 責務: 接続関数が成功するまでバックオフを挟んで再試行する。
 * 中断されるまで諦めない。中断時は CancelledError で reject する。
 */
export class ReconnectManager {
  private readonly logger: Logger;

  /**
   * @param backoff バックオフ戦略（establish の成功でリセットされる）
   * @param logger ロガー（オプショナル、未指定の場合は LoggerFactory から取得）
   * @param metricsCollector メトリクスコレクター（オプショナル）
   */
  constructor(
    private readonly backoff: BackoffStrategy = new BackoffStrategy(),
    logger?: Logger,
    private readonly metricsCollector?: MetricsCollector
  ) {
    this.logger =
      logger?.child({ component: 'ReconnectManager' }) ??
      LoggerFactory.create({ component: 'ReconnectManager' });
  }

  /**
   * attemptFn が成功するまで繰り返す。
   * @returns attemptFn の戻り値
   * @throws {CancelledError}
   */
  async establish<T>(attemptFn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      if (signal?.aborted) {
        throw new CancelledError();
      }
      try {
        const result = await attemptFn();
        this.backoff.reset();
        return result;
      } catch (error) {
        if (error instanceof CancelledError) {
          throw error;
        }
        const delayMs = this.backoff.getNextDelay();
        this.logger.warn('Reconnect attempt failed', { attempt, kind: errorKind(error), delayMs, err: error });

        // メトリクス収集: 再接続回数
        this.metricsCollector?.incrementReconnect();

        await sleep(delayMs, signal);
      }
    }
  }
}
