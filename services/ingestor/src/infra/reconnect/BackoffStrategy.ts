import type { BackoffSettings } from '@/application/interfaces/IngestorConfig';

/**
 * インフラ層: 指数バックオフ戦略の実装
 *
 * 失敗ごとに遅延を倍にし、上限で頭打ちにする。
 */
export class BackoffStrategy {
  private attempt = 0;

  constructor(private readonly settings: BackoffSettings = { initialDelayMs: 1000, maxDelayMs: 60000 }) {}

  /**
   * 次の再接続までの遅延時間（ミリ秒）を取得する。
   */
  getNextDelay(): number {
    const delay = Math.min(this.settings.initialDelayMs * 2 ** this.attempt, this.settings.maxDelayMs);
    this.attempt += 1;
    return delay;
  }

  /**
   * 接続成功時に呼び出される。
   */
  reset(): void {
    this.attempt = 0;
  }
}
