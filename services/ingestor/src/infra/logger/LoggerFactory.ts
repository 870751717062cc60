import type { Logger } from '@/application/interfaces/Logger';
import { PinoLogger } from './PinoLogger';

const SERVICE_NAME = 'option-ingestor';

/**
 * ロガーファクトリー
 *
 * プロセスで 1 つのルートロガーを持ち、すべての出力に service を付ける。
 */
class LoggerFactory {
  private static root: Logger | null = null;

  /**
   * ルートロガー、または bindings を付けた子ロガーを返す
   *
   * 環境変数:
   * - `LOG_LEVEL`: ログレベル（debug, info, warn, error）。デフォルトは `info`
   * - `NODE_ENV`: production の場合は JSON 形式、それ以外は pretty 形式
   */
  static create(bindings?: Record<string, unknown>): Logger {
    if (LoggerFactory.root === null) {
      LoggerFactory.root = new PinoLogger({
        level: process.env.LOG_LEVEL,
        pretty: process.env.NODE_ENV !== 'production',
      }).child({ service: SERVICE_NAME });
    }

    return bindings ? LoggerFactory.root.child(bindings) : LoggerFactory.root;
  }

  /**
   * ルートロガーを破棄する（主にテスト用）
   */
  static reset(): void {
    LoggerFactory.root = null;
  }
}

export { LoggerFactory };
