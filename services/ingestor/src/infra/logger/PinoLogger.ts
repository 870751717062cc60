import pino from 'pino';
import type { Logger } from '@/application/interfaces/Logger';

export interface PinoLoggerOptions {
  level?: string;
  pretty?: boolean;
}

/**
 * pino を使用したロガー実装
 *
 * 開発環境では `pino-pretty` を使用して人間可読形式で出力。
 * 本番環境では JSON 形式で出力。
 */
export class PinoLogger implements Logger {
  private readonly pinoLogger: pino.Logger;

  constructor(options: PinoLoggerOptions | pino.Logger = {}) {
    if (isPinoLogger(options)) {
      // child() から生成された場合
      this.pinoLogger = options;
      return;
    }

    const level = options.level ?? process.env.LOG_LEVEL ?? 'info';
    const usePretty = options.pretty ?? process.env.NODE_ENV !== 'production';

    this.pinoLogger = usePretty
      ? pino({
          level,
          transport: {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'HH:MM:ss.l',
              ignore: 'pid,hostname',
            },
          },
        })
      : pino({ level });
  }

  debug(msg: string, meta: object = {}): void {
    this.pinoLogger.debug(meta, msg);
  }

  info(msg: string, meta: object = {}): void {
    this.pinoLogger.info(meta, msg);
  }

  warn(msg: string, meta: object = {}): void {
    this.pinoLogger.warn(meta, msg);
  }

  error(msg: string, meta: object = {}): void {
    this.pinoLogger.error(meta, msg);
  }

  child(bindings: object): Logger {
    return new PinoLogger(this.pinoLogger.child(bindings));
  }
}

function isPinoLogger(value: PinoLoggerOptions | pino.Logger): value is pino.Logger {
  return 'child' in value && typeof value.child === 'function';
}
