import WebSocket from 'ws';
import type { Logger } from '@/application/interfaces/Logger';
import { CancelledError, TransportError } from '@/domain/errors/IngestorError';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import type {
  ConnectOptions,
  WebSocketConnection,
  WebSocketConnector,
  WebSocketData,
} from '@/infra/websocket/interfaces/WebSocketConnection';
import { StandardWebSocketConnection } from '@/infra/websocket/StandardWebSocketConnection';

/**
 * インフラ層: WebSocket 接続の確立（低レベル）
 *
 * 責務: ハンドシェイクの完了を待って接続を返すことのみ。プロトコルはセッション側が持つ。
 */
export class DeribitWebSocketClient implements WebSocketConnector {
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger =
      logger?.child({ component: 'DeribitWebSocketClient' }) ??
      LoggerFactory.create({ component: 'DeribitWebSocketClient' });
  }

  /**
   * WebSocket 接続を確立する。
   * @returns 接続が確立されたら解決される
   * @throws {TransportError} ハンドシェイク失敗・タイムアウト
   * @throws {CancelledError}
   */
  connect(url: string, options: ConnectOptions): Promise<WebSocketConnection> {
    const { signal } = options;
    if (signal?.aborted) {
      return Promise.reject(new CancelledError());
    }

    return new Promise<WebSocketConnection>((resolve, reject) => {
      const socket = new WebSocket(url, { handshakeTimeout: options.handshakeTimeoutMs });
      const connection = new StandardWebSocketConnection(socket);

      const onAbort = () => {
        connection.removeAllListeners();
        connection.terminate();
        reject(new CancelledError());
      };

      connection.onOpen(() => {
        signal?.removeEventListener('abort', onAbort);
        connection.removeAllListeners();
        this.logger.info('socket opened', { url });
        resolve(connection);
      });

      connection.onError((error) => {
        signal?.removeEventListener('abort', onAbort);
        connection.removeAllListeners();
        reject(new TransportError(`failed to connect to ${url}`, { cause: error }));
      });

      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}

/**
 * 受信データをテキストに変換する。
 */
export function readText(data: WebSocketData): string {
  if (typeof data === 'string') {
    return data;
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf-8');
  }
  if (Buffer.isBuffer(data)) {
    return data.toString('utf-8');
  }
  return Buffer.from(data).toString('utf-8');
}
