import type { FeedCredentials, FeedEvent, FeedSession } from '@/application/interfaces/FeedSession';
import type { Logger } from '@/application/interfaces/Logger';
import {
  AuthError,
  CancelledError,
  InvalidStateError,
  SubscribeError,
  TimeoutError,
  TransportError,
} from '@/domain/errors/IngestorError';
import type { Frame } from '@/domain/models/Frame';
import type { SessionState } from '@/domain/models/SessionState';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import { FrameQueue } from '@/infra/websocket/FrameQueue';
import type { WebSocketConnection, WebSocketConnector } from '@/infra/websocket/interfaces/WebSocketConnection';
import { DeribitWebSocketClient, readText } from './DeribitWebSocketClient';
import {
  type DeribitMethod,
  type DeribitRequest,
  type DeribitRpcResponse,
  DeribitAuthResultSchema,
  DeribitRpcResponseSchema,
  DeribitSubscribeResultSchema,
  tickerChannel,
} from './types/DeribitMessages';

export interface DeribitFeedSessionOptions {
  wsUrl: string;
  connectTimeoutMs: number;
  requestTimeoutMs: number;
  idleTimeoutMs: number;
  /** 未指定の場合は `ws` で実接続する */
  connector?: WebSocketConnector;
  logger?: Logger;
}

/**
 * インフラ層: JSON-RPC over WebSocket のフィードセッション
 *
 * 責務: 1 回分の接続サイクル（接続・認証・購読・受信・ping・切断）。
 * close() 後は同じインスタンスで connect() からやり直せる。
 *
 * ハンドシェイク中に届いた応答以外のフレームは捨てずに保持し、receiveFrame() で先に返す。
 */
export class DeribitFeedSession implements FeedSession {
  private currentState: SessionState = 'disconnected';
  private readonly subscribed = new Set<string>();
  private connection: WebSocketConnection | null = null;
  private queue = new FrameQueue();
  private deferred: Frame[] = [];
  private nextRequestId = 1;
  private readonly connector: WebSocketConnector;
  private readonly logger: Logger;

  constructor(private readonly options: DeribitFeedSessionOptions) {
    const logger = options.logger ?? LoggerFactory.create();
    this.connector = options.connector ?? new DeribitWebSocketClient(logger);
    this.logger = logger.child({ component: 'DeribitFeedSession' });
  }

  get state(): SessionState {
    return this.currentState;
  }

  get subscriptions(): ReadonlySet<string> {
    return this.subscribed;
  }

  async connect(signal?: AbortSignal): Promise<void> {
    this.assertState('connect', 'disconnected');

    let connection: WebSocketConnection;
    try {
      connection = await this.connector.connect(this.options.wsUrl, {
        handshakeTimeoutMs: this.options.connectTimeoutMs,
        signal,
      });
    } catch (error) {
      if (error instanceof CancelledError || error instanceof TransportError) {
        throw error;
      }
      throw new TransportError(`failed to connect to ${this.options.wsUrl}`, { cause: error });
    }

    // 接続ごとに受信バッファとリクエスト ID を作り直す
    const queue = new FrameQueue();
    connection.onMessage((data) => {
      queue.push({ payload: readText(data), receivedAt: Date.now() });
    });
    connection.onClose((code, reason) => {
      const detail = reason ? `code=${code}, reason=${reason}` : `code=${code}`;
      queue.fail(new TransportError(`connection closed by peer (${detail})`));
    });
    connection.onError((error) => {
      queue.fail(new TransportError('socket error', { cause: error }));
    });

    this.queue = queue;
    this.deferred = [];
    this.nextRequestId = 1;
    this.connection = connection;
    this.currentState = 'connecting';
    this.logger.info('session connected', { url: this.options.wsUrl });
  }

  async authenticate(credentials: FeedCredentials, signal?: AbortSignal): Promise<void> {
    this.assertState('authenticate', 'connecting');
    this.currentState = 'authenticating';

    const response = await this.request(
      'public/auth',
      {
        grant_type: 'client_credentials',
        client_id: credentials.clientId,
        client_secret: credentials.clientSecret,
      },
      signal
    );
    if (response.error) {
      throw new AuthError(`authentication rejected: ${response.error.message} (code=${response.error.code})`);
    }
    if (!DeribitAuthResultSchema.safeParse(response.result).success) {
      throw new AuthError('authentication response has no access token');
    }

    this.currentState = 'active';
    this.logger.info('session authenticated');
  }

  async subscribe(instrumentNames: readonly string[], signal?: AbortSignal): Promise<void> {
    this.assertState('subscribe', 'active');
    if (instrumentNames.length === 0) {
      throw new SubscribeError('no instruments to subscribe', instrumentNames);
    }

    const channels = instrumentNames.map(tickerChannel);
    const response = await this.request('public/subscribe', { channels }, signal);
    if (response.error) {
      throw new SubscribeError(`subscription rejected: ${response.error.message}`, instrumentNames);
    }
    const parsed = DeribitSubscribeResultSchema.safeParse(response.result);
    if (!parsed.success) {
      throw new SubscribeError('subscription response has no channel list', instrumentNames, {
        cause: parsed.error,
      });
    }
    const accepted = new Set(parsed.data);
    const missing = channels.filter((channel) => !accepted.has(channel));
    if (missing.length > 0) {
      throw new SubscribeError(`channels not confirmed: ${missing.join(', ')}`, instrumentNames);
    }

    for (const name of instrumentNames) {
      this.subscribed.add(name);
    }
    this.logger.info('subscribed', { instruments: instrumentNames });
  }

  async receiveFrame(signal?: AbortSignal): Promise<FeedEvent> {
    this.assertState('receive', 'active');
    if (signal?.aborted) {
      throw new CancelledError();
    }

    const deferred = this.deferred.shift();
    if (deferred) {
      return { kind: 'frame', frame: deferred };
    }

    const frame = await this.readFrame(this.options.idleTimeoutMs, signal);
    return frame ? { kind: 'frame', frame } : { kind: 'idle' };
  }

  async ping(signal?: AbortSignal): Promise<void> {
    this.assertState('ping', 'active');
    if (signal?.aborted) {
      throw new CancelledError();
    }
    this.send({ jsonrpc: '2.0', id: this.nextRequestId++, method: 'public/test' });
  }

  async close(): Promise<void> {
    if (this.currentState === 'disconnected') {
      return;
    }
    this.currentState = 'closing';

    const connection = this.connection;
    this.connection = null;
    if (connection) {
      connection.removeAllListeners();
      connection.close();
    }
    this.queue.fail(new TransportError('session closed'));
    this.deferred = [];
    this.subscribed.clear();

    this.currentState = 'disconnected';
    this.logger.info('session closed');
  }

  private assertState(operation: string, expected: SessionState): void {
    if (this.currentState !== expected) {
      throw new InvalidStateError(operation, this.currentState);
    }
  }

  private async request(
    method: DeribitMethod,
    params: Record<string, unknown>,
    signal?: AbortSignal
  ): Promise<DeribitRpcResponse> {
    const id = this.nextRequestId++;
    this.send({ jsonrpc: '2.0', id, method, params });
    return await this.awaitResponse(id, method, signal);
  }

  /**
   * id が一致する応答を待つ。一致しないフレームは deferred に積む
   * @throws {TimeoutError}
   */
  private async awaitResponse(id: number, operation: string, signal?: AbortSignal): Promise<DeribitRpcResponse> {
    const timeoutMs = this.options.requestTimeoutMs;
    const deadline = Date.now() + timeoutMs;

    for (;;) {
      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        throw new TimeoutError(operation, timeoutMs);
      }
      const frame = await this.readFrame(remaining, signal);
      if (frame === null) {
        throw new TimeoutError(operation, timeoutMs);
      }
      const response = parseResponse(frame.payload);
      if (response?.id === id) {
        return response;
      }
      this.deferred.push(frame);
    }
  }

  private async readFrame(timeoutMs: number, signal?: AbortSignal): Promise<Frame | null> {
    const queue = this.queue;
    try {
      return await queue.next(timeoutMs, signal);
    } catch (error) {
      // close() 済みの場合は状態を戻さない
      if (error instanceof TransportError && queue === this.queue && this.currentState !== 'disconnected') {
        this.currentState = 'closing';
      }
      throw error;
    }
  }

  private send(request: DeribitRequest): void {
    if (!this.connection) {
      throw new InvalidStateError(`send ${request.method}`, this.currentState);
    }
    try {
      this.connection.send(JSON.stringify(request));
    } catch (error) {
      this.currentState = 'closing';
      throw new TransportError(`failed to send ${request.method}`, { cause: error });
    }
  }
}

/**
 * JSON-RPC 応答として読めないフレームは null（データ通知などはデコーダー側で扱う）
 */
function parseResponse(payload: string): DeribitRpcResponse | null {
  let message: unknown;
  try {
    message = JSON.parse(payload);
  } catch {
    return null;
  }
  const parsed = DeribitRpcResponseSchema.safeParse(message);
  return parsed.success ? parsed.data : null;
}
