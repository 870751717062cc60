import type { Frame } from '@/domain/models/Frame';
import type { SessionState } from '@/domain/models/SessionState';

/**
 * 受信結果。アイドルタイムアウトは失敗ではなく 'idle' として返す。
 */
export type FeedEvent = { kind: 'frame'; frame: Frame } | { kind: 'idle' };

export interface FeedCredentials {
  clientId: string;
  clientSecret: string;
}

/**
 * アプリケーション層: フィードセッションの契約
 *
 * 責務: 1 回分の接続サイクル（接続・認証・購読・受信・キープアライブ・切断）。
 * 再接続はしない。再接続の方針はインジェストループが持つ。
 *
 * 状態外の操作は InvalidStateError、AbortSignal による中断は CancelledError で失敗する。
 */
export interface FeedSession {
  readonly state: SessionState;
  readonly subscriptions: ReadonlySet<string>;

  /** @throws {TransportError} */
  connect(signal?: AbortSignal): Promise<void>;

  /** @throws {AuthError | TimeoutError | TransportError} */
  authenticate(credentials: FeedCredentials, signal?: AbortSignal): Promise<void>;

  /**
   * すべての銘柄を 1 リクエストで購読する。失敗時は購読集合を変更しない。
   * @throws {SubscribeError | TimeoutError | TransportError}
   */
  subscribe(instrumentNames: readonly string[], signal?: AbortSignal): Promise<void>;

  /** @throws {TransportError} */
  receiveFrame(signal?: AbortSignal): Promise<FeedEvent>;

  /** @throws {TransportError} */
  ping(signal?: AbortSignal): Promise<void>;

  /**
   * すべての終了経路でトランスポートを解放する。切断済みなら何もしない。
   */
  close(): Promise<void>;
}
