import type { SessionState } from '@/domain/models/SessionState';

/**
 * エラー種別。ログの `kind` とメトリクスの `error_kind` ラベルにそのまま使う。
 */
export type IngestorErrorKind =
  | 'transport'
  | 'auth'
  | 'timeout'
  | 'subscribe'
  | 'invalid_state'
  | 'decode'
  | 'storage'
  | 'discovery'
  | 'no_instruments'
  | 'cancelled'
  | 'configuration';

/**
 * ドメイン層: インジェスタのエラー基底クラス
 *
 * 責務: 発生層ごとの封じ込め方針（再接続・リトライ・スキップ・終了）を `kind` で判別できるようにする。
 */
export abstract class IngestorError extends Error {
  abstract readonly kind: IngestorErrorKind;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** 接続レベルの失敗。再接続のトリガーになる */
export class TransportError extends IngestorError {
  readonly kind = 'transport';
}

/** 認証レスポンスにアクセストークンがない */
export class AuthError extends IngestorError {
  readonly kind = 'auth';
}

/** 往復リクエストが時間内に応答しなかった */
export class TimeoutError extends IngestorError {
  readonly kind = 'timeout';

  constructor(
    readonly operation: string,
    readonly timeoutMs: number
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`);
  }
}

/** 購読が受理されなかった。要求した銘柄を保持する */
export class SubscribeError extends IngestorError {
  readonly kind = 'subscribe';

  constructor(
    message: string,
    readonly instruments: readonly string[],
    options?: ErrorOptions
  ) {
    super(`${message} (requested: ${instruments.join(', ')})`, options);
  }
}

/** 現在の状態では許可されない操作 */
export class InvalidStateError extends IngestorError {
  readonly kind = 'invalid_state';

  constructor(
    readonly operation: string,
    readonly state: SessionState
  ) {
    super(`cannot ${operation} while session is ${state}`);
  }
}

/** 1 メッセージ単位のデコード失敗。ログに残してスキップする */
export class DecodeError extends IngestorError {
  readonly kind = 'decode';
}

/** 1 レコード単位の書き込み失敗。ログに残して破棄する */
export class StorageError extends IngestorError {
  readonly kind = 'storage';

  constructor(
    readonly instrumentName: string,
    options?: ErrorOptions
  ) {
    super(`failed to store record for ${instrumentName}`, options);
  }
}

/** 銘柄探索 REST の失敗 */
export class DiscoveryError extends IngestorError {
  readonly kind = 'discovery';
}

/** 購読対象がない。起動時のみ発生し、致命的 */
export class NoInstrumentsError extends IngestorError {
  readonly kind = 'no_instruments';
}

/** AbortSignal による中断 */
export class CancelledError extends IngestorError {
  readonly kind = 'cancelled';

  constructor(message = 'operation cancelled') {
    super(message);
  }
}

/** 環境変数の欠落・不正 */
export class ConfigurationError extends IngestorError {
  readonly kind = 'configuration';
}

/**
 * 任意の値からエラー種別を取り出す。IngestorError 以外は 'unknown'。
 */
export function errorKind(error: unknown): IngestorErrorKind | 'unknown' {
  return error instanceof IngestorError ? error.kind : 'unknown';
}
