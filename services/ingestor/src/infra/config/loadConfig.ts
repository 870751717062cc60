import type { IngestorConfig, StorageSettings } from '@/application/interfaces/IngestorConfig';
import { ConfigurationError } from '@/domain/errors/IngestorError';

type Env = Record<string, string | undefined>;

const DEFAULTS = {
  FEED_WS_URL: 'wss://test.deribit.com/ws/api/v2',
  FEED_REST_URL: 'https://test.deribit.com',
  FEED_CONNECT_TIMEOUT_MS: 10000,
  FEED_REQUEST_TIMEOUT_MS: 10000,
  FEED_IDLE_TIMEOUT_MS: 30000,
  BACKOFF_INITIAL_DELAY_MS: 1000,
  BACKOFF_MAX_DELAY_MS: 60000,
  DISCOVERY_CURRENCY: 'BTC',
  DISCOVERY_KIND: 'option',
  SUBSCRIPTION_CAP: 5,
  REDIS_URL: 'redis://localhost:6379/0',
  REDIS_KEY_PREFIX: 'options',
} as const;

/**
 * 必須の環境変数を取得する。
 * @throws {ConfigurationError} 未設定または空文字の場合
 */
export function requireEnv(env: Env, name: string): string {
  const value = env[name]?.trim();
  if (!value) {
    throw new ConfigurationError(`${name} is required`);
  }
  return value;
}

function optionalString(env: Env, name: string, fallback: string): string {
  const value = env[name]?.trim();
  return value ? value : fallback;
}

/**
 * 正の整数として読む。未設定なら fallback
 */
function positiveInt(env: Env, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(`${name} must be a positive integer (got "${raw}")`);
  }
  return value;
}

function bool(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) {
    return fallback;
  }
  if (raw === 'true' || raw === '1') {
    return true;
  }
  if (raw === 'false' || raw === '0') {
    return false;
  }
  throw new ConfigurationError(`${name} must be true or false (got "${raw}")`);
}

/**
 * レポートコマンド用。フィードの認証情報は不要。
 */
export function loadStorageConfig(env: Env = process.env): StorageSettings {
  return {
    redisUrl: optionalString(env, 'REDIS_URL', DEFAULTS.REDIS_URL),
    keyPrefix: optionalString(env, 'REDIS_KEY_PREFIX', DEFAULTS.REDIS_KEY_PREFIX),
  };
}

/**
 * インジェスト用の設定一式。
 * @throws {ConfigurationError}
 */
export function loadIngestorConfig(env: Env = process.env): IngestorConfig {
  const initialDelayMs = positiveInt(env, 'BACKOFF_INITIAL_DELAY_MS', DEFAULTS.BACKOFF_INITIAL_DELAY_MS);
  const maxDelayMs = positiveInt(env, 'BACKOFF_MAX_DELAY_MS', DEFAULTS.BACKOFF_MAX_DELAY_MS);
  if (maxDelayMs < initialDelayMs) {
    throw new ConfigurationError(
      `BACKOFF_MAX_DELAY_MS (${maxDelayMs}) must not be less than BACKOFF_INITIAL_DELAY_MS (${initialDelayMs})`
    );
  }

  const metricsPort = env.METRICS_PORT?.trim() ? positiveInt(env, 'METRICS_PORT', 0) : null;

  return {
    feed: {
      wsUrl: optionalString(env, 'FEED_WS_URL', DEFAULTS.FEED_WS_URL),
      restUrl: optionalString(env, 'FEED_REST_URL', DEFAULTS.FEED_REST_URL).replace(/\/+$/, ''),
      credentials: {
        clientId: requireEnv(env, 'FEED_CLIENT_ID'),
        clientSecret: requireEnv(env, 'FEED_CLIENT_SECRET'),
      },
      connectTimeoutMs: positiveInt(env, 'FEED_CONNECT_TIMEOUT_MS', DEFAULTS.FEED_CONNECT_TIMEOUT_MS),
      requestTimeoutMs: positiveInt(env, 'FEED_REQUEST_TIMEOUT_MS', DEFAULTS.FEED_REQUEST_TIMEOUT_MS),
      idleTimeoutMs: positiveInt(env, 'FEED_IDLE_TIMEOUT_MS', DEFAULTS.FEED_IDLE_TIMEOUT_MS),
    },
    backoff: { initialDelayMs, maxDelayMs },
    discovery: {
      currency: optionalString(env, 'DISCOVERY_CURRENCY', DEFAULTS.DISCOVERY_CURRENCY),
      kind: optionalString(env, 'DISCOVERY_KIND', DEFAULTS.DISCOVERY_KIND),
      includeExpired: bool(env, 'DISCOVERY_INCLUDE_EXPIRED', false),
      subscriptionCap: positiveInt(env, 'SUBSCRIPTION_CAP', DEFAULTS.SUBSCRIPTION_CAP),
    },
    storage: loadStorageConfig(env),
    metricsPort,
  };
}
