import type { FeedCredentials } from './FeedSession';

export interface FeedSettings {
  wsUrl: string;
  restUrl: string;
  credentials: FeedCredentials;
  connectTimeoutMs: number;
  /** 認証・購読の往復待ちの上限 */
  requestTimeoutMs: number;
  /** この時間フレームが来なければ ping を送る */
  idleTimeoutMs: number;
}

export interface BackoffSettings {
  initialDelayMs: number;
  maxDelayMs: number;
}

export interface DiscoverySettings {
  currency: string;
  kind: string;
  includeExpired: boolean;
  subscriptionCap: number;
}

export interface StorageSettings {
  redisUrl: string;
  keyPrefix: string;
}

/**
 * 起動時に組み立てて各コンポーネントのコンストラクタへ渡す設定値。
 */
export interface IngestorConfig {
  feed: FeedSettings;
  backoff: BackoffSettings;
  discovery: DiscoverySettings;
  storage: StorageSettings;
  /** null の場合はメトリクスサーバーを起動しない */
  metricsPort: number | null;
}
