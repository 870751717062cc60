/**
 * 銘柄探索（REST）で返される銘柄の記述子。
 */
export interface InstrumentDescriptor {
  instrumentName: string;
  isActive: boolean;
  /** 満期時刻（エポックミリ秒） */
  expirationTimestampMs: number;
}

/**
 * 銘柄探索リクエストの条件。
 */
export interface DiscoveryRequest {
  currency: string;
  kind: string;
  includeExpired: boolean;
}
