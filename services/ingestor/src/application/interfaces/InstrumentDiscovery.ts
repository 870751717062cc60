import type { DiscoveryRequest, InstrumentDescriptor } from '@/domain/models/Instrument';

/**
 * 銘柄探索のインターフェイス（インフラ層で実装される）。
 * 起動時に 1 回だけ呼ばれる。
 */
export interface InstrumentDiscovery {
  /**
   * @returns レスポンスの順序を保った銘柄一覧
   * @throws {DiscoveryError}
   */
  fetchInstruments(request: DiscoveryRequest, signal?: AbortSignal): Promise<InstrumentDescriptor[]>;
}
