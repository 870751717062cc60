import type { InstrumentDescriptor } from '@/domain/models/Instrument';

/**
 * アプリケーション層: 購読銘柄の選定
 *
 * 有効かつ満期前の銘柄を探索結果の順序のまま先頭から cap 件選ぶ。
 */
export class SelectInstrumentsUsecase {
  constructor(private readonly cap: number) {}

  execute(instruments: readonly InstrumentDescriptor[], now: number = Date.now()): string[] {
    return instruments
      .filter((instrument) => instrument.isActive && instrument.expirationTimestampMs > now)
      .slice(0, this.cap)
      .map((instrument) => instrument.instrumentName);
  }
}
