import type { InstrumentDescriptor } from '@/domain/models/Instrument';

/**
 * ticker 通知フレームの payload を組み立てる
 */
export function tickerPayload(data: Record<string, unknown>): string {
  return JSON.stringify({
    jsonrpc: '2.0',
    method: 'subscription',
    params: { channel: `ticker.${String(data.instrument_name)}.raw`, data },
  });
}

export function instrument(
  instrumentName: string,
  overrides: Partial<Omit<InstrumentDescriptor, 'instrumentName'>> = {}
): InstrumentDescriptor {
  return {
    instrumentName,
    isActive: true,
    expirationTimestampMs: Date.now() + 24 * 60 * 60 * 1000,
    ...overrides,
  };
}
