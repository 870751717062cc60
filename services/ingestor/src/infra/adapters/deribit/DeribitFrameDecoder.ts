import type { DecodeResult, FrameDecoder } from '@/application/interfaces/FrameDecoder';
import { DecodeError } from '@/domain/errors/IngestorError';
import type { Frame } from '@/domain/models/Frame';
import type { NormalizedRecord } from '@/domain/models/NormalizedRecord';
import { DeribitTickerDataSchema } from './types/DeribitMessages';

/**
 * インフラ層: ticker 通知のデコーダー
 *
 * `params.data` を持つフレームだけをデータ通知として扱う。
 * 応答・ハートビート・購読確認は ignored。
 */
export class DeribitFrameDecoder implements FrameDecoder {
  classify(frame: Frame): DecodeResult {
    let message: unknown;
    try {
      message = JSON.parse(frame.payload);
    } catch (error) {
      return { kind: 'malformed', error: new DecodeError('frame is not valid JSON', { cause: error }) };
    }

    if (!isObject(message) || !isObject(message.params) || !('data' in message.params)) {
      return { kind: 'ignored' };
    }

    const parsed = DeribitTickerDataSchema.safeParse(message.params.data);
    if (!parsed.success) {
      return {
        kind: 'malformed',
        error: new DecodeError('data push has no usable instrument_name', { cause: parsed.error }),
      };
    }

    const data = parsed.data;
    const timestamp = data.timestamp ?? 0;
    const record: NormalizedRecord = {
      instrumentName: data.instrument_name,
      price: data.mark_price ?? data.last_price ?? null,
      volatility: data.mark_iv ?? null,
      delta: data.greeks?.delta ?? null,
      observedAt: timestamp > 0 ? timestamp : frame.receivedAt,
    };
    return { kind: 'record', record };
  }

  decode(frame: Frame): NormalizedRecord | null {
    const result = this.classify(frame);
    return result.kind === 'record' ? result.record : null;
  }
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
