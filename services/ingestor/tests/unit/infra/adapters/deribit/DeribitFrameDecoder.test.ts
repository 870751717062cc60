import { describe, expect, it } from 'vitest';
import { DecodeError } from '@/domain/errors/IngestorError';
import type { Frame } from '@/domain/models/Frame';
import { DeribitFrameDecoder } from '@/infra/adapters/deribit/DeribitFrameDecoder';
import { tickerPayload } from '@test/unit/helpers/fixtures';

const RECEIVED_AT = 1_700_000_000_000;

function frame(payload: string): Frame {
  return { payload, receivedAt: RECEIVED_AT };
}

/**
 * 単体テスト: DeribitFrameDecoder
 *
 * - データ通知以外は ignored / null
 * - 壊れたデータ通知は malformed / null（例外は投げない）
 * - フィールドの対応付け
 */
describe('DeribitFrameDecoder', () => {
  const decoder = new DeribitFrameDecoder();

  describe('データ通知以外', () => {
    it.each([
      ['RPC 応答', JSON.stringify({ jsonrpc: '2.0', id: 1, result: { access_token: 'test-token' } })],
      ['ハートビート', JSON.stringify({ jsonrpc: '2.0', method: 'heartbeat', params: { type: 'heartbeat' } })],
      ['購読確認', JSON.stringify({ jsonrpc: '2.0', id: 2, result: ['ticker.BTC-A.raw'] })],
      ['JSON の数値', '42'],
    ])('%s は ignored になり decode は null を返す', (_label, payload) => {
      expect(decoder.classify(frame(payload))).toEqual({ kind: 'ignored' });
      expect(decoder.decode(frame(payload))).toBeNull();
    });
  });

  describe('壊れたデータ通知', () => {
    it.each([
      ['JSON として読めない', '{"params": {"data": '],
      ['data が null', JSON.stringify({ params: { data: null } })],
      ['data が配列', JSON.stringify({ params: { data: [1, 2] } })],
      ['instrument_name がない', tickerPayload({ mark_price: 1 })],
      ['instrument_name が空文字', tickerPayload({ instrument_name: '', mark_price: 1 })],
      ['instrument_name が数値', tickerPayload({ instrument_name: 7 })],
    ])('%s 場合は malformed になり例外を投げない', (_label, payload) => {
      const result = decoder.classify(frame(payload));
      expect(result.kind).toBe('malformed');
      if (result.kind === 'malformed') {
        expect(result.error).toBeInstanceOf(DecodeError);
      }
      expect(decoder.decode(frame(payload))).toBeNull();
    });
  });

  describe('フィールドの対応付け', () => {
    it('すべてのフィールドが揃ったデータ通知をレコードにする', () => {
      const payload = tickerPayload({
        instrument_name: 'BTC-27DEC24-60000-C',
        mark_price: 0.0512,
        last_price: 0.05,
        mark_iv: 61.3,
        greeks: { delta: 0.42, gamma: 0.0001 },
        timestamp: 1_700_000_123_456,
      });

      expect(decoder.decode(frame(payload))).toEqual({
        instrumentName: 'BTC-27DEC24-60000-C',
        price: 0.0512,
        volatility: 61.3,
        delta: 0.42,
        observedAt: 1_700_000_123_456,
      });
    });

    it('mark_price が null なら last_price を価格にする', () => {
      const payload = tickerPayload({ instrument_name: 'BTC-A', mark_price: null, last_price: 41000.5 });

      expect(decoder.decode(frame(payload))?.price).toBe(41000.5);
    });

    it('mark_price が 0 のときは 0 を価格として採用する', () => {
      const payload = tickerPayload({ instrument_name: 'BTC-A', mark_price: 0, last_price: 41000.5 });

      expect(decoder.decode(frame(payload))?.price).toBe(0);
    });

    it('価格フィールドがどちらもなければ price は null', () => {
      const payload = tickerPayload({ instrument_name: 'BTC-A' });

      expect(decoder.decode(frame(payload))).toEqual({
        instrumentName: 'BTC-A',
        price: null,
        volatility: null,
        delta: null,
        observedAt: RECEIVED_AT,
      });
    });

    it('greeks.delta があれば delta に入り、greeks がなければ null', () => {
      const withGreeks = tickerPayload({ instrument_name: 'BTC-A', greeks: { delta: 0.42 } });
      const withoutGreeks = tickerPayload({ instrument_name: 'BTC-A' });

      expect(decoder.decode(frame(withGreeks))?.delta).toBe(0.42);
      expect(decoder.decode(frame(withoutGreeks))?.delta).toBeNull();
    });

    it('型の違う数値フィールドは欠損として扱いフレームは捨てない', () => {
      const payload = tickerPayload({
        instrument_name: 'BTC-A',
        mark_price: '0.05',
        last_price: 0.04,
        mark_iv: 'high',
        greeks: 'n/a',
        timestamp: '1700000000999',
      });

      expect(decoder.decode(frame(payload))).toEqual({
        instrumentName: 'BTC-A',
        price: 0.04,
        volatility: null,
        delta: null,
        observedAt: RECEIVED_AT,
      });
    });

    it('timestamp が 0 なら受信時刻を observedAt にする', () => {
      const payload = tickerPayload({ instrument_name: 'BTC-A', mark_price: 1, timestamp: 0 });

      expect(decoder.decode(frame(payload))?.observedAt).toBe(RECEIVED_AT);
    });

    it('classify は record 種別でレコードを返す', () => {
      const payload = tickerPayload({ instrument_name: 'BTC-A', mark_iv: 55 });

      expect(decoder.classify(frame(payload))).toEqual({
        kind: 'record',
        record: { instrumentName: 'BTC-A', price: null, volatility: 55, delta: null, observedAt: RECEIVED_AT },
      });
    });
  });
});
