import { describe, expect, it } from 'vitest';
import { SelectInstrumentsUsecase } from '@/application/usecases/SelectInstrumentsUsecase';
import { instrument } from '@test/unit/helpers/fixtures';

const NOW = Date.parse('2024-05-01T00:00:00Z');
const DAY = 24 * 60 * 60 * 1000;

/**
 * 単体テスト: SelectInstrumentsUsecase
 */
describe('SelectInstrumentsUsecase', () => {
  it('有効な 8 銘柄と満期切れ 2 銘柄から、探索順の先頭 5 件を選ぶ', () => {
    const instruments = [
      instrument('BTC-1', { expirationTimestampMs: NOW + DAY }),
      instrument('BTC-X1', { expirationTimestampMs: NOW - DAY }),
      instrument('BTC-2', { expirationTimestampMs: NOW + DAY }),
      instrument('BTC-3', { expirationTimestampMs: NOW + 2 * DAY }),
      instrument('BTC-X2', { expirationTimestampMs: NOW }),
      instrument('BTC-4', { expirationTimestampMs: NOW + DAY }),
      instrument('BTC-5', { expirationTimestampMs: NOW + DAY }),
      instrument('BTC-6', { expirationTimestampMs: NOW + DAY }),
      instrument('BTC-7', { expirationTimestampMs: NOW + DAY }),
      instrument('BTC-8', { expirationTimestampMs: NOW + DAY }),
    ];

    const selected = new SelectInstrumentsUsecase(5).execute(instruments, NOW);

    expect(selected).toEqual(['BTC-1', 'BTC-2', 'BTC-3', 'BTC-4', 'BTC-5']);
  });

  it('無効な銘柄は選ばない', () => {
    const instruments = [
      instrument('BTC-1', { isActive: false, expirationTimestampMs: NOW + DAY }),
      instrument('BTC-2', { expirationTimestampMs: NOW + DAY }),
    ];

    expect(new SelectInstrumentsUsecase(5).execute(instruments, NOW)).toEqual(['BTC-2']);
  });

  it('候補がなければ空配列', () => {
    expect(new SelectInstrumentsUsecase(5).execute([], NOW)).toEqual([]);
  });
});
