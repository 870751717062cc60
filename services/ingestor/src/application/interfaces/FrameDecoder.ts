import type { DecodeError } from '@/domain/errors/IngestorError';
import type { Frame } from '@/domain/models/Frame';
import type { NormalizedRecord } from '@/domain/models/NormalizedRecord';

/**
 * デコード結果。
 * - record: データ通知からレコードを得た
 * - ignored: データ通知ではない（応答、ハートビート、購読確認など）
 * - malformed: データ通知だが壊れている（呼び出し側でログに残してスキップ）
 */
export type DecodeResult =
  | { kind: 'record'; record: NormalizedRecord }
  | { kind: 'ignored' }
  | { kind: 'malformed'; error: DecodeError };

/**
 * フレームデコーダのインターフェイス（インフラ層で実装される）。
 * 副作用を持たず、例外も投げない。
 */
export interface FrameDecoder {
  classify(frame: Frame): DecodeResult;

  /**
   * フレームをレコードに変換する。
   * @returns レコード。データ通知でない・壊れている場合は null
   */
  decode(frame: Frame): NormalizedRecord | null;
}
