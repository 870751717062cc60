import type { NormalizedRecord, RecordStats } from '@/domain/models/NormalizedRecord';

/**
 * レコードストアのインターフェイス（インフラ層で実装される）。
 *
 * 永続化の責務はストア側が持つ。並行 insert の排他もストア側で担保する。
 */
export interface RecordStore {
  /**
   * レコードを追記する。
   * @throws {StorageError} 書き込みに失敗した場合
   */
  insert(record: NormalizedRecord): Promise<void>;

  /**
   * 指定銘柄の直近 windowMs 以内のレコードを新しい順に返す。
   */
  query(instrumentName: string, windowMs: number): Promise<NormalizedRecord[]>;

  /**
   * 全銘柄から新しい順に最大 limit 件を返す。
   */
  recent(limit: number): Promise<NormalizedRecord[]>;

  stats(): Promise<RecordStats>;

  close(): Promise<void>;
}
