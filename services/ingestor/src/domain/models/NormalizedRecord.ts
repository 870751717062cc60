/**
 * ドメイン層: 正規化済みオプション ticker レコード（DTO 的な型のみ）
 *
 * フィードの ticker 通知から価格・インプライドボラティリティ・デルタを取り出した形。
 * 数値フィールドはそれぞれ独立して欠損しうる（欠損は null で表す）。
 */
export interface NormalizedRecord {
  /** 銘柄名（例: 'BTC-27DEC24-60000-C'）。常に空でない */
  instrumentName: string;
  /** マーク価格。なければ最終約定価格 */
  price: number | null;
  /** マーク IV */
  volatility: number | null;
  /** greeks.delta */
  delta: number | null;
  /** 観測時刻（エポックミリ秒） */
  observedAt: number;
}

/**
 * ストレージの集計値。
 */
export interface RecordStats {
  totalCount: number;
  distinctInstrumentCount: number;
  /** レコードが 1 件もない場合は null */
  latestObservedAt: number | null;
}
