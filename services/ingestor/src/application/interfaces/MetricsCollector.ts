/**
 * メトリクスレジストリの最小インターフェース
 * prom-client の Registry 型を抽象化
 */
export interface MetricsRegistry {
  contentType: string;
}

/**
 * メトリクス収集インターフェース
 *
 * 責務: インジェスト処理のメトリクスの収集・保持・公開を抽象化
 */
export interface MetricsCollector {
  /**
   * フィードから受信したフレーム数をカウント
   */
  incrementReceived(): void;

  /**
   * ストアに書き込んだレコード数をカウント
   * @param instrument 銘柄名
   */
  incrementStored(instrument: string): void;

  /**
   * エラー数をカウント
   * @param errorKind エラー種別（decode, storage, transport など）
   */
  incrementError(errorKind: string): void;

  /**
   * 失敗した接続試行の回数をカウント
   */
  incrementReconnect(): void;

  /**
   * アイドル時に送信した ping の数をカウント
   */
  incrementPing(): void;

  /**
   * Prometheus 形式のメトリクス文字列を取得
   */
  getMetrics(): Promise<string>;

  /**
   * メトリクスレジストリを取得（HTTP サーバーで使用）
   */
  getRegistry(): MetricsRegistry;
}
