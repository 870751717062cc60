/**
 * フィードから受信した 1 フレーム（テキスト）と受信時刻。
 * 受信時刻は observedAt のフォールバックに使うため、受信時点で確定させる。
 */
export interface Frame {
  payload: string;
  /** 受信時刻（エポックミリ秒） */
  receivedAt: number;
}
