/**
 * 受信データの型。`ws` の RawData にテキストフレームの string を加えたもの。
 */
export type WebSocketData = string | Buffer | ArrayBuffer | Buffer[];

/**
 * インフラ層: 取引所非依存の WebSocket 接続ラッパ（インターフェース）
 *
 * 責務: WebSocket 接続のイベント処理と送信を抽象化する。テストでは偽の接続に差し替える。
 */
export interface WebSocketConnection {
  /**
   * 接続が確立されたときに呼ばれるコールバック
   */
  onOpen(callback: () => void): void;

  /**
   * メッセージを受信したときに呼ばれるコールバック
   */
  onMessage(callback: (data: WebSocketData) => void): void;

  /**
   * 接続が閉じられたときに呼ばれるコールバック
   */
  onClose(callback: (code: number, reason: string) => void): void;

  onError(callback: (error: Error) => void): void;

  /**
   * メッセージを送信する。送信できない状態なら例外を投げる
   */
  send(data: string): void;

  close(): void;

  /**
   * すべてのイベントリスナーを削除する
   */
  removeAllListeners(): void;

  /**
   * ハンドシェイクを待たずに接続を強制終了する
   */
  terminate(): void;
}

export interface ConnectOptions {
  handshakeTimeoutMs: number;
  signal?: AbortSignal;
}

/**
 * 接続を開く関数オブジェクト。セッションはこれを注入され、テストでは偽の接続を返す
 */
export interface WebSocketConnector {
  /**
   * @throws {TransportError | CancelledError}
   */
  connect(url: string, options: ConnectOptions): Promise<WebSocketConnection>;
}
