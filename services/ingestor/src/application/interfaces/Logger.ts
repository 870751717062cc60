/**
 * ロガーインターフェース
 *
 * 実装は pino だが、テストで差し替えられるようにインターフェースを切っている。
 * エラーオブジェクトは meta の `err` キーに載せる（pino の標準シリアライザに乗せるため）。
 */
export interface Logger {
  debug(msg: string, meta?: object): void;
  info(msg: string, meta?: object): void;
  warn(msg: string, meta?: object): void;
  error(msg: string, meta?: object): void;

  /**
   * 子ロガーを作成する。
   * component, instrument などのコンテキストを以降のログに自動付与するために使う。
   */
  child(bindings: object): Logger;
}
