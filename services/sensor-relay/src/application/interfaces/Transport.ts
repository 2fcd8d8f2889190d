/**
 * アプリケーション層: 「バイト列をどうプロセス外へ出すか」の抽象
 *
 * 責務: Sensor が必要とする最小の契約を定義する（実装はインフラ層の TcpTransport / UdpTransport）。
 * 実装は内部のソケットに委譲するだけで、独自の状態を持たない。
 */
export interface Transport {
  /**
   * 送信先へのリンクを確立する。接続済みの場合は何もしない。
   */
  connect(): Promise<void>;

  /**
   * 文字列を UTF-8 で送信する。全バイト送信するか、例外を投げる。
   * @param payload 送信する文字列
   * @returns 送信したバイト数
   */
  sendString(payload: string): Promise<number>;

  /**
   * リンクを閉じる。何度呼んでも安全で、例外を投げない。
   */
  close(): void;

  /**
   * ハンドルを保持しているかどうか
   */
  isConnected(): boolean;
}
