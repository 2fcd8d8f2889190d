/**
 * メトリクスレジストリの最小インターフェース
 * prom-client の Registry 型を抽象化
 */
export interface MetricsRegistry {
  contentType: string;
}

/** エラー種別ラベル */
export type RelayErrorType = 'connect_error' | 'acquisition_error' | 'send_error';

/**
 * メトリクス収集インターフェース
 *
 * 責務: tick 数・送信バイト数・接続回数・エラー数の収集と公開を抽象化
 */
export interface MetricsCollector {
  /**
   * 完了した tick 数をカウント
   * @param sensorId センサー識別子
   */
  incrementTicks(sensorId: string): void;

  /**
   * 送信バイト数を加算
   * @param sensorId センサー識別子
   * @param bytes 送信したバイト数
   */
  addBytesSent(sensorId: string, bytes: number): void;

  /**
   * 接続成功回数をカウント
   * @param sensorId センサー識別子
   */
  incrementConnects(sensorId: string): void;

  /**
   * エラー数をカウント
   * @param errorType エラー種別
   */
  incrementError(errorType: RelayErrorType): void;

  /**
   * Prometheus 形式のメトリクス文字列を取得
   */
  getMetrics(): Promise<string>;

  /**
   * メトリクスレジストリを取得（HTTP サーバーで使用）
   */
  getRegistry(): MetricsRegistry;
}
