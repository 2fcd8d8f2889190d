import type { DataSource } from '@/application/interfaces/DataSource';
import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import type { Transport } from '@/application/interfaces/Transport';
import { ConfigurationError } from '@/domain/errors';
import type { ReadingSet, SensorConfig } from '@/domain/types';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import { PayloadEncoder } from './PayloadEncoder';

/**
 * Sensor の初期化オプション
 */
export interface SensorOptions {
  logger?: Logger;
  metricsCollector?: MetricsCollector;
  /** 現在時刻（エポックミリ秒）を返す関数。未指定の場合は Date.now */
  clock?: () => number;
}

/**
 * アプリケーション層: 取得→エンコード→送信のサイクルを回す司令塔
 *
 * 責務:
 * - 設定の検証（識別子と送信間隔）
 * - 1 tick の実行（runOnce）と、停止シグナルまでの繰り返し（run）
 *
 * 注意: 再試行・バックオフ・再接続は持たない。失敗はすべて呼び出し元へ伝播する。
 */
export class Sensor {
  private readonly config: Readonly<SensorConfig>;
  private readonly encoder: PayloadEncoder;
  private readonly logger: Logger;
  private readonly metricsCollector: MetricsCollector | undefined;
  private readonly clock: () => number;

  /**
   * @param config センサー設定
   * @param dataSource 読み取り値の取得元
   * @param transport 送信に使う Transport（未接続のもの）
   * @param options オプション（ロガー、メトリクス、時計）
   * @throws {ConfigurationError} sensorId が空、または intervalSeconds が正の整数でない場合
   */
  constructor(
    config: SensorConfig,
    private readonly dataSource: DataSource,
    private readonly transport: Transport,
    options?: SensorOptions
  ) {
    if (!config.sensorId) {
      throw new ConfigurationError('Sensor: sensorId must not be empty');
    }
    if (!Number.isInteger(config.intervalSeconds) || config.intervalSeconds <= 0) {
      throw new ConfigurationError('Sensor: intervalSeconds must be > 0');
    }

    this.config = Object.freeze({
      sensorId: config.sensorId,
      intervalSeconds: config.intervalSeconds,
      units: Object.freeze({ ...config.units }),
      metadata: Object.freeze({ ...config.metadata }),
    });
    this.encoder = new PayloadEncoder(this.config);
    this.logger = (options?.logger ?? LoggerFactory.create()).child({ component: 'Sensor', sensorId: config.sensorId });
    this.metricsCollector = options?.metricsCollector;
    this.clock = options?.clock ?? Date.now;
  }

  get sensorId(): string {
    return this.config.sensorId;
  }

  get intervalSeconds(): number {
    return this.config.intervalSeconds;
  }

  /**
   * Transport を接続する。失敗はそのまま伝播する（再試行しない）。
   */
  async connect(): Promise<void> {
    try {
      await this.transport.connect();
    } catch (error) {
      this.metricsCollector?.incrementError('connect_error');
      throw error;
    }
    this.metricsCollector?.incrementConnects(this.config.sensorId);
    this.logger.info('transport connected');
  }

  /**
   * 1 tick 分の処理: 読み取り → JSON 化 → 送信（完了まで待つ）。
   * 失敗した tick の読み取り値は破棄する。
   * @returns 送信したバイト数
   */
  async runOnce(): Promise<number> {
    // 1. 読み取り
    let readings: ReadingSet;
    try {
      readings = await this.dataSource.readAll();
    } catch (error) {
      this.metricsCollector?.incrementError('acquisition_error');
      throw error;
    }

    // 2. ペイロード生成
    const payload = this.encoder.encode(readings, this.clock());

    // 3. 送信
    let bytesSent: number;
    try {
      bytesSent = await this.transport.sendString(payload);
    } catch (error) {
      this.metricsCollector?.incrementError('send_error');
      throw error;
    }

    this.metricsCollector?.incrementTicks(this.config.sensorId);
    this.metricsCollector?.addBytesSent(this.config.sensorId, bytesSent);
    this.logger.debug('tick sent', { bytes: bytesSent, readings: Object.keys(readings).length });
    return bytesSent;
  }

  /**
   * 停止シグナルが立つまで runOnce() を intervalSeconds ごとに繰り返す。
   *
   * シグナルは tick と tick の間でしか確認しない（スリープ中・送信中は中断しない）。
   * そのため停止までの遅延は最大で 1 インターバル分になる。
   * @param signal 停止シグナル（supervisor の AbortController が所有）
   */
  async run(signal: AbortSignal): Promise<void> {
    this.logger.info('sensor loop started', { intervalSeconds: this.config.intervalSeconds });
    while (!signal.aborted) {
      await this.runOnce();
      await new Promise((resolve) => setTimeout(resolve, this.config.intervalSeconds * 1000));
    }
    this.logger.info('sensor loop stopped');
  }

  /**
   * Transport を閉じる。何度呼んでも、connect() 失敗後に呼んでも安全。
   */
  close(): void {
    this.transport.close();
  }
}
