import type { Logger } from '@/application/interfaces/Logger';
import type { Sensor } from '@/application/sensor/Sensor';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';

/**
 * プレゼンテーション層: 1 センサー分のワーカー
 *
 * 責務: connect → run → close の順に Sensor を動かし、どの経路でも close する。
 * 失敗は握りつぶさず、ログを出したうえで supervisor へ再送出する。
 */
export class SensorWorker {
  private readonly logger: Logger;

  constructor(
    private readonly sensor: Sensor,
    logger?: Logger
  ) {
    this.logger = (logger ?? LoggerFactory.create()).child({ component: 'SensorWorker', sensorId: sensor.sensorId });
  }

  /**
   * @param signal 停止シグナル
   */
  async run(signal: AbortSignal): Promise<void> {
    this.logger.info('worker started');
    try {
      await this.sensor.connect();
      await this.sensor.run(signal);
    } catch (error) {
      this.logger.error('sensor worker failed', { err: error });
      this.logger.warn('closing sensor after failure');
      this.sensor.close();
      throw error;
    }
    this.sensor.close();
    this.logger.info('worker stopped');
  }
}
