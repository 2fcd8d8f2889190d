import { Counter, Registry } from 'prom-client';
import type { MetricsCollector, MetricsRegistry, RelayErrorType } from '@/application/interfaces/MetricsCollector';

/**
 * Prometheus メトリクスコレクター実装
 * テストで別レジストリを使用するため、シングルトンパターンの実装にはしていない。
 *
 * 責務: prom-client を使用してリレーのメトリクスを収集・保持
 */
export class PrometheusMetricsCollector implements MetricsCollector {
  private readonly register: Registry;
  private readonly ticksCounter: Counter;
  private readonly bytesSentCounter: Counter;
  private readonly connectsCounter: Counter;
  private readonly errorCounter: Counter;

  constructor() {
    this.register = new Registry();

    // 送信まで完了した tick 数
    this.ticksCounter = new Counter({
      name: 'relay_ticks_total',
      help: 'Total number of ticks delivered to the collector',
      labelNames: ['sensor_id'],
      registers: [this.register],
    });

    this.bytesSentCounter = new Counter({
      name: 'relay_bytes_sent_total',
      help: 'Total number of payload bytes sent',
      labelNames: ['sensor_id'],
      registers: [this.register],
    });

    this.connectsCounter = new Counter({
      name: 'relay_connects_total',
      help: 'Total number of successful transport connections',
      labelNames: ['sensor_id'],
      registers: [this.register],
    });

    this.errorCounter = new Counter({
      name: 'relay_errors_total',
      help: 'Total number of errors',
      labelNames: ['error_type'],
      registers: [this.register],
    });
  }

  incrementTicks(sensorId: string): void {
    this.ticksCounter.inc({ sensor_id: sensorId });
  }

  addBytesSent(sensorId: string, bytes: number): void {
    this.bytesSentCounter.inc({ sensor_id: sensorId }, bytes);
  }

  incrementConnects(sensorId: string): void {
    this.connectsCounter.inc({ sensor_id: sensorId });
  }

  incrementError(errorType: RelayErrorType): void {
    this.errorCounter.inc({ error_type: errorType });
  }

  async getMetrics(): Promise<string> {
    return await this.register.metrics();
  }

  getRegistry(): MetricsRegistry {
    return this.register;
  }
}
