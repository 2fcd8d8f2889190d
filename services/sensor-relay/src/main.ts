import 'dotenv/config';
import process from 'node:process';
import type { DataSource } from '@/application/interfaces/DataSource';
import { Sensor } from '@/application/sensor/Sensor';
import { ConfigLoader } from '@/infra/config/ConfigLoader';
import { DataSourceFactory } from '@/infra/datasource/DataSourceFactory';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import { MetricsServer } from '@/infra/metrics/MetricsServer';
import { PrometheusMetricsCollector } from '@/infra/metrics/PrometheusMetricsCollector';
import { TransportFactory } from '@/infra/transport/TransportFactory';
import { RelaySupervisor } from '@/presentation/supervisor/RelaySupervisor';
import { SensorWorker } from '@/presentation/worker/SensorWorker';

/**
 * エントリーポイント: 設定の読み込み、依存関係の注入、シグナルハンドリング
 *
 * 責務:
 * - `.env` 読み込みと環境変数・設定ファイルの検証
 * - コンポーネントの生成と配線
 * - SIGINT / SIGTERM を停止要求に変換
 *
 * 注意: 送信ループの挙動は main.ts に書かない。ここは「配線するだけ」にする。
 */
async function bootstrap(): Promise<number> {
  const env = ConfigLoader.loadRuntimeEnv(process.env);
  const logger = LoggerFactory.create();

  // 設定ファイルはすべて起動時に検証し、不正なら送信前に落とす
  const sensorConfig = await ConfigLoader.loadSensorConfig(env.SENSOR_CONFIG);
  const transportConfig = await ConfigLoader.loadTransportConfig(env.TRANSPORT_CONFIG);
  logger.info('configuration loaded', {
    sensorId: sensorConfig.sensorId,
    intervalSeconds: sensorConfig.intervalSeconds,
    transport: transportConfig.kind,
    host: transportConfig.host,
    port: transportConfig.port,
    dataSource: env.DATA_SOURCE,
  });

  const metricsCollector = new PrometheusMetricsCollector();
  const metricsServer = env.METRICS_PORT === undefined ? null : new MetricsServer(metricsCollector, env.METRICS_PORT, logger);

  const dataSource: DataSource = await DataSourceFactory.make(
    { kind: env.DATA_SOURCE, simulationConfigPath: env.SIMULATION_DATASOURCE_CONFIG },
    logger
  );
  const transport = TransportFactory.make(transportConfig, { logger });
  const sensor = new Sensor(sensorConfig, dataSource, transport, { logger, metricsCollector });
  const worker = new SensorWorker(sensor, logger);
  const supervisor = new RelaySupervisor({ runDurationSeconds: env.RUN_DURATION_SECONDS, logger });

  const onSignal = (signal: NodeJS.Signals) => {
    supervisor.requestStop(signal);
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  try {
    if (metricsServer) {
      await metricsServer.start();
    }
    return await supervisor.supervise((signal) => worker.run(signal));
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
    metricsServer?.stop();
    dataSource.close?.();
    logger.info('sensor relay stopped');
  }
}

bootstrap()
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    console.error('Failed to bootstrap sensor relay:', error);
    process.exitCode = 1;
  });
