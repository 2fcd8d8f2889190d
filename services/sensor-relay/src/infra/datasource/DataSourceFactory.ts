import type { DataSource } from '@/application/interfaces/DataSource';
import type { Logger } from '@/application/interfaces/Logger';
import { AcquisitionError } from '@/domain/errors';
import { ConfigLoader } from '@/infra/config/ConfigLoader';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import { CameraDataSource } from './CameraDataSource';
import { MockCamera } from './MockCamera';
import { SimulationDataSource } from './SimulationDataSource';

export type DataSourceKind = 'camera' | 'simulation';

export interface DataSourceSettings {
  kind: DataSourceKind;
  /** kind が 'simulation' のときに読むルールファイル */
  simulationConfigPath: string;
}

/** 開くカメラのデバイス番号（既定のデバイス） */
const CAMERA_INDEX = 0;

/**
 * インフラ層: 設定に応じて DataSource を 1 度だけ選んで組み立てる
 */
class DataSourceFactory {
  /**
   * @throws {AcquisitionError} カメラを開けない場合
   * @throws {ConfigurationError} シミュレーション設定が読めない場合
   */
  static async make(settings: DataSourceSettings, logger?: Logger): Promise<DataSource> {
    const log = logger ?? LoggerFactory.create();

    switch (settings.kind) {
      case 'camera': {
        const camera = new MockCamera();
        if (!camera.open(CAMERA_INDEX)) {
          throw new AcquisitionError(`DataSourceFactory: cannot open camera ${CAMERA_INDEX}`);
        }
        log.info('camera data source ready', { backend: camera.backendName, index: CAMERA_INDEX });
        return new CameraDataSource(camera, log);
      }
      case 'simulation': {
        const rules = await ConfigLoader.loadSimulationRules(settings.simulationConfigPath);
        log.info('simulation data source ready', { metrics: Object.keys(rules) });
        return new SimulationDataSource(rules);
      }
    }
  }
}

export { DataSourceFactory };
