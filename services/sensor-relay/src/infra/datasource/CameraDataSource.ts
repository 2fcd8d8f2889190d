import type { Camera, Frame } from '@/application/interfaces/Camera';
import type { DataSource } from '@/application/interfaces/DataSource';
import type { Logger } from '@/application/interfaces/Logger';
import { AcquisitionError, errorMessage } from '@/domain/errors';
import type { ReadingSet } from '@/domain/types';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';

/**
 * インフラ層: カメラのフレームから読み取り値を作るデータソース
 *
 * 責務:
 * - 1 tick ごとに 1 フレームを読み、サイズと平均輝度を返す
 * - フレームが取れない場合は frame_status: 0 だけを返す（例外にはしない）
 */
export class CameraDataSource implements DataSource {
  private readonly logger: Logger;

  constructor(
    private readonly camera: Camera,
    logger?: Logger
  ) {
    this.logger = (logger ?? LoggerFactory.create()).child({ component: 'CameraDataSource', backend: camera.backendName });
  }

  /**
   * @throws {AcquisitionError} カメラの読み取りが例外を投げた場合
   */
  async readAll(): Promise<ReadingSet> {
    if (!this.camera.isOpened()) {
      this.logger.warn('camera not opened');
      return { frame_status: 0 };
    }

    let frame: Frame | null;
    try {
      frame = this.camera.read();
    } catch (error) {
      throw new AcquisitionError(`camera read failed: ${errorMessage(error)}`, { cause: error });
    }

    if (frame === null || frame.data.byteLength === 0) {
      this.logger.warn('no frame captured');
      return { frame_status: 0 };
    }

    return {
      frame_status: 1,
      frame_width: frame.width,
      frame_height: frame.height,
      channels: frame.channels,
      frame_bytes: frame.data.byteLength,
      brightness: meanSample(frame.data),
    };
  }

  close(): void {
    this.camera.release();
  }
}

function meanSample(data: Uint8Array): number {
  let sum = 0;
  for (const sample of data) {
    sum += sample;
  }
  return sum / data.length;
}
