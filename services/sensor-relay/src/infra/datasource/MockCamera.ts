import type { Camera, Frame } from '@/application/interfaces/Camera';

const FRAME_COUNT = 10;
const FRAME_WIDTH = 640;
const FRAME_HEIGHT = 480;
const FRAME_CHANNELS = 3;

/**
 * インフラ層: 合成フレームを返すカメラ
 *
 * i 番目のフレームは全画素が (i*20, i*10, i*5)。10 フレームを繰り返す。
 */
export class MockCamera implements Camera {
  readonly backendName = 'mock';
  private readonly frames: Frame[];
  private opened = false;
  private position = 0;

  constructor() {
    this.frames = Array.from({ length: FRAME_COUNT }, (_, i) => MockCamera.buildFrame(i));
  }

  open(_index: number): boolean {
    this.opened = true;
    this.position = 0;
    return true;
  }

  isOpened(): boolean {
    return this.opened;
  }

  read(): Frame | null {
    if (!this.opened) {
      return null;
    }
    const frame = this.frames[this.position];
    this.position = (this.position + 1) % this.frames.length;
    return frame ?? null;
  }

  release(): void {
    this.opened = false;
  }

  private static buildFrame(i: number): Frame {
    const data = new Uint8Array(FRAME_WIDTH * FRAME_HEIGHT * FRAME_CHANNELS);
    const pixel = [i * 20, i * 10, i * 5];
    for (let offset = 0; offset < data.length; offset += FRAME_CHANNELS) {
      data.set(pixel, offset);
    }
    return { width: FRAME_WIDTH, height: FRAME_HEIGHT, channels: FRAME_CHANNELS, data };
  }
}
