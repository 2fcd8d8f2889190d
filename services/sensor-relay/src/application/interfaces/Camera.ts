/**
 * 1 フレーム分の画素データ（行優先、チャンネルはインターリーブ）。
 */
export interface Frame {
  width: number;
  height: number;
  channels: number;
  data: Uint8Array;
}

/**
 * カメラデバイスのインターフェイス。
 * CameraDataSource はこの契約だけに依存する。
 */
export interface Camera {
  /**
   * デバイスを開く。
   * @param index デバイス番号
   * @returns 開けた場合 true
   */
  open(index: number): boolean;

  isOpened(): boolean;

  /**
   * 次のフレームを読む。
   * @returns フレーム。未オープンや読み取り失敗時は null
   */
  read(): Frame | null;

  release(): void;

  /** バックエンド名（ログ用） */
  readonly backendName: string;
}
