import type { ReadingSet } from '@/domain/types';

/**
 * アプリケーション層: データ取得元のインターフェイス（インフラ層で実装される）。
 */
export interface DataSource {
  /**
   * 最新の読み取り値をすべて返す。
   * 取得できない場合は例外（通常は AcquisitionError）を投げる。
   */
  readAll(): Promise<ReadingSet>;

  /**
   * ハードウェアなどの資源を解放する（必要な実装のみ）。
   */
  close?(): void;
}
