import type { ReadingPayload, ReadingSet, SensorConfig, SensorPayload } from '@/domain/types';

/** 読み取り値を丸める小数点以下の桁数 */
export const READING_DECIMALS = 3;

/**
 * 指定桁数に丸める（0.5 はゼロから遠い方へ）。
 * @param value 丸める値
 * @param decimals 小数点以下の桁数
 */
export function roundToDecimals(value: number, decimals: number): number {
  const scale = 10 ** decimals;
  return (Math.sign(value) * Math.round(Math.abs(value) * scale)) / scale;
}

/**
 * メトリクス名から単位を決める。
 * 設定の単位マップを優先し、なければ名前に含まれる部分文字列から推定する。
 * @param readingName メトリクス名
 * @param units 設定の単位マップ
 */
export function inferUnit(readingName: string, units: Readonly<Record<string, string>>): string {
  if (Object.hasOwn(units, readingName)) {
    return units[readingName] ?? 'unknown';
  }
  // 画像センサー系の項目向けの既定値
  if (readingName.includes('width') || readingName.includes('height')) return 'pixels';
  if (readingName.includes('channels')) return 'count';
  if (readingName.includes('bytes') || readingName.includes('size')) return 'bytes';
  if (readingName.includes('brightness') || readingName.includes('luma')) return 'intensity';
  return 'unknown';
}

/**
 * アプリケーション層: 読み取り値を送信用の JSON 1 行に変換する
 */
export class PayloadEncoder {
  constructor(private readonly config: Readonly<SensorConfig>) {}

  /**
   * ペイロードを組み立てる。
   * キー順は sensor_id, metadata, timestamp_ms, readings。空の metadata / readings は省略する。
   * @param readings 今回の tick の読み取り値
   * @param timestampMs エポックミリ秒
   */
  build(readings: ReadingSet, timestampMs: number): SensorPayload {
    const hasMetadata = Object.keys(this.config.metadata).length > 0;
    const readingsJson = this.buildReadings(readings);

    return {
      sensor_id: this.config.sensorId,
      ...(hasMetadata ? { metadata: { ...this.config.metadata } } : {}),
      timestamp_ms: timestampMs,
      ...(readingsJson ? { readings: readingsJson } : {}),
    };
  }

  /**
   * JSON 文字列（末尾に改行付き）に変換する。
   */
  encode(readings: ReadingSet, timestampMs: number): string {
    return `${JSON.stringify(this.build(readings, timestampMs))}\n`;
  }

  private buildReadings(readings: ReadingSet): Record<string, ReadingPayload> | null {
    const entries = Object.entries(readings);
    if (entries.length === 0) {
      return null;
    }

    const readingsJson: Record<string, ReadingPayload> = {};
    for (const [name, value] of entries) {
      readingsJson[name] = {
        value: roundToDecimals(value, READING_DECIMALS),
        unit: inferUnit(name, this.config.units),
      };
    }
    return readingsJson;
  }
}
