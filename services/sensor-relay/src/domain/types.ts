/**
 * ドメイン層: センサーリレーで扱う値の型定義（DTO 的な型のみ）
 *
 * 注意: 振る舞いは持たない。検証はファクトリ・コンストラクタ・設定ローダーが担当する。
 */

/** ポート番号の下限（この値自体は不正） */
export const MIN_PORT = 0;
/** ポート番号の上限（この値は有効） */
export const MAX_PORT = 65535;

/**
 * ポート番号が (0, 65535] の整数かどうかを判定する。
 * @param port 判定するポート番号
 */
export function isValidPortRange(port: number): boolean {
  return Number.isInteger(port) && port > MIN_PORT && port <= MAX_PORT;
}

/**
 * 送信先のホストとポートの組。ソケット生成後は変更しない。
 */
export interface Endpoint {
  readonly host: string;
  readonly port: number;
}

/** サポートするトランスポート種別 */
export type TransportKind = 'tcp' | 'udp';

/**
 * トランスポート設定。
 * kind は 'tcp' / 'udp' を想定するが、ファクトリ側で大文字小文字を無視して再検証する。
 */
export interface TransportConfig {
  kind: string;
  host: string;
  port: number;
}

/**
 * センサー設定（識別子と送信間隔）。
 */
export interface SensorConfig {
  /** センサー識別子（例: 'temp-01'） */
  sensorId: string;
  /** 送信間隔（秒、正の整数） */
  intervalSeconds: number;
  /** メトリクス名 → 単位（例: temperature → 'F'） */
  units: Record<string, string>;
  /** 任意のタグ（設置場所、型番など） */
  metadata: Record<string, string>;
}

/**
 * 1 tick 分の読み取り結果。メトリクス名 → 数値。
 * tick ごとにデータソースが新しく生成し、tick をまたいで保持しない。
 */
export type ReadingSet = Readonly<Record<string, number>>;

/** ペイロード内の 1 読み取り値 */
export interface ReadingPayload {
  value: number;
  unit: string;
}

/**
 * 送信ペイロード（JSON 1 行としてシリアライズされる）。
 * metadata / readings は空のとき省略する。
 */
export interface SensorPayload {
  sensor_id: string;
  metadata?: Record<string, string>;
  timestamp_ms: number;
  readings?: Record<string, ReadingPayload>;
}

/**
 * シミュレーション用データソースの 1 メトリクス分の生成ルール。
 * fixed は常に同じ値、range は [min, max) の一様乱数（badProbability の確率で範囲外の値）。
 */
export type MetricRule =
  | { kind: 'fixed'; value: number }
  | { kind: 'range'; min: number; max: number; badProbability: number };
