import { readFile } from 'node:fs/promises';
import type { z } from 'zod';
import { ConfigurationError, errorMessage } from '@/domain/errors';
import type { MetricRule, SensorConfig, TransportConfig, TransportKind } from '@/domain/types';
import {
  EndpointSectionSchema,
  type RuntimeEnv,
  RuntimeEnvSchema,
  SensorConfigFileSchema,
  SimulationConfigFileSchema,
  TransportConfigFileSchema,
} from './schemas';

const TRANSPORT_KINDS: readonly TransportKind[] = ['tcp', 'udp'];

function isTransportKind(kind: string): kind is TransportKind {
  return TRANSPORT_KINDS.some((candidate) => candidate === kind);
}

/**
 * zod の検証エラーを 1 行のメッセージにする。
 * @param issues 検証エラー
 * @param prefix フィールド名の前に付けるセクション名
 */
function formatIssues(issues: z.ZodIssue[], prefix = ''): string {
  return issues
    .map((issue) => {
      const field = [prefix, ...issue.path.map(String)].filter(Boolean).join('.');
      return field ? `'${field}': ${issue.message}` : issue.message;
    })
    .join('; ');
}

async function readJsonFile(path: string): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`ConfigLoader: cannot open file: ${path}`, { cause: error });
  }

  try {
    return JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError(`ConfigLoader: invalid JSON in ${path}: ${errorMessage(error)}`, { cause: error });
  }
}

/**
 * インフラ層: JSON 設定ファイルと環境変数の読み込み・検証
 *
 * 型・範囲など一般的な検証はここで行う。プロトコル固有の検証は TransportFactory 側。
 */
class ConfigLoader {
  /**
   * センサー設定を読み込む。
   * @param path sensor_config.json のパス
   * @throws {ConfigurationError} ファイルが読めない、JSON が不正、検証エラーの場合
   */
  static async loadSensorConfig(path: string): Promise<SensorConfig> {
    const result = SensorConfigFileSchema.safeParse(await readJsonFile(path));
    if (!result.success) {
      throw new ConfigurationError(`SensorConfig: ${formatIssues(result.error.issues)} in ${path}`);
    }

    return {
      sensorId: result.data.sensor_id,
      intervalSeconds: result.data.interval_seconds,
      units: result.data.units,
      metadata: result.data.metadata,
    };
  }

  /**
   * トランスポート設定を読み込む。kind と同名のセクション（大文字小文字は区別しない）が必須。
   * @param path transport_config.json のパス
   * @throws {ConfigurationError} ファイルが読めない、JSON が不正、検証エラー、未対応の kind の場合
   */
  static async loadTransportConfig(path: string): Promise<TransportConfig> {
    const top = TransportConfigFileSchema.safeParse(await readJsonFile(path));
    if (!top.success) {
      throw new ConfigurationError(`TransportConfig: ${formatIssues(top.error.issues)} in ${path}`);
    }

    const kind = top.data.kind;
    const sectionName = kind.toLowerCase();
    if (!isTransportKind(sectionName)) {
      throw new ConfigurationError(`TransportConfig: unsupported kind '${kind}' in ${path}`);
    }

    const rawSection = top.data[sectionName];
    if (typeof rawSection !== 'object' || rawSection === null || Array.isArray(rawSection)) {
      throw new ConfigurationError(`TransportConfig: missing '${sectionName}' object for kind='${kind}' in ${path}`);
    }

    const section = EndpointSectionSchema.safeParse(rawSection);
    if (!section.success) {
      throw new ConfigurationError(`TransportConfig: ${formatIssues(section.error.issues, sectionName)} in ${path}`);
    }

    return { kind, host: section.data.host, port: section.data.port };
  }

  /**
   * シミュレーション用データソースの生成ルールを読み込む。
   * @param path simulation_config.json のパス
   * @returns メトリクス名 → 生成ルール
   */
  static async loadSimulationRules(path: string): Promise<Record<string, MetricRule>> {
    const result = SimulationConfigFileSchema.safeParse(await readJsonFile(path));
    if (!result.success) {
      throw new ConfigurationError(`SimulationConfig: ${formatIssues(result.error.issues)} in ${path}`);
    }

    const rules: Record<string, MetricRule> = {};
    for (const [name, rule] of Object.entries(result.data.limits)) {
      rules[name] =
        'fixed' in rule
          ? { kind: 'fixed', value: rule.fixed }
          : { kind: 'range', min: rule.min, max: rule.max, badProbability: rule.bad_probability };
    }
    return rules;
  }

  /**
   * 環境変数を検証する。空文字の変数は未設定として扱う。
   * @param env 環境変数（通常は process.env）
   * @throws {ConfigurationError} 値が不正な場合
   */
  static loadRuntimeEnv(env: NodeJS.ProcessEnv): RuntimeEnv {
    const defined = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''));
    const result = RuntimeEnvSchema.safeParse(defined);
    if (!result.success) {
      throw new ConfigurationError(`Environment: ${formatIssues(result.error.issues)}`);
    }
    return result.data;
  }
}

export { ConfigLoader };
