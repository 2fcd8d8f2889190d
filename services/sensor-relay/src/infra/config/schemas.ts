import { z } from 'zod';
import { MAX_PORT } from '@/domain/types';

/**
 * センサー設定ファイル（sensor_config.json）
 */
export const SensorConfigFileSchema = z.object({
  sensor_id: z.string().min(1),
  interval_seconds: z.number().int().positive().default(1),
  units: z.record(z.string()).default({}),
  metadata: z.record(z.string()).default({}),
});

/**
 * トランスポート設定ファイル（transport_config.json）の最上位。
 * 接続先は kind と同名のセクション（"tcp" / "udp"）に置く。
 */
export const TransportConfigFileSchema = z
  .object({
    kind: z.string().min(1),
  })
  .passthrough();

export const EndpointSectionSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().min(1).max(MAX_PORT),
});

const FixedRuleSchema = z.object({
  fixed: z.number(),
});

const RangeRuleSchema = z
  .object({
    min: z.number(),
    max: z.number(),
    bad_probability: z.number().min(0).max(1).default(0),
  })
  .refine((rule) => rule.min <= rule.max, { message: 'min must be <= max' });

/**
 * シミュレーション用データソース設定（simulation_config.json）。
 * fixed と min/max の両方がある場合は fixed を優先する。
 */
export const SimulationConfigFileSchema = z.object({
  limits: z.record(z.union([FixedRuleSchema, RangeRuleSchema])),
});

/**
 * 実行時の環境変数
 */
export const RuntimeEnvSchema = z.object({
  SENSOR_CONFIG: z.string().min(1).default('config/sensor_config.json'),
  TRANSPORT_CONFIG: z.string().min(1).default('config/transport_config.json'),
  DATA_SOURCE: z.enum(['camera', 'simulation']).default('camera'),
  SIMULATION_DATASOURCE_CONFIG: z.string().min(1).default('config/simulation_config.json'),
  RUN_DURATION_SECONDS: z.coerce.number().int().min(0).default(0),
  METRICS_PORT: z.coerce.number().int().min(1).max(MAX_PORT).optional(),
});

export type RuntimeEnv = z.infer<typeof RuntimeEnvSchema>;
