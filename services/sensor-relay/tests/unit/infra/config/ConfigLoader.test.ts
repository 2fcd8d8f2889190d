import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigurationError } from '@/domain/errors';
import { ConfigLoader } from '@/infra/config/ConfigLoader';

/**
 * 単体テスト: ConfigLoader
 *
 * Infrastructure層（一時ディレクトリの JSON ファイルを使用）
 * - センサー・トランスポート・シミュレーション設定の読み込みと既定値
 * - ファイル・JSON・スキーマのエラー
 * - 環境変数の検証
 */
describe('ConfigLoader', () => {
  let dir: string;

  const writeJson = async (name: string, content: unknown): Promise<string> => {
    const file = path.join(dir, name);
    await writeFile(file, typeof content === 'string' ? content : JSON.stringify(content));
    return file;
  };

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'sensor-relay-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('loadSensorConfig()', () => {
    it('すべての項目を読み込む', async () => {
      const file = await writeJson('sensor.json', {
        sensor_id: 'temp-01',
        interval_seconds: 5,
        units: { temperature: 'F' },
        metadata: { location: 'lab' },
      });

      await expect(ConfigLoader.loadSensorConfig(file)).resolves.toEqual({
        sensorId: 'temp-01',
        intervalSeconds: 5,
        units: { temperature: 'F' },
        metadata: { location: 'lab' },
      });
    });

    it('省略された項目には既定値を入れる', async () => {
      const file = await writeJson('sensor.json', { sensor_id: 'temp-01' });

      await expect(ConfigLoader.loadSensorConfig(file)).resolves.toEqual({
        sensorId: 'temp-01',
        intervalSeconds: 1,
        units: {},
        metadata: {},
      });
    });

    it('sensor_id が無い場合はフィールド名とファイル名を含む ConfigurationError', async () => {
      const file = await writeJson('sensor.json', { interval_seconds: 1 });

      await expect(ConfigLoader.loadSensorConfig(file)).rejects.toThrow(
        new ConfigurationError(`SensorConfig: 'sensor_id': Required in ${file}`)
      );
    });

    it('interval_seconds が 0 の場合は ConfigurationError', async () => {
      const file = await writeJson('sensor.json', { sensor_id: 'temp-01', interval_seconds: 0 });

      await expect(ConfigLoader.loadSensorConfig(file)).rejects.toThrow("'interval_seconds'");
    });

    it('ファイルが無い場合は ConfigurationError', async () => {
      const file = path.join(dir, 'missing.json');

      await expect(ConfigLoader.loadSensorConfig(file)).rejects.toThrow(
        new ConfigurationError(`ConfigLoader: cannot open file: ${file}`)
      );
    });

    it('JSON として不正な場合は ConfigurationError', async () => {
      const file = await writeJson('sensor.json', '{ "sensor_id": ');

      const error = await ConfigLoader.loadSensorConfig(file).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error).toMatchObject({ message: expect.stringContaining(`ConfigLoader: invalid JSON in ${file}`) });
    });
  });

  describe('loadTransportConfig()', () => {
    it('kind と同名のセクションから host / port を読む（大文字小文字は区別しない）', async () => {
      const file = await writeJson('transport.json', {
        kind: 'TCP',
        tcp: { host: '127.0.0.1', port: 9000 },
        udp: { host: '127.0.0.2', port: 9001 },
      });

      await expect(ConfigLoader.loadTransportConfig(file)).resolves.toEqual({
        kind: 'TCP',
        host: '127.0.0.1',
        port: 9000,
      });
    });

    it('kind のセクションが無い場合は ConfigurationError', async () => {
      const file = await writeJson('transport.json', { kind: 'udp', tcp: { host: '127.0.0.1', port: 9000 } });

      await expect(ConfigLoader.loadTransportConfig(file)).rejects.toThrow(
        new ConfigurationError(`TransportConfig: missing 'udp' object for kind='udp' in ${file}`)
      );
    });

    it('未対応の kind は ConfigurationError', async () => {
      const file = await writeJson('transport.json', { kind: 'serial' });

      await expect(ConfigLoader.loadTransportConfig(file)).rejects.toThrow(
        new ConfigurationError(`TransportConfig: unsupported kind 'serial' in ${file}`)
      );
    });

    it('ポートが範囲外の場合はセクション名付きのフィールドを示す', async () => {
      const file = await writeJson('transport.json', { kind: 'tcp', tcp: { host: '127.0.0.1', port: 70000 } });

      await expect(ConfigLoader.loadTransportConfig(file)).rejects.toThrow("'tcp.port'");
    });

    it('host が空の場合は ConfigurationError', async () => {
      const file = await writeJson('transport.json', { kind: 'udp', udp: { host: '', port: 9001 } });

      await expect(ConfigLoader.loadTransportConfig(file)).rejects.toThrow("'udp.host'");
    });
  });

  describe('loadSimulationRules()', () => {
    it('fixed と range のルールを読み込む（bad_probability の既定値は 0）', async () => {
      const file = await writeJson('simulation.json', {
        limits: {
          temperature: { min: 60, max: 80, bad_probability: 0.05 },
          pressure: { min: 990, max: 1030 },
          status: { fixed: 1 },
        },
      });

      await expect(ConfigLoader.loadSimulationRules(file)).resolves.toEqual({
        temperature: { kind: 'range', min: 60, max: 80, badProbability: 0.05 },
        pressure: { kind: 'range', min: 990, max: 1030, badProbability: 0 },
        status: { kind: 'fixed', value: 1 },
      });
    });

    it('fixed と min/max の両方がある場合は fixed を優先する', async () => {
      const file = await writeJson('simulation.json', { limits: { status: { fixed: 2, min: 0, max: 10 } } });

      await expect(ConfigLoader.loadSimulationRules(file)).resolves.toEqual({ status: { kind: 'fixed', value: 2 } });
    });

    it('min > max のルールは ConfigurationError', async () => {
      const file = await writeJson('simulation.json', { limits: { temperature: { min: 80, max: 60 } } });

      const error = await ConfigLoader.loadSimulationRules(file).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error).toMatchObject({ message: expect.stringContaining("'limits.temperature'") });
    });

    it('limits が無い場合は ConfigurationError', async () => {
      const file = await writeJson('simulation.json', {});

      await expect(ConfigLoader.loadSimulationRules(file)).rejects.toThrow(
        new ConfigurationError(`SimulationConfig: 'limits': Required in ${file}`)
      );
    });
  });

  describe('loadRuntimeEnv()', () => {
    it('未設定の場合は既定値を使う', () => {
      expect(ConfigLoader.loadRuntimeEnv({})).toEqual({
        SENSOR_CONFIG: 'config/sensor_config.json',
        TRANSPORT_CONFIG: 'config/transport_config.json',
        DATA_SOURCE: 'camera',
        SIMULATION_DATASOURCE_CONFIG: 'config/simulation_config.json',
        RUN_DURATION_SECONDS: 0,
      });
    });

    it('数値は文字列から変換する', () => {
      const env = ConfigLoader.loadRuntimeEnv({
        DATA_SOURCE: 'simulation',
        RUN_DURATION_SECONDS: '30',
        METRICS_PORT: '9464',
      });

      expect(env.DATA_SOURCE).toBe('simulation');
      expect(env.RUN_DURATION_SECONDS).toBe(30);
      expect(env.METRICS_PORT).toBe(9464);
    });

    it('空文字の変数は未設定として扱う', () => {
      const env = ConfigLoader.loadRuntimeEnv({ METRICS_PORT: '', SENSOR_CONFIG: '' });

      expect(env.METRICS_PORT).toBeUndefined();
      expect(env.SENSOR_CONFIG).toBe('config/sensor_config.json');
    });

    it('DATA_SOURCE が不正な場合は ConfigurationError', () => {
      expect(() => ConfigLoader.loadRuntimeEnv({ DATA_SOURCE: 'video' })).toThrow("'DATA_SOURCE'");
    });

    it('RUN_DURATION_SECONDS が負の場合は ConfigurationError', () => {
      expect(() => ConfigLoader.loadRuntimeEnv({ RUN_DURATION_SECONDS: '-1' })).toThrow(ConfigurationError);
    });
  });
});
