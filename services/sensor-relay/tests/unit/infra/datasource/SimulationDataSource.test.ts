import { describe, expect, it } from 'vitest';
import { AcquisitionError } from '@/domain/errors';
import type { MetricRule } from '@/domain/types';
import { SimulationDataSource } from '@/infra/datasource/SimulationDataSource';

/**
 * 乱数列を順に返す関数を作る（尽きたら 0）
 */
function sequence(...values: number[]): () => number {
  let index = 0;
  return () => values[index++] ?? 0;
}

/**
 * 単体テスト: SimulationDataSource
 *
 * Infrastructure層（乱数は差し替え）
 * - fixed / range ルールによる値の生成
 * - bad_probability による範囲外の値
 * - 未定義メトリクスのエラー
 */
describe('SimulationDataSource', () => {
  const rules: Record<string, MetricRule> = {
    temperature: { kind: 'range', min: 60, max: 80, badProbability: 0 },
    status: { kind: 'fixed', value: 1 },
  };

  describe('generate()', () => {
    it('fixed は常に同じ値を返す', () => {
      const source = new SimulationDataSource(rules, sequence(0.9, 0.9));

      expect(source.generate('status')).toBe(1);
      expect(source.generate('status')).toBe(1);
    });

    it('range は [min, max) の一様乱数を返す', () => {
      const source = new SimulationDataSource(rules, sequence(0.25, 0));

      expect(source.generate('temperature')).toBe(65);
      expect(source.generate('temperature')).toBe(60);
    });

    it('bad_probability に当たると min - 10 を返すことがある', () => {
      const source = new SimulationDataSource(
        { humidity: { kind: 'range', min: 30, max: 60, badProbability: 0.1 } },
        sequence(0.05, 0.3)
      );

      expect(source.generate('humidity')).toBe(20);
    });

    it('bad_probability に当たると max + 10 を返すことがある', () => {
      const source = new SimulationDataSource(
        { humidity: { kind: 'range', min: 30, max: 60, badProbability: 0.1 } },
        sequence(0.05, 0.7)
      );

      expect(source.generate('humidity')).toBe(70);
    });

    it('bad_probability に当たらなければ範囲内の値を返す', () => {
      const source = new SimulationDataSource(
        { humidity: { kind: 'range', min: 30, max: 60, badProbability: 0.1 } },
        sequence(0.5, 0.5)
      );

      expect(source.generate('humidity')).toBe(45);
    });

    it('未定義のメトリクスは AcquisitionError', () => {
      const source = new SimulationDataSource(rules);

      expect(() => source.generate('pressure')).toThrow(new AcquisitionError('Metric not found: pressure'));
    });
  });

  describe('readAll()', () => {
    it('定義済みのすべてのメトリクスを返す', async () => {
      const source = new SimulationDataSource(rules, sequence(0.5));

      await expect(source.readAll()).resolves.toEqual({ temperature: 70, status: 1 });
      expect(source.metricNames).toEqual(['temperature', 'status']);
    });

    it('ルールが空なら空の読み取り値を返す', async () => {
      const source = new SimulationDataSource({});

      await expect(source.readAll()).resolves.toEqual({});
    });
  });
});
