import type { DataSource } from '@/application/interfaces/DataSource';
import { AcquisitionError } from '@/domain/errors';
import type { MetricRule, ReadingSet } from '@/domain/types';

/** 範囲外の値を出すときに min / max からずらす量 */
const OUTLIER_OFFSET = 10;

/**
 * インフラ層: 設定ファイルのルールから読み取り値を生成するデータソース
 *
 * ハードウェアなしで動かすためのもの。乱数関数は差し替え可能（テスト用）。
 */
export class SimulationDataSource implements DataSource {
  private readonly rules: ReadonlyMap<string, MetricRule>;

  /**
   * @param rules メトリクス名 → 生成ルール
   * @param random [0, 1) の乱数を返す関数
   */
  constructor(
    rules: Record<string, MetricRule>,
    private readonly random: () => number = Math.random
  ) {
    this.rules = new Map(Object.entries(rules));
  }

  get metricNames(): string[] {
    return [...this.rules.keys()];
  }

  /**
   * 1 メトリクス分の値を生成する。
   * @throws {AcquisitionError} 未定義のメトリクスの場合
   */
  generate(name: string): number {
    const rule = this.rules.get(name);
    if (rule === undefined) {
      throw new AcquisitionError(`Metric not found: ${name}`);
    }

    if (rule.kind === 'fixed') {
      return rule.value;
    }

    if (rule.badProbability > 0 && this.random() < rule.badProbability) {
      return this.random() < 0.5 ? rule.min - OUTLIER_OFFSET : rule.max + OUTLIER_OFFSET;
    }
    return rule.min + this.random() * (rule.max - rule.min);
  }

  async readAll(): Promise<ReadingSet> {
    const readings: Record<string, number> = {};
    for (const name of this.rules.keys()) {
      readings[name] = this.generate(name);
    }
    return readings;
  }
}
