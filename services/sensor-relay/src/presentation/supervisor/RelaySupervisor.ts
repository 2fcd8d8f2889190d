import type { Logger } from '@/application/interfaces/Logger';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';

/** ハートビートログの既定間隔（ミリ秒） */
const DEFAULT_HEARTBEAT_INTERVAL_MS = 60_000;

export interface RelaySupervisorOptions {
  /** 0 より大きい場合、この秒数で自動停止する。0 はシグナルまで動き続ける */
  runDurationSeconds: number;
  heartbeatIntervalMs?: number;
  logger?: Logger;
}

/** supervisor が監視するタスク（通常は SensorWorker.run） */
export type SupervisedTask = (signal: AbortSignal) => Promise<void>;

/**
 * プレゼンテーション層: プロセス全体の停止シグナルと実行時間の管理
 *
 * 責務:
 * - 停止シグナル（AbortController）の唯一の所有者
 * - 定期的なハートビートログ
 * - 実行時間の上限による自動停止
 * - タスクの成否を終了コードに変換
 */
export class RelaySupervisor {
  private readonly controller = new AbortController();
  private readonly logger: Logger;
  private readonly heartbeatIntervalMs: number;

  constructor(private readonly options: RelaySupervisorOptions) {
    this.logger = (options.logger ?? LoggerFactory.create()).child({ component: 'RelaySupervisor' });
    this.heartbeatIntervalMs = options.heartbeatIntervalMs ?? DEFAULT_HEARTBEAT_INTERVAL_MS;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get stopRequested(): boolean {
    return this.controller.signal.aborted;
  }

  /**
   * 停止を要求する。2 回目以降は何もしない。
   * @param reason ログに残す理由（例: 'SIGINT'）
   */
  requestStop(reason: string): void {
    if (this.controller.signal.aborted) {
      return;
    }
    this.logger.info('stop requested', { reason });
    this.controller.abort(reason);
  }

  /**
   * タスクを停止シグナル付きで実行し、完了まで待つ。
   * @returns 終了コード（正常終了 0、タスクが失敗した場合 1）
   */
  async supervise(task: SupervisedTask): Promise<number> {
    const startedAt = Date.now();
    const heartbeat = setInterval(() => {
      this.logger.info('heartbeat', { uptimeSeconds: Math.floor((Date.now() - startedAt) / 1000) });
    }, this.heartbeatIntervalMs);

    let deadline: NodeJS.Timeout | undefined;
    if (this.options.runDurationSeconds > 0) {
      deadline = setTimeout(() => {
        this.requestStop('run duration elapsed');
      }, this.options.runDurationSeconds * 1000);
    }

    try {
      await task(this.controller.signal);
      this.logger.info('task completed');
      return 0;
    } catch (error) {
      this.logger.error('task failed', { err: error });
      this.requestStop('task failed');
      return 1;
    } finally {
      clearInterval(heartbeat);
      clearTimeout(deadline);
    }
  }
}
