import { LoggerMock } from '@test/unit/helpers/mocks/LoggerMock';
import { TransportMock } from '@test/unit/helpers/mocks/TransportMock';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { Sensor } from '@/application/sensor/Sensor';
import { SendError } from '@/domain/errors';
import { RelaySupervisor } from '@/presentation/supervisor/RelaySupervisor';
import { SensorWorker } from '@/presentation/worker/SensorWorker';

/**
 * シグナルが立つまで待つだけのタスク
 */
function untilAborted(signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    signal.addEventListener('abort', () => resolve(), { once: true });
  });
}

/**
 * 単体テスト: RelaySupervisor
 *
 * - 停止要求（冪等）
 * - 実行時間による自動停止
 * - ハートビート
 * - 終了コードとタイマーの後始末
 */
describe('RelaySupervisor', () => {
  let loggerMock: LoggerMock;

  beforeEach(() => {
    vi.useFakeTimers();
    loggerMock = new LoggerMock();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('requestStop()', () => {
    it('シグナルを立て、2 回目以降は何もしない', () => {
      const supervisor = new RelaySupervisor({ runDurationSeconds: 0, logger: loggerMock });

      supervisor.requestStop('SIGINT');
      supervisor.requestStop('SIGTERM');

      expect(supervisor.stopRequested).toBe(true);
      expect(supervisor.signal.reason).toBe('SIGINT');
      expect(loggerMock.info).toHaveBeenCalledTimes(1);
      expect(loggerMock.info).toHaveBeenCalledWith('stop requested', { reason: 'SIGINT' });
    });
  });

  describe('supervise()', () => {
    it('タスクが正常終了すると 0 を返し、タイマーを残さない', async () => {
      const supervisor = new RelaySupervisor({ runDurationSeconds: 10, logger: loggerMock });

      const exitCode = await supervisor.supervise(async () => undefined);

      expect(exitCode).toBe(0);
      expect(vi.getTimerCount()).toBe(0);
    });

    it('タスクが失敗すると停止を要求して 1 を返す', async () => {
      const supervisor = new RelaySupervisor({ runDurationSeconds: 0, logger: loggerMock });
      const failure = new SendError('send: connection closed by peer');

      const exitCode = await supervisor.supervise(async () => {
        throw failure;
      });

      expect(exitCode).toBe(1);
      expect(supervisor.stopRequested).toBe(true);
      expect(loggerMock.error).toHaveBeenCalledWith('task failed', { err: failure });
      expect(vi.getTimerCount()).toBe(0);
    });

    it('requestStop() でタスクにシグナルが届く', async () => {
      const supervisor = new RelaySupervisor({ runDurationSeconds: 0, logger: loggerMock });

      const running = supervisor.supervise(untilAborted);
      await vi.advanceTimersByTimeAsync(5000);
      supervisor.requestStop('SIGTERM');

      await expect(running).resolves.toBe(0);
    });

    it('runDurationSeconds が経過すると自動で停止する', async () => {
      const supervisor = new RelaySupervisor({ runDurationSeconds: 3, logger: loggerMock });
      let finished = false;

      const running = supervisor.supervise(untilAborted).then((code) => {
        finished = true;
        return code;
      });

      await vi.advanceTimersByTimeAsync(2999);
      expect(finished).toBe(false);

      await vi.advanceTimersByTimeAsync(1);
      await expect(running).resolves.toBe(0);
      expect(supervisor.signal.reason).toBe('run duration elapsed');
    });

    it('runDurationSeconds が 0 の場合は自動停止しない', async () => {
      const supervisor = new RelaySupervisor({ runDurationSeconds: 0, heartbeatIntervalMs: 1000, logger: loggerMock });

      const running = supervisor.supervise(untilAborted);
      await vi.advanceTimersByTimeAsync(60_000);

      expect(supervisor.stopRequested).toBe(false);
      supervisor.requestStop('SIGINT');
      await running;
    });

    it('heartbeatIntervalMs ごとにハートビートを記録する', async () => {
      const supervisor = new RelaySupervisor({ runDurationSeconds: 0, heartbeatIntervalMs: 1000, logger: loggerMock });

      const running = supervisor.supervise(untilAborted);
      await vi.advanceTimersByTimeAsync(2500);

      const heartbeats = loggerMock.info.mock.calls.filter(([msg]) => msg === 'heartbeat');
      expect(heartbeats).toEqual([
        ['heartbeat', { uptimeSeconds: 1 }],
        ['heartbeat', { uptimeSeconds: 2 }],
      ]);

      supervisor.requestStop('SIGINT');
      await running;
    });

    it('SensorWorker と組み合わせると、実行時間の経過後に次の tick を待たず停止する', async () => {
      const transport = new TransportMock();
      const sensor = new Sensor(
        { sensorId: 'temp-01', intervalSeconds: 2, units: {}, metadata: {} },
        { readAll: async () => ({ temperature: 70 }) },
        transport,
        { logger: loggerMock, clock: () => 0 }
      );
      const worker = new SensorWorker(sensor, loggerMock);
      const supervisor = new RelaySupervisor({ runDurationSeconds: 3, logger: loggerMock });

      const running = supervisor.supervise((signal) => worker.run(signal));
      await vi.advanceTimersByTimeAsync(4000);

      await expect(running).resolves.toBe(0);
      // t=0 と t=2s の 2 回。t=3s の停止要求は t=4s のスリープ明けで反映される
      expect(transport.sendString).toHaveBeenCalledTimes(2);
      expect(transport.close).toHaveBeenCalledTimes(1);
    });
  });
});
