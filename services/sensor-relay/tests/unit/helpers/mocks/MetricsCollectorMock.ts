import { type Mock, vi } from 'vitest';
import type { MetricsCollector, MetricsRegistry, RelayErrorType } from '@/application/interfaces/MetricsCollector';

/**
 * テスト用メトリクスコレクターモック
 */
export class MetricsCollectorMock implements MetricsCollector {
  incrementTicks: Mock<(sensorId: string) => void> = vi.fn<(sensorId: string) => void>();
  addBytesSent: Mock<(sensorId: string, bytes: number) => void> = vi.fn<(sensorId: string, bytes: number) => void>();
  incrementConnects: Mock<(sensorId: string) => void> = vi.fn<(sensorId: string) => void>();
  incrementError: Mock<(errorType: RelayErrorType) => void> = vi.fn<(errorType: RelayErrorType) => void>();
  getMetrics: Mock<() => Promise<string>> = vi.fn<() => Promise<string>>(async () => '');
  getRegistry: Mock<() => MetricsRegistry> = vi.fn<() => MetricsRegistry>(() => ({ contentType: 'text/plain' }));
}
