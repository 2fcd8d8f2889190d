import { createServer, type IncomingMessage, type ServerResponse } from 'node:http';
import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';

/**
 * メトリクス HTTP サーバー
 *
 * 責務: /metrics エンドポイントで Prometheus 形式のメトリクスを公開
 */
export class MetricsServer {
  private server: ReturnType<typeof createServer> | null = null;

  constructor(
    private readonly metricsCollector: MetricsCollector,
    private readonly port: number,
    private readonly logger: Logger
  ) {}

  /**
   * HTTP サーバーを起動
   * @returns 実際に待ち受けているポート番号（port に 0 を渡した場合は OS が割り当てた番号）
   */
  start(): Promise<number> {
    const server = createServer((req: IncomingMessage, res: ServerResponse) => {
      void this.handle(req, res);
    });
    this.server = server;

    return new Promise((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.port, () => {
        server.removeListener('error', reject);
        const address = server.address();
        const port = typeof address === 'object' && address !== null ? address.port : this.port;
        this.logger.info('Metrics server started', { port });
        resolve(port);
      });
    });
  }

  /**
   * HTTP サーバーを停止
   */
  stop(): void {
    if (this.server) {
      this.server.close();
      this.server = null;
    }
  }

  private async handle(req: IncomingMessage, res: ServerResponse): Promise<void> {
    if (req.url !== '/metrics' || req.method !== 'GET') {
      res.statusCode = 404;
      res.end('Not Found');
      return;
    }

    try {
      const metrics = await this.metricsCollector.getMetrics();
      const registry = this.metricsCollector.getRegistry();
      res.setHeader('Content-Type', registry.contentType);
      res.statusCode = 200;
      res.end(metrics);
    } catch (error) {
      this.logger.error('Failed to get metrics', { err: error });
      res.statusCode = 500;
      res.end('Internal Server Error');
    }
  }
}
