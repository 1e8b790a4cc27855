import { createServer, type IncomingMessage, type ServerResponse } from 'node:http';
import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';

/**
 * メトリクス HTTP サーバー
 *
 * 責務: /metrics で Prometheus 形式のメトリクス、/healthz でストリーミング中かどうかを公開
 */
export class MetricsServer {
  private server: ReturnType<typeof createServer> | null = null;

  constructor(
    private readonly metricsCollector: MetricsCollector,
    private readonly port: number,
    private readonly logger: Logger,
    private readonly isHealthy: () => boolean = () => true
  ) {}

  start(): void {
    this.server = createServer((req, res) => {
      void this.handle(req, res);
    });

    this.server.listen(this.port, () => {
      this.logger.info('Metrics server started', { port: this.port });
    });
  }

  async stop(): Promise<void> {
    const server = this.server;
    this.server = null;
    if (!server) {
      return;
    }
    await new Promise<void>((resolve) => {
      server.close(() => resolve());
    });
  }

  private async handle(req: IncomingMessage, res: ServerResponse): Promise<void> {
    if (req.method !== 'GET') {
      res.statusCode = 405;
      res.end('Method Not Allowed');
      return;
    }

    if (req.url === '/metrics') {
      try {
        const metrics = await this.metricsCollector.getMetrics();
        res.setHeader('Content-Type', this.metricsCollector.getRegistry().contentType);
        res.statusCode = 200;
        res.end(metrics);
      } catch (error) {
        this.logger.error('Failed to get metrics', { err: error });
        res.statusCode = 500;
        res.end('Internal Server Error');
      }
      return;
    }

    if (req.url === '/healthz') {
      const healthy = this.isHealthy();
      res.statusCode = healthy ? 200 : 503;
      res.end(healthy ? 'ok' : 'not streaming');
      return;
    }

    res.statusCode = 404;
    res.end('Not Found');
  }
}
