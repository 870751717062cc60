import { createServer, type IncomingMessage, type ServerResponse } from 'node:http';
import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';

/**
 * メトリクス HTTP サーバー
 *
 * 責務: /metrics エンドポイントで Prometheus 形式のメトリクスを公開
 */
export class MetricsServer {
  private server: ReturnType<typeof createServer> | null = null;

  private readonly logger: Logger;

  constructor(
    private readonly metricsCollector: MetricsCollector,
    private readonly port: number,
    logger?: Logger
  ) {
    this.logger =
      logger?.child({ component: 'MetricsServer' }) ??
      LoggerFactory.create({ component: 'MetricsServer' });
  }

  /**
   * HTTP サーバーを起動し、listen 完了で解決する
   */
  start(): Promise<void> {
    this.server = createServer(async (req: IncomingMessage, res: ServerResponse) => {
      if (req.url === '/metrics' && req.method === 'GET') {
        try {
          const metrics = await this.metricsCollector.getMetrics();
          const registry = this.metricsCollector.getRegistry();
          res.setHeader('Content-Type', registry.contentType);
          res.statusCode = 200;
          res.end(metrics);
        } catch (error) {
          this.logger.error('Failed to render metrics', { err: error });
          res.statusCode = 500;
          res.end('Internal Server Error');
        }
      } else {
        res.statusCode = 404;
        res.end('Not Found');
      }
    });

    const server = this.server;
    return new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.port, () => {
        server.off('error', reject);
        this.logger.info('Metrics server started', { port: this.port });
        resolve();
      });
    });
  }

  /**
   * HTTP サーバーを停止
   */
  stop(): Promise<void> {
    const server = this.server;
    this.server = null;
    if (!server) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  }
}
