import { Counter, Registry } from 'prom-client';
import type { MetricsCollector, MetricsRegistry } from '@/application/interfaces/MetricsCollector';

/**
 * Prometheus メトリクスコレクター実装
 * テストで別レジストリを使用するため、シングルトンにはしていない。
 */
export class PrometheusMetricsCollector implements MetricsCollector {
  private readonly register: Registry;
  private readonly receivedCounter: Counter;
  private readonly storedCounter: Counter<'instrument'>;
  private readonly errorCounter: Counter<'error_kind'>;
  private readonly reconnectCounter: Counter;
  private readonly pingCounter: Counter;

  constructor() {
    this.register = new Registry();

    this.receivedCounter = new Counter({
      name: 'ingestor_frames_received_total',
      help: 'Total number of frames received from the feed',
      registers: [this.register],
    });

    this.storedCounter = new Counter({
      name: 'ingestor_records_stored_total',
      help: 'Total number of records written to the record store',
      labelNames: ['instrument'],
      registers: [this.register],
    });

    this.errorCounter = new Counter({
      name: 'ingestor_errors_total',
      help: 'Total number of contained errors',
      labelNames: ['error_kind'],
      registers: [this.register],
    });

    this.reconnectCounter = new Counter({
      name: 'ingestor_reconnect_attempts_total',
      help: 'Total number of failed connection attempts',
      registers: [this.register],
    });

    this.pingCounter = new Counter({
      name: 'ingestor_pings_sent_total',
      help: 'Total number of keepalive pings sent on idle',
      registers: [this.register],
    });
  }

  incrementReceived(): void {
    this.receivedCounter.inc();
  }

  incrementStored(instrument: string): void {
    this.storedCounter.inc({ instrument });
  }

  incrementError(errorKind: string): void {
    this.errorCounter.inc({ error_kind: errorKind });
  }

  incrementReconnect(): void {
    this.reconnectCounter.inc();
  }

  incrementPing(): void {
    this.pingCounter.inc();
  }

  async getMetrics(): Promise<string> {
    return await this.register.metrics();
  }

  getRegistry(): MetricsRegistry {
    return this.register;
  }
}
