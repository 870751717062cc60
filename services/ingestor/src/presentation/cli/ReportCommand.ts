import { ConfigurationError } from '@/domain/errors/IngestorError';
import type { NormalizedRecord } from '@/domain/models/NormalizedRecord';
import type { RecordStore } from '@/domain/repositories/RecordStore';

export type LineWriter = (line: string) => void;

const HOUR_MS = 60 * 60 * 1000;

export const REPORT_USAGE = [
  'usage:',
  '  show-records [limit=10]',
  '  show-stats',
  '  show-instrument <name> [hours=24]',
].join('\n');

/**
 * プレゼンテーション層: 保存済みレコードのレポート出力
 *
 * 責務: サブコマンドの引数を解釈してストアを読み、1 行ずつ書き出す。
 */
export class ReportCommand {
  constructor(
    private readonly store: RecordStore,
    private readonly write: LineWriter = (line) => process.stdout.write(`${line}\n`)
  ) {}

  /**
   * @throws {ConfigurationError} 不明なコマンド・不正な引数
   */
  async run(command: string, args: readonly string[]): Promise<void> {
    switch (command) {
      case 'show-records':
        return await this.showRecords(parseCount(args[0], 10, 'limit'));
      case 'show-stats':
        return await this.showStats();
      case 'show-instrument': {
        const name = args[0];
        if (!name) {
          throw new ConfigurationError(`show-instrument requires an instrument name\n${REPORT_USAGE}`);
        }
        return await this.showInstrument(name, parseCount(args[1], 24, 'hours'));
      }
      default:
        throw new ConfigurationError(`unknown command: ${command}\n${REPORT_USAGE}`);
    }
  }

  async showRecords(limit = 10): Promise<void> {
    const records = await this.store.recent(limit);
    if (records.length === 0) {
      this.write('No records found');
      return;
    }
    for (const record of records) {
      this.write(formatRecord(record));
    }
  }

  async showStats(): Promise<void> {
    const stats = await this.store.stats();
    this.write(`Total records: ${stats.totalCount}`);
    this.write(`Unique instruments: ${stats.distinctInstrumentCount}`);
    this.write(`Latest timestamp: ${stats.latestObservedAt === null ? 'N/A' : formatTime(stats.latestObservedAt)}`);
  }

  async showInstrument(instrumentName: string, hours = 24): Promise<void> {
    const records = await this.store.query(instrumentName, hours * HOUR_MS);
    if (records.length === 0) {
      this.write(`No records for ${instrumentName} in the last ${hours}h`);
      return;
    }
    this.write(`${instrumentName}: ${records.length} records in the last ${hours}h`);
    for (const record of records) {
      this.write(formatRecord(record));
    }
  }
}

export function formatRecord(record: NormalizedRecord): string {
  return [
    formatTime(record.observedAt),
    record.instrumentName,
    `price=${formatValue(record.price)}`,
    `iv=${formatValue(record.volatility)}`,
    `delta=${formatValue(record.delta)}`,
  ].join('  ');
}

function formatTime(epochMs: number): string {
  return new Date(epochMs).toISOString();
}

function formatValue(value: number | null): string {
  return value === null ? '-' : String(value);
}

function parseCount(raw: string | undefined, fallback: number, name: string): number {
  if (raw === undefined) {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(`${name} must be a positive integer (got "${raw}")`);
  }
  return value;
}
