import Redis from 'ioredis';
import { z } from 'zod';
import type { StorageSettings } from '@/application/interfaces/IngestorConfig';
import type { Logger } from '@/application/interfaces/Logger';
import { StorageError } from '@/domain/errors/IngestorError';
import type { NormalizedRecord, RecordStats } from '@/domain/models/NormalizedRecord';
import type { RecordStore } from '@/domain/repositories/RecordStore';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';

// 同じスコアのメンバーは辞書順に並ぶので、採番を固定幅の文字列にして挿入順と揃える
const SEQUENCE_WIDTH = 16;

const StoredRecordSchema = z.object({
  id: z.string(),
  instrumentName: z.string(),
  price: z.number().nullable(),
  volatility: z.number().nullable(),
  delta: z.number().nullable(),
  observedAt: z.number(),
});

/**
 * インフラ層: Redis へのレコード書き込み・読み出し実装
 *
 * キー構成（prefix は既定で `options`）:
 * - `<prefix>:seq` レコード ID の採番
 * - `<prefix>:records` 全レコード（observedAt をスコアにした sorted set）
 * - `<prefix>:records:<instrument>` 銘柄ごとの sorted set
 * - `<prefix>:instruments` 銘柄名の set
 *
 * メンバーは ID を含む JSON なので、内容が同じレコードも別メンバーになる。
 * observedAt が同じレコードは後から書いたものほど新しい扱いになる。
 */
export class RedisRecordStore implements RecordStore {
  private readonly redis: Redis;
  private readonly logger: Logger;

  /**
   * @param settings 接続 URL とキー prefix
   * @param logger ロガー（オプショナル、未指定の場合は LoggerFactory から取得）
   */
  constructor(
    private readonly settings: StorageSettings,
    logger?: Logger
  ) {
    this.redis = new Redis(settings.redisUrl, { maxRetriesPerRequest: 3 });
    this.logger =
      logger?.child({ component: 'RedisRecordStore' }) ??
      LoggerFactory.create({ component: 'RedisRecordStore' });
  }

  async insert(record: NormalizedRecord): Promise<void> {
    try {
      const id = await this.redis.incr(this.key('seq'));
      const member = JSON.stringify({ id: String(id).padStart(SEQUENCE_WIDTH, '0'), ...record });

      // 1 レコード分を MULTI でまとめて書く
      const results = await this.redis
        .multi()
        .zadd(this.key('records'), record.observedAt, member)
        .zadd(this.instrumentKey(record.instrumentName), record.observedAt, member)
        .sadd(this.key('instruments'), record.instrumentName)
        .exec();

      if (results === null) {
        throw new Error('transaction was discarded');
      }
      const failed = results.find(([error]) => error !== null);
      if (failed) {
        throw failed[0];
      }
    } catch (error) {
      throw new StorageError(record.instrumentName, { cause: error });
    }
  }

  async query(instrumentName: string, windowMs: number): Promise<NormalizedRecord[]> {
    const since = Date.now() - windowMs;
    const members = await this.redis.zrevrangebyscore(this.instrumentKey(instrumentName), '+inf', since);
    return this.parseMembers(members);
  }

  async recent(limit: number): Promise<NormalizedRecord[]> {
    if (limit <= 0) {
      return [];
    }
    const members = await this.redis.zrevrange(this.key('records'), 0, limit - 1);
    return this.parseMembers(members);
  }

  async stats(): Promise<RecordStats> {
    const [totalCount, distinctInstrumentCount, latest] = await Promise.all([
      this.redis.zcard(this.key('records')),
      this.redis.scard(this.key('instruments')),
      this.redis.zrevrange(this.key('records'), 0, 0, 'WITHSCORES'),
    ]);
    const latestScore = latest[1];

    return {
      totalCount,
      distinctInstrumentCount,
      latestObservedAt: latestScore === undefined ? null : Number(latestScore),
    };
  }

  /**
   * Redis 接続を閉じる。
   */
  async close(): Promise<void> {
    await this.redis.quit();
  }

  private key(suffix: string): string {
    return `${this.settings.keyPrefix}:${suffix}`;
  }

  private instrumentKey(instrumentName: string): string {
    return this.key(`records:${instrumentName}`);
  }

  private parseMembers(members: string[]): NormalizedRecord[] {
    const records: NormalizedRecord[] = [];
    for (const member of members) {
      const parsed = StoredRecordSchema.safeParse(safeJsonParse(member));
      if (!parsed.success) {
        this.logger.warn('skipping unreadable stored record', { member, err: parsed.error });
        continue;
      }
      const { id: _id, ...record } = parsed.data;
      records.push(record);
    }
    return records;
  }
}

function safeJsonParse(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
