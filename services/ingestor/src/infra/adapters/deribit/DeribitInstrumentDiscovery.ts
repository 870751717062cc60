import type { FeedCredentials } from '@/application/interfaces/FeedSession';
import type { InstrumentDiscovery } from '@/application/interfaces/InstrumentDiscovery';
import type { Logger } from '@/application/interfaces/Logger';
import { CancelledError, DiscoveryError } from '@/domain/errors/IngestorError';
import type { DiscoveryRequest, InstrumentDescriptor } from '@/domain/models/Instrument';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import {
  DeribitAuthResponseSchema,
  DeribitInstrumentSchema,
  DeribitInstrumentsResponseSchema,
} from './types/DeribitMessages';

export interface DeribitInstrumentDiscoveryOptions {
  restUrl: string;
  credentials: FeedCredentials;
  requestTimeoutMs: number;
  logger?: Logger;
}

/**
 * インフラ層: REST による銘柄探索
 *
 * トークンを取得してから get_instruments を呼ぶ。起動時に 1 回だけ使う。
 */
export class DeribitInstrumentDiscovery implements InstrumentDiscovery {
  private readonly logger: Logger;

  constructor(private readonly options: DeribitInstrumentDiscoveryOptions) {
    this.logger =
      options.logger?.child({ component: 'DeribitInstrumentDiscovery' }) ??
      LoggerFactory.create({ component: 'DeribitInstrumentDiscovery' });
  }

  async fetchInstruments(request: DiscoveryRequest, signal?: AbortSignal): Promise<InstrumentDescriptor[]> {
    const token = await this.fetchAccessToken(signal);

    const query = new URLSearchParams({
      currency: request.currency,
      kind: request.kind,
      expired: String(request.includeExpired),
    });
    const body = await this.requestJson(
      `${this.options.restUrl}/api/v2/public/get_instruments?${query.toString()}`,
      { method: 'GET', headers: { Authorization: `Bearer ${token}` } },
      signal
    );
    const parsed = DeribitInstrumentsResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new DiscoveryError('get_instruments response has no result list', { cause: parsed.error });
    }

    const instruments: InstrumentDescriptor[] = [];
    for (const entry of parsed.data.result) {
      const instrument = DeribitInstrumentSchema.safeParse(entry);
      if (!instrument.success) {
        continue;
      }
      instruments.push({
        instrumentName: instrument.data.instrument_name,
        isActive: instrument.data.is_active,
        expirationTimestampMs: instrument.data.expiration_timestamp,
      });
    }

    this.logger.info('instruments discovered', {
      currency: request.currency,
      kind: request.kind,
      received: parsed.data.result.length,
      usable: instruments.length,
    });
    return instruments;
  }

  private async fetchAccessToken(signal?: AbortSignal): Promise<string> {
    const { clientId, clientSecret } = this.options.credentials;
    const body = await this.requestJson(
      `${this.options.restUrl}/api/v2/public/auth`,
      {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          client_id: clientId,
          client_secret: clientSecret,
          grant_type: 'client_credentials',
        }),
      },
      signal
    );
    const parsed = DeribitAuthResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new DiscoveryError('auth response has no access token', { cause: parsed.error });
    }
    return parsed.data.result.access_token;
  }

  /**
   * 1 リクエスト分。本文の読み出しまで含めて requestTimeoutMs で打ち切る
   * @throws {DiscoveryError | CancelledError}
   */
  private async requestJson(url: string, init: RequestInit, signal?: AbortSignal): Promise<unknown> {
    if (signal?.aborted) {
      throw new CancelledError();
    }
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.options.requestTimeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const response = await fetch(url, { ...init, signal: controller.signal });
      if (!response.ok) {
        throw new DiscoveryError(`request to ${url} failed with status ${response.status}`);
      }
      try {
        return await untilAborted(response.json(), controller.signal);
      } catch (error) {
        if (controller.signal.aborted) {
          throw error;
        }
        throw new DiscoveryError(`response from ${url} is not valid JSON`, { cause: error });
      }
    } catch (error) {
      if (signal?.aborted) {
        throw new CancelledError();
      }
      if (error instanceof DiscoveryError) {
        throw error;
      }
      if (controller.signal.aborted) {
        throw new DiscoveryError(`request to ${url} timed out after ${this.options.requestTimeoutMs}ms`, {
          cause: error,
        });
      }
      throw new DiscoveryError(`request to ${url} failed`, { cause: error });
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}

/**
 * signal が中断されたら promise の完了を待たずに reject する
 */
function untilAborted<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new Error('request aborted'));
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}
