import { type Mock, afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { CancelledError, DiscoveryError } from '@/domain/errors/IngestorError';
import { DeribitInstrumentDiscovery } from '@/infra/adapters/deribit/DeribitInstrumentDiscovery';
import { LoggerMock } from '@test/unit/helpers/mocks/LoggerMock';

type FetchFn = (input: string | URL | Request, init?: RequestInit) => Promise<Response>;

const REQUEST = { currency: 'BTC', kind: 'option', includeExpired: false };

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

/**
 * 単体テスト: DeribitInstrumentDiscovery
 *
 * グローバルの fetch を差し替えて REST のやり取りを再現する。
 */
describe('DeribitInstrumentDiscovery', () => {
  let fetchMock: Mock<FetchFn>;
  let discovery: DeribitInstrumentDiscovery;

  beforeEach(() => {
    fetchMock = vi.fn<FetchFn>();
    vi.stubGlobal('fetch', fetchMock);
    discovery = new DeribitInstrumentDiscovery({
      restUrl: 'https://feed.test',
      credentials: { clientId: 'test-client', clientSecret: 'test-secret' },
      requestTimeoutMs: 10000,
      logger: new LoggerMock(),
    });
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.useRealTimers();
  });

  /** ヘッダーは届くが本文が終わらない応答 */
  function stalledResponse(): Response {
    const response = new Response('{}', { status: 200 });
    vi.spyOn(response, 'json').mockReturnValue(new Promise<unknown>(() => {}));
    return response;
  }

  it('トークンを取得してから銘柄一覧を取得し、順序を保って返す', async () => {
    fetchMock
      .mockResolvedValueOnce(jsonResponse({ result: { access_token: 'test-token' } }))
      .mockResolvedValueOnce(
        jsonResponse({
          result: [
            { instrument_name: 'BTC-B', is_active: true, expiration_timestamp: 2000, strike: 60000 },
            { instrument_name: 'BTC-A', is_active: false, expiration_timestamp: 1000 },
          ],
        })
      );

    const instruments = await discovery.fetchInstruments(REQUEST);

    expect(instruments).toEqual([
      { instrumentName: 'BTC-B', isActive: true, expirationTimestampMs: 2000 },
      { instrumentName: 'BTC-A', isActive: false, expirationTimestampMs: 1000 },
    ]);

    const [authUrl, authInit] = fetchMock.mock.calls[0];
    expect(authUrl).toBe('https://feed.test/api/v2/public/auth');
    expect(authInit?.method).toBe('POST');
    expect(authInit?.body).toBe(
      JSON.stringify({ client_id: 'test-client', client_secret: 'test-secret', grant_type: 'client_credentials' })
    );

    const [listUrl, listInit] = fetchMock.mock.calls[1];
    expect(listUrl).toBe('https://feed.test/api/v2/public/get_instruments?currency=BTC&kind=option&expired=false');
    expect(listInit?.headers).toEqual({ Authorization: 'Bearer test-token' });
  });

  it('必須フィールドが欠けた要素は読み飛ばす', async () => {
    fetchMock
      .mockResolvedValueOnce(jsonResponse({ result: { access_token: 'test-token' } }))
      .mockResolvedValueOnce(
        jsonResponse({
          result: [
            { instrument_name: 'BTC-A', is_active: true },
            { is_active: true, expiration_timestamp: 1000 },
            { instrument_name: 'BTC-C', expiration_timestamp: 1000 },
            { instrument_name: 'BTC-D', is_active: true, expiration_timestamp: 3000 },
          ],
        })
      );

    const instruments = await discovery.fetchInstruments(REQUEST);

    expect(instruments.map((instrument) => instrument.instrumentName)).toEqual(['BTC-D']);
  });

  it('2xx 以外のステータスは DiscoveryError', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ error: { message: 'unauthorized' } }, 401));

    await expect(discovery.fetchInstruments(REQUEST)).rejects.toThrow(
      'request to https://feed.test/api/v2/public/auth failed with status 401'
    );
  });

  it('トークンのない認証応答は DiscoveryError', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ result: {} }));

    await expect(discovery.fetchInstruments(REQUEST)).rejects.toThrow('auth response has no access token');
  });

  it('result が配列でない一覧応答は DiscoveryError', async () => {
    fetchMock
      .mockResolvedValueOnce(jsonResponse({ result: { access_token: 'test-token' } }))
      .mockResolvedValueOnce(jsonResponse({ result: 'nope' }));

    await expect(discovery.fetchInstruments(REQUEST)).rejects.toBeInstanceOf(DiscoveryError);
  });

  it('JSON でない応答本文は DiscoveryError', async () => {
    fetchMock.mockResolvedValueOnce(new Response('<html>', { status: 200 }));

    await expect(discovery.fetchInstruments(REQUEST)).rejects.toThrow(
      'response from https://feed.test/api/v2/public/auth is not valid JSON'
    );
  });

  it('ネットワークエラーは DiscoveryError に包む', async () => {
    fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));

    await expect(discovery.fetchInstruments(REQUEST)).rejects.toThrow(
      'request to https://feed.test/api/v2/public/auth failed'
    );
  });

  it('本文の読み出しが終わらなければ requestTimeoutMs で DiscoveryError', async () => {
    vi.useFakeTimers();
    fetchMock.mockResolvedValueOnce(stalledResponse());

    const result = expect(discovery.fetchInstruments(REQUEST)).rejects.toThrow(
      'request to https://feed.test/api/v2/public/auth timed out after 10000ms'
    );
    await vi.advanceTimersByTimeAsync(10000);

    await result;
    expect(vi.getTimerCount()).toBe(0);
  });

  it('本文の読み出し中に中断されると CancelledError', async () => {
    vi.useFakeTimers();
    fetchMock.mockResolvedValueOnce(stalledResponse());
    const controller = new AbortController();

    const result = expect(discovery.fetchInstruments(REQUEST, controller.signal)).rejects.toBeInstanceOf(
      CancelledError
    );
    await vi.advanceTimersByTimeAsync(100);
    controller.abort();

    await result;
    expect(vi.getTimerCount()).toBe(0);
  });

  it('中断済みの signal では CancelledError', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(discovery.fetchInstruments(REQUEST, controller.signal)).rejects.toBeInstanceOf(CancelledError);
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
