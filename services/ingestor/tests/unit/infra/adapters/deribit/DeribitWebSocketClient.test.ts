import { beforeEach, describe, expect, it, vi } from 'vitest';
import { CancelledError, TransportError } from '@/domain/errors/IngestorError';
import { DeribitWebSocketClient, readText } from '@/infra/adapters/deribit/DeribitWebSocketClient';
import { LoggerMock } from '@test/unit/helpers/mocks/LoggerMock';

interface CreatedSocket {
  url: string;
  options: unknown;
  emit(event: string, ...args: unknown[]): boolean;
  terminate: () => void;
}

const wsState = vi.hoisted(() => ({ created: new Array<CreatedSocket>() }));

// ws をモック（実ソケットは開かない）
vi.mock('ws', async () => {
  const { EventEmitter } = await import('node:events');

  class MockWebSocket extends EventEmitter {
    static readonly OPEN = 1;
    readyState = 1;
    send = vi.fn();
    close = vi.fn();
    terminate = vi.fn();

    constructor(
      readonly url: string,
      readonly options: unknown
    ) {
      super();
      wsState.created.push(this);
    }
  }

  return { default: MockWebSocket };
});

function arrayBufferOf(text: string): ArrayBuffer {
  const bytes = new TextEncoder().encode(text);
  const buffer = new ArrayBuffer(bytes.length);
  new Uint8Array(buffer).set(bytes);
  return buffer;
}

function lastSocket(): CreatedSocket {
  const socket = wsState.created.at(-1);
  if (!socket) {
    throw new Error('no socket was created');
  }
  return socket;
}

/**
 * 単体テスト: DeribitWebSocketClient
 *
 * - ハンドシェイク完了で接続を返す
 * - ハンドシェイク失敗は TransportError
 * - 中断は CancelledError
 */
describe('DeribitWebSocketClient', () => {
  let client: DeribitWebSocketClient;

  beforeEach(() => {
    wsState.created.length = 0;
    client = new DeribitWebSocketClient(new LoggerMock());
  });

  it('open で接続を返し、ハンドシェイクのタイムアウトを ws に渡す', async () => {
    const pending = client.connect('wss://feed.test/ws', { handshakeTimeoutMs: 5000 });
    lastSocket().emit('open');

    const connection = await pending;
    const received: string[] = [];
    connection.onMessage((data) => received.push(readText(data)));
    lastSocket().emit('message', Buffer.from('{"jsonrpc":"2.0"}'), false);

    expect(lastSocket().url).toBe('wss://feed.test/ws');
    expect(lastSocket().options).toEqual({ handshakeTimeout: 5000 });
    expect(received).toEqual(['{"jsonrpc":"2.0"}']);
  });

  it('ハンドシェイク中のエラーは TransportError になり原因を保持する', async () => {
    const pending = client.connect('wss://feed.test/ws', { handshakeTimeoutMs: 5000 });
    const cause = new Error('Opening handshake has timed out');
    lastSocket().emit('error', cause);

    const error = await pending.catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransportError);
    if (error instanceof TransportError) {
      expect(error.message).toBe('failed to connect to wss://feed.test/ws');
      expect(error.cause).toBe(cause);
    }
  });

  it('中断されるとソケットを強制終了して CancelledError', async () => {
    const controller = new AbortController();
    const pending = client.connect('wss://feed.test/ws', { handshakeTimeoutMs: 5000, signal: controller.signal });
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(CancelledError);
    expect(lastSocket().terminate).toHaveBeenCalledTimes(1);
  });

  it('中断済みの signal ではソケットを作らない', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      client.connect('wss://feed.test/ws', { handshakeTimeoutMs: 5000, signal: controller.signal })
    ).rejects.toBeInstanceOf(CancelledError);
    expect(wsState.created).toHaveLength(0);
  });
});

describe('readText', () => {
  it.each([
    ['string', 'abc'],
    ['Buffer', Buffer.from('abc')],
    ['Buffer[]', [Buffer.from('a'), Buffer.from('bc')]],
    ['ArrayBuffer', arrayBufferOf('abc')],
  ])('%s をテキストに変換する', (_label, data) => {
    expect(readText(data)).toBe('abc');
  });
});
