import { CancelledError } from '@/domain/errors/IngestorError';
import type { Frame } from '@/domain/models/Frame';

interface Waiter {
  resolve(frame: Frame | null): void;
  reject(error: Error): void;
}

/**
 * インフラ層: 受信フレームのバッファ
 *
 * イベント駆動のソケットを `await next()` で読めるようにする。読み手は常に 1 つ。
 * fail() 後もバッファ済みのフレームは先に返し、空になってからエラーを投げる。
 */
export class FrameQueue {
  private readonly buffer: Frame[] = [];
  private failure: Error | null = null;
  private waiter: Waiter | null = null;

  push(frame: Frame): void {
    if (this.failure) {
      return;
    }
    if (this.waiter) {
      const waiter = this.waiter;
      this.waiter = null;
      waiter.resolve(frame);
      return;
    }
    this.buffer.push(frame);
  }

  /**
   * 最初の失敗だけを保持する
   */
  fail(error: Error): void {
    if (this.failure) {
      return;
    }
    this.failure = error;
    if (this.waiter) {
      const waiter = this.waiter;
      this.waiter = null;
      waiter.reject(error);
    }
  }

  get failed(): boolean {
    return this.failure !== null;
  }

  /**
   * 次のフレームを待つ。
   * @returns フレーム。timeoutMs 以内に届かなければ null
   * @throws fail() に渡されたエラー、または中断時の CancelledError
   */
  next(timeoutMs: number, signal?: AbortSignal): Promise<Frame | null> {
    // 中断済みならバッファが残っていても返さない
    if (signal?.aborted) {
      return Promise.reject(new CancelledError());
    }
    const buffered = this.buffer.shift();
    if (buffered) {
      return Promise.resolve(buffered);
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    if (this.waiter) {
      return Promise.reject(new Error('FrameQueue supports a single reader'));
    }

    return new Promise<Frame | null>((resolve, reject) => {
      const cleanup = () => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        this.waiter = null;
      };
      const onAbort = () => {
        cleanup();
        reject(new CancelledError());
      };
      const timer = setTimeout(() => {
        cleanup();
        resolve(null);
      }, timeoutMs);

      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiter = {
        resolve: (frame) => {
          cleanup();
          resolve(frame);
        },
        reject: (error) => {
          cleanup();
          reject(error);
        },
      };
    });
  }
}
