import WebSocket from 'ws';
import type { WebSocketConnection, WebSocketData } from './interfaces/WebSocketConnection';

/**
 * `ws` を使った WebSocket 接続の実装
 */
export class StandardWebSocketConnection implements WebSocketConnection {
  private openCallbacks: Array<() => void> = [];
  private messageCallbacks: Array<(data: WebSocketData) => void> = [];
  private closeCallbacks: Array<(code: number, reason: string) => void> = [];
  private errorCallbacks: Array<(error: Error) => void> = [];

  constructor(private readonly socket: WebSocket) {
    this.socket.on('open', () => {
      for (const cb of this.openCallbacks) {
        cb();
      }
    });

    this.socket.on('message', (data: WebSocket.RawData, isBinary: boolean) => {
      const payload: WebSocketData = isBinary ? data : data.toString();
      for (const cb of this.messageCallbacks) {
        cb(payload);
      }
    });

    this.socket.on('close', (code: number, reason: Buffer) => {
      for (const cb of this.closeCallbacks) {
        cb(code, reason.toString());
      }
    });

    this.socket.on('error', (error: Error) => {
      for (const cb of this.errorCallbacks) {
        cb(error);
      }
    });
  }

  onOpen(callback: () => void): void {
    this.openCallbacks.push(callback);
  }

  onMessage(callback: (data: WebSocketData) => void): void {
    this.messageCallbacks.push(callback);
  }

  onClose(callback: (code: number, reason: string) => void): void {
    this.closeCallbacks.push(callback);
  }

  onError(callback: (error: Error) => void): void {
    this.errorCallbacks.push(callback);
  }

  send(data: string): void {
    if (this.socket.readyState !== WebSocket.OPEN) {
      throw new Error(`socket is not open (readyState=${this.socket.readyState})`);
    }
    this.socket.send(data);
  }

  close(): void {
    this.socket.close();
  }

  removeAllListeners(): void {
    this.openCallbacks = [];
    this.messageCallbacks = [];
    this.closeCallbacks = [];
    this.errorCallbacks = [];
  }

  terminate(): void {
    this.socket.terminate();
  }
}
