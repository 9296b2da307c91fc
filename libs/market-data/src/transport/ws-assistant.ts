import { Logger } from '@nestjs/common';
import WebSocket from 'ws';
import { CancelledError, IdleTimeoutError, TransportError, errorMessage } from '../errors';
import { WsAssistant } from '../interfaces';

export interface WsAssistantOptions {
  connectTimeoutMs?: number;
  headers?: Record<string, string>;
}

interface PendingReceive {
  resolve: (message: unknown) => void;
  reject: (error: unknown) => void;
}

const decodeFrame = (data: WebSocket.RawData): unknown => {
  const raw = Array.isArray(data)
    ? Buffer.concat(data).toString('utf8')
    : Buffer.from(data instanceof ArrayBuffer ? new Uint8Array(data) : data).toString('utf8');
  try {
    return JSON.parse(raw);
  } catch {
    // plain text frames such as "pong"
    return raw;
  }
};

/**
 * Pull-style wrapper around a single `ws` connection: frames are buffered
 * until `receive()` takes them, one at a time, in arrival order.
 */
export class WebSocketAssistant implements WsAssistant {
  private readonly logger = new Logger(WebSocketAssistant.name);
  private ws?: WebSocket;
  private url = '';
  private messageTimeoutMs = 0;
  private closed = true;
  private closeReason: Error | null = null;
  private readonly buffer: unknown[] = [];
  private pending: PendingReceive | null = null;
  private readonly connectTimeoutMs: number;
  private readonly headers: Record<string, string>;

  constructor(options: WsAssistantOptions = {}) {
    this.connectTimeoutMs = options.connectTimeoutMs ?? 10_000;
    this.headers = options.headers ?? { 'User-Agent': 'perp-market-stream/1.0' };
  }

  async connect(url: string, messageTimeoutMs: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      throw new CancelledError();
    }
    if (this.ws && !this.closed) {
      return;
    }

    this.url = url;
    this.messageTimeoutMs = messageTimeoutMs;
    this.closeReason = null;
    this.buffer.length = 0;

    const ws = new WebSocket(url, { headers: this.headers });
    this.ws = ws;

    ws.on('message', (data) => this.enqueue(decodeFrame(data)));
    ws.on('close', (code, reason) => {
      this.handleClose(
        new TransportError(`Websocket closed (${code}) ${reason.toString('utf8')}`.trim(), { url }),
      );
    });
    ws.on('error', (error) => {
      this.logger.warn(JSON.stringify({ event: 'ws_error', url, message: errorMessage(error) }));
      this.handleClose(new TransportError(`Websocket error: ${errorMessage(error)}`, { url, cause: error }));
    });

    await new Promise<void>((resolve, reject) => {
      const finish = (error?: unknown) => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        ws.off('open', onOpen);
        ws.off('error', onError);
        if (error) {
          this.release(ws);
          reject(error);
        } else {
          resolve();
        }
      };
      const onOpen = () => {
        this.closed = false;
        finish();
      };
      const onError = (error: Error) =>
        finish(new TransportError(`Websocket connect failed: ${error.message}`, { url, cause: error }));
      const onAbort = () => finish(new CancelledError());
      const timer = setTimeout(
        () => finish(new TransportError(`Websocket connect timed out after ${this.connectTimeoutMs}ms`, { url })),
        this.connectTimeoutMs,
      );

      ws.once('open', onOpen);
      ws.once('error', onError);
      signal?.addEventListener('abort', onAbort, { once: true });
    });

    this.logger.debug(JSON.stringify({ event: 'ws_connected', url }));
  }

  async send(payload: unknown): Promise<void> {
    const ws = this.ws;
    if (!ws || this.closed || ws.readyState !== WebSocket.OPEN) {
      throw new TransportError('Websocket is not connected', { url: this.url });
    }
    const text = typeof payload === 'string' ? payload : JSON.stringify(payload);
    await new Promise<void>((resolve, reject) => {
      ws.send(text, (error) => {
        if (error) {
          reject(new TransportError(`Websocket send failed: ${error.message}`, { url: this.url, cause: error }));
          return;
        }
        resolve();
      });
    });
  }

  receive(signal?: AbortSignal): Promise<unknown> {
    if (signal?.aborted) {
      return Promise.reject(new CancelledError());
    }
    if (this.buffer.length > 0) {
      return Promise.resolve(this.buffer.shift());
    }
    if (this.closed) {
      return Promise.reject(this.closeReason ?? new TransportError('Websocket is not connected', { url: this.url }));
    }

    return new Promise<unknown>((resolve, reject) => {
      const settle = () => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        this.pending = null;
      };
      const onAbort = () => {
        settle();
        reject(new CancelledError());
      };
      const timer = setTimeout(() => {
        settle();
        reject(new IdleTimeoutError(this.messageTimeoutMs));
      }, this.messageTimeoutMs);

      signal?.addEventListener('abort', onAbort, { once: true });
      this.pending = {
        resolve: (message) => {
          settle();
          resolve(message);
        },
        reject: (error) => {
          settle();
          reject(error);
        },
      };
    });
  }

  async disconnect(): Promise<void> {
    const ws = this.ws;
    this.ws = undefined;
    this.handleClose(new TransportError('Websocket disconnected', { url: this.url }));
    if (ws) {
      this.release(ws);
      this.logger.debug(JSON.stringify({ event: 'ws_disconnected', url: this.url }));
    }
  }

  private enqueue(message: unknown): void {
    if (this.pending) {
      this.pending.resolve(message);
      return;
    }
    this.buffer.push(message);
  }

  private handleClose(reason: Error): void {
    if (!this.closeReason) {
      this.closeReason = reason;
    }
    this.closed = true;
    this.pending?.reject(this.closeReason);
  }

  private release(ws: WebSocket): void {
    // keep an error listener attached while tearing down
    ws.on('error', () => undefined);
    ws.removeAllListeners('open');
    ws.removeAllListeners('message');
    ws.removeAllListeners('close');

    if (ws.readyState === WebSocket.OPEN) {
      ws.close(1000, 'cleanup');
    } else if (ws.readyState === WebSocket.CONNECTING) {
      ws.terminate();
    }
  }
}
