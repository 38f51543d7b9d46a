/**
 * WebSocket Transport
 *
 * Carries raw PCM bytes in binary frames in both directions using the `ws`
 * client. Incoming frames are queued until `receive()` picks them up, so the
 * send path and the receive loop never wait on each other.
 */

import WebSocket from 'ws';
import type { RawData } from 'ws';
import type { IDenoiseTransport } from './IDenoiseTransport';
import { createLogger } from '../../../utils/logger';

const logger = createLogger({ service: 'WebSocketTransport' });

const DEFAULT_HANDSHAKE_TIMEOUT_MS = 10000;
const DEFAULT_CLOSE_TIMEOUT_MS = 2000;

export interface WebSocketTransportOptions {
  handshakeTimeoutMs?: number;
  /**
   * How long close() waits for the peer's close frame before dropping the socket
   */
  closeTimeoutMs?: number;
}

interface PendingReceive {
  resolve: (data: Buffer | null) => void;
  reject: (error: unknown) => void;
}

function toBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) {
    return data;
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data);
  }
  return Buffer.from(data);
}

export class WebSocketTransport implements IDenoiseTransport {
  private readonly socket: WebSocket;
  private queue: Buffer[] = [];
  private receivers: PendingReceive[] = [];
  private failure: Error | null = null;
  private closed = false;
  private readonly closeTimeoutMs: number;

  constructor(socket: WebSocket, options: WebSocketTransportOptions = {}) {
    this.socket = socket;
    this.closeTimeoutMs = options.closeTimeoutMs ?? DEFAULT_CLOSE_TIMEOUT_MS;
    socket.on('message', (data) => this.handleMessage(toBuffer(data)));
    socket.on('error', (error) => this.handleError(error));
    socket.on('close', (code, reason) => this.handleClose(code, reason.toString()));
  }

  get isOpen(): boolean {
    return this.socket.readyState === WebSocket.OPEN;
  }

  send(data: Buffer): Promise<void> {
    if (!this.isOpen) {
      return Promise.reject(new Error('WebSocket is not open'));
    }

    return new Promise((resolve, reject) => {
      this.socket.send(data, { binary: true }, (error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }

  receive(signal?: AbortSignal): Promise<Buffer | null> {
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }

    const queued = this.queue.shift();
    if (queued) {
      return Promise.resolve(queued);
    }

    if (this.failure) {
      const failure = this.failure;
      this.failure = null;
      return Promise.reject(failure);
    }

    if (this.closed) {
      return Promise.resolve(null);
    }

    return new Promise((resolve, reject) => {
      const onAbort = () => {
        this.receivers = this.receivers.filter((receiver) => receiver !== pending);
        reject(signal?.reason);
      };

      const pending: PendingReceive = {
        resolve: (data) => {
          signal?.removeEventListener('abort', onAbort);
          resolve(data);
        },
        reject: (error) => {
          signal?.removeEventListener('abort', onAbort);
          reject(error);
        }
      };

      signal?.addEventListener('abort', onAbort, { once: true });
      this.receivers.push(pending);
    });
  }

  close(): Promise<void> {
    if (this.socket.readyState === WebSocket.CLOSED) {
      return Promise.resolve();
    }

    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        logger.debug({ timeoutMs: this.closeTimeoutMs }, 'No close frame from peer, terminating');
        this.socket.terminate();
      }, this.closeTimeoutMs);

      this.socket.once('close', () => {
        clearTimeout(timer);
        resolve();
      });
      if (this.socket.readyState !== WebSocket.CLOSING) {
        this.socket.close(1000);
      }
    });
  }

  private handleMessage(data: Buffer): void {
    const receiver = this.receivers.shift();
    if (receiver) {
      receiver.resolve(data);
    } else {
      this.queue.push(data);
    }
  }

  private handleError(error: Error): void {
    logger.debug({ error: error.message }, 'WebSocket error');

    const receivers = this.receivers;
    this.receivers = [];
    if (receivers.length === 0) {
      this.failure = error;
      return;
    }
    receivers.forEach((receiver) => receiver.reject(error));
  }

  private handleClose(code: number, reason: string): void {
    logger.debug({ code, reason }, 'WebSocket closed');
    this.closed = true;

    const receivers = this.receivers;
    this.receivers = [];
    receivers.forEach((receiver) => receiver.resolve(null));
  }
}

/**
 * Open a WebSocket transport, resolving once the handshake has completed
 */
export function openWebSocketTransport(
  url: string,
  options: WebSocketTransportOptions = {}
): Promise<WebSocketTransport> {
  const socket = new WebSocket(url, {
    handshakeTimeout: options.handshakeTimeoutMs ?? DEFAULT_HANDSHAKE_TIMEOUT_MS
  });
  const transport = new WebSocketTransport(socket, options);

  return new Promise((resolve, reject) => {
    const onOpen = () => {
      socket.off('error', onError);
      resolve(transport);
    };
    const onError = (error: Error) => {
      socket.off('open', onOpen);
      reject(error);
    };

    socket.once('open', onOpen);
    socket.once('error', onError);
  });
}
