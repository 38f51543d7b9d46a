/**
 * Connection Manager
 *
 * Owns the single connection of a denoise session. Connecting is lazy and never
 * retried automatically: a failed or dropped connection stays down until the
 * next send asks for it again.
 */

import type { AudioFormat } from '../../models/AudioUnit';
import type { DenoiseTransportFactory, IDenoiseTransport } from '../../providers/audio/transport/IDenoiseTransport';
import type { AudioSink } from './AudioSink';
import type { Scheduler, TaskHandle } from './Scheduler';
import { ReceiveLoop } from './ReceiveLoop';
import type { ReceiveLoopEndReason } from './ReceiveLoop';
import { ConnectionFailureError, SendFailureError } from '../../errors/DenoiseErrors';
import type { DenoiseTransportError } from '../../errors/DenoiseErrors';
import { createLogger } from '../../utils/logger';

const logger = createLogger({ service: 'ConnectionManager' });

export type ConnectionStatus = 'disconnected' | 'connecting' | 'connected' | 'failed';

type ConnectionState =
  | { status: 'disconnected' }
  | { status: 'connecting'; attempt: Promise<void> }
  | { status: 'connected'; transport: IDenoiseTransport; receiveTask: TaskHandle }
  | { status: 'failed'; error: ConnectionFailureError };

export interface ConnectionManagerOptions {
  sessionId: string;
  url: string;
  /**
   * URL safe to log (credential masked); defaults to `url`
   */
  displayUrl?: string;
  transportFactory: DenoiseTransportFactory;
  scheduler: Scheduler;
  sink: AudioSink;
  getFormat: () => AudioFormat;
}

export class ConnectionManager {
  private readonly options: ConnectionManagerOptions;
  private state: ConnectionState = { status: 'disconnected' };
  // Bumped on every connect and disconnect so stale callbacks can tell they were superseded
  private generation = 0;
  private _lastError: DenoiseTransportError | null = null;
  private _bytesSent = 0;

  constructor(options: ConnectionManagerOptions) {
    this.options = options;
  }

  get status(): ConnectionStatus {
    return this.state.status;
  }

  get isConnected(): boolean {
    return this.state.status === 'connected';
  }

  get lastError(): DenoiseTransportError | null {
    return this._lastError;
  }

  get bytesSent(): number {
    return this._bytesSent;
  }

  /**
   * Open the connection and start the receive loop.
   * Joins an attempt already in flight; no-op when connected.
   * @throws ConnectionFailureError when the transport could not be opened
   */
  connect(): Promise<void> {
    if (this.state.status === 'connected') {
      return Promise.resolve();
    }
    if (this.state.status === 'connecting') {
      return this.state.attempt;
    }

    const generation = ++this.generation;
    const attempt = Promise.resolve().then(() => this.open(generation));
    this.state = { status: 'connecting', attempt };
    return attempt;
  }

  /**
   * Stop the receive loop, close the transport and return to disconnected.
   * Safe to call in any state.
   */
  async disconnect(): Promise<void> {
    const previous = this.state;
    this.generation++;
    this.state = { status: 'disconnected' };

    if (previous.status !== 'connected') {
      return;
    }

    await previous.receiveTask.cancel();
    await this.closeTransport(previous.transport);
    logger.info({ sessionId: this.options.sessionId, bytesSent: this._bytesSent }, 'Disconnected from denoise endpoint');
  }

  /**
   * @throws SendFailureError when not connected or the write fails; a failed
   * write also drops the connection so the next send reconnects
   */
  async send(data: Buffer): Promise<void> {
    const state = this.state;
    if (state.status !== 'connected') {
      throw this.recordError(new SendFailureError(`Cannot send while ${state.status}`));
    }

    try {
      await state.transport.send(data);
      this._bytesSent += data.length;
    } catch (error) {
      if (this.state === state) {
        await this.disconnect();
      }
      throw this.recordError(new SendFailureError('Sending audio to denoise endpoint failed', error));
    }
  }

  private async open(generation: number): Promise<void> {
    const { sessionId, url, displayUrl = url, transportFactory } = this.options;
    logger.info({ sessionId, url: displayUrl }, 'Connecting to denoise endpoint');

    let transport: IDenoiseTransport;
    try {
      transport = await transportFactory(url);
    } catch (error) {
      const failure = new ConnectionFailureError(displayUrl, error);
      this.recordError(failure);
      if (generation === this.generation) {
        this.state = { status: 'failed', error: failure };
      }
      throw failure;
    }

    if (generation !== this.generation) {
      // Disconnected while the handshake was in flight
      logger.debug({ sessionId }, 'Connect superseded, closing fresh transport');
      await this.closeTransport(transport);
      return;
    }

    const receiveLoop = new ReceiveLoop({
      sessionId,
      transport,
      sink: this.options.sink,
      getFormat: this.options.getFormat,
      onEnded: (reason) => this.handleReceiveEnded(generation, reason)
    });
    const receiveTask = this.options.scheduler.spawn(`receive:${sessionId}`, (signal) => receiveLoop.run(signal));

    this.state = { status: 'connected', transport, receiveTask };
    logger.info({ sessionId }, 'Connected to denoise endpoint');
  }

  private handleReceiveEnded(generation: number, reason: ReceiveLoopEndReason): void {
    if (generation !== this.generation || this.state.status !== 'connected') {
      return;
    }

    const { transport } = this.state;
    this.generation++;
    this.state = { status: 'disconnected' };
    logger.info({ sessionId: this.options.sessionId, reason }, 'Receive loop ended, will reconnect on next send');
    void this.closeTransport(transport);
  }

  private async closeTransport(transport: IDenoiseTransport): Promise<void> {
    try {
      await transport.close();
    } catch (error) {
      logger.warn(
        { sessionId: this.options.sessionId, error: error instanceof Error ? error.message : error },
        'Closing denoise transport failed'
      );
    }
  }

  private recordError<E extends DenoiseTransportError>(error: E): E {
    this._lastError = error;
    return error;
  }
}
