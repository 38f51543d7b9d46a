/**
 * Denoise Orchestrator
 *
 * Streams raw PCM to a remote denoising endpoint and emits what comes back.
 * Input is gated (mute, passthrough), batched into windows by the
 * AudioAccumulator and sent over the session's connection. Denoised audio
 * arrives independently through the ReceiveLoop, so a sent window and an
 * emitted unit are never paired.
 *
 * Usage:
 * ```typescript
 * const sink = new EventEmitterSink();
 * sink.on('audio', (unit: OutputUnit) => playback.write(unit.audio));
 *
 * const orchestrator = new DenoiseOrchestrator({ config: toDenoiseConfig(loadEnv()), sink });
 * await orchestrator.start(16000, 1);
 * await orchestrator.processInput({ audio: chunk, sampleRate: 16000, numChannels: 1 });
 * await orchestrator.stop();
 * ```
 */

import type { AudioFormat, InputUnit } from '../../models/AudioUnit';
import type { DenoiseMessage } from '../../models/DenoiseMessage';
import { resolveDenoiseConfig } from '../../models/DenoiseConfig';
import type { DenoiseConfig, ResolvedDenoiseConfig } from '../../models/DenoiseConfig';
import type { DenoiseTransportFactory } from '../../providers/audio/transport/IDenoiseTransport';
import { openWebSocketTransport } from '../../providers/audio/transport/WebSocketTransport';
import { DenoiseStateError, DenoiseTransportError } from '../../errors/DenoiseErrors';
import type { AudioSink } from './AudioSink';
import { AudioAccumulator } from './AudioAccumulator';
import { ConnectionManager } from './ConnectionManager';
import type { ConnectionStatus } from './ConnectionManager';
import { AsyncTaskScheduler } from './Scheduler';
import type { Scheduler } from './Scheduler';
import { StateTracker } from './StateTracker';
import { buildDenoiseUrl } from './denoiseUrl';
import { generateCorrelationId } from '../../utils/correlationId';
import { createLogger } from '../../utils/logger';

const logger = createLogger({ service: 'DenoiseOrchestrator' });

export type OrchestratorState = 'uninitialized' | 'started' | 'stopped' | 'cancelled';

export interface DenoiseOrchestratorOptions {
  config: DenoiseConfig;
  sink: AudioSink;
  /**
   * Opens the endpoint connection (default: WebSocket)
   */
  transportFactory?: DenoiseTransportFactory;
  scheduler?: Scheduler;
  sessionId?: string;
}

type ActiveSession =
  | { mode: 'passthrough'; format: AudioFormat }
  | { mode: 'denoise'; format: AudioFormat; accumulator: AudioAccumulator; connection: ConnectionManager };

type OrchestratorPhase =
  | { state: 'uninitialized' }
  | { state: 'started'; session: ActiveSession }
  | { state: 'stopped' }
  | { state: 'cancelled' };

export class DenoiseOrchestrator {
  readonly sessionId: string;

  private readonly config: ResolvedDenoiseConfig;
  private readonly sink: AudioSink;
  private readonly transportFactory: DenoiseTransportFactory;
  private readonly scheduler: Scheduler;
  private readonly stateTracker = new StateTracker();
  private phase: OrchestratorPhase = { state: 'uninitialized' };
  private windowsSent = 0;
  private windowsFailed = 0;

  constructor(options: DenoiseOrchestratorOptions) {
    this.config = resolveDenoiseConfig(options.config);
    this.sink = options.sink;
    this.transportFactory = options.transportFactory ?? ((url) => openWebSocketTransport(url));
    this.scheduler = options.scheduler ?? new AsyncTaskScheduler();
    this.sessionId = options.sessionId ?? generateCorrelationId();
  }

  get state(): OrchestratorState {
    return this.phase.state;
  }

  get muted(): boolean {
    return this.stateTracker.muted;
  }

  get connectionStatus(): ConnectionStatus | null {
    if (this.phase.state !== 'started' || this.phase.session.mode !== 'denoise') {
      return null;
    }
    return this.phase.session.connection.status;
  }

  getStats(): { windowsSent: number; windowsFailed: number; bufferedBytes: number } {
    const session = this.phase.state === 'started' ? this.phase.session : null;
    return {
      windowsSent: this.windowsSent,
      windowsFailed: this.windowsFailed,
      bufferedBytes: session?.mode === 'denoise' ? session.accumulator.bufferedBytes : 0
    };
  }

  /**
   * Fix the session format and open the connection (unless in passthrough).
   * A failed connect is reported and retried on the next send.
   */
  async start(sampleRate: number, numChannels: number): Promise<void> {
    switch (this.phase.state) {
      case 'started':
        // Repeated start with the same format is harmless; a different one throws
        this.stateTracker.configure(sampleRate, numChannels);
        return;
      case 'cancelled':
        logger.debug({ sessionId: this.sessionId }, 'Ignoring start on cancelled session');
        return;
      case 'stopped':
        throw new DenoiseStateError('Cannot restart a stopped denoise session');
    }

    const format = this.stateTracker.configure(sampleRate, numChannels);

    if (this.config.passthrough) {
      this.phase = { state: 'started', session: { mode: 'passthrough', format } };
      logger.info({ sessionId: this.sessionId, ...format }, 'Denoise session started (passthrough)');
      return;
    }

    const connection = this.createConnection(format);
    const accumulator = new AudioAccumulator({
      sampleRate: format.sampleRate,
      accumulationWindowSecs: this.config.accumulationWindowSecs
    });
    this.phase = { state: 'started', session: { mode: 'denoise', format, accumulator, connection } };
    logger.info(
      { sessionId: this.sessionId, ...format, windowSecs: this.config.accumulationWindowSecs },
      'Denoise session started'
    );

    try {
      await connection.connect();
    } catch (error) {
      if (this.phase.state === 'started') {
        this.handleTransportError(error);
      }
    }
  }

  /**
   * Gate, accumulate and, once a window is full, send one input unit
   * @throws DenoiseStateError before start
   * @throws ConfigurationViolationError when the unit's format differs from the session's
   */
  async processInput(unit: InputUnit): Promise<void> {
    const phase = this.phase;
    if (phase.state === 'uninitialized') {
      throw new DenoiseStateError('processInput called before start');
    }
    if (phase.state !== 'started') {
      logger.debug({ sessionId: this.sessionId, state: phase.state }, 'Dropping input after shutdown');
      return;
    }

    const format = this.stateTracker.assertMatches(unit);

    if (this.stateTracker.muted) {
      return;
    }

    const session = phase.session;
    if (session.mode === 'passthrough') {
      this.sink.pushAudio({ audio: unit.audio, sampleRate: format.sampleRate, numChannels: format.numChannels });
      return;
    }

    session.accumulator.accumulate(unit.audio);
    if (!session.accumulator.shouldFlush()) {
      return;
    }

    const batch = session.accumulator.flush();
    if (batch.length === 0) {
      return;
    }

    await this.sendWindow(session.connection, batch, format);
  }

  setMuted(muted: boolean): void {
    if (this.stateTracker.muted !== muted) {
      logger.info({ sessionId: this.sessionId, muted }, muted ? 'Denoise input muted' : 'Denoise input unmuted');
    }
    this.stateTracker.setMuted(muted);
  }

  /**
   * Disconnect and discard any audio not yet sent
   */
  async stop(): Promise<void> {
    const phase = this.phase;
    if (phase.state !== 'started') {
      logger.debug({ sessionId: this.sessionId, state: phase.state }, 'Ignoring stop');
      return;
    }

    this.phase = { state: 'stopped' };
    await this.teardown(phase.session);
    logger.info({ sessionId: this.sessionId, ...this.getStats() }, 'Denoise session stopped');
  }

  /**
   * Like stop(), but valid from any state, including while start() is still connecting
   */
  async cancel(): Promise<void> {
    const phase = this.phase;
    if (phase.state === 'cancelled') {
      return;
    }

    this.phase = { state: 'cancelled' };
    if (phase.state === 'started') {
      await this.teardown(phase.session);
    }
    logger.info({ sessionId: this.sessionId }, 'Denoise session cancelled');
  }

  async handleMessage(message: DenoiseMessage): Promise<void> {
    switch (message.kind) {
      case 'audio':
        return this.processInput(message.unit);
      case 'mute':
        this.setMuted(message.muted);
        return;
      case 'lifecycle':
        switch (message.event) {
          case 'start':
            return this.start(message.sampleRate, message.numChannels);
          case 'stop':
            return this.stop();
          case 'cancel':
            return this.cancel();
        }
    }
  }

  private createConnection(format: AudioFormat): ConnectionManager {
    const urlParams = {
      baseUrl: this.config.baseUrl,
      sampleRate: format.sampleRate,
      outputFrameRate: this.config.outputFrameRate ?? format.sampleRate
    };

    return new ConnectionManager({
      sessionId: this.sessionId,
      url: buildDenoiseUrl({ ...urlParams, apiKey: this.config.apiKey }),
      displayUrl: buildDenoiseUrl({ ...urlParams, apiKey: '***' }),
      transportFactory: this.transportFactory,
      scheduler: this.scheduler,
      sink: this.sink,
      getFormat: () => format
    });
  }

  private async sendWindow(connection: ConnectionManager, batch: Buffer, format: AudioFormat): Promise<void> {
    try {
      if (!connection.isConnected) {
        await connection.connect();
      }
      await connection.send(batch);
      this.windowsSent++;
    } catch (error) {
      if (this.phase.state !== 'started') {
        logger.debug({ sessionId: this.sessionId }, 'Window dropped during shutdown');
        return;
      }

      this.handleTransportError(error);
      this.windowsFailed++;

      if (this.config.fallbackToPassthrough) {
        this.sink.pushAudio({ audio: batch, sampleRate: format.sampleRate, numChannels: format.numChannels });
      }
    }
  }

  /**
   * Report a recoverable transport failure; anything else is rethrown
   */
  private handleTransportError(error: unknown): void {
    if (!(error instanceof DenoiseTransportError)) {
      throw error;
    }

    logger.warn({ sessionId: this.sessionId, error: error.message, type: error.name }, 'Denoise transport failure');
    this.sink.pushError?.({ sessionId: this.sessionId, error });
  }

  private async teardown(session: ActiveSession): Promise<void> {
    if (session.mode === 'passthrough') {
      return;
    }

    if (session.accumulator.bufferedBytes > 0) {
      logger.debug({ sessionId: this.sessionId, bytes: session.accumulator.bufferedBytes }, 'Discarding unsent audio');
    }
    session.accumulator.reset();
    await session.connection.disconnect();
  }
}
