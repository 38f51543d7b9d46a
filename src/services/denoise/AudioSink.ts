import { EventEmitter } from 'events';
import type { OutputUnit } from '../../models/AudioUnit';
import type { DenoiseTransportError } from '../../errors/DenoiseErrors';

export interface DenoiseErrorEvent {
  sessionId: string;
  error: DenoiseTransportError;
}

/**
 * Downstream consumer of denoised audio
 */
export interface AudioSink {
  pushAudio(unit: OutputUnit): void;

  /**
   * Informational, non-fatal transport failures
   */
  pushError?(event: DenoiseErrorEvent): void;
}

export interface AudioSinkEvents {
  audio: (unit: OutputUnit) => void;
  denoiseError: (event: DenoiseErrorEvent) => void;
}

/**
 * Sink that re-emits output as `audio` and `denoiseError` events
 *
 * Usage:
 * ```typescript
 * const sink = new EventEmitterSink();
 * sink.on('audio', (unit) => player.write(unit.audio));
 * const orchestrator = new DenoiseOrchestrator({ config, sink });
 * ```
 */
export class EventEmitterSink extends EventEmitter implements AudioSink {
  pushAudio(unit: OutputUnit): void {
    this.emit('audio', unit);
  }

  pushError(event: DenoiseErrorEvent): void {
    this.emit('denoiseError', event);
  }

  on<K extends keyof AudioSinkEvents>(event: K, listener: AudioSinkEvents[K]): this {
    return super.on(event, listener);
  }

  once<K extends keyof AudioSinkEvents>(event: K, listener: AudioSinkEvents[K]): this {
    return super.once(event, listener);
  }

  off<K extends keyof AudioSinkEvents>(event: K, listener: AudioSinkEvents[K]): this {
    return super.off(event, listener);
  }

  emit<K extends keyof AudioSinkEvents>(event: K, ...args: Parameters<AudioSinkEvents[K]>): boolean {
    return super.emit(event, ...args);
  }
}
