import type { AudioFormat } from '../../models/AudioUnit';
import type { IDenoiseTransport } from '../../providers/audio/transport/IDenoiseTransport';
import type { AudioSink } from './AudioSink';
import { ReceiveFailureError } from '../../errors/DenoiseErrors';
import { createLogger } from '../../utils/logger';

const logger = createLogger({ service: 'ReceiveLoop' });

export type ReceiveLoopEndReason = 'closed' | 'failed' | 'cancelled';

export interface ReceiveLoopOptions {
  sessionId: string;
  transport: IDenoiseTransport;
  sink: AudioSink;
  /**
   * Current session format, read for every received chunk
   */
  getFormat: () => AudioFormat;
  onEnded?: (reason: ReceiveLoopEndReason) => void;
}

/**
 * Forwards denoised chunks from the transport to the sink, in receive order.
 * Runs once per connected period; remote close or a read error ends it.
 */
export class ReceiveLoop {
  private readonly options: ReceiveLoopOptions;
  private _chunksReceived = 0;

  constructor(options: ReceiveLoopOptions) {
    this.options = options;
  }

  get chunksReceived(): number {
    return this._chunksReceived;
  }

  async run(signal: AbortSignal): Promise<void> {
    const { sessionId, transport, sink, getFormat } = this.options;
    let reason: ReceiveLoopEndReason = 'failed';

    try {
      while (true) {
        let data: Buffer | null;
        try {
          data = await transport.receive(signal);
        } catch (error) {
          if (signal.aborted) {
            reason = 'cancelled';
            return;
          }
          const failure = new ReceiveFailureError(error);
          logger.warn({ sessionId, error: failure.message }, 'Receive loop ended on read error');
          sink.pushError?.({ sessionId, error: failure });
          return;
        }

        if (data === null) {
          reason = 'closed';
          logger.info({ sessionId, chunks: this._chunksReceived }, 'Denoise connection closed by remote');
          return;
        }

        const format = getFormat();
        sink.pushAudio({ audio: data, sampleRate: format.sampleRate, numChannels: format.numChannels });
        this._chunksReceived++;
      }
    } finally {
      this.options.onEnded?.(reason);
    }
  }
}
