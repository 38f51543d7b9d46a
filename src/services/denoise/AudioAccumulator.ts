import { BYTES_PER_SAMPLE } from '../../models/AudioUnit';

export interface AudioAccumulatorOptions {
  sampleRate: number;
  accumulationWindowSecs: number;
}

/**
 * Buffers PCM chunks into windows.
 * Duration is derived from the byte count at the session sample rate, not from a timer.
 */
export class AudioAccumulator {
  private readonly bytesPerSecond: number;
  private readonly windowSecs: number;
  private chunks: Buffer[] = [];
  private totalBytes = 0;

  constructor(options: AudioAccumulatorOptions) {
    this.bytesPerSecond = options.sampleRate * BYTES_PER_SAMPLE;
    this.windowSecs = options.accumulationWindowSecs;
  }

  get bufferedBytes(): number {
    return this.totalBytes;
  }

  get bufferedDurationSecs(): number {
    return this.totalBytes / this.bytesPerSecond;
  }

  accumulate(chunk: Buffer): void {
    if (chunk.length === 0) {
      return;
    }
    // Copy: the caller owns the input buffer
    this.chunks.push(Buffer.from(chunk));
    this.totalBytes += chunk.length;
  }

  shouldFlush(): boolean {
    return this.bufferedDurationSecs > this.windowSecs;
  }

  /**
   * Take the buffered window and start a new, empty one
   */
  flush(): Buffer {
    const batch = this.chunks.length === 1 ? this.chunks[0] : Buffer.concat(this.chunks, this.totalBytes);
    this.reset();
    return batch;
  }

  reset(): void {
    this.chunks = [];
    this.totalBytes = 0;
  }
}
