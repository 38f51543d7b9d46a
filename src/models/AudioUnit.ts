/**
 * Audio units exchanged with the surrounding pipeline.
 * All audio is 16-bit signed little-endian linear PCM.
 */

export const BYTES_PER_SAMPLE = 2;

export interface AudioFormat {
  sampleRate: number;
  numChannels: number;
}

/**
 * Raw audio chunk delivered by the upstream pipeline (read only)
 */
export interface InputUnit extends AudioFormat {
  readonly audio: Buffer;
}

/**
 * Denoised audio chunk, tagged with the session format
 */
export interface OutputUnit extends AudioFormat {
  readonly audio: Buffer;
}
