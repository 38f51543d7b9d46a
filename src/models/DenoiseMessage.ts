import type { InputUnit } from './AudioUnit';

export interface AudioChunkMessage {
  kind: 'audio';
  unit: InputUnit;
}

export interface MuteControlMessage {
  kind: 'mute';
  muted: boolean;
}

export type LifecycleMessage =
  | { kind: 'lifecycle'; event: 'start'; sampleRate: number; numChannels: number }
  | { kind: 'lifecycle'; event: 'stop' }
  | { kind: 'lifecycle'; event: 'cancel' };

/**
 * Messages the denoise orchestrator reacts to
 */
export type DenoiseMessage = AudioChunkMessage | MuteControlMessage | LifecycleMessage;
