/**
 * Streaming denoise client
 */

export * from './services/denoise';
export * from './providers/audio/transport';
export * from './providers/ai';
export { BYTES_PER_SAMPLE } from './models/AudioUnit';
export type { AudioFormat, InputUnit, OutputUnit } from './models/AudioUnit';
export type { DenoiseMessage, AudioChunkMessage, MuteControlMessage, LifecycleMessage } from './models/DenoiseMessage';
export { DEFAULT_ACCUMULATION_WINDOW_SECS, DEFAULT_DENOISE_BASE_URL, resolveDenoiseConfig } from './models/DenoiseConfig';
export type { DenoiseConfig, ResolvedDenoiseConfig } from './models/DenoiseConfig';
export * from './errors/DenoiseErrors';
export { loadEnv, parseEnv, toDenoiseConfig, toProxyLLMOptions } from './config/env';
export type { Env } from './config/env';
export { logger, createLogger, setLogLevel, LOG_LEVELS } from './utils/logger';
export type { LogLevel } from './utils/logger';
