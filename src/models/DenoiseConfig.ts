export const DEFAULT_ACCUMULATION_WINDOW_SECS = 0.14;
export const DEFAULT_DENOISE_BASE_URL = 'wss://denoise.ncompass.tech';

export interface DenoiseConfig {
  /**
   * Credential identifier, embedded in the endpoint URL
   */
  apiKey: string;

  /**
   * WebSocket base URL of the denoising endpoint
   */
  baseUrl?: string;

  /**
   * Seconds of audio buffered before a window is sent (default 0.14)
   */
  accumulationWindowSecs?: number;

  /**
   * Frame rate requested from the endpoint; defaults to the session sample rate
   */
  outputFrameRate?: number;

  /**
   * Forward input unchanged, never opening a connection
   */
  passthrough?: boolean;

  /**
   * Emit the original window when it could not be sent instead of emitting nothing
   */
  fallbackToPassthrough?: boolean;
}

export type ResolvedDenoiseConfig = Required<Omit<DenoiseConfig, 'outputFrameRate'>> &
  Pick<DenoiseConfig, 'outputFrameRate'>;

export function resolveDenoiseConfig(config: DenoiseConfig): ResolvedDenoiseConfig {
  const accumulationWindowSecs = config.accumulationWindowSecs ?? DEFAULT_ACCUMULATION_WINDOW_SECS;
  if (!(accumulationWindowSecs > 0)) {
    throw new RangeError(`accumulationWindowSecs must be positive, got ${accumulationWindowSecs}`);
  }
  if (config.outputFrameRate !== undefined && !(Number.isInteger(config.outputFrameRate) && config.outputFrameRate > 0)) {
    throw new RangeError(`outputFrameRate must be a positive integer, got ${config.outputFrameRate}`);
  }

  return {
    apiKey: config.apiKey,
    baseUrl: config.baseUrl ?? DEFAULT_DENOISE_BASE_URL,
    accumulationWindowSecs,
    outputFrameRate: config.outputFrameRate,
    passthrough: config.passthrough ?? false,
    fallbackToPassthrough: config.fallbackToPassthrough ?? false
  };
}
