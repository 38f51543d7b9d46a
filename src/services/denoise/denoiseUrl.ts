import { BYTES_PER_SAMPLE } from '../../models/AudioUnit';

export interface DenoiseUrlParams {
  baseUrl: string;
  apiKey: string;
  sampleRate: number;
  outputFrameRate: number;
  bytesPerSample?: number;
}

/**
 * Endpoint URL: `{baseUrl}/{apiKey}/denoise/{bytesPerSample}/{sampleRate}/{outputFrameRate}`
 */
export function buildDenoiseUrl(params: DenoiseUrlParams): string {
  const base = params.baseUrl.replace(/\/+$/, '');
  const segments = [
    params.apiKey,
    'denoise',
    String(params.bytesPerSample ?? BYTES_PER_SAMPLE),
    String(params.sampleRate),
    String(params.outputFrameRate)
  ].map((segment) => encodeURIComponent(segment));

  return `${base}/${segments.join('/')}`;
}
