/**
 * Environment Configuration
 *
 * Validates and provides type-safe access to environment variables
 */

import { z } from 'zod';
import * as dotenv from 'dotenv';
import { EnvValidationError } from '../errors/DenoiseErrors';
import { DEFAULT_ACCUMULATION_WINDOW_SECS, DEFAULT_DENOISE_BASE_URL } from '../models/DenoiseConfig';
import type { DenoiseConfig } from '../models/DenoiseConfig';
import type { ProxyLLMProviderOptions } from '../providers/ai/llm/ProxyLLMProvider';
import { LOG_LEVELS, setLogLevel } from '../utils/logger';

// z.coerce.boolean() treats "false" as true, so map the usual spellings explicitly
const booleanString = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const envSchema = z.object({
  // ===== Denoise Endpoint =====
  DENOISE_API_KEY: z.string().min(1, 'DENOISE_API_KEY is required'),
  DENOISE_BASE_URL: z
    .string()
    .url()
    .refine((url) => /^wss?:\/\//.test(url), 'DENOISE_BASE_URL must use ws:// or wss://')
    .default(DEFAULT_DENOISE_BASE_URL),

  // ===== Streaming =====
  DENOISE_ACCUMULATION_WINDOW_SECS: z.coerce.number().positive().default(DEFAULT_ACCUMULATION_WINDOW_SECS),
  DENOISE_OUTPUT_FRAME_RATE: z.coerce.number().int().positive().optional(),
  DENOISE_PASSTHROUGH: booleanString.default('false'),
  DENOISE_FALLBACK_TO_PASSTHROUGH: booleanString.default('false'),

  // ===== LLM Proxy =====
  LLM_PROXY_API_KEY: z.string().optional(),
  LLM_PROXY_BASE_URL: z.string().url().default('http://ncompass.tech'),
  LLM_PROXY_MODEL: z.string().min(1).default('llama-3.1-70B'),

  // ===== Runtime =====
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development')
});

export type Env = z.infer<typeof envSchema>;

/**
 * Validate an environment map
 * @throws EnvValidationError listing every invalid variable
 */
export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const parsed = envSchema.safeParse(source);

  if (!parsed.success) {
    throw new EnvValidationError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  return parsed.data;
}

/**
 * Load `.env` into process.env, validate it and apply LOG_LEVEL to every logger
 */
export function loadEnv(): Env {
  dotenv.config();
  const env = parseEnv(process.env);
  setLogLevel(env.LOG_LEVEL);
  return env;
}

export function toDenoiseConfig(env: Env): DenoiseConfig {
  return {
    apiKey: env.DENOISE_API_KEY,
    baseUrl: env.DENOISE_BASE_URL,
    accumulationWindowSecs: env.DENOISE_ACCUMULATION_WINDOW_SECS,
    outputFrameRate: env.DENOISE_OUTPUT_FRAME_RATE,
    passthrough: env.DENOISE_PASSTHROUGH,
    fallbackToPassthrough: env.DENOISE_FALLBACK_TO_PASSTHROUGH
  };
}

export function toProxyLLMOptions(env: Env): ProxyLLMProviderOptions {
  return {
    apiKey: env.LLM_PROXY_API_KEY,
    baseUrl: env.LLM_PROXY_BASE_URL,
    model: env.LLM_PROXY_MODEL
  };
}
