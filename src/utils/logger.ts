import pino from 'pino';
import type { Logger } from 'pino';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function resolveLevel(): LogLevel {
  const configured = process.env.LOG_LEVEL;
  if (configured && isLogLevel(configured)) {
    return configured;
  }
  return process.env.NODE_ENV === 'test' ? 'silent' : 'info';
}

export const logger = pino({
  name: 'streaming-denoise-client',
  level: resolveLevel()
});

// pino children keep the level they were created with
const componentLoggers = new Set<Logger>();

export type { Logger };

/**
 * Child logger bound to a component, e.g. `createLogger({ service: 'ReceiveLoop' })`
 */
export function createLogger(bindings: Record<string, unknown>): Logger {
  const child = logger.child(bindings);
  componentLoggers.add(child);
  return child;
}

/**
 * Change the level of the root logger and every component logger
 */
export function setLogLevel(level: LogLevel): void {
  logger.level = level;
  componentLoggers.forEach((child) => {
    child.level = level;
  });
}
