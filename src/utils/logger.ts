/**
 * Logging with Pino - credentials are redacted
 */

import pino from 'pino';

const redactPaths = [
  'apiKey',
  'api_key',
  'authorization',
  'Authorization',
  'password',
  'secret',
  'token',
  '*.apiKey',
  '*.api_key',
  '*.token',
  'headers.authorization',
  'headers.Authorization',
];

const underTest = process.env.VITEST !== undefined || process.env.NODE_ENV === 'test';

export type Logger = pino.Logger;

export const logger: Logger = pino({
  level: process.env.LOG_LEVEL || (underTest ? 'silent' : 'info'),
  redact: {
    paths: redactPaths,
    censor: '[REDACTED]',
  },
  transport:
    process.env.NODE_ENV !== 'production' && !underTest
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            ignore: 'pid,hostname',
          },
        }
      : undefined,
});

// Pino children copy the parent level on creation, so level changes fan out.
const children = new Set<Logger>();

export function createChildLogger(name: string): Logger {
  const child = logger.child({ module: name });
  children.add(child);
  return child;
}

export function setLogLevel(level: pino.LevelWithSilent): void {
  logger.level = level;
  for (const child of children) {
    child.level = level;
  }
}
