import { createLogger, format, transports } from 'winston';
import { z } from 'zod';

export const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export const logLevelSchema = z.enum(LOG_LEVELS).default('info');

/**
 * Level for the logger. The logger loads before env validation runs, so an
 * unknown value falls back to 'info' here and is rejected by validateEnv().
 */
export function resolveLogLevel(value: string | undefined): LogLevel {
  const result = logLevelSchema.safeParse(value);
  return result.success ? result.data : 'info';
}

export const logger = createLogger({
  level: resolveLogLevel(process.env.LOG_LEVEL),
  silent: process.env.NODE_ENV === 'test',
  format: format.combine(
    format.timestamp(),
    format.errors({ stack: true }),
    format.json()
  ),
  defaultMeta: { service: 'streamer-donations' },
  transports: [
    new transports.Console({
      format: format.combine(
        format.colorize(),
        format.simple()
      ),
    }),
  ],
});
