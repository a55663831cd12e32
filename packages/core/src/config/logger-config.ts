/**
 * Logger configuration read from environment variables.
 *
 * Environment variables:
 * - LOG_LEVEL: error | warn | info | http | debug (default: info)
 * - LOG_FORMAT: json | simple (default: json)
 * - NODE_ENV: under "test" the level is forced to error
 */

import { z } from 'zod';
import { ConfigurationError } from './configuration-error';

export const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'debug'] as const;
export const LOG_FORMATS = ['json', 'simple'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];
export type LogFormat = (typeof LOG_FORMATS)[number];

export interface LoggerConfig {
  level: LogLevel;
  format: LogFormat;
}

const LoggerEnvSchema = z.object({
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  LOG_FORMAT: z.enum(LOG_FORMATS).default('json'),
  NODE_ENV: z.string().default('development'),
});

export function loadLoggerConfig(env: Record<string, string | undefined> = process.env): LoggerConfig {
  const parsed = LoggerEnvSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const variable = issue ? issue.path.join('.') : undefined;
    throw new ConfigurationError(
      `Invalid logger configuration: ${parsed.error.issues.map((i) => i.message).join(', ')}`,
      variable,
      variable === 'LOG_FORMAT'
        ? `Use one of: ${LOG_FORMATS.join(', ')}`
        : `Use one of: ${LOG_LEVELS.join(', ')}`,
      parsed.error
    );
  }

  const { LOG_LEVEL, LOG_FORMAT, NODE_ENV } = parsed.data;

  // Only log errors in tests
  if (NODE_ENV === 'test') {
    return { level: 'error', format: 'simple' };
  }

  return { level: LOG_LEVEL, format: LOG_FORMAT };
}
