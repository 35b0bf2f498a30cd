/**
 * Structured logging with Pino
 *
 * - Development: pretty-printed, colorized output
 * - Production and tests: plain JSON lines
 * - Tokens and webhook secrets are redacted
 */

import pino from 'pino';

const isProduction = process.env.NODE_ENV === 'production';
const isTest = process.env.NODE_ENV === 'test';

const logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  transport: !isProduction && !isTest
    ? { target: 'pino-pretty', options: { colorize: true, translateTime: 'SYS:HH:MM:ss' } }
    : undefined,
  redact: [
    'token',
    'secret',
    'webhookSecret',
    '*.token',
    '*.secret',
    '*.webhookSecret',
    'headers.authorization',
  ],
});

/**
 * Create a child logger scoped to a module
 *
 * @example
 * const log = createLogger('detector');
 * log.info({ pr: 12 }, 'Scanning pull request text');
 * log.warn({ err }, 'Closing issues query failed');
 */
export function createLogger(module: string): pino.Logger {
  return logger.child({ module });
}

export default logger;
