import pino from 'pino';

/**
 * Structured Logger using Pino
 *
 * **Configuration:**
 * - LOG_LEVEL: Set log level (error, warn, info, debug) - defaults to 'info',
 *   and to 'silent' under NODE_ENV=test unless LOG_LEVEL is given
 * - NODE_ENV: 'development' uses pretty-printing, anything else emits JSON
 *
 * **Usage:**
 * ```typescript
 * import { logger } from '../shared/logger';
 *
 * logger.warn({
 *   msg: 'Version conflict on update',
 *   productId: 42,
 *   expectedVersion: 3,
 *   currentVersion: 4,
 * });
 * ```
 */

const nodeEnv = process.env.NODE_ENV || 'development';
const isDevelopment = nodeEnv === 'development';
const logLevel = process.env.LOG_LEVEL || (nodeEnv === 'test' ? 'silent' : 'info');

export const logger = pino({
  level: logLevel,
  // pino-pretty only for local development; JSON everywhere else
  transport: isDevelopment
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
        },
      }
    : undefined,
  base: {
    env: nodeEnv,
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});
