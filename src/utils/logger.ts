/**
 * Logging configuration using Pino.
 */

import pino from 'pino';
import { config } from '../config.js';

const env = process.env.NODE_ENV;

/**
 * Options shared by the standalone logger and the Fastify request logger.
 * Pretty output in development, silent under the test runner.
 */
export const loggerOptions = {
  level: env === 'test' ? 'silent' : config.LOG_LEVEL.toLowerCase(),
  transport:
    env !== 'production' && env !== 'test'
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
};

/**
 * Global logger instance configured with environment settings.
 */
export const logger = pino(loggerOptions);
