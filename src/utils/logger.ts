/**
 * Structured logger (pino)
 */

import pino, { type Logger } from 'pino';
import { config } from '../config/index.js';

function createLogger(): Logger {
  const pretty = config.app.env === 'development';

  return pino({
    level: config.logging.level,
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      service: config.app.name,
      version: config.app.version,
    },
    ...(pretty
      ? {
          transport: {
            target: 'pino-pretty',
            options: { colorize: true, translateTime: 'SYS:standard' },
          },
        }
      : {}),
  });
}

export const logger = createLogger();

/**
 * Child logger tagged with a component name
 */
export function componentLogger(component: string): Logger {
  return logger.child({ component });
}

export type { Logger };
