import { isRecord } from '@authgate/core';

import type { JsonifibleObject, Log, LogLevel } from '@authgate/core';
import type { FastifyServerOptions } from 'fastify';

const LOG_LEVELS = new Set<string>([
  'trace',
  'debug',
  'info',
  'warn',
  'error',
  'fatal',
]);

/**
 * checks whether a pino level label is one of ours
 * @param label level label written by pino
 * @returns true if the label is a known log level
 */
function isLogLevel(label: unknown): label is LogLevel {
  return typeof label === 'string' && LOG_LEVELS.has(label);
}

/**
 * creates fastify logger configuration that bridges to a custom log function
 * when no log function is provided, logging is disabled
 * @param log optional custom logging function
 * @returns fastify logger configuration object
 * @example
 * ```typescript
 * const server = fastify({
 *   logger: createLoggerConfig((level, message, data) => {
 *     console.log(`[${level}] ${message}`, data);
 *   }),
 * });
 * ```
 */
export function createLoggerConfig(log?: Log): FastifyServerOptions['logger'] {
  if (!log) {
    return false;
  }

  return {
    level: 'trace',
    messageKey: 'message',
    errorKey: 'error',
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    // bridge fastify's pino logger to the Log callback
    stream: {
      write: (msg: string) => {
        try {
          const parsed: JsonifibleObject | undefined = JSON.parse(msg);
          if (!isRecord(parsed)) {
            log('info', msg.trim());

            return;
          }

          const { level, message, ...meta } = parsed;

          const logLevel = isLogLevel(level) ? level : 'info';
          const logMessage = typeof message === 'string' ? message : '';

          if (Object.keys(meta).length > 0) {
            log(logLevel, logMessage, meta);
          } else {
            log(logLevel, logMessage);
          }
        } catch {
          // fallback for non-JSON log messages
          log('info', msg.trim());
        }
      },
    },
  };
}
