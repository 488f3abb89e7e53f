import type { JsonifibleObject } from '#json';

/** logging levels in order of severity from lowest to highest */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

/** formats log messages */
export type Log = (
  level: LogLevel,
  message: string,
  meta?: JsonifibleObject,
) => void;
