import { pino } from 'pino';
import type { Logger } from 'pino';

export type { Logger } from 'pino';

export interface LoggerOptions {
  level?: string;
  name?: string;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: options.name ?? 'eavstore',
    level: options.level ?? 'info',
  });
}

/** Used when the caller passes no logger. */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
