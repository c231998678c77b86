/**
 * Console Logger
 *
 * Default LoggerProvider. Writes to the Node.js console with a package
 * prefix and drops messages below the configured level.
 */

import { LoggerProvider, LogLevel } from '../core/types';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  silent: 5,
};

const PREFIX = '[openapi-case-tester]';

export class ConsoleLogger implements LoggerProvider {
  constructor(private level: LogLevel = 'warn') {}

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  debug(message: string): void {
    if (this.shouldLog('debug')) console.debug(`${PREFIX}[debug]`, message);
  }

  info(message: string): void {
    if (this.shouldLog('info')) console.info(PREFIX, message);
  }

  warn(message: string): void {
    if (this.shouldLog('warn')) console.warn(`${PREFIX}[warn]`, message);
  }

  error(message: string): void {
    if (this.shouldLog('error')) console.error(`${PREFIX}[error]`, message);
  }
}

/**
 * Shared fallback used when a component is built without a logger.
 */
export const defaultLogger = new ConsoleLogger();
