/**
 * Scoped diagnostic loggers.
 *
 * Every line is prefixed with the scope and written to stderr, so stdout
 * stays clean for reports and --json output.
 */

import { LogManager, type LogLevel } from '../ui/LogManager.js';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function createLogger(scope: string): Logger {
  const write = (level: LogLevel, message: string): void => {
    LogManager.getInstance().scoped(level, scope, message);
  };
  return {
    debug: (message) => write('debug', message),
    info: (message) => write('info', message),
    warn: (message) => write('warn', message),
    error: (message) => write('error', message),
  };
}
