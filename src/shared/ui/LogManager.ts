/**
 * Console output with level filtering.
 *
 * All user-facing and diagnostic output goes through this singleton so the
 * level chosen by configuration (or --verbose) applies everywhere.
 */

import chalk from 'chalk';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = typeof LOG_LEVELS[number];

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

export class LogManager {
  private static instance: LogManager | null = null;

  private level: LogLevel = 'info';

  private constructor() {}

  static getInstance(): LogManager {
    if (!LogManager.instance) {
      LogManager.instance = new LogManager();
    }
    return LogManager.instance;
  }

  static resetInstance(): void {
    LogManager.instance = null;
  }

  setLogLevel(level: LogLevel): void {
    this.level = level;
  }

  getLogLevel(): LogLevel {
    return this.level;
  }

  shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  /** Diagnostic line from a scoped logger; always written to stderr */
  scoped(level: LogLevel, scope: string, message: string): void {
    if (!this.shouldLog(level)) return;
    const line = `[${scope}] ${message}`;
    switch (level) {
      case 'debug':
        console.error(chalk.gray(line));
        return;
      case 'info':
        console.error(chalk.white(line));
        return;
      case 'warn':
        console.error(chalk.yellow(line));
        return;
      case 'error':
        console.error(chalk.red(line));
        return;
    }
  }

  info(message: string): void {
    if (!this.shouldLog('info')) return;
    console.log(chalk.blue(message));
  }

  /** Command output; not subject to the level filter */
  plain(message: string): void {
    console.log(message);
  }

  warn(message: string): void {
    if (!this.shouldLog('warn')) return;
    console.error(chalk.yellow(message));
  }

  error(message: string): void {
    console.error(chalk.red(message));
  }
}
