/**
 * User-facing console output.
 */

import { LogManager } from './LogManager.js';

export { LogManager, LOG_LEVELS, isLogLevel, type LogLevel } from './LogManager.js';

export function info(message: string): void {
  LogManager.getInstance().info(message);
}

/** Print text as-is, e.g. a preformatted report */
export function print(text: string): void {
  LogManager.getInstance().plain(text);
}

export function warn(message: string): void {
  LogManager.getInstance().warn(message);
}

export function error(message: string): void {
  LogManager.getInstance().error(message);
}
