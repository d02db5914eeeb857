/**
 * Named loggers
 *
 * A Logger is the capability handed to components that report progress;
 * the default implementation renders through LogManager.
 */

import { LogManager } from '../ui/index.js';

export type LogData = Record<string, unknown>;

export interface Logger {
  debug(message: string, data?: LogData): void;
  info(message: string, data?: LogData): void;
  error(message: string, data?: LogData): void;
}

function render(name: string, message: string, data?: LogData): string {
  const suffix = data && Object.keys(data).length > 0 ? ` ${JSON.stringify(data)}` : '';
  return `[${name}] ${message}${suffix}`;
}

export function createLogger(name: string): Logger {
  return {
    debug(message, data) {
      LogManager.getInstance().debug(render(name, message, data));
    },
    info(message, data) {
      LogManager.getInstance().info(render(name, message, data));
    },
    error(message, data) {
      LogManager.getInstance().error(render(name, message, data));
    },
  };
}
