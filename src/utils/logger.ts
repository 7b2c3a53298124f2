/**
 * Minimal logging seam. Anything with these four methods (console, pino,
 * winston) can be passed through `logger` options.
 */

export interface Logger {
  debug(message: string, ...meta: unknown[]): void;
  info(message: string, ...meta: unknown[]): void;
  warn(message: string, ...meta: unknown[]): void;
  error(message: string, ...meta: unknown[]): void;
}

const PREFIX = '[rubix-sdk]';

export function createConsoleLogger(prefix: string = PREFIX): Logger {
  return {
    debug: (message, ...meta) => console.debug(`${prefix} ${message}`, ...meta),
    info: (message, ...meta) => console.info(`${prefix} ${message}`, ...meta),
    warn: (message, ...meta) => console.warn(`${prefix} ${message}`, ...meta),
    error: (message, ...meta) => console.error(`${prefix} ${message}`, ...meta),
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

export const defaultLogger: Logger = createConsoleLogger();
