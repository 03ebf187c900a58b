/**
 * @wirebound/core - Logger
 */

import { InvocationContext } from '../../domain/context/InvocationContext';

/**
 * Logger interface for clients
 */
export interface ILogger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

function withInvocation(message: string): string {
  const invocationId = InvocationContext.current()?.invocationId;
  return invocationId ? `[${invocationId}] ${message}` : message;
}

/**
 * Default console logger. Messages logged during an orchestration carry its
 * invocation id.
 */
export const consoleLogger: ILogger = {
  debug: (message, ...args) => console.debug(`[DEBUG] ${withInvocation(message)}`, ...args),
  info: (message, ...args) => console.info(`[INFO] ${withInvocation(message)}`, ...args),
  warn: (message, ...args) => console.warn(`[WARN] ${withInvocation(message)}`, ...args),
  error: (message, ...args) => console.error(`[ERROR] ${withInvocation(message)}`, ...args),
};

/**
 * Logger that drops everything
 */
export const silentLogger: ILogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
