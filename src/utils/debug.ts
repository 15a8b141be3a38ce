/**
 * Debug utilities
 * Scoped console logging shared by the geometry pipeline and the HTTP layer
 */

export const DEBUG = process.env.NODE_ENV !== 'production';

export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
}

/**
 * Create a logger whose lines are prefixed with `[SCOPE]`.
 * Debug lines are dropped in production.
 */
export function createLogger(scope: string): Logger {
  const tag = `[${scope.toUpperCase()}]`;
  return {
    debug(message, data) {
      if (DEBUG) {
        console.log(`${tag} ${message}`, data ?? '');
      }
    },
    info(message, data) {
      console.log(`${tag} ${message}`, data ?? '');
    },
    warn(message, data) {
      console.warn(`${tag} ${message}`, data ?? '');
    },
    error(message, data) {
      console.error(`${tag} ${message}`, data ?? '');
    },
  };
}
