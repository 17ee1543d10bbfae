/**
 * Tagged console logger. Everything goes to stderr so stdout stays free for
 * the MCP stdio transport.
 */
export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

export function createLogger(scope: string, debug = false): Logger {
  const prefix = `[${scope}]`;
  return {
    debug: (message, ...details) => {
      if (debug) {
        console.error(`[DEBUG] ${prefix} ${message}`, ...details);
      }
    },
    info: (message, ...details) => console.error(`${prefix} ${message}`, ...details),
    warn: (message, ...details) => console.error(`${prefix} ⚠️ ${message}`, ...details),
    error: (message, ...details) => console.error(`${prefix} ✗ ${message}`, ...details),
  };
}

/**
 * Logger that drops everything; handy in tests
 */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
