/**
 * Scoped console logger
 * Everything goes to stderr so stdout stays free for the MCP stdio transport
 * and for the CLI's own progress trace.
 */

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}

export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  return {
    info: (message) => console.error(`${prefix} ${message}`),
    warn: (message) => console.error(`${prefix} ⚠️ ${message}`),
    error: (message, error) => {
      if (error === undefined) {
        console.error(`${prefix} ❌ ${message}`);
      } else {
        console.error(`${prefix} ❌ ${message}`, error);
      }
    },
  };
}

/**
 * Logger that drops everything. Handy for tests and for quiet library use.
 */
export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
