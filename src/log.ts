/** Scoped console logging: every line carries a `[scope]` tag. */

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function createConsoleLogger(scope: string): Logger {
  const tag = `[${scope}]`;
  return {
    info: (message) => console.log(`${tag} ${message}`),
    warn: (message) => console.warn(`${tag} ${message}`),
    error: (message) => console.error(`${tag} ${message}`),
  };
}

/** Logger that drops everything. Used where a caller passes none. */
export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};
