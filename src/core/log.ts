export type Logger = {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
};

/** Escape control characters so one log call stays one line. */
export function sanitizeLogMessage(s: string): string {
  if (!s) return "";
  return s.replace(/\r?\n|\r/g, "\\n").replace(/\t/g, "\\t").slice(0, 10000);
}

/**
 * Scoped stderr logger: `[scope] message`. Stdout stays free for command output.
 */
export function createLogger(scope: string): Logger {
  const fmt = (message: string) => `[${scope}] ${sanitizeLogMessage(message)}`;
  return {
    info: (message) => console.error(fmt(message)),
    warn: (message) => console.warn(fmt(message)),
    error: (message) => console.error(fmt(message)),
  };
}

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};
