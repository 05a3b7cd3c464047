export interface Logger {
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
  debug(message: string, ...details: unknown[]): void;
}

/**
 * Scoped console logger. Everything goes to stderr so stdout stays free for
 * streamed output; debug lines only appear when `debug` is on.
 */
export function createLogger(scope: string, debug: boolean = false): Logger {
  const prefix = `[${scope}]`;
  return {
    info: (message, ...details) => console.error(`${prefix} ${message}`, ...details),
    warn: (message, ...details) => console.error(`${prefix} ⚠️  ${message}`, ...details),
    error: (message, ...details) => console.error(`${prefix} ❌ ${message}`, ...details),
    debug: (message, ...details) => {
      if (debug) {
        console.error(`[DEBUG] ${prefix} ${message}`, ...details);
      }
    },
  };
}
