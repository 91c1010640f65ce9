/** Structured context attached to a log record. */
export type LogContext = Record<string, unknown>;

/**
 * Minimal logging facility the client writes to. Any structured logger exposing these
 * four methods (console, pino, winston, ...) can be passed in.
 */
export interface Logger {
  debug: (message: string, context?: LogContext) => void;
  info: (message: string, context?: LogContext) => void;
  warn: (message: string, context?: LogContext) => void;
  error: (message: string, context?: LogContext) => void;
}

/**
 * Creates a console-backed {@link Logger} that prefixes each record with `[prefix]`.
 */
export function createConsoleLogger(prefix = 'xivapi'): Logger {
  const write =
    (method: 'debug' | 'info' | 'warn' | 'error') =>
    (message: string, context?: LogContext): void => {
      if (context) {
        console[method](`[${prefix}] ${message}`, context);
        return;
      }
      console[method](`[${prefix}] ${message}`);
    };

  return {
    debug: write('debug'),
    info: write('info'),
    warn: write('warn'),
    error: write('error'),
  };
}

const noop = (): void => {};

/** Logger that drops every record. */
export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};

/**
 * Returns the URL with the `private_key` query parameter masked, so API keys never reach log output.
 */
export function redactUrl(url: string): string {
  return url.replace(/([?&]private_key=)[^&#]*/g, '$1***');
}
