/** Injection token for the logger service. */
export const LOGGER_SERVICE = Symbol('LOGGER_SERVICE');

/** Structured fields appended to a log line. */
export interface LogContext {
  [key: string]: unknown;
}

/**
 * Logging port used by services and repositories,
 * so tests can swap in a jest mock.
 */
export interface ILogger {
  log(message: string, context?: LogContext): void;

  warn(message: string, context?: LogContext): void;

  error(message: string, context?: LogContext): void;

  debug(message: string, context?: LogContext): void;
}
