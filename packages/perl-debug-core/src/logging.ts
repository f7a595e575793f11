/**
 * Structured logger seam used by every component of the debug core.
 *
 * The core never picks a logging backend itself: the executable injects one
 * (pino in `perl-debug-adapter`), tests inject sinon stubs.
 */
export interface LoggerInterface {
  trace(message: string, ...args: unknown[]): void;
  trace(obj: object, message?: string, ...args: unknown[]): void;

  debug(message: string, ...args: unknown[]): void;
  debug(obj: object, message?: string, ...args: unknown[]): void;

  info(message: string, ...args: unknown[]): void;
  info(obj: object, message?: string, ...args: unknown[]): void;

  warn(message: string, ...args: unknown[]): void;
  warn(obj: object, message?: string, ...args: unknown[]): void;

  error(message: string, ...args: unknown[]): void;
  error(obj: object, message?: string, ...args: unknown[]): void;

  /**
   * Returns a logger whose records carry `bindings` (e.g. `{ component }` or
   * `{ sessionId }`). Optional: callers fall back to the parent logger.
   */
  child?(bindings: Record<string, unknown>): LoggerInterface;
}

/**
 * Binds `{ component }` when the logger supports child loggers.
 */
export function componentLogger(
  logger: LoggerInterface,
  component: string,
): LoggerInterface {
  return logger.child ? logger.child({ component }) : logger;
}

const noop = (): void => {};

/** Logger that drops everything. */
export const silentLogger: LoggerInterface = {
  trace: noop,
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
  child: () => silentLogger,
};
