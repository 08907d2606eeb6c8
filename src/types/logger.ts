/**
 * Universal Logger Interface
 * Compatible with Pino, Winston, console, and custom loggers
 */

/**
 * Logger interface that works with popular logging libraries
 *
 * @example Pino
 * ```typescript
 * import pino from 'pino';
 * const logger = pino({ level: 'debug' });
 * const guarded = newHandler(checker, handler, { logger });
 * ```
 *
 * @example Console
 * ```typescript
 * const guarded = newHandler(checker, handler, { logger: console });
 * ```
 */
export interface Logger {
  /**
   * Debug level logging
   * Called for detailed diagnostic information
   */
  debug(message: string, ...args: unknown[]): void;
  debug(obj: object, message?: string, ...args: unknown[]): void;

  /**
   * Info level logging
   */
  info(message: string, ...args: unknown[]): void;
  info(obj: object, message?: string, ...args: unknown[]): void;

  warn(message: string, ...args: unknown[]): void;
  warn(obj: object, message?: string, ...args: unknown[]): void;

  /**
   * Error level logging
   * Called for error conditions (a handler that rejected, a write that failed)
   */
  error(message: string, ...args: unknown[]): void;
  error(obj: object, message?: string, ...args: unknown[]): void;
}

/**
 * Console adapter - wraps console to match Logger interface
 */
export const consoleLogger: Logger = {
  debug: (msgOrObj: string | object, ...args: unknown[]) => {
    console.debug(msgOrObj, ...args);
  },
  info: (msgOrObj: string | object, ...args: unknown[]) => {
    console.info(msgOrObj, ...args);
  },
  warn: (msgOrObj: string | object, ...args: unknown[]) => {
    console.warn(msgOrObj, ...args);
  },
  error: (msgOrObj: string | object, ...args: unknown[]) => {
    console.error(msgOrObj, ...args);
  },
};

/**
 * Silent logger - no output
 * Useful for testing or when you want to completely disable logging
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

type LevelName = 'debug' | 'info' | 'warn' | 'error';

// Trailing arguments in the shape of the object-first overload
function messageArgs(args: unknown[]): [message?: string, ...rest: unknown[]] {
  if (args.length === 0) return [];
  const [message, ...rest] = args;
  return [message === undefined ? undefined : String(message), ...rest];
}

/**
 * Create a logger that only logs at or above the specified level
 */
export function createLevelLogger(baseLogger: Logger, minLevel: LevelName): Logger {
  const levels: Record<LevelName, number> = { debug: 0, info: 1, warn: 2, error: 3 };
  const minLevelNum = levels[minLevel];

  return {
    debug: (msgOrObj: string | object, ...args: unknown[]) => {
      if (levels.debug < minLevelNum) return;
      if (typeof msgOrObj === 'string') baseLogger.debug(msgOrObj, ...args);
      else baseLogger.debug(msgOrObj, ...messageArgs(args));
    },
    info: (msgOrObj: string | object, ...args: unknown[]) => {
      if (levels.info < minLevelNum) return;
      if (typeof msgOrObj === 'string') baseLogger.info(msgOrObj, ...args);
      else baseLogger.info(msgOrObj, ...messageArgs(args));
    },
    warn: (msgOrObj: string | object, ...args: unknown[]) => {
      if (levels.warn < minLevelNum) return;
      if (typeof msgOrObj === 'string') baseLogger.warn(msgOrObj, ...args);
      else baseLogger.warn(msgOrObj, ...messageArgs(args));
    },
    error: (msgOrObj: string | object, ...args: unknown[]) => {
      if (levels.error < minLevelNum) return;
      if (typeof msgOrObj === 'string') baseLogger.error(msgOrObj, ...args);
      else baseLogger.error(msgOrObj, ...messageArgs(args));
    },
  };
}
