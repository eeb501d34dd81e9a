/**
 * Library logger.
 *
 * Warnings cover recoverable surprises (an ambiguous union value, a struct
 * reference that cannot be resolved); errors cover unmapped request failures;
 * debug output traces binding builds and fields dropped at the depth limit.
 *
 * @example
 * ```ts
 * import { setLogger, createConsoleLogger } from 'transfer-dto';
 *
 * setLogger(createConsoleLogger('debug'));
 *
 * // or route everything to pino
 * setLogger({
 *   debug(msg, ctx) { pino.debug(ctx, msg); },
 *   warn(msg, ctx) { pino.warn(ctx, msg); },
 *   error(msg, ctx) { pino.error(ctx, msg); },
 * });
 * ```
 */

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

export type LogLevel = 'debug' | 'warn' | 'error' | 'silent';

const LEVEL_RANK: Record<LogLevel, number> = { debug: 0, warn: 1, error: 2, silent: 3 };

const PREFIX = '[transfer-dto]';

/** Console logger writing entries at or above `level`. */
export function createConsoleLogger(level: LogLevel = 'warn'): Logger {
  const threshold = LEVEL_RANK[level];

  const write =
    (entryLevel: Exclude<LogLevel, 'silent'>, sink: (...args: unknown[]) => void) =>
    (message: string, context?: LogContext): void => {
      if (LEVEL_RANK[entryLevel] < threshold) return;
      if (context && Object.keys(context).length > 0) {
        sink(`${PREFIX} ${message}`, context);
      } else {
        sink(`${PREFIX} ${message}`);
      }
    };

  return {
    debug: write('debug', console.debug),
    warn: write('warn', console.warn),
    error: write('error', console.error),
  };
}

const defaultLogger = createConsoleLogger();
let currentLogger: Logger = defaultLogger;

export function setLogger(logger: Logger): void {
  currentLogger = logger;
}

export function getLogger(): Logger {
  return currentLogger;
}

/** Restores the default console logger (warnings and errors only). */
export function resetLogger(): void {
  currentLogger = defaultLogger;
}
