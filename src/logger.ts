/**
 * Console logging for orchestration code.
 *
 * The conversion core never logs; entry points that run whole jobs accept a
 * {@link Logger} and report progress and recoverable problems through it.
 */

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

export interface ConsoleLoggerOptions {
  /** Suppress debug and info output. @default false */
  quiet?: boolean;
  /** @default '[md2page]' */
  prefix?: string;
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const prefix = options.prefix ?? '[md2page]';
  const quiet = options.quiet ?? false;

  return {
    debug(message, ...details) {
      if (!quiet) console.debug(prefix, message, ...details);
    },
    info(message, ...details) {
      if (!quiet) console.log(prefix, message, ...details);
    },
    warn(message, ...details) {
      console.warn(prefix, message, ...details);
    },
    error(message, ...details) {
      console.error(prefix, message, ...details);
    },
  };
}

/** A logger that discards everything. */
export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};
