/**
 * Logger interface for pipeline output.
 *
 * Everything goes to stderr: stdout of the orchestrator and of the driver
 * carries the list of written files and nothing else.
 */
export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface ConsoleLoggerOptions {
  /** Prefix for every line (default: "[stagegen]") */
  prefix?: string;
  /** Whether debug messages are printed (default: false) */
  debug?: boolean;
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const prefix = options.prefix ?? "[stagegen]";
  const verbose = options.debug ?? false;
  return {
    debug(message) {
      if (verbose) console.error(`${prefix} ${message}`);
    },
    info(message) {
      console.error(`${prefix} ${message}`);
    },
    warn(message) {
      console.warn(`${prefix} ${message}`);
    },
    error(message) {
      console.error(`${prefix} ${message}`);
    },
  };
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};
