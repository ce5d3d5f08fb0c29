/**
 * Minimal logging sink used by the decoder.
 */

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface ConsoleLoggerOptions {
  /** Emit debug lines. Off by default. */
  readonly verbose?: boolean;
}

function timestamp(): string {
  return new Date().toISOString().slice(11, 23);
}

/**
 * Logger writing to the console with a time stamp and level tag.
 */
export function createConsoleLogger({ verbose = false }: ConsoleLoggerOptions = {}): Logger {
  return {
    debug(message: string): void {
      if (verbose) {
        console.debug(`${timestamp()} [DEBUG] ${message}`);
      }
    },
    info(message: string): void {
      console.log(`${timestamp()} ${message}`);
    },
    warn(message: string): void {
      console.warn(`${timestamp()} [WARN] ${message}`);
    },
    error(message: string): void {
      console.error(`${timestamp()} [ERROR] ${message}`);
    },
  };
}

/** Logger that drops everything. */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
