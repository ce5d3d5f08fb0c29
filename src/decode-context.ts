/**
 * Per-parse decoding state: the strictness policy, the log sink and the
 * once-only warnings already issued.
 */
import { FormatViolationError } from './errors.js';
import { Logger } from './utils/logger.js';

export interface DecodeOptions {
  /** Throw on reserved-field violations instead of logging them. */
  readonly strict: boolean;
  readonly logger: Logger;
}

export class DecodeContext {
  readonly strict: boolean;
  readonly logger: Logger;
  private readonly warned = new Set<string>();

  constructor({ strict, logger }: DecodeOptions) {
    this.strict = strict;
    this.logger = logger;
  }

  /**
   * Reports a must-be-zero or reserved field holding another value.
   * @throws {FormatViolationError} In strict mode
   */
  violation(message: string, offset: number): void {
    if (this.strict) {
      throw new FormatViolationError(message, offset);
    }
    this.logger.error(`${message} offset=0x${offset.toString(16)}`);
  }

  /** Logs a warning the first time a given kind is seen. */
  warnOnce(kind: string, message: string): void {
    if (this.warned.has(kind)) {
      return;
    }
    this.warned.add(kind);
    this.logger.warn(message);
  }
}
