import type { Logger } from './logger';
import { LogLevel } from './types';

/**
 * Result of `Logger.assert()`.
 *
 * The condition is evaluated once, when the assertion is made; a failure is
 * logged at ERROR right away. Chained actions only re-read the stored result,
 * so calling them repeatedly is safe.
 */
export class LogAssertion {
  readonly passed: boolean;
  readonly message: string;
  private readonly logger: Logger;

  constructor(logger: Logger, condition: boolean, message: string) {
    this.logger = logger;
    this.passed = condition;
    this.message = message;

    if (!condition) {
      logger.emit(`ASSERTION FAILED: ${message}`, LogLevel.ERROR);
    }
  }

  /**
   * Run `callback` if the assertion failed
   */
  onFailure(callback: () => void): this {
    if (!this.passed) callback();
    return this;
  }

  /**
   * Break into the debugger if one is attached and the assertion failed
   */
  breakDebugger(): this {
    const dbg = this.logger.runtime.debugger;
    if (!this.passed && dbg.isAttached()) dbg.break();
    return this;
  }

  /**
   * Pause the host if the assertion failed. Only editor hosts pause.
   */
  pauseEditor(): this {
    if (!this.passed) this.logger.runtime.pauseHost();
    return this;
  }
}
