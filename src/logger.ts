import { LogAssertion } from './assertion';
import { getDefaultRuntime } from './core';
import type { LogRuntime } from './core';
import { LogLevel, WHITE, levelName } from './types';
import type { LogChannel, LoggerConfig, Rgb } from './types';

export type ThrottleOptions = {
  /** Rate-limit key to use instead of `<logger id>_<message>` */
  key?: string;
  /** Opaque reference forwarded to sinks */
  target?: unknown;
};

/**
 * Channel-aware logger instance.
 *
 * Emission passes, in order: the runtime's global gate, this instance's
 * enabled flag, the channel policy, and (for `logThrottled`) the rate
 * limiter. The first failing gate drops the call.
 */
export class Logger {
  readonly runtime: LogRuntime;
  /** Stable identity used in throttle keys */
  readonly id: number;
  private prefix: string;
  private color: Rgb;
  private enabled: boolean;
  private channel: LogChannel;

  constructor(config: LoggerConfig = {}, runtime: LogRuntime = getDefaultRuntime()) {
    this.runtime = runtime;
    this.id = runtime.nextLoggerId();
    this.prefix = config.prefix ?? '';
    this.color = config.color ? { ...config.color } : { ...WHITE };
    this.enabled = config.enabled ?? true;
    this.channel = config.channel ?? 'Default';
  }

  /**
   * Log an info message
   */
  info(message: string, target?: unknown): void {
    this.emit(message, LogLevel.INFO, target);
  }

  /**
   * Log a warning message
   */
  warn(message: string, target?: unknown): void {
    this.emit(message, LogLevel.WARN, target);
  }

  /**
   * Log an error message
   */
  error(message: string, target?: unknown): void {
    this.emit(message, LogLevel.ERROR, target);
  }

  /**
   * Log a fatal error message
   */
  fatal(message: string, target?: unknown): void {
    this.emit(message, LogLevel.FATAL, target);
  }

  emit(message: string, level: LogLevel = LogLevel.INFO, target?: unknown): void {
    if (!this.passesGates()) return;
    this.write(message, level, target);
  }

  /**
   * Log only if the condition holds. With thunks, the message is built
   * only after the condition returned true.
   */
  logIf(condition: boolean, message: string, level?: LogLevel, target?: unknown): void;
  logIf(condition: () => boolean, message: () => string, level?: LogLevel, target?: unknown): void;
  logIf(
    condition: boolean | (() => boolean),
    message: string | (() => string),
    level: LogLevel = LogLevel.INFO,
    target?: unknown
  ): void {
    const ok = typeof condition === 'function' ? condition() : condition;
    if (!ok) return;
    this.emit(typeof message === 'function' ? message() : message, level, target);
  }

  /**
   * Log at most once per `minIntervalMs` for the same message (or key).
   * The first emission after a quiet period reports how many calls were dropped.
   */
  logThrottled(
    message: string,
    minIntervalMs: number = this.runtime.rateLimiting.defaultIntervalMs,
    level: LogLevel = LogLevel.INFO,
    options: ThrottleOptions = {}
  ): void {
    if (!this.passesGates()) return;

    if (!this.runtime.rateLimiting.enabled) {
      this.write(message, level, options.target);
      return;
    }

    const limiter = this.runtime.limiter;
    const key = options.key ?? `${this.id}_${message}`;
    // Read before shouldEmit(): an accepted call resets the count
    const suppressed = limiter.suppressedCount(key);
    if (!limiter.shouldEmit(key, minIntervalMs)) return;

    this.write(suppressed > 0 ? `${message} (suppressed ${suppressed}x)` : message, level, options.target);
  }

  /**
   * Assert a condition; a failure is logged at ERROR immediately
   */
  assert(condition: boolean, message: string): LogAssertion {
    return new LogAssertion(this, condition, message);
  }

  validateNotNull(value: unknown, name: string): LogAssertion {
    return this.assert(value != null, `${name} cannot be null`);
  }

  validateRange(value: number, min: number, max: number, name: string): LogAssertion {
    if (min > max) {
      return this.assert(false, `${name} has an invalid range: min ${min} is greater than max ${max}`);
    }
    return this.assert(value >= min && value <= max, `${name} must be between ${min} and ${max}, but was ${value}`);
  }

  /**
   * Run `fn` with `name` pushed on the runtime's context stack
   */
  withContext<T>(name: string, fn: () => T): T {
    return this.runtime.context.run(name, fn);
  }

  toggleEnabled(enabled: boolean): void {
    this.enabled = enabled;
  }

  setPrefix(prefix: string): void {
    this.prefix = prefix;
  }

  setColor(color: Rgb): void {
    this.color = { ...color };
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  getPrefix(): string {
    return this.prefix;
  }

  getColor(): Rgb {
    return { ...this.color };
  }

  getChannel(): LogChannel {
    return this.channel;
  }

  private passesGates(): boolean {
    if (!this.runtime.enabled) return false;
    if (!this.enabled) return false;
    return this.runtime.channels.isEnabled(this.channel);
  }

  private write(message: string, level: LogLevel, target: unknown): void {
    const body = this.runtime.context.currentPrefix() + message;

    this.runtime.write({
      level,
      levelName: levelName(level),
      message: this.prefix ? `${this.prefix}:: ${body}` : body,
      color: { ...this.color },
      channel: this.channel,
      timestamp: this.runtime.now(),
      ...(target !== undefined ? { target } : {}),
    });
  }
}

/**
 * Create a new logger instance
 */
export function createLogger(config?: LoggerConfig, runtime?: LogRuntime): Logger {
  return new Logger(config, runtime);
}
