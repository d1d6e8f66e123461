/**
 * Log levels in order of severity
 */
export enum LogLevel {
  INFO = 0,
  WARN = 1,
  ERROR = 2,
  FATAL = 3,
}

/**
 * String representation of log levels
 */
export type LogLevelName = 'info' | 'warn' | 'error' | 'fatal';

export const LEVEL_NAMES: readonly LogLevelName[] = ['info', 'warn', 'error', 'fatal'];

/**
 * Channels a logger can belong to. `Default` is always enabled and
 * cannot be configured.
 */
export const LOG_CHANNELS = [
  'Default',
  'Audio',
  'Network',
  'Physics',
  'AI',
  'UI',
  'Gameplay',
  'Performance',
  'Animation',
  'Input',
  'Rendering',
  'System',
] as const;

export type LogChannel = (typeof LOG_CHANNELS)[number];

/** Channels that carry a configuration entry (everything but `Default`). */
export type ConfigurableChannel = Exclude<LogChannel, 'Default'>;

/**
 * Where a channel is active
 */
export const CHANNEL_SCOPES = ['EditorOnly', 'BuildOnly', 'Both'] as const;

export type ChannelScope = (typeof CHANNEL_SCOPES)[number];

/**
 * The kind of host the process runs in: an interactive development host
 * (`editor`) or a packaged build (`build`).
 */
export type HostEnvironment = 'editor' | 'build';

export interface ChannelConfig {
  channel: LogChannel;
  scope: ChannelScope;
  enabled: boolean;
}

/**
 * 8-bit RGB color hint attached to every record
 */
export interface Rgb {
  r: number;
  g: number;
  b: number;
}

export const WHITE: Readonly<Rgb> = Object.freeze({ r: 255, g: 255, b: 255 });

/**
 * Final, display-ready log record handed to sinks
 */
export interface LogRecord {
  level: LogLevel;
  levelName: LogLevelName;
  /** Message with context and instance prefix already applied */
  message: string;
  color: Rgb;
  channel: LogChannel;
  /** Runtime clock reading (ms) at emission */
  timestamp: number;
  /** Opaque caller reference, passed through untouched */
  target?: unknown;
}

/**
 * Sink interface for pluggable output destinations.
 * Sinks are expected not to throw.
 */
export interface LogSink {
  write(record: LogRecord): void;
}

/**
 * Logger instance configuration
 */
export interface LoggerConfig {
  /**
   * Text placed before every message as `<prefix>:: `. Default: none
   */
  prefix?: string;
  /**
   * Color hint forwarded to sinks. Default: white
   */
  color?: Rgb;
  /**
   * Instance-local switch. Default: true
   */
  enabled?: boolean;
  /**
   * Channel used for filtering. Default: 'Default'
   */
  channel?: LogChannel;
}

export function isConfigurableChannel(channel: LogChannel): channel is ConfigurableChannel {
  return channel !== 'Default';
}

export function levelName(level: LogLevel): LogLevelName {
  return LEVEL_NAMES[level] ?? 'info';
}
