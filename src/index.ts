/**
 * loggate: channel-aware logger with per-key throttling,
 * scoped context prefixes and fluent assertions
 */

export { Logger, createLogger } from './logger';
export type { ThrottleOptions } from './logger';
export { LogAssertion } from './assertion';
export { createRuntime, getDefaultRuntime, setDefaultRuntime } from './core';
export type { LogRuntime, CreateRuntimeOptions, DebuggerHooks } from './core';
export { RateLimiter } from './rate-limiter';
export type { RateLimiterOptions } from './rate-limiter';
export { ContextStack } from './context';
export { ChannelRegistry, CONFIGURABLE_CHANNELS, defaultScope } from './channels';
export type { ChannelStatus } from './channels';
export {
  LoggerSettingsSchema,
  ChannelConfigSchema,
  RateLimitSettingsSchema,
  SettingsError,
  defaultSettings,
  parseSettings,
  serializeSettings,
  loadSettingsFile,
  saveSettingsFile,
} from './settings';
export type { LoggerSettings, RateLimitSettings } from './settings';
export { ConsoleSink, StreamSink, MemorySink, NoOpSink } from './sinks';
export { LogHistory } from './history';
export type { HistoryEntry, HistoryFilter } from './history';
export { createConsoleFormatter, formatElapsed } from './format';
export type { ColorMode, ConsoleFormatter } from './format';
export { LogLevel, LOG_CHANNELS, CHANNEL_SCOPES, WHITE } from './types';
export type {
  LogLevelName,
  LogChannel,
  ConfigurableChannel,
  ChannelScope,
  ChannelConfig,
  HostEnvironment,
  Rgb,
  LogRecord,
  LogSink,
  LoggerConfig,
} from './types';

// Default export
import { createLogger } from './logger';
import { createRuntime } from './core';
import { LogLevel } from './types';

export default {
  createLogger,
  createRuntime,
  LogLevel,
};
