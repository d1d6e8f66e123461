/**
 * Settings document: channel configuration plus rate-limit defaults.
 * Validated with zod at the file boundary.
 */
import { readFileSync, writeFileSync } from 'node:fs';
import { z } from 'zod';
import { CONFIGURABLE_CHANNELS, defaultScope } from './channels';
import { CHANNEL_SCOPES, LOG_CHANNELS } from './types';

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

export const ChannelConfigSchema = z.object({
  channel: z.enum(LOG_CHANNELS),
  scope: z.enum(CHANNEL_SCOPES).default('Both'),
  enabled: z.boolean().default(true),
});

export const RateLimitSettingsSchema = z.object({
  enabled: z.boolean().default(true),
  /** Interval used by logThrottled() when the caller passes none */
  defaultIntervalMs: z.number().nonnegative().default(100),
});
export type RateLimitSettings = z.infer<typeof RateLimitSettingsSchema>;

export const LoggerSettingsSchema = z.object({
  channels: z.array(ChannelConfigSchema).default([]),
  rateLimiting: RateLimitSettingsSchema.default({}),
});
export type LoggerSettings = z.infer<typeof LoggerSettingsSchema>;

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class SettingsError extends Error {
  readonly issues: z.ZodIssue[];

  constructor(message: string, issues: z.ZodIssue[] = []) {
    super(message);
    this.name = 'SettingsError';
    this.issues = issues;
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Every configurable channel enabled; Performance limited to the editor host. */
export function defaultSettings(): LoggerSettings {
  return {
    channels: CONFIGURABLE_CHANNELS.map((channel) => ({
      channel,
      scope: defaultScope(channel),
      enabled: true,
    })),
    rateLimiting: { enabled: true, defaultIntervalMs: 100 },
  };
}

export function parseSettings(input: unknown): LoggerSettings {
  const result = LoggerSettingsSchema.safeParse(input);
  if (!result.success) {
    const detail = result.error.issues
      .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('; ');
    throw new SettingsError(`Invalid logger settings: ${detail}`, result.error.issues);
  }
  return result.data;
}

export function serializeSettings(settings: LoggerSettings): string {
  return `${JSON.stringify(settings, null, 2)}\n`;
}

/**
 * Read and validate a settings file.
 * Returns `undefined` when the file does not exist.
 */
export function loadSettingsFile(path: string): LoggerSettings | undefined {
  let text: string;
  try {
    text = readFileSync(path, 'utf8');
  } catch (err) {
    if (isMissingFile(err)) return undefined;
    throw err;
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new SettingsError(`Settings file ${path} is not valid JSON: ${reason}`);
  }
  return parseSettings(json);
}

export function saveSettingsFile(path: string, settings: LoggerSettings): void {
  writeFileSync(path, serializeSettings(settings), 'utf8');
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
