// src/core.ts
// Logging runtime: the state every logger shares.
// - One runtime per application run, passed to loggers (or the lazily created default).
// - Global on/off gate, host flag, clock, sinks.
// - Owns the channel registry, rate limiter and context stack.

import { url as inspectorUrl } from 'node:inspector';
import { ChannelRegistry } from './channels';
import { ContextStack } from './context';
import { RateLimiter } from './rate-limiter';
import { loadSettingsFile } from './settings';
import type { LoggerSettings, RateLimitSettings } from './settings';
import { ConsoleSink } from './sinks';
import type { ColorMode } from './format';
import { LogLevel, WHITE } from './types';
import type { HostEnvironment, LogRecord, LogSink } from './types';

/* ---------------------------------- Types ---------------------------------- */

export type DebuggerHooks = {
    /** Whether a debugger is attached to the process. */
    isAttached: () => boolean;
    /** Break into the attached debugger. */
    break: () => void;
};

export interface LogRuntime {
    /**
     * Global gate checked before anything else on every emission.
     * Resolved from `CreateRuntimeOptions.enabled` or `USE_LOGS`.
     */
    readonly enabled: boolean;

    /** Flip the global gate. Returns true if changed. */
    setEnabled(on: boolean): boolean;

    /** Host kind consulted by channel scopes. */
    readonly host: HostEnvironment;

    readonly channels: ChannelRegistry;
    readonly limiter: RateLimiter;
    readonly context: ContextStack;

    /** Rate-limit policy used by `logThrottled()`. */
    readonly rateLimiting: Readonly<RateLimitSettings>;
    setRateLimiting(patch: Partial<RateLimitSettings>): void;

    readonly debugger: DebuggerHooks;

    /** Monotonic clock in milliseconds. */
    now(): number;

    /** Hand a record to every sink. */
    write(record: LogRecord): void;

    /** Stable identity for the next logger created on this runtime. */
    nextLoggerId(): number;

    /**
     * Pause the host through the `pauseHost` hook.
     * Editor hosts only; returns false when nothing was paused.
     */
    pauseHost(): boolean;

    /** Snapshot of the current channel and rate-limit settings, for saving. */
    snapshot(): LoggerSettings;
}

export type CreateRuntimeOptions = {
    /**
     * Output sinks. `null` => no-op runtime.
     * Default: a single ConsoleSink using `color`.
     */
    sinks?: LogSink[] | null;

    /** Color mode of the default console sink. Default: 'auto' */
    color?: ColorMode;

    /**
     * Explicit global gate. If omitted, resolves from env:
     * `USE_LOGS=0|false|no|off` => disabled, anything else => enabled.
     */
    enabled?: boolean;

    /**
     * Explicit host. If omitted, resolves from env:
     * - `LOG_HOST=editor|build`
     * - otherwise `NODE_ENV=production` => 'build', else 'editor'.
     */
    host?: HostEnvironment;

    /**
     * Settings document. `null` => no configuration source (every channel enabled).
     * If omitted, loaded from `settingsPath` (or `LOG_SETTINGS`) when one is given.
     */
    settings?: LoggerSettings | null;

    /** Settings file to load when `settings` is omitted. */
    settingsPath?: string;

    /**
     * Environment bag used for resolving. Provide in tests;
     * defaults to `process.env`.
     */
    env?: Record<string, string | undefined>;

    /** Clock source (ms). Default: () => performance.now() */
    now?: () => number;

    /** Cap on tracked rate-limit keys. Default: unbounded */
    maxRateLimitKeys?: number;

    /** Debugger detection/break. Default: node:inspector + `debugger` statement */
    debugger?: Partial<DebuggerHooks>;

    /** Host pause hook used by `pauseEditor()` on failed assertions. */
    pauseHost?: () => void;
};

/* ------------------------------- Env helpers ------------------------------- */

const FALSY = new Set(['0', 'false', 'no', 'off']);

/**
 * Resolve the global gate:
 * 1) explicit `enabled`
 * 2) `USE_LOGS` (falsy words disable)
 * 3) enabled
 */
function resolveEnabled(explicit: boolean | undefined, env?: Record<string, string | undefined>): boolean {
    if (explicit != null) return explicit;
    const v = env?.USE_LOGS?.trim().toLowerCase();
    return !(v && FALSY.has(v));
}

/**
 * Resolve the host:
 * 1) explicit `host`
 * 2) `LOG_HOST=editor|build`
 * 3) `NODE_ENV=production` → build, else editor
 */
function resolveHost(explicit: HostEnvironment | undefined, env?: Record<string, string | undefined>): HostEnvironment {
    if (explicit) return explicit;
    const h = env?.LOG_HOST?.trim().toLowerCase();
    if (h === 'editor' || h === 'build') return h;
    return env?.NODE_ENV?.trim().toLowerCase() === 'production' ? 'build' : 'editor';
}

const defaultDebugger: DebuggerHooks = {
    isAttached: () => inspectorUrl() !== undefined,
    break: () => {
        // eslint-disable-next-line no-debugger
        debugger;
    },
};

/* --------------------------------- Factory --------------------------------- */

/**
 * Create a logging runtime.
 * - If `sinks` is null => records are dropped.
 * - If `settings` is null, or no settings file is found => channels fail open.
 * - A missing, unreadable or malformed settings file is reported once through
 *   the sinks as a WARN record, and channels fail open. Logging never throws here;
 *   call `loadSettingsFile()` directly to surface `SettingsError`.
 */
export function createRuntime(options?: CreateRuntimeOptions): LogRuntime {
    const opts: CreateRuntimeOptions = options ?? {};
    const env = opts.env ?? process.env;
    const now = opts.now ?? (() => performance.now());
    const sinks: LogSink[] = opts.sinks === null ? [] : opts.sinks ?? [new ConsoleSink(opts.color)];

    let _enabled = resolveEnabled(opts.enabled, env);
    const host = resolveHost(opts.host, env);

    // Settings: explicit document → file → none
    let settings: LoggerSettings | null = null;
    let settingsWarning: string | undefined;
    if (opts.settings !== undefined) {
        settings = opts.settings;
    } else {
        const path = opts.settingsPath ?? env.LOG_SETTINGS;
        if (path) {
            try {
                settings = loadSettingsFile(path) ?? null;
                if (!settings) settingsWarning = `No settings file found at ${path}`;
            } catch (err) {
                const reason = err instanceof Error ? err.message : String(err);
                settingsWarning = `Invalid settings file at ${path}: ${reason}`;
            }
        }
    }

    const channels = new ChannelRegistry(host, settings ? settings.channels : null);
    const limiter = new RateLimiter({ now, maxKeys: opts.maxRateLimitKeys });
    const context = new ContextStack();
    const rateLimiting: RateLimitSettings = settings
        ? { ...settings.rateLimiting }
        : { enabled: true, defaultIntervalMs: 100 };
    const dbg: DebuggerHooks = { ...defaultDebugger, ...opts.debugger };

    let _loggerIds = 0;
    const write = (record: LogRecord) => {
        for (const sink of sinks) sink.write(record);
    };

    const runtime: LogRuntime = {
        get enabled() { return _enabled; },
        setEnabled: (on: boolean) => {
            if (_enabled === on) return false;
            _enabled = on;
            return true;
        },
        host,
        channels,
        limiter,
        context,
        get rateLimiting() { return rateLimiting; },
        setRateLimiting: (patch) => { Object.assign(rateLimiting, patch); },
        debugger: dbg,
        now,
        write,
        nextLoggerId: () => ++_loggerIds,
        pauseHost: () => {
            if (host !== 'editor' || !opts.pauseHost) return false;
            opts.pauseHost();
            return true;
        },
        snapshot: () => ({ channels: channels.configs(), rateLimiting: { ...rateLimiting } }),
    };

    if (settingsWarning && _enabled) {
        write({
            level: LogLevel.WARN,
            levelName: 'warn',
            message: `[loggate] ${settingsWarning}. Using default settings.`,
            color: { ...WHITE },
            channel: 'Default',
            timestamp: now(),
        });
    }

    return runtime;
}

/* ----------------------------- Default runtime ----------------------------- */

let _default: LogRuntime | undefined;

/** Process-wide runtime used by loggers created without one; created on first use. */
export function getDefaultRuntime(): LogRuntime {
    return _default ?? (_default = createRuntime());
}

/** Replace (or with `undefined`, reset) the process-wide runtime. */
export function setDefaultRuntime(runtime: LogRuntime | undefined): void {
    _default = runtime;
}
