import type { LogLevelName, LogRecord, Rgb } from './types';

/* ---------------------------------- Types ---------------------------------- */

export type ColorMode   = 'auto' | 'on' | 'off';

export type ConsoleFormatter = (record: LogRecord) => string;

const CSI = '\x1b[';
const colors = {
    red:     (s: string) => `${CSI}31m${s}${CSI}39m`,
    magenta: (s: string) => `${CSI}35m${s}${CSI}39m`,
    yellow:  (s: string) => `${CSI}33m${s}${CSI}39m`,
    dim:     (s: string) => `${CSI}2m${s}${CSI}22m`,
    rgb:     (c: Rgb, s: string) => `${CSI}38;2;${channel(c.r)};${channel(c.g)};${channel(c.b)}m${s}${CSI}39m`,
};

const LEVEL_TAGS: Record<LogLevelName, string> = {
    info:  '[INFO]',
    warn:  '[WARN]',
    error: '[ERROR]',
    fatal: '[FATAL]',
};

/* ------------------------------- Formatters -------------------------------- */

/** Decide whether ANSI colors are used for a given mode; `auto` means TTY and not production. */
export function resolveColor(color: ColorMode = 'auto', env: Record<string, string | undefined> = process.env): boolean {
    if (color !== 'auto') return color === 'on';
    const isTTY = !!process.stdout?.isTTY;
    return isTTY && env.NODE_ENV?.trim().toLowerCase() !== 'production';
}

/**
 * Minimal console formatter: `[LEVEL] message`.
 * With color on, the level tag is tinted by severity and the message by the record's color.
 */
export function createConsoleFormatter(color: ColorMode = 'auto'): ConsoleFormatter {
    const useColor = resolveColor(color);

    return (record) => {
        let tag = LEVEL_TAGS[record.levelName];
        if (!useColor) return `${tag} ${record.message}`;

        if (record.levelName === 'fatal') tag = colors.magenta(tag);
        else if (record.levelName === 'error') tag = colors.red(tag);
        else if (record.levelName === 'warn') tag = colors.yellow(tag);
        else tag = colors.dim(tag);
        return `${tag} ${colors.rgb(record.color, record.message)}`;
    };
}

/* ----------------------------- Format helpers ------------------------------ */

/** `hh:mm:ss.fff` for a millisecond clock reading */
export function formatElapsed(ms: number): string {
    const total = Math.max(0, Math.floor(ms));
    const h = Math.floor(total / 3_600_000);
    const m = Math.floor(total / 60_000) % 60;
    const s = Math.floor(total / 1000) % 60;
    const f = total % 1000;
    return `${pad(h, 2)}:${pad(m, 2)}:${pad(s, 2)}.${pad(f, 3)}`;
}

function channel(v: number): number {
    return Number.isFinite(v) ? Math.max(0, Math.min(255, Math.round(v))) : 0;
}

function pad(n: number, width: number): string {
    return String(n).padStart(width, '0');
}
