/**
 * Bounded log history.
 * Keeps the most recent records for browsing, filtering and flat text export.
 */
import { writeFileSync } from 'node:fs';
import { formatElapsed } from './format';
import type { LogChannel, LogLevelName, LogRecord, LogSink } from './types';

export type HistoryEntry = {
  timestamp: number;
  levelName: LogLevelName;
  channel: LogChannel;
  message: string;
};

export type HistoryFilter = {
  /** Default: true */
  showInfo?: boolean;
  /** Default: true */
  showWarnings?: boolean;
  /** Covers both error and fatal. Default: true */
  showErrors?: boolean;
  /** Case-insensitive substring match on the message */
  search?: string;
  /** Only entries from these channels */
  channels?: readonly LogChannel[];
};

export const DEFAULT_MAX_ENTRIES = 1000;

const RULE_WIDTH = 80;

export class LogHistory implements LogSink {
  private entries: HistoryEntry[] = [];
  private maxEntries: number;

  constructor(maxEntries: number = DEFAULT_MAX_ENTRIES) {
    this.maxEntries = normalizeMax(maxEntries);
  }

  write(record: LogRecord): void {
    this.entries.push({
      timestamp: record.timestamp,
      levelName: record.levelName,
      channel: record.channel,
      message: record.message,
    });
    if (this.entries.length > this.maxEntries) {
      this.entries.splice(0, this.entries.length - this.maxEntries);
    }
  }

  get size(): number {
    return this.entries.length;
  }

  get capacity(): number {
    return this.maxEntries;
  }

  /** Change the capacity, dropping the oldest entries if needed. */
  setCapacity(maxEntries: number): void {
    this.maxEntries = normalizeMax(maxEntries);
    if (this.entries.length > this.maxEntries) {
      this.entries.splice(0, this.entries.length - this.maxEntries);
    }
  }

  /** Entries (oldest first) matching `filter` */
  list(filter: HistoryFilter = {}): HistoryEntry[] {
    const showInfo = filter.showInfo ?? true;
    const showWarnings = filter.showWarnings ?? true;
    const showErrors = filter.showErrors ?? true;
    const needle = filter.search?.toLowerCase() ?? '';
    const channels = filter.channels ? new Set(filter.channels) : undefined;

    return this.entries.filter((e) => {
      if (e.levelName === 'info' && !showInfo) return false;
      if (e.levelName === 'warn' && !showWarnings) return false;
      if ((e.levelName === 'error' || e.levelName === 'fatal') && !showErrors) return false;
      if (channels && !channels.has(e.channel)) return false;
      if (needle && !e.message.toLowerCase().includes(needle)) return false;
      return true;
    });
  }

  /** Entry count per level */
  counts(): Record<LogLevelName, number> {
    const out: Record<LogLevelName, number> = { info: 0, warn: 0, error: 0, fatal: 0 };
    for (const e of this.entries) out[e.levelName]++;
    return out;
  }

  clear(): void {
    this.entries = [];
  }

  /**
   * Flat, human-readable dump of the entries matching `filter`.
   * The header's total counts every retained entry.
   */
  exportText(filter: HistoryFilter = {}, exportedAt: Date = new Date()): string {
    const lines: string[] = [
      'Log Export',
      `Exported: ${exportedAt.toISOString()}`,
      `Total Logs: ${this.entries.length}`,
      '='.repeat(RULE_WIDTH),
      '',
    ];
    for (const e of this.list(filter)) {
      lines.push(`[${formatElapsed(e.timestamp)}] [${e.levelName.toUpperCase()}] ${e.message}`);
      lines.push('-'.repeat(RULE_WIDTH));
    }
    return lines.join('\n') + '\n';
  }

  exportToFile(path: string, filter: HistoryFilter = {}, exportedAt: Date = new Date()): void {
    writeFileSync(path, this.exportText(filter, exportedAt), 'utf8');
  }
}

function normalizeMax(n: number): number {
  return Number.isFinite(n) && n >= 1 ? Math.floor(n) : DEFAULT_MAX_ENTRIES;
}
