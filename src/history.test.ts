import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect, beforeEach } from 'vitest';
import { createRuntime } from './core';
import { LogHistory } from './history';
import { Logger } from './logger';
import { LogLevel } from './types';

describe('LogHistory', () => {
  let t: number;
  let history: LogHistory;
  let audio: Logger;
  let net: Logger;

  beforeEach(() => {
    t = 0;
    history = new LogHistory();
    const runtime = createRuntime({ sinks: [history], settings: null, env: {}, now: () => t });
    audio = new Logger({ prefix: 'Audio', channel: 'Audio' }, runtime);
    net = new Logger({ prefix: 'Net', channel: 'Network' }, runtime);
  });

  const fill = () => {
    t = 1_000;
    audio.info('music started');
    t = 61_250;
    net.warn('latency 250ms');
    t = 3_723_004;
    net.error('Connection lost');
    audio.emit('device gone', LogLevel.FATAL);
  };

  it('counts entries per level', () => {
    fill();
    expect(history.counts()).toEqual({ info: 1, warn: 1, error: 1, fatal: 1 });
  });

  it('filters by level, with fatal grouped under errors', () => {
    fill();
    expect(history.list({ showErrors: false }).map((e) => e.message)).toEqual([
      'Audio:: music started',
      'Net:: latency 250ms',
    ]);
    expect(history.list({ showInfo: false, showWarnings: false }).map((e) => e.levelName)).toEqual(['error', 'fatal']);
  });

  it('searches case-insensitively', () => {
    fill();
    expect(history.list({ search: 'CONNECTION' }).map((e) => e.message)).toEqual(['Net:: Connection lost']);
    expect(history.list({ search: 'nothing like it' })).toEqual([]);
  });

  it('filters by channel', () => {
    fill();
    expect(history.list({ channels: ['Network'] }).map((e) => e.channel)).toEqual(['Network', 'Network']);
  });

  it('keeps only the newest entries beyond capacity', () => {
    const small = new LogHistory(2);
    const log = new Logger({}, createRuntime({ sinks: [small], settings: null, env: {}, now: () => 0 }));
    log.info('1');
    log.info('2');
    log.info('3');
    expect(small.list().map((e) => e.message)).toEqual(['2', '3']);

    small.setCapacity(1);
    expect(small.list().map((e) => e.message)).toEqual(['3']);
    expect(small.capacity).toBe(1);
  });

  it('falls back to the default capacity for nonsense values', () => {
    expect(new LogHistory(0).capacity).toBe(1000);
    expect(new LogHistory(Number.NaN).capacity).toBe(1000);
  });

  it('clears', () => {
    fill();
    history.clear();
    expect(history.size).toBe(0);
  });

  it('exports the filtered entries under a header counting all of them', () => {
    fill();
    const text = history.exportText({ showInfo: false, showWarnings: false }, new Date('2026-01-02T03:04:05.000Z'));
    const rule = '-'.repeat(80);

    expect(text).toBe(
      [
        'Log Export',
        'Exported: 2026-01-02T03:04:05.000Z',
        'Total Logs: 4',
        '='.repeat(80),
        '',
        '[01:02:03.004] [ERROR] Net:: Connection lost',
        rule,
        '[01:02:03.004] [FATAL] Audio:: device gone',
        rule,
        '',
      ].join('\n')
    );
  });

  it('writes the export to a file', () => {
    fill();
    const dir = mkdtempSync(join(tmpdir(), 'loggate-export-'));
    try {
      const path = join(dir, 'logs.txt');
      const at = new Date('2026-01-02T03:04:05.000Z');
      history.exportToFile(path, { search: 'music' }, at);
      expect(readFileSync(path, 'utf8')).toBe(history.exportText({ search: 'music' }, at));
      expect(readFileSync(path, 'utf8')).toContain('[00:00:01.000] [INFO] Audio:: music started\n');
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
