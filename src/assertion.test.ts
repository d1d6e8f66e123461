import { describe, it, expect, vi, beforeEach } from 'vitest';
import { createRuntime } from './core';
import type { CreateRuntimeOptions } from './core';
import { Logger } from './logger';
import { MemorySink } from './sinks';
import { LogLevel } from './types';

describe('LogAssertion', () => {
  let sink: MemorySink;

  const makeLogger = (overrides: CreateRuntimeOptions = {}) =>
    new Logger({ prefix: 'Combat' }, createRuntime({ sinks: [sink], settings: null, host: 'editor', env: {}, ...overrides }));

  beforeEach(() => {
    sink = new MemorySink();
  });

  it('logs one error on failure and runs onFailure exactly once', () => {
    const cb = vi.fn();
    const result = makeLogger().assert(false, 'm').onFailure(cb);

    expect(sink.records).toHaveLength(1);
    expect(sink.records[0].level).toBe(LogLevel.ERROR);
    expect(sink.records[0].message).toBe('Combat:: ASSERTION FAILED: m');
    expect(cb).toHaveBeenCalledTimes(1);
    expect(result.passed).toBe(false);
    expect(result.message).toBe('m');
  });

  it('stays silent on success and never runs onFailure', () => {
    const cb = vi.fn();
    makeLogger().assert(true, 'm').onFailure(cb);
    expect(sink.records).toHaveLength(0);
    expect(cb).not.toHaveBeenCalled();
  });

  it('re-checks the stored result on repeated chain calls', () => {
    const cb = vi.fn();
    const result = makeLogger().assert(false, 'hp < 0');
    result.onFailure(cb).onFailure(cb);
    expect(cb).toHaveBeenCalledTimes(2);
    expect(sink.records).toHaveLength(1);
  });

  it('breaks only when a debugger is attached and the check failed', () => {
    const brk = vi.fn();
    let attached = false;
    const log = makeLogger({ debugger: { isAttached: () => attached, break: brk } });

    log.assert(false, 'a').breakDebugger();
    expect(brk).not.toHaveBeenCalled();

    attached = true;
    log.assert(true, 'b').breakDebugger();
    expect(brk).not.toHaveBeenCalled();

    log.assert(false, 'c').breakDebugger();
    expect(brk).toHaveBeenCalledTimes(1);
  });

  it('pauses the editor host on failure', () => {
    const pause = vi.fn();
    const log = makeLogger({ pauseHost: pause });
    log.assert(true, 'ok').pauseEditor();
    expect(pause).not.toHaveBeenCalled();
    log.assert(false, 'bad').pauseEditor();
    expect(pause).toHaveBeenCalledTimes(1);
  });

  it('never pauses a build host', () => {
    const pause = vi.fn();
    const log = makeLogger({ host: 'build', pauseHost: pause });
    log.assert(false, 'bad').pauseEditor();
    expect(pause).not.toHaveBeenCalled();
  });

  it('still evaluates the result when emission is gated off', () => {
    const log = makeLogger();
    log.toggleEnabled(false);
    const cb = vi.fn();
    log.assert(false, 'quiet').onFailure(cb);
    expect(sink.records).toHaveLength(0);
    expect(cb).toHaveBeenCalledTimes(1);
  });
});
