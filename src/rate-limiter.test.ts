import { describe, it, expect, beforeEach } from 'vitest';
import { RateLimiter } from './rate-limiter';

describe('RateLimiter', () => {
  let t: number;
  let limiter: RateLimiter;

  beforeEach(() => {
    t = 0;
    limiter = new RateLimiter({ now: () => t });
  });

  it('always lets the first observation of a key through', () => {
    expect(limiter.shouldEmit('x', 10_000)).toBe(true);
    expect(limiter.suppressedCount('x')).toBe(0);
  });

  it('suppresses inside the interval and resets the count once it elapses', () => {
    expect(limiter.shouldEmit('x', 1000)).toBe(true);

    t = 300;
    expect(limiter.shouldEmit('x', 1000)).toBe(false);
    expect(limiter.suppressedCount('x')).toBe(1);

    t = 700;
    expect(limiter.shouldEmit('x', 1000)).toBe(false);
    expect(limiter.suppressedCount('x')).toBe(2);

    t = 1100;
    expect(limiter.shouldEmit('x', 1000)).toBe(true);
    expect(limiter.suppressedCount('x')).toBe(0);
  });

  it('measures the interval from the last accepted call, not the last attempt', () => {
    limiter.shouldEmit('x', 1000);
    t = 900;
    expect(limiter.shouldEmit('x', 1000)).toBe(false);
    t = 1000;
    expect(limiter.shouldEmit('x', 1000)).toBe(true);
    t = 1999;
    expect(limiter.shouldEmit('x', 1000)).toBe(false);
  });

  it('tracks keys independently', () => {
    limiter.shouldEmit('a', 1000);
    t = 100;
    expect(limiter.shouldEmit('b', 1000)).toBe(true);
    expect(limiter.shouldEmit('a', 1000)).toBe(false);
    expect(limiter.suppressedCount('a')).toBe(1);
    expect(limiter.suppressedCount('b')).toBe(0);
  });

  it('never suppresses with a non-positive interval', () => {
    for (let i = 0; i < 5; i++) {
      expect(limiter.shouldEmit('x', 0)).toBe(true);
      expect(limiter.shouldEmit('y', -5)).toBe(true);
    }
    expect(limiter.suppressedCount('x')).toBe(0);
  });

  it('reports 0 for unseen keys without tracking them', () => {
    expect(limiter.suppressedCount('never')).toBe(0);
    expect(limiter.size).toBe(0);
  });

  it('forgets every key on clear()', () => {
    limiter.shouldEmit('x', 1000);
    limiter.shouldEmit('x', 1000);
    limiter.clear();
    expect(limiter.size).toBe(0);
    expect(limiter.shouldEmit('x', 1000)).toBe(true);
  });

  it('drops the oldest key when maxKeys is reached', () => {
    const capped = new RateLimiter({ now: () => t, maxKeys: 2 });
    capped.shouldEmit('a', 1000);
    capped.shouldEmit('b', 1000);
    capped.shouldEmit('c', 1000);
    expect(capped.size).toBe(2);
    // 'a' was evicted, so it counts as a first observation again
    expect(capped.shouldEmit('a', 1000)).toBe(true);
    expect(capped.shouldEmit('c', 1000)).toBe(false);
  });
});
