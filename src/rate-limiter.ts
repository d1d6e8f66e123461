/* ---------------------------------- Types ---------------------------------- */

type RateLimitEntry = {
    lastEmitTime: number;
    suppressedCount: number;
};

export type RateLimiterOptions = {
    /** Clock source (ms). Default: () => performance.now() */
    now?: () => number;

    /**
     * Upper bound on tracked keys. When a new key would exceed it, the oldest
     * tracked key is dropped. Default: unbounded.
     */
    maxKeys?: number;
};

/* ------------------------------- Rate limiter ------------------------------ */

/**
 * Per-key throttle. Each key is tracked independently so unrelated messages
 * never suppress each other; the suppressed count lets the next accepted
 * emission report how many were dropped.
 */
export class RateLimiter {
    private readonly entries = new Map<string, RateLimitEntry>();
    private readonly now: () => number;
    private readonly maxKeys: number;

    constructor(options: RateLimiterOptions = {}) {
        this.now = options.now ?? (() => performance.now());
        this.maxKeys = options.maxKeys && options.maxKeys > 0 ? options.maxKeys : Infinity;
    }

    /**
     * Decide whether `key` may be emitted now.
     * - first observation: always true
     * - `minIntervalMs <= 0`: always true
     * - at least `minIntervalMs` since the last accepted call: true, count resets
     * - otherwise false, count increments
     */
    shouldEmit(key: string, minIntervalMs: number): boolean {
        const t = this.now();
        const entry = this.entries.get(key);

        if (!entry) {
            this.track(key, { lastEmitTime: t, suppressedCount: 0 });
            return true;
        }

        if (!(minIntervalMs > 0) || t - entry.lastEmitTime >= minIntervalMs) {
            entry.lastEmitTime = t;
            entry.suppressedCount = 0;
            return true;
        }

        entry.suppressedCount++;
        return false;
    }

    /** Suppressed calls since the last accepted one; 0 for unseen keys. */
    suppressedCount(key: string): number {
        return this.entries.get(key)?.suppressedCount ?? 0;
    }

    get size(): number {
        return this.entries.size;
    }

    clear(): void {
        this.entries.clear();
    }

    private track(key: string, entry: RateLimitEntry): void {
        if (this.entries.size >= this.maxKeys) {
            // Map iterates in insertion order
            const oldest = this.entries.keys().next();
            if (!oldest.done) this.entries.delete(oldest.value);
        }
        this.entries.set(key, entry);
    }
}
