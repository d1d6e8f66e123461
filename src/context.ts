/**
 * Nested context labels prefixed onto every message while a scope is open.
 *
 * `exit()` pops LIFO. Prefer `run()`, which releases its own scope on every
 * exit path, so async scopes that settle out of order keep each other's
 * names; `enter()` hands back the same disposer for callers that manage the
 * scope themselves.
 */
interface Frame {
  name: string;
  token: symbol;
}

export class ContextStack {
  private readonly frames: Frame[] = [];

  /**
   * Push `name` and return an idempotent disposer that removes that frame,
   * even when scopes entered after it are still open.
   */
  enter(name: string): () => void {
    const token = Symbol(name);
    this.frames.push({ name, token });
    let disposed = false;
    return () => {
      if (disposed) return;
      disposed = true;
      this.remove(token);
    };
  }

  /**
   * Pop the most recently entered name. No-op on an empty stack.
   */
  exit(): void {
    this.frames.pop();
  }

  /**
   * Run `fn` inside the scope `name`. Works with sync & async functions
   * (the pop happens in finally/Promise.finally).
   */
  run<T>(name: string, fn: () => Promise<T>): Promise<T>;
  run<T>(name: string, fn: () => T): T;
  run<T>(name: string, fn: () => T | Promise<T>): T | Promise<T> {
    const dispose = this.enter(name);
    try {
      const r = fn();
      if (r instanceof Promise) {
        return r.finally(dispose);
      }
      dispose();
      return r;
    } catch (e) {
      dispose();
      throw e;
    }
  }

  /**
   * `"[Outer > Inner] "`, or `""` when no scope is open
   */
  currentPrefix(): string {
    if (this.frames.length === 0) return '';
    return `[${this.frames.map((f) => f.name).join(' > ')}] `;
  }

  get depth(): number {
    return this.frames.length;
  }

  clear(): void {
    this.frames.length = 0;
  }

  // frames already dropped by exit() or clear() are gone; nothing to do then
  private remove(token: symbol): void {
    for (let i = this.frames.length - 1; i >= 0; i--) {
      if (this.frames[i].token === token) {
        this.frames.splice(i, 1);
        return;
      }
    }
  }
}
