/**
 * Wait primitives shared by the client's loops and callers.
 */

/**
 * A one-shot flag. `wait()` resolves once `set()` has been called; setting
 * an already-set event changes nothing.
 */
export class ResetEvent {
  private signaled = false;
  private readonly waiters: Array<() => void> = [];

  isSet(): boolean {
    return this.signaled;
  }

  set(): void {
    if (this.signaled) return;
    this.signaled = true;
    for (const resolve of this.waiters.splice(0)) {
      resolve();
    }
  }

  wait(): Promise<void> {
    if (this.signaled) return Promise.resolve();
    return new Promise<void>((resolve) => {
      this.waiters.push(resolve);
    });
  }
}

/**
 * Counting semaphore. Each `post()` lets exactly one `wait()` through,
 * whether the waiter arrived before or after the post.
 */
export class Semaphore {
  private permits = 0;
  private readonly waiters: Array<() => void> = [];

  get available(): number {
    return this.permits;
  }

  post(): void {
    const next = this.waiters.shift();
    if (next) {
      next();
    } else {
      this.permits++;
    }
  }

  wait(): Promise<void> {
    if (this.permits > 0) {
      this.permits--;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.waiters.push(resolve);
    });
  }
}

/** Marker returned by `raceTimeout` when the wait ran out. */
export const TIMED_OUT: unique symbol = Symbol("timed out");

/**
 * Wait for `promise` for at most `ms` milliseconds. The promise itself is
 * left running; a later call may race it again.
 */
export function raceTimeout<T>(
  promise: Promise<T>,
  ms: number
): Promise<T | typeof TIMED_OUT> {
  let timeoutId: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<typeof TIMED_OUT>((resolve) => {
    timeoutId = setTimeout(() => resolve(TIMED_OUT), ms);
  });
  return Promise.race([promise, timeout]).finally(() => {
    clearTimeout(timeoutId);
  });
}
