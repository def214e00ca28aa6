import { LockTimeoutError } from "../shared/errors.js";

/**
 * FIFO mutual exclusion for one request/response/ack exchange.
 *
 * Not reentrant: code already inside `runExclusive` must call the lock-free
 * internals directly instead of going back through the public entry point.
 */
export class ExchangeLock {
  private locked = false;
  private readonly waiters: Array<() => void> = [];

  get held(): boolean {
    return this.locked;
  }

  /** Number of callers queued behind the current holder. */
  get queued(): number {
    return this.waiters.length;
  }

  async runExclusive<T>(fn: () => Promise<T>, timeoutMs?: number): Promise<T> {
    await this.acquire(timeoutMs);
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  private acquire(timeoutMs?: number): Promise<void> {
    if (!this.locked) {
      this.locked = true;
      return Promise.resolve();
    }
    return new Promise((resolve, reject) => {
      let timer: NodeJS.Timeout | undefined;
      const grant = () => {
        if (timer) clearTimeout(timer);
        resolve();
      };
      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          const index = this.waiters.indexOf(grant);
          if (index !== -1) this.waiters.splice(index, 1);
          reject(new LockTimeoutError(timeoutMs));
        }, timeoutMs);
      }
      this.waiters.push(grant);
    });
  }

  /** Hand the lock straight to the next waiter, or free it. */
  private release(): void {
    const next = this.waiters.shift();
    if (next) next();
    else this.locked = false;
  }
}
