import { ExchangeCancelledError } from '@palaver/shared';

/**
 * FIFO async mutex. Waiters are granted the lock strictly in arrival order;
 * a waiter whose signal aborts leaves the queue without ever holding it.
 */
export class ExecutionLock {
  private held = false;
  private readonly waiters: Array<() => void> = [];

  /** Held, or somebody is queued for it */
  get isBusy(): boolean {
    return this.held || this.waiters.length > 0;
  }

  get isHeld(): boolean {
    return this.held;
  }

  get queueLength(): number {
    return this.waiters.length;
  }

  async runExclusive<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    await this.acquire(signal);
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  private acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(new ExchangeCancelledError(signal.reason));
    }
    if (!this.held) {
      this.held = true;
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const onAbort = (): void => {
        const idx = this.waiters.indexOf(waiter);
        if (idx !== -1) this.waiters.splice(idx, 1);
        reject(new ExchangeCancelledError(signal?.reason));
      };
      const waiter = (): void => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  private release(): void {
    const next = this.waiters.shift();
    if (next) {
      // Ownership passes straight to the next waiter; `held` stays true
      next();
    } else {
      this.held = false;
    }
  }
}
