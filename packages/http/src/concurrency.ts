import { err, ok, type Result } from 'neverthrow';

import type { HttpRequest } from './request.js';
import { type AfterResponseCallback, type BeforeRequestCallback, CancellationError } from './types.js';

interface Waiter {
  grant(): void;
}

/**
 * FIFO counting semaphore. Register it as both a before-request and an
 * after-response hook so every admitted request releases its slot.
 */
export class ConcurrencyLimiter implements BeforeRequestCallback, AfterResponseCallback {
  readonly capacity: number;
  private available: number;
  private readonly waiters: Waiter[] = [];

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new Error(`Invalid concurrency limit: expected a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    this.available = capacity;
  }

  get inUse(): number {
    return this.capacity - this.available;
  }

  get queued(): number {
    return this.waiters.length;
  }

  enter(request: HttpRequest): Promise<Result<void, Error>> {
    return this.acquire(request.signal);
  }

  exit(): void {
    this.release();
  }

  acquire(signal: AbortSignal): Promise<Result<void, Error>> {
    if (signal.aborted) {
      return Promise.resolve(err(new CancellationError(signal.reason)));
    }
    if (this.available > 0) {
      this.available--;
      return Promise.resolve(ok());
    }

    return new Promise((resolve) => {
      const onAbort = () => {
        const index = this.waiters.indexOf(waiter);
        if (index >= 0) {
          this.waiters.splice(index, 1);
          resolve(err(new CancellationError(signal.reason)));
        }
      };
      const waiter: Waiter = {
        grant: () => {
          signal.removeEventListener('abort', onAbort);
          resolve(ok());
        },
      };
      this.waiters.push(waiter);
      signal.addEventListener('abort', onAbort, { once: true });
    });
  }

  /**
   * Hand the slot to the oldest waiter, or return it to the pool
   */
  release(): void {
    const next = this.waiters.shift();
    if (next) {
      next.grant();
      return;
    }
    this.available = Math.min(this.capacity, this.available + 1);
  }
}
