/**
 * Counting semaphore.
 * @module concurrency/semaphore
 */

import { ScannerError } from '../errors.js';

interface Waiter {
  resolve: () => void;
  reject: (error: ScannerError) => void;
  signal?: AbortSignal;
  onAbort?: () => void;
}

/**
 * Counting semaphore used both for the worker cap (async {@link acquire}) and
 * for fixed-size buffers (non-blocking {@link tryAcquire}).
 */
export class Semaphore {
  private permits: number;
  private waiting: Waiter[] = [];

  constructor(permits: number) {
    if (!Number.isInteger(permits) || permits < 1) {
      throw ScannerError.configuration(`Semaphore size must be a positive integer, got ${permits}`);
    }
    this.permits = permits;
  }

  /**
   * Acquire a permit, waiting if necessary.
   * Rejects with a `Cancelled` error when the signal aborts first.
   */
  async acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      throw ScannerError.cancelled('Permit acquisition cancelled');
    }

    if (this.permits > 0) {
      this.permits--;
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const waiter: Waiter = { resolve, reject, signal };
      if (signal) {
        waiter.onAbort = () => {
          this.waiting = this.waiting.filter((w) => w !== waiter);
          reject(ScannerError.cancelled('Permit acquisition cancelled'));
        };
        signal.addEventListener('abort', waiter.onAbort, { once: true });
      }
      this.waiting.push(waiter);
    });
  }

  /**
   * Takes a permit only if one is free.
   */
  tryAcquire(): boolean {
    if (this.permits > 0) {
      this.permits--;
      return true;
    }
    return false;
  }

  /**
   * Release a permit, potentially unblocking a waiting caller
   */
  release(): void {
    this.permits++;
    const waiter = this.waiting.shift();
    if (waiter) {
      this.permits--;
      if (waiter.signal && waiter.onAbort) {
        waiter.signal.removeEventListener('abort', waiter.onAbort);
      }
      waiter.resolve();
    }
  }

  /**
   * Number of free permits.
   */
  get available(): number {
    return this.permits;
  }
}
