// Token bucket rate limiter - allows bursts up to capacity
// Conservative defaults: capacity 10, refill 3/sec, 5 in flight
// Waiters are admitted strictly in arrival order

import { CancelledError } from "../utils/errors.js";

export interface Permit {
  readonly id: number;
}

interface Waiter {
  resolve: (permit: Permit) => void;
  cleanup: () => void;
}

export class TokenBucket {
  private tokens: number;
  private lastRefill: number;
  private readonly capacity: number;
  private readonly refillRate: number; // tokens per second
  readonly maxConcurrent: number;
  private readonly waiters: Waiter[] = [];
  private readonly held = new Set<number>();
  private nextPermitId = 1;
  private timer: NodeJS.Timeout | null = null;

  constructor(capacity: number, refillRate: number, maxConcurrent: number = Infinity) {
    if (capacity < 1 || refillRate <= 0 || maxConcurrent < 1) {
      throw new RangeError(
        `Invalid rate limit: capacity=${capacity}, refillRate=${refillRate}, maxConcurrent=${maxConcurrent}`,
      );
    }
    this.capacity = capacity;
    this.refillRate = refillRate;
    this.maxConcurrent = maxConcurrent;
    this.tokens = capacity; // Start with full bucket
    this.lastRefill = Date.now();
  }

  private refill(): void {
    const now = Date.now();
    const elapsedMs = now - this.lastRefill;
    const elapsedSeconds = elapsedMs / 1000;

    // Add tokens based on elapsed time
    const tokensToAdd = elapsedSeconds * this.refillRate;
    this.tokens = Math.min(this.capacity, this.tokens + tokensToAdd);
    this.lastRefill = now;
  }

  private canAdmit(): boolean {
    return this.tokens >= 1 && this.held.size < this.maxConcurrent;
  }

  private admit(): Permit {
    this.tokens -= 1;
    const permit: Permit = { id: this.nextPermitId++ };
    this.held.add(permit.id);
    return permit;
  }

  /**
   * Wait for a token and a free in-flight slot.
   * Rejects with CancelledError if the signal aborts while queued.
   */
  acquire(signal?: AbortSignal): Promise<Permit> {
    if (signal?.aborted) {
      return Promise.reject(new CancelledError("Cancelled while waiting for rate limiter"));
    }

    this.refill();
    if (this.waiters.length === 0 && this.canAdmit()) {
      return Promise.resolve(this.admit());
    }

    return new Promise<Permit>((resolve, reject) => {
      const onAbort = (): void => {
        const index = this.waiters.indexOf(waiter);
        if (index !== -1) this.waiters.splice(index, 1);
        reject(new CancelledError("Cancelled while waiting for rate limiter"));
        this.drain();
      };
      const waiter: Waiter = {
        resolve,
        cleanup: () => signal?.removeEventListener("abort", onAbort),
      };
      signal?.addEventListener("abort", onAbort, { once: true });
      this.waiters.push(waiter);
      this.schedule();
    });
  }

  release(permit: Permit): void {
    // Releasing twice is a no-op
    if (!this.held.delete(permit.id)) return;
    this.drain();
  }

  private drain(): void {
    this.refill();
    while (this.waiters.length > 0 && this.canAdmit()) {
      const waiter = this.waiters.shift();
      if (!waiter) break;
      waiter.cleanup();
      waiter.resolve(this.admit());
    }
    this.schedule();
  }

  // Only token starvation needs a timer; a full in-flight set drains on release
  private schedule(): void {
    if (this.timer || this.waiters.length === 0) return;
    if (this.tokens >= 1) return;

    const waitTimeMs = Math.ceil(((1 - this.tokens) / this.refillRate) * 1000);
    this.timer = setTimeout(() => {
      this.timer = null;
      this.drain();
    }, waitTimeMs);
  }

  tryConsume(count: number = 1): boolean {
    this.refill();

    if (this.waiters.length === 0 && this.tokens >= count) {
      this.tokens -= count;
      return true;
    }

    return false;
  }

  get availableTokens(): number {
    this.refill();
    return this.tokens;
  }

  // Callers queued for admission
  get pending(): number {
    return this.waiters.length;
  }

  // Permits currently held
  get active(): number {
    return this.held.size;
  }
}
