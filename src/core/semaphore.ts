import { assertValidLimit, SlotReleaseError } from "./errors.js";

/**
 * Counting semaphore bounding how many jobs hold a slot at once.
 *
 * Waiters are served in arrival order. A released slot goes straight to the
 * oldest waiter, so `available` only grows when nobody is queued.
 */
export class Semaphore {
  readonly capacity: number;
  private available: number;
  private readonly waiters: Array<() => void> = [];

  constructor(capacity: number) {
    assertValidLimit(capacity, "capacity");
    this.capacity = capacity;
    this.available = capacity;
  }

  /** Resolves once a slot has been taken for the caller. */
  acquire(): Promise<void> {
    if (this.tryAcquire()) return Promise.resolve();
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /** Take a slot if one is free right now. */
  tryAcquire(): boolean {
    if (this.available === 0 || this.waiters.length > 0) return false;
    this.available--;
    return true;
  }

  release(): void {
    const next = this.waiters.shift();
    if (next) {
      next();
      return;
    }
    if (this.available >= this.capacity) {
      throw new SlotReleaseError(this.capacity);
    }
    this.available++;
  }

  /** Current free slots. Stale as soon as the caller yields. */
  peekAvailable(): number {
    return this.available;
  }

  /** Number of callers queued in acquire(). */
  get waiting(): number {
    return this.waiters.length;
  }
}
