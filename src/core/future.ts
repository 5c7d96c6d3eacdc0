import { FutureAlreadyWrittenError } from "./errors.js";

export type FutureState<T> =
  | { status: "pending" }
  | { status: "fulfilled"; value: T }
  | { status: "rejected"; reason: Error };

interface Waiter<T> {
  resolve: (value: T) => void;
  reject: (reason: Error) => void;
}

/**
 * Single-assignment result of a background job.
 *
 * The outcome is stored rather than held in a promise, so a failed future that
 * nobody reads never surfaces as an unhandled rejection.
 */
export class Future<T> {
  private state: FutureState<T> = { status: "pending" };
  private waiters: Waiter<T>[] = [];

  get settled(): boolean {
    return this.state.status !== "pending";
  }

  peek(): FutureState<T> {
    return this.state;
  }

  /**
   * Wait for the job's value. Repeated reads give the same value;
   * a failed job rejects every read with its WorkFailure.
   */
  read(): Promise<T> {
    const state = this.state;
    switch (state.status) {
      case "fulfilled": return Promise.resolve(state.value);
      case "rejected": return Promise.reject(state.reason);
      case "pending":
        return new Promise<T>((resolve, reject) => {
          this.waiters.push({ resolve, reject });
        });
    }
  }

  write(value: T): void {
    this.settle({ status: "fulfilled", value });
    for (const waiter of this.drainWaiters()) waiter.resolve(value);
  }

  fail(reason: Error): void {
    this.settle({ status: "rejected", reason });
    for (const waiter of this.drainWaiters()) waiter.reject(reason);
  }

  private settle(next: FutureState<T>): void {
    if (this.state.status !== "pending") throw new FutureAlreadyWrittenError();
    this.state = next;
  }

  private drainWaiters(): Waiter<T>[] {
    const waiters = this.waiters;
    this.waiters = [];
    return waiters;
  }
}
