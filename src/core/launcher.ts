import { setImmediate as yieldToLoop } from "node:timers/promises";
import { BarrierStateError, WorkFailure } from "./errors.js";
import { Future } from "./future.js";
import type { Semaphore } from "./semaphore.js";
import type { ContextSource, Work } from "./context.js";

export interface BackgroundOptions {
  /** Name used in failure messages. Defaults to `job-<id>`. */
  label?: string;
}

export type FailureListener = (failure: WorkFailure) => void;

/**
 * Starts jobs on behalf of one completion barrier.
 *
 * Every launch is tracked from the moment `background` is called, including
 * launches still queued for a slot, so `drain()` cannot miss outstanding work.
 */
export class JobLauncher<C> {
  private readonly inFlight = new Set<Promise<void>>();
  private nextId = 1;
  private closed = false;

  constructor(
    private readonly semaphore: Semaphore,
    private readonly context: ContextSource<C>,
    private readonly onFailure: FailureListener,
  ) {}

  /** Slots currently held by jobs. */
  get running(): number {
    return this.semaphore.capacity - this.semaphore.peekAvailable();
  }

  /** Launches not yet finished, queued ones included. */
  get pending(): number {
    return this.inFlight.size;
  }

  /**
   * Run `work` in the background under a snapshot of the current context.
   *
   * Resolves with the job's Future as soon as a slot is held; when every slot
   * is taken this waits for one to free up, which throttles the caller.
   */
  background<T>(work: Work<C, T>, options: BackgroundOptions = {}): Promise<Future<T>> {
    if (this.closed) {
      return Promise.reject(new BarrierStateError("Cannot launch a background job after its barrier has closed"));
    }

    let snapshot: C;
    try {
      snapshot = this.context.capture();
    } catch (err) {
      return Promise.reject(err);
    }

    const jobId = this.nextId++;
    const label = options.label ?? `job-${jobId}`;
    const acquired = this.semaphore.acquire();
    const future = new Future<T>();

    const task: Promise<void> = acquired
      .then(() => this.execute(jobId, label, snapshot, work, future))
      .finally(() => {
        this.inFlight.delete(task);
      });
    this.inFlight.add(task);

    return acquired.then(() => future);
  }

  /**
   * Wait for every launch, including ones started while draining.
   * With `close`, further launches are refused from the same tick the
   * last in-flight check passes.
   */
  async drain(options: { close?: boolean } = {}): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(this.inFlight);
    }
    if (options.close) this.closed = true;
  }

  close(): void {
    this.closed = true;
  }

  private async execute<T>(
    jobId: number,
    label: string,
    snapshot: C,
    work: Work<C, T>,
    future: Future<T>,
  ): Promise<void> {
    try {
      await yieldToLoop();
      const value = await work(snapshot);
      future.write(value);
    } catch (err) {
      const failure = new WorkFailure(jobId, label, err);
      if (!future.settled) future.fail(failure);
      this.onFailure(failure);
    } finally {
      this.semaphore.release();
    }
  }
}
