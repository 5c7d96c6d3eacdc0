import { assertValidLimit, BarrierStateError, JobsFailedError, WorkFailure } from "./errors.js";
import { Semaphore } from "./semaphore.js";
import { JobLauncher, type FailureListener } from "./launcher.js";
import { Shell } from "../shell/shell.js";
import type { Awaitable, ContextSource } from "./context.js";

export type BarrierState = "created" | "open" | "draining" | "closed";

export interface BarrierOptions {
  /** Called once per failed job, as soon as it fails. */
  onFailure?: FailureListener;
}

export interface JobsOptions extends BarrierOptions {
  /** Context captured for every job. Defaults to a Shell over the current process. */
  shell?: Shell;
}

/**
 * Scope that owns a semaphore of `limit` slots and does not finish until
 * every job launched through it has finished.
 *
 * Used once: created -> open -> draining -> closed.
 */
export class CompletionBarrier<C> {
  readonly limit: number;
  private readonly semaphore: Semaphore;
  private readonly launcher: JobLauncher<C>;
  private readonly options: BarrierOptions;
  private readonly failures: WorkFailure[] = [];
  private listenerError: { error: unknown } | undefined;
  private current: BarrierState = "created";

  constructor(limit: number, context: ContextSource<C>, options: BarrierOptions = {}) {
    assertValidLimit(limit);
    this.limit = limit;
    this.options = options;
    this.semaphore = new Semaphore(limit);
    this.launcher = new JobLauncher(this.semaphore, context, (failure) => this.recordFailure(failure));
  }

  get state(): BarrierState {
    return this.current;
  }

  /** Failures recorded so far, in the order they happened. */
  get failed(): readonly WorkFailure[] {
    return this.failures;
  }

  async run<R>(logic: (job: JobLauncher<C>) => Awaitable<R>): Promise<R> {
    if (this.current !== "created") {
      throw new BarrierStateError(`Barrier already used (state: ${this.current})`);
    }
    this.current = "open";

    let outcome: { ok: true; value: R } | { ok: false; error: unknown };
    try {
      outcome = { ok: true, value: await logic(this.launcher) };
    } catch (error) {
      outcome = { ok: false, error };
    }

    this.current = "draining";
    await this.launcher.drain({ close: true });
    if (this.semaphore.peekAvailable() !== this.limit) {
      throw new BarrierStateError(
        `Barrier drained with ${this.limit - this.semaphore.peekAvailable()} slot(s) still held`,
      );
    }
    this.current = "closed";

    if (!outcome.ok) throw outcome.error;
    if (this.listenerError) throw this.listenerError.error;
    if (this.failures.length === 1) throw this.failures[0];
    if (this.failures.length > 1) throw new JobsFailedError([...this.failures]);
    return outcome.value;
  }

  private recordFailure(failure: WorkFailure): void {
    this.failures.push(failure);
    if (!this.options.onFailure) return;
    try {
      this.options.onFailure(failure);
    } catch (error) {
      this.listenerError ??= { error };
    }
  }
}

/**
 * Open a barrier of `limit` slots whose jobs run under copies of a Shell.
 *
 *     await jobs(2, async (job) => {
 *       const build = await job.background((sh) => sh.exec("make"));
 *       await job.background((sh) => sh.exec("make docs"));
 *       return build.read();
 *     });
 */
export async function jobs<R>(
  limit: number,
  logic: (job: JobLauncher<Shell>) => Awaitable<R>,
  options: JobsOptions = {},
): Promise<R> {
  assertValidLimit(limit);
  const { shell, ...barrierOptions } = options;
  const barrier = new CompletionBarrier(limit, shell ?? Shell.fromProcess(), barrierOptions);
  return barrier.run(logic);
}
