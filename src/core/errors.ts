/**
 * Thrown when a concurrency limit is not a positive integer.
 * Raised before any semaphore or job exists.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/**
 * A background job that threw or rejected. The original error is kept as `cause`.
 */
export class WorkFailure extends Error {
  constructor(public readonly jobId: number, public readonly label: string, cause: unknown) {
    super(`Background job ${label} failed: ${describeCause(cause)}`, { cause });
    this.name = "WorkFailure";
  }
}

/**
 * Raised by a barrier when more than one of its jobs failed.
 */
export class JobsFailedError extends Error {
  constructor(public readonly failures: readonly WorkFailure[]) {
    super(`${failures.length} background jobs failed: ${failures.map((f) => f.label).join(", ")}`);
    this.name = "JobsFailedError";
  }
}

export class FutureAlreadyWrittenError extends Error {
  constructor() {
    super("Future has already been settled");
    this.name = "FutureAlreadyWrittenError";
  }
}

export class SlotReleaseError extends Error {
  constructor(capacity: number) {
    super(`Semaphore released more often than acquired (capacity ${capacity})`);
    this.name = "SlotReleaseError";
  }
}

export class BarrierStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BarrierStateError";
  }
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/**
 * Validate a concurrency limit, failing fast with a ConfigurationError.
 */
export function assertValidLimit(limit: number, what = "limit"): void {
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new ConfigurationError(`expected ${what} to be a positive integer, got ${limit}`);
  }
}
