export { CompletionBarrier, jobs, type BarrierOptions, type BarrierState, type JobsOptions } from "./core/barrier.js";
export { JobLauncher, type BackgroundOptions, type FailureListener } from "./core/launcher.js";
export { Future, type FutureState } from "./core/future.js";
export { Semaphore } from "./core/semaphore.js";
export { staticContext, type Awaitable, type ContextSource, type Work } from "./core/context.js";
export {
  BarrierStateError,
  ConfigurationError,
  FutureAlreadyWrittenError,
  JobsFailedError,
  SlotReleaseError,
  WorkFailure,
} from "./core/errors.js";
export { Shell, CommandFailedError, type CommandResult, type ShellState } from "./shell/shell.js";
export { poolMap } from "./utils/pool.js";
