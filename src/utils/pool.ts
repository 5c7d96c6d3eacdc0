import { CompletionBarrier } from "../core/barrier.js";
import { staticContext } from "../core/context.js";
import { WorkFailure, JobsFailedError } from "../core/errors.js";
import type { Future } from "../core/future.js";

/**
 * Process items in parallel with bounded concurrency.
 * Results preserve input order. Every launched item settles before this
 * returns; when items fail, the error of the earliest one in input order is
 * rethrown as the callback threw it.
 */
export async function poolMap<T, R>(
  items: readonly T[],
  fn: (item: T, index: number) => Promise<R>,
  concurrency: number,
): Promise<R[]> {
  const barrier = new CompletionBarrier(concurrency, staticContext(null));

  try {
    return await barrier.run(async (job) => {
      const futures: Future<R>[] = [];
      for (const [index, item] of items.entries()) {
        futures.push(await job.background(() => fn(item, index), { label: `item-${index}` }));
      }
      const results: R[] = [];
      for (const future of futures) {
        results.push(await future.read());
      }
      return results;
    });
  } catch (err) {
    throw unwrapFailure(err);
  }
}

function unwrapFailure(err: unknown): unknown {
  if (err instanceof WorkFailure) return err.cause;
  if (err instanceof JobsFailedError) return err.failures[0]?.cause;
  return err;
}
