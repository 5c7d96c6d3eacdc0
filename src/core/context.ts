/**
 * Supplies the state a background job runs under.
 * Each capture must be independent of the source and of earlier captures.
 */
export interface ContextSource<C> {
  capture(): C;
}

export type Awaitable<T> = T | Promise<T>;

/** A unit of work: receives its captured context, produces a value or throws. */
export type Work<C, T> = (context: C) => Awaitable<T>;

/**
 * Context source for plain data. Every capture is a deep copy of `value`.
 */
export function staticContext<C>(value: C): ContextSource<C> {
  return {
    capture: () => structuredClone(value),
  };
}
