/**
 * Shared types for @alternate/core
 *
 * A `Source` is the pull capability every adapter consumes and implements:
 * one `next()` that yields an item or signals exhaustion, plus a size hint
 * describing how many items may remain.
 */

/**
 * Bounds on the number of items a source may still produce.
 *
 * `upper` is `null` when the source is unbounded, when the bound is unknown,
 * or when it cannot be represented as a count no larger than `MAX_COUNT`.
 */
export type SizeHint = readonly [lower: number, upper: number | null];

/** A lower bound paired with a flag granting one extra item */
export type BoundPair = readonly [min: number, bonus: boolean];

/** A pull-based producer of items with a size estimate */
export interface Source<T> {
  next(): IteratorResult<T, undefined>;
  sizeHint(): SizeHint;
}

/** Anything an adapter accepts as one of its two inputs */
export type SourceLike<T> = Source<T> | Iterable<T> | Iterator<T>;
