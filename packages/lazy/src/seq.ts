/**
 * Chainable wrapper around a `Source`
 *
 * `Seq` adds method syntax on top of the adapters in @alternate/core.
 * Intermediate operations return a new `Seq` over a wrapped source and
 * pull nothing; terminal operations drive the source until its first
 * exhaustion signal.
 */

import {
  Alternating,
  AlternatingAll,
  AlternatingNoRemainder,
  count as countSource,
  from,
} from "@alternate/core";
import type { SizeHint, Source, SourceLike } from "@alternate/core";
import { FilterSource, MapSource, TakeSource } from "./operators.js";

/**
 * A lazy sequence with alternation and a few size-hint-aware operators.
 *
 * @example
 * ```typescript
 * const result = seq([1, 2, 3])
 *   .alternateWithAll([10, 20])
 *   .map(x => x * 2)
 *   .toArray(); // [2, 20, 4, 40, 6]
 * ```
 */
export class Seq<T> implements Source<T>, IterableIterator<T> {
  private readonly source: Source<T>;

  constructor(source: SourceLike<T>) {
    this.source = from(source);
  }

  next(): IteratorResult<T, undefined> {
    return this.source.next();
  }

  sizeHint(): SizeHint {
    return this.source.sizeHint();
  }

  [Symbol.iterator](): this {
    return this;
  }

  // ---------------------------------------------------------------------------
  // Alternation
  // ---------------------------------------------------------------------------

  /** See `Alternating` */
  alternateWith(other: SourceLike<T>): Seq<T> {
    return new Seq(new Alternating(this.source, other));
  }

  /** See `AlternatingAll` */
  alternateWithAll(other: SourceLike<T>): Seq<T> {
    return new Seq(new AlternatingAll(this.source, other));
  }

  /** See `AlternatingNoRemainder` */
  alternateWithNoRemainder(other: SourceLike<T>): Seq<T> {
    return new Seq(new AlternatingNoRemainder(this.source, other));
  }

  // ---------------------------------------------------------------------------
  // Intermediate operations
  // ---------------------------------------------------------------------------

  /** Transform each element */
  map<U>(f: (value: T) => U): Seq<U> {
    return new Seq(new MapSource(this.source, f));
  }

  /** Keep only elements that satisfy the predicate */
  filter(predicate: (value: T) => boolean): Seq<T> {
    return new Seq(new FilterSource(this.source, predicate));
  }

  /** Take at most `count` elements */
  take(count: number): Seq<T> {
    if (!Number.isInteger(count) || count < 0) {
      throw new RangeError(`take() count must be a non-negative integer, got ${count}`);
    }
    return new Seq(new TakeSource(this.source, count));
  }

  // ---------------------------------------------------------------------------
  // Terminal operations
  // ---------------------------------------------------------------------------

  /** Collect all results into an array */
  toArray(): T[] {
    const result: T[] = [];
    for (const value of this) {
      result.push(value);
    }
    return result;
  }

  /** Count the number of elements */
  count(): number {
    return countSource(this.source);
  }

  /** Fold elements left-to-right into a single value */
  reduce<Acc>(f: (acc: Acc, value: T) => Acc, init: Acc): Acc {
    let acc = init;
    for (const value of this) {
      acc = f(acc, value);
    }
    return acc;
  }

  /** Execute a side effect for each element */
  forEach(f: (value: T) => void): void {
    for (const value of this) {
      f(value);
    }
  }

  /** First element, or null if empty */
  first(): T | null {
    const result = this.source.next();
    return result.done ? null : result.value;
  }

  /** Last element, or null if empty */
  last(): T | null {
    let result: T | null = null;
    for (const value of this) {
      result = value;
    }
    return result;
  }

  /** Find the first element matching the predicate */
  find(predicate: (value: T) => boolean): T | null {
    for (const value of this) {
      if (predicate(value)) return value;
    }
    return null;
  }
}
