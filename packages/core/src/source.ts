/**
 * Conversion of arrays, collections, iterables and iterators into `Source`s.
 *
 * Arrays and keyed collections know how many items they hold, so their
 * sources report exact hints. Everything else reports `[0, null]`.
 */

import { SourceError } from "./errors.js";
import type { SizeHint, Source, SourceLike } from "./types.js";

/** The exhaustion signal */
export function done(): IteratorReturnResult<undefined> {
  return { done: true, value: undefined };
}

/** Turn any accepted input into a `Source`. Sources pass through unchanged. */
export function from<T>(input: SourceLike<T>): Source<T> {
  if (isSource(input)) return input;
  if (isArray(input)) return new ArraySource(input);
  if (isSized(input)) return new CollectionSource(input);
  if (isIterable(input)) return new IteratorSource(input[Symbol.iterator]());
  if (isIterator(input)) return new IteratorSource(input);
  throw new SourceError(
    "not_iterable",
    `Expected an iterable, an iterator or a source, got ${describe(input)}`,
  );
}

export function isSource<T>(input: SourceLike<T>): input is Source<T> {
  return (
    typeof property(input, "sizeHint") === "function" &&
    typeof property(input, "next") === "function"
  );
}

/** Remaining item count when the hint is exact, otherwise `null` */
export function exactLength(source: Source<unknown>): number | null {
  const [lower, upper] = source.sizeHint();
  return upper === lower ? lower : null;
}

/** Pull until the first exhaustion signal and return how many items came out */
export function count(source: Source<unknown>): number {
  let n = 0;
  while (!source.next().done) n++;
  return n;
}

// ---------------------------------------------------------------------------
// Source implementations
// ---------------------------------------------------------------------------

class ArraySource<T> implements Source<T> {
  private index = 0;

  constructor(private readonly items: readonly T[]) {}

  next(): IteratorResult<T, undefined> {
    if (this.index >= this.items.length) return done();
    const value = this.items[this.index];
    this.index++;
    return { done: false, value };
  }

  sizeHint(): SizeHint {
    const remaining = Math.max(0, this.items.length - this.index);
    return [remaining, remaining];
  }
}

class CollectionSource<T> implements Source<T> {
  private readonly iterator: Iterator<T>;
  private pulled = 0;
  private finished = false;

  constructor(private readonly collection: Iterable<T> & { readonly size: number }) {
    this.iterator = collection[Symbol.iterator]();
  }

  next(): IteratorResult<T, undefined> {
    if (this.finished) return done();
    const result = this.iterator.next();
    if (result.done) {
      this.finished = true;
      return done();
    }
    this.pulled++;
    return result;
  }

  sizeHint(): SizeHint {
    if (this.finished) return [0, 0];
    const remaining = Math.max(0, this.collection.size - this.pulled);
    return [remaining, remaining];
  }
}

class IteratorSource<T> implements Source<T> {
  constructor(private readonly iterator: Iterator<T>) {}

  next(): IteratorResult<T, undefined> {
    const result = this.iterator.next();
    return result.done ? done() : result;
  }

  sizeHint(): SizeHint {
    return [0, null];
  }
}

// ---------------------------------------------------------------------------
// Guards
// ---------------------------------------------------------------------------

function property(value: unknown, key: PropertyKey): unknown {
  if (typeof value === "function" || (typeof value === "object" && value !== null)) {
    return Reflect.get(value, key);
  }
  return undefined;
}

function isArray<T>(input: SourceLike<T>): input is readonly T[] {
  return Array.isArray(input);
}

function isSized<T>(input: SourceLike<T>): input is Iterable<T> & { readonly size: number } {
  return input instanceof Set || input instanceof Map;
}

function isIterable<T>(input: SourceLike<T>): input is Iterable<T> {
  return typeof input === "string" || typeof property(input, Symbol.iterator) === "function";
}

function isIterator<T>(input: SourceLike<T>): input is Iterator<T> {
  return typeof property(input, "next") === "function";
}

function describe(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}
