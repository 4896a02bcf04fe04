/**
 * Factory sources with precise size hints.
 *
 * `range()` counts its items up front, so its hint is exact while the
 * remaining count fits in `MAX_COUNT`;
 * `repeat()` never ends and reports `[MAX_COUNT, null]`.
 */

import { MAX_COUNT } from "./bounds.js";
import { done } from "./source.js";
import type { SizeHint, Source } from "./types.js";

/** A numeric source over [start, end) with optional step */
export function range(start: number, end: number, step: number = 1): Source<number> {
  if (step === 0) throw new RangeError("range() step must not be zero");
  return new RangeSource(start, end, step);
}

/** An infinite source that repeats a single value */
export function repeat<T>(value: T): Source<T> {
  return new RepeatSource(value);
}

/** A source yielding exactly one value */
export function once<T>(value: T): Source<T> {
  return new OnceSource(value);
}

/** A source with no items */
export function empty<T>(): Source<T> {
  return new EmptySource<T>();
}

// ---------------------------------------------------------------------------
// Internal source classes
// ---------------------------------------------------------------------------

class RangeSource implements Source<number> {
  private readonly total: number;
  private index = 0;

  constructor(
    private readonly start: number,
    end: number,
    private readonly step: number,
  ) {
    const total = Math.ceil((end - start) / step);
    this.total = total > 0 ? total : 0;
  }

  next(): IteratorResult<number, undefined> {
    if (this.index >= this.total) return done();
    const value = this.start + this.index * this.step;
    this.index++;
    return { done: false, value };
  }

  sizeHint(): SizeHint {
    const remaining = this.total - this.index;
    if (remaining > MAX_COUNT) return [MAX_COUNT, null];
    return [remaining, remaining];
  }
}

class RepeatSource<T> implements Source<T> {
  constructor(private readonly value: T) {}

  next(): IteratorResult<T, undefined> {
    return { done: false, value: this.value };
  }

  sizeHint(): SizeHint {
    return [MAX_COUNT, null];
  }
}

class OnceSource<T> implements Source<T> {
  private taken = false;

  constructor(private readonly value: T) {}

  next(): IteratorResult<T, undefined> {
    if (this.taken) return done();
    this.taken = true;
    return { done: false, value: this.value };
  }

  sizeHint(): SizeHint {
    return this.taken ? [0, 0] : [1, 1];
  }
}

class EmptySource<T> implements Source<T> {
  next(): IteratorResult<T, undefined> {
    return done();
  }

  sizeHint(): SizeHint {
    return [0, 0];
  }
}
