/**
 * Intermediate operators as sources, each propagating its input's size hint.
 */

import { done } from "@alternate/core";
import type { SizeHint, Source } from "@alternate/core";

export class MapSource<T, U> implements Source<U> {
  constructor(
    private readonly source: Source<T>,
    private readonly f: (value: T) => U,
  ) {}

  next(): IteratorResult<U, undefined> {
    const result = this.source.next();
    if (result.done) return result;
    return { done: false, value: this.f(result.value) };
  }

  sizeHint(): SizeHint {
    return this.source.sizeHint();
  }
}

export class FilterSource<T> implements Source<T> {
  constructor(
    private readonly source: Source<T>,
    private readonly predicate: (value: T) => boolean,
  ) {}

  next(): IteratorResult<T, undefined> {
    for (let result = this.source.next(); !result.done; result = this.source.next()) {
      if (this.predicate(result.value)) return result;
    }
    return done();
  }

  // Any item may be rejected
  sizeHint(): SizeHint {
    return [0, this.source.sizeHint()[1]];
  }
}

export class TakeSource<T> implements Source<T> {
  constructor(
    private readonly source: Source<T>,
    private remaining: number,
  ) {}

  next(): IteratorResult<T, undefined> {
    if (this.remaining <= 0) return done();
    const result = this.source.next();
    if (!result.done) this.remaining--;
    return result;
  }

  sizeHint(): SizeHint {
    if (this.remaining <= 0) return [0, 0];
    const [lower, upper] = this.source.sizeHint();
    return [Math.min(lower, this.remaining), Math.min(upper ?? this.remaining, this.remaining)];
  }
}
