import { expect } from "vitest";
import { done } from "../source.js";
import type { SizeHint, Source } from "../types.js";

export const DEFAULT_ATTEMPTS = 10;

/** Assert that the next `attempts` pulls all signal exhaustion */
export function noMore(source: Source<unknown>, attempts: number = DEFAULT_ATTEMPTS): void {
  for (let i = 0; i < attempts; i++) {
    expect(source.next(), `pull ${i}`).toEqual({ done: true, value: undefined });
  }
}

export function item<T>(value: T): IteratorYieldResult<T> {
  return { done: false, value };
}

/**
 * A source that yields `first`, signals exhaustion once, then yields
 * `after` forever. Useful for checking that an adapter never resumes.
 */
export function flaky<T>(first: T, after: T): Source<T> {
  let calls = 0;
  return {
    next(): IteratorResult<T, undefined> {
      calls++;
      if (calls === 1) return item(first);
      if (calls === 2) return done();
      return item(after);
    },
    sizeHint(): SizeHint {
      return [0, null];
    },
  };
}

/** Wrap a source and count how many times it was pulled */
export function counted<T>(source: Source<T>): { source: Source<T>; pulls: () => number } {
  let pulls = 0;
  return {
    source: {
      next() {
        pulls++;
        return source.next();
      },
      sizeHint() {
        return source.sizeHint();
      },
    },
    pulls: () => pulls,
  };
}

/** `[0, 1, ..., n - 1]` */
export function upTo(n: number): number[] {
  return Array.from({ length: n }, (_, i) => i);
}

/** A source that throws on its first pull, then yields `items` */
export function throwsOnce<T>(items: readonly T[]): Source<T> {
  let calls = 0;
  return {
    next(): IteratorResult<T, undefined> {
      calls++;
      if (calls === 1) throw new Error("source failed");
      const index = calls - 2;
      return index < items.length ? item(items[index]) : done();
    },
    sizeHint(): SizeHint {
      return [0, null];
    },
  };
}
