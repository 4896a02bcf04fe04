/**
 * Entry points for creating sequences.
 *
 * `seq()` wraps any accepted input; `range()`, `repeat()`, `once()` and
 * `empty()` wrap the factory sources of @alternate/core.
 */

import * as sources from "@alternate/core";
import type { SourceLike } from "@alternate/core";
import { Seq } from "./seq.js";

/** Create a sequence from an array, iterable, iterator or source */
export function seq<T>(source: SourceLike<T>): Seq<T> {
  return new Seq(source);
}

/** Create a sequence over a numeric range [start, end) with optional step */
export function range(start: number, end: number, step: number = 1): Seq<number> {
  return new Seq(sources.range(start, end, step));
}

/** Create an infinite sequence that repeats a single value */
export function repeat<T>(value: T): Seq<T> {
  return new Seq(sources.repeat(value));
}

/** Create a sequence with exactly one value */
export function once<T>(value: T): Seq<T> {
  return new Seq(sources.once(value));
}

/** Create an empty sequence */
export function empty<T>(): Seq<T> {
  return new Seq(sources.empty<T>());
}
