/**
 * @alternate/core — Interleave two sequences into one
 *
 * Three adapters that take turns pulling from a left and a right source,
 * differing only in what happens once one side runs out:
 *
 * | Adapter                  | After one side is exhausted                          |
 * |--------------------------|------------------------------------------------------|
 * | `Alternating`            | keeps taking turns; the survivor every other call    |
 * | `AlternatingAll`         | the survivor's remaining items, back to back         |
 * | `AlternatingNoRemainder` | stops for good                                       |
 *
 * Every adapter is itself a `Source`, so adapters nest and their size hints
 * compose.
 *
 * @example
 * ```typescript
 * import { AlternatingAll, range } from "@alternate/core";
 *
 * const it = new AlternatingAll(["a", "b"], ["x", "y", "z"]);
 * [...it]; // ["a", "x", "b", "y", "z"]
 *
 * new AlternatingAll(range(0, 3), range(10, 12)).sizeHint(); // [5, 5]
 * ```
 */

export { Alternating } from "./alternating.js";
export { AlternatingAll } from "./alternating-all.js";
export { AlternatingNoRemainder } from "./alternating-no-remainder.js";

export { from, isSource, done, exactLength, count } from "./source.js";
export { range, repeat, once, empty } from "./sources.js";

export {
  MAX_COUNT,
  pairFor,
  saturatingDoublePlusBonus,
  checkedDoublePlusBonus,
  saturatingAdd,
  checkedAdd,
} from "./bounds.js";

export { config } from "./config.js";
export type { AlternateConfig } from "./config.js";
export { SourceError } from "./errors.js";
export type { SourceErrorReason } from "./errors.js";

export type { SizeHint, BoundPair, Source, SourceLike } from "./types.js";
