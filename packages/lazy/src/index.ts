/**
 * @alternate/lazy — Method syntax for alternating sequences
 *
 * @example
 * ```typescript
 * import { seq, range } from "@alternate/lazy";
 *
 * seq(["a", "b"]).alternateWith(["x", "y", "z"]).toArray(); // ["a", "x", "b", "y"]
 *
 * range(0, 3).alternateWithNoRemainder(range(10, 20)).toArray(); // [0, 10, 1, 11, 2, 12]
 * ```
 */

export { Seq } from "./seq.js";
export { seq, range, repeat, once, empty } from "./seq-entry.js";
export { MapSource, FilterSource, TakeSource } from "./operators.js";
