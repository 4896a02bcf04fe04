/**
 * Alternation that drains the survivor in one uninterrupted run.
 */

import { checkedAdd, saturatingAdd } from "./bounds.js";
import { trace } from "./logger.js";
import { done, exactLength, from } from "./source.js";
import type { SizeHint, Source, SourceLike } from "./types.js";

type Turn = "left" | "right" | "drainLeft" | "drainRight" | "done";

/**
 * Pulls from `left` and `right` in turn, starting with `left`. When a side
 * is exhausted, the rest of the other side follows without gaps.
 *
 * Fused: after the first exhaustion signal neither source is pulled again
 * and every call signals exhaustion.
 *
 * @example
 * ```typescript
 * [...new AlternatingAll([1, 2], [3, 4, 5, 6])]; // [1, 3, 2, 4, 5, 6]
 * ```
 */
export class AlternatingAll<T> implements Source<T>, IterableIterator<T> {
  private readonly left: Source<T>;
  private readonly right: Source<T>;
  private turn: Turn = "left";

  constructor(left: SourceLike<T>, right: SourceLike<T>) {
    this.left = from(left);
    this.right = from(right);
  }

  next(): IteratorResult<T, undefined> {
    switch (this.turn) {
      case "left": {
        const result = this.left.next();
        if (!result.done) {
          this.turn = "right";
          return result;
        }
        trace("AlternatingAll", "left exhausted, draining right");
        this.turn = "drainRight";
        return this.drain(this.right);
      }

      case "right": {
        const result = this.right.next();
        if (!result.done) {
          this.turn = "left";
          return result;
        }
        trace("AlternatingAll", "right exhausted, draining left");
        this.turn = "drainLeft";
        return this.drain(this.left);
      }

      case "drainLeft":
        return this.drain(this.left);

      case "drainRight":
        return this.drain(this.right);

      case "done":
        return done();
    }
  }

  sizeHint(): SizeHint {
    switch (this.turn) {
      case "left":
      case "right": {
        const [leftLower, leftUpper] = this.left.sizeHint();
        const [rightLower, rightUpper] = this.right.sizeHint();
        const upper =
          leftUpper !== null && rightUpper !== null ? checkedAdd(leftUpper, rightUpper) : null;
        return [saturatingAdd(leftLower, rightLower), upper];
      }

      case "drainLeft":
        return this.left.sizeHint();

      case "drainRight":
        return this.right.sizeHint();

      case "done":
        return [0, 0];
    }
  }

  /** Remaining item count when both sides know theirs exactly, else `null` */
  len(): number | null {
    return exactLength(this);
  }

  [Symbol.iterator](): this {
    return this;
  }

  private drain(survivor: Source<T>): IteratorResult<T, undefined> {
    const result = survivor.next();
    if (result.done) {
      trace("AlternatingAll", "both sides exhausted");
      this.turn = "done";
    }
    return result;
  }
}
