/**
 * Strict alternation that stops at the first exhausted side.
 */

import { checkedDoublePlusBonus, pairFor, saturatingDoublePlusBonus } from "./bounds.js";
import { trace } from "./logger.js";
import { done, from } from "./source.js";
import type { SizeHint, Source, SourceLike } from "./types.js";

type Turn = "left" | "right" | "done";

/**
 * Pulls from `left` and `right` in turn, starting with `left`, and stops for
 * good as soon as the side whose turn it is comes up empty. The other side's
 * remaining items are discarded.
 *
 * The order of the inputs matters. With `small = [1, 2]` and
 * `big = [3, 4, 5]`:
 *
 * ```txt
 * small: 1 2 <end>        big: 3 4 5
 *        |/|/                  |/|/|
 *   big: 3 4            small: 1 2 <end>
 * ```
 *
 * `small` first yields 4 items, `big` first yields 5.
 */
export class AlternatingNoRemainder<T> implements Source<T>, IterableIterator<T> {
  private readonly left: Source<T>;
  private readonly right: Source<T>;
  private turn: Turn = "left";

  constructor(left: SourceLike<T>, right: SourceLike<T>) {
    this.left = from(left);
    this.right = from(right);
  }

  next(): IteratorResult<T, undefined> {
    if (this.turn === "done") return done();

    const due = this.turn;
    const result = due === "left" ? this.left.next() : this.right.next();
    if (result.done) {
      trace("AlternatingNoRemainder", `${due} exhausted, stopping`);
      this.turn = "done";
      return result;
    }

    this.turn = due === "left" ? "right" : "left";
    return result;
  }

  sizeHint(): SizeHint {
    if (this.turn === "done") return [0, 0];

    const [leftLower, leftUpper] = this.left.sizeHint();
    const [rightLower, rightUpper] = this.right.sizeHint();
    const lastWasLeft = this.turn === "right";

    const lower = saturatingDoublePlusBonus(pairFor(leftLower, rightLower, lastWasLeft));

    let upper: number | null = null;
    if (leftUpper !== null && rightUpper !== null) {
      upper = checkedDoublePlusBonus(pairFor(leftUpper, rightUpper, lastWasLeft));
    } else if (leftUpper !== null) {
      upper = checkedDoublePlusBonus([leftUpper, lastWasLeft]);
    } else if (rightUpper !== null) {
      upper = checkedDoublePlusBonus([rightUpper, !lastWasLeft]);
    }

    return [lower, upper];
  }

  [Symbol.iterator](): this {
    return this;
  }
}
