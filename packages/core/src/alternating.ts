/**
 * Alternation that keeps taking turns after a side runs dry.
 */

import { checkedDoublePlusBonus, pairFor, saturatingDoublePlusBonus } from "./bounds.js";
import { from } from "./source.js";
import type { SizeHint, Source, SourceLike } from "./types.js";

type Turn = "left" | "right";

/**
 * Pulls from `left` and `right` in turn, starting with `left`.
 *
 * Every call hands the turn to the other side, whatever the current side
 * returned. Once one side is exhausted its turns produce the exhaustion
 * signal, so the survivor's remaining items come out on every other call.
 *
 * Exhaustion is therefore **not** sticky: an exhaustion signal may be
 * followed by more items. `for...of` stops at the first one.
 *
 * @example
 * ```typescript
 * const it = new Alternating([1, 2], [3, 4, 5]);
 * [...it];   // [1, 3, 2, 4]
 * it.next(); // { done: false, value: 5 }
 * ```
 */
export class Alternating<T> implements Source<T>, IterableIterator<T> {
  private readonly left: Source<T>;
  private readonly right: Source<T>;
  private turn: Turn = "left";

  constructor(left: SourceLike<T>, right: SourceLike<T>) {
    this.left = from(left);
    this.right = from(right);
  }

  next(): IteratorResult<T, undefined> {
    if (this.turn === "left") {
      const result = this.left.next();
      this.turn = "right";
      return result;
    }
    const result = this.right.next();
    this.turn = "left";
    return result;
  }

  /** Bounds on the items produced before the next exhaustion signal */
  sizeHint(): SizeHint {
    const [leftLower, leftUpper] = this.left.sizeHint();
    const [rightLower, rightUpper] = this.right.sizeHint();
    const lastWasLeft = this.turn === "right";

    const lower = saturatingDoublePlusBonus(pairFor(leftLower, rightLower, lastWasLeft));

    let upper: number | null;
    if (leftUpper !== null && rightUpper !== null) {
      upper = checkedDoublePlusBonus(pairFor(leftUpper, rightUpper, lastWasLeft));
    } else if (leftUpper !== null) {
      // Right never ends: it also fills the turn after left's last item
      upper = checkedDoublePlusBonus([leftUpper, lastWasLeft]);
    } else if (rightUpper !== null) {
      upper = checkedDoublePlusBonus([rightUpper, !lastWasLeft]);
    } else {
      upper = null;
    }

    return [lower, upper];
  }

  [Symbol.iterator](): this {
    return this;
  }
}
