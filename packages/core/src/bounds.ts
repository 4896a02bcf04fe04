/**
 * Overflow-safe arithmetic for combining size hints.
 *
 * Counts never exceed `MAX_COUNT`. Saturating operations clamp to it;
 * checked operations return `null` when the exact result would not fit.
 */

import type { BoundPair } from "./types.js";

/** Largest count a size hint can carry */
export const MAX_COUNT = Number.MAX_SAFE_INTEGER;

/**
 * Pick the shorter of two remaining counts and decide whether the longer
 * side earns one extra item.
 *
 * Strict alternation can emit at most twice the shorter count. The longer
 * side gets one more turn exactly when it is due before the shorter side
 * comes round again.
 */
export function pairFor(left: number, right: number, lastWasLeft: boolean): BoundPair {
  if (left < right) return [left, lastWasLeft];
  if (left > right) return [right, !lastWasLeft];
  return [left, false];
}

/** `2m + bonus`, clamped to `MAX_COUNT` */
export function saturatingDoublePlusBonus([min, bonus]: BoundPair): number {
  const doubled = min * 2;
  if (doubled >= MAX_COUNT) return MAX_COUNT;
  return bonus ? doubled + 1 : doubled;
}

/** `2m + bonus`, or `null` if it exceeds `MAX_COUNT` */
export function checkedDoublePlusBonus([min, bonus]: BoundPair): number | null {
  const doubled = min * 2;
  if (doubled > MAX_COUNT) return null;
  const total = bonus ? doubled + 1 : doubled;
  return total > MAX_COUNT ? null : total;
}

export function saturatingAdd(a: number, b: number): number {
  const total = a + b;
  return total > MAX_COUNT ? MAX_COUNT : total;
}

export function checkedAdd(a: number, b: number): number | null {
  const total = a + b;
  return total > MAX_COUNT ? null : total;
}
