import type { ReadonlySlotBuffer } from "./buffer.js";
import type { LessThan } from "./sort.js";

/**
 * Leftmost lower bound of `item` in the sorted prefix `a[0, count)`: the
 * first index `i` with `!(a[i] < item)`, or `count`.
 *
 * Halves the window while it holds more than `linearThreshold` elements,
 * then scans it linearly. Callers derive the threshold from the cache line
 * size so the final scan stays within one line.
 */
export function lowerBound<T>(
  a: ReadonlySlotBuffer<T>,
  count: number,
  item: T,
  lessThan: LessThan<T>,
  linearThreshold: number,
): number {
  let l = 0;
  let r = count;

  while (r - l > linearThreshold) {
    const m = l + Math.floor((r - l) / 2);
    if (lessThan(a[m], item)) {
      l = m + 1;
    } else {
      r = m;
    }
  }

  while (l < r && lessThan(a[l], item)) l++;
  return l;
}
