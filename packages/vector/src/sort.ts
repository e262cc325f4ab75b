/**
 * In-place sorting of slot ranges.
 *
 * `quicksort` is iterative: pending sub-ranges live on a fixed-capacity work
 * stack instead of the call stack. The larger side of every partition is
 * deferred and the smaller one processed next, so at most `ceil(log2 n)`
 * ranges are pending. Not stable.
 */

import type { Comparator } from "@vecta/std";
import type { SlotBuffer } from "./buffer.js";

export type LessThan<T> = (a: T, b: T) => boolean;

const SEED = 31;
const LCG_MULTIPLIER = 69069;

/** 32-bit linear congruential step. */
function nextSeed(seed: number): number {
  return (Math.imul(seed, LCG_MULTIPLIER) + 1) >>> 0;
}

export function insertionSort<T>(a: SlotBuffer<T>, lo: number, hi: number, lessThan: LessThan<T>): void {
  for (let i = lo + 1; i < hi; i++) {
    const item = a[i];
    let j = i;
    while (j > lo && lessThan(item, a[j - 1])) {
      a[j] = a[j - 1];
      j--;
    }
    a[j] = item;
  }
}

/**
 * Hoare partition of `[lo, hi)` around `pivot`. Returns `mid` such that every
 * element of `[lo, mid)` is `<= pivot` and every element of `[mid, hi)` is
 * `>= pivot`; `lo < mid <= hi`. `mid === hi` only when `a[hi - 1]` is a
 * maximum of the range.
 */
function partition<T>(a: SlotBuffer<T>, lo: number, hi: number, pivot: T, lessThan: LessThan<T>): number {
  let i = lo - 1;
  let j = hi;
  for (;;) {
    do i++;
    while (lessThan(a[i], pivot));
    do j--;
    while (lessThan(pivot, a[j]));
    if (i >= j) return j + 1;

    const tmp = a[i];
    a[i] = a[j];
    a[j] = tmp;
  }
}

export interface QuicksortOptions {
  /** Capacity of the work stack. */
  readonly stackDepth: number;
  /** Called when the stack is full; the current range is insertion-sorted. */
  readonly onOverflow?: (rangeLength: number) => void;
}

/**
 * Sort `a[start, end)` with a randomized iterative quicksort. The pivot of
 * each range `[lo, hi)` is `a[lo + seed % (hi - lo)]`, with the seed reset
 * to 31 on every call.
 */
export function quicksort<T>(
  a: SlotBuffer<T>,
  start: number,
  end: number,
  lessThan: LessThan<T>,
  options: QuicksortOptions,
): void {
  const { stackDepth, onOverflow } = options;
  const pendingLo: number[] = [];
  const pendingHi: number[] = [];
  let pos = 0;
  let seed = SEED;
  let lo = start;
  let hi = end;

  for (;;) {
    while (lo + 1 < hi) {
      if (pos === stackDepth) {
        onOverflow?.(hi - lo);
        insertionSort(a, lo, hi, lessThan);
        break;
      }

      const pivot = a[lo + (seed % (hi - lo))];
      seed = nextSeed(seed);
      const mid = partition(a, lo, hi, pivot, lessThan);
      if (mid === hi) {
        // a[hi - 1] is already in place
        hi--;
        continue;
      }

      if (mid - lo < hi - mid) {
        pendingLo[pos] = mid;
        pendingHi[pos] = hi;
        hi = mid;
      } else {
        pendingLo[pos] = lo;
        pendingHi[pos] = mid;
        lo = mid;
      }
      pos++;
    }

    if (pos === 0) return;
    pos--;
    lo = pendingLo[pos];
    hi = pendingHi[pos];
  }
}

/**
 * Sort `a[start, end)` with the platform sort under a three-way comparator.
 */
export function sortWith<T>(a: SlotBuffer<T>, start: number, end: number, cmp: Comparator<T>): void {
  const items: T[] = [];
  for (let i = start; i < end; i++) items.push(a[i]);
  items.sort(cmp);
  for (let i = 0; i < items.length; i++) a[start + i] = items[i];
}
