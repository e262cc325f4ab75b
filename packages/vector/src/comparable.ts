/**
 * ComparableVector<T>: ordered search, sorted insertion and in-place
 * quicksort over an injected `Ord<T>`. Every routine runs on the strict
 * order `ord.lessThan`.
 */

import { createLogger } from "@vecta/core";
import type { Option } from "@vecta/std";
import { EquatableVector } from "./equatable.js";
import { lowerBound } from "./search.js";
import { quicksort, type LessThan } from "./sort.js";
import type { SortedInsertResult, VecStatus } from "./status.js";
import type { ComparableTraits } from "./traits.js";

const log = createLogger("sort");

export class ComparableVector<T> extends EquatableVector<T> {
  private readonly lessThan: LessThan<T>;

  constructor(override readonly traits: ComparableTraits<T>) {
    super(traits);
    const { ord } = traits;
    this.lessThan = (a, b) => ord.lessThan(a, b);
  }

  /** Index of the first minimum. */
  indexOfMin(): Option<number> {
    if (this._count === 0) return null;
    let min = 0;
    for (let i = 1; i < this._count; i++) {
      if (this.lessThan(this._buffer[i], this._buffer[min])) min = i;
    }
    return min;
  }

  /** Index of the first maximum. */
  indexOfMax(): Option<number> {
    if (this._count === 0) return null;
    let max = 0;
    for (let i = 1; i < this._count; i++) {
      if (this.lessThan(this._buffer[max], this._buffer[i])) max = i;
    }
    return max;
  }

  sort(): void {
    this.sortRange(0, this._count);
  }

  /** Sort `[start, start + length)` in place. Not stable. */
  sortRange(start: number, length: number): void {
    if (this.traits.checks) this.checkRange(start, length, "sortRange");
    const op = this.operation("sortRange");
    quicksort(this._buffer, start, start + length, this.lessThan, {
      stackDepth: this.traits.sortStackDepth,
      onOverflow: (n) => log.debug(`${op}: work stack full, insertion-sorting ${n} elements`),
    });
  }

  /** Leftmost index at which `item` keeps the vector sorted. */
  insertionIndexSorted(item: T): number {
    return lowerBound(this._buffer, this._count, item, this.lessThan, this.traits.linearSearchThreshold);
  }

  /** Index of the first occurrence of `item` in a sorted vector. */
  indexOfSorted(item: T): Option<number> {
    const index = this.insertionIndexSorted(item);
    return index < this._count && this.same(this._buffer[index], item) ? index : null;
  }

  containsSorted(item: T): boolean {
    return this.indexOfSorted(item) !== null;
  }

  insertSorted(item: T): SortedInsertResult {
    const index = this.insertionIndexSorted(item);
    return { status: this.insertAt(index, item), index };
  }

  /** Like `insertSorted`, but reports `"already-present"` instead of inserting a duplicate. */
  insertSortedUnique(item: T): SortedInsertResult {
    const index = this.insertionIndexSorted(item);
    if (index < this._count && this.same(this._buffer[index], item)) {
      return { status: "already-present", index };
    }
    return { status: this.insertAt(index, item), index };
  }

  insertAllSorted(items: Iterable<T>): VecStatus {
    for (const item of items === this ? this.toArray() : items) {
      if (this.insertSorted(item).status === "allocation-failure") return "allocation-failure";
    }
    return "ok";
  }

  insertAllSortedUnique(items: Iterable<T>): VecStatus {
    for (const item of items === this ? this.toArray() : items) {
      if (this.insertSortedUnique(item).status === "allocation-failure") return "allocation-failure";
    }
    return "ok";
  }

  override copy(): Option<ComparableVector<T>> {
    return this.copyInto(new ComparableVector(this.traits));
  }

  override deepCopy(copyFn: (item: T) => T): Option<ComparableVector<T>> {
    return this.deepCopyInto(new ComparableVector(this.traits), copyFn);
  }
}
