/**
 * Vector<T>: contiguous, explicitly managed storage.
 *
 * Capacity is always zero or a power of two. Growth doubles (0 → 2),
 * `reserveCapacity` rounds up to the next power of two, and `shrink` rounds
 * down to the smallest power of two that still holds every element. Buffers
 * come from the module's allocator; a failed allocation leaves the vector
 * untouched and is reported as `"allocation-failure"`.
 *
 * Element access is unchecked unless the module was defined with `checks`.
 */

import { createLogger, requires } from "@vecta/core";
import type { Comparator, Option } from "@vecta/std";
import { copySlots, type ReadonlySlotBuffer, type SlotBuffer } from "./buffer.js";
import { sortWith } from "./sort.js";
import { nextPowerOfTwo, type VecStatus } from "./status.js";
import type { VectorTraits } from "./traits.js";

const log = createLogger("vector");

export class Vector<T> implements Iterable<T> {
  protected _buffer: SlotBuffer<T>;
  protected _count = 0;
  protected _allocated = 0;

  constructor(readonly traits: VectorTraits<T>) {
    this._buffer = traits.layout.create(0);
  }

  get count(): number {
    return this._count;
  }

  get allocated(): number {
    return this._allocated;
  }

  get isEmpty(): boolean {
    return this._count === 0;
  }

  /**
   * The live buffer, or `null` while nothing is allocated. Growth and
   * shrinking replace it; do not hold on to it across those calls.
   */
  get storage(): ReadonlySlotBuffer<T> | null {
    return this._allocated === 0 ? null : this._buffer;
  }

  // --------------------------------------------------------------------------
  // Capacity
  // --------------------------------------------------------------------------

  reserveCapacity(capacity: number): VecStatus {
    if (this.traits.checks) {
      requires(
        Number.isInteger(capacity) && capacity >= 0,
        this.operation("reserveCapacity"),
        `capacity must be a non-negative integer, got ${capacity}`,
      );
    }
    // also rejects NaN
    if (!(capacity > this._allocated)) return "ok";
    return this.resize(nextPowerOfTwo(capacity), "reserveCapacity");
  }

  /** Make room for `n` more elements. */
  expand(n: number): VecStatus {
    return this.reserveCapacity(this._count + n);
  }

  shrink(): VecStatus {
    if (this._count === 0) {
      if (this._allocated > 0) log.debug(`${this.traits.name}.shrink: released ${this._allocated} slots`);
      this.deinit();
      return "ok";
    }
    const capacity = nextPowerOfTwo(this._count);
    if (capacity >= this._allocated) return "ok";
    return this.resize(capacity, "shrink");
  }

  /** Free the buffer and return to the empty, unallocated state. */
  deinit(): void {
    if (this._allocated > 0) {
      this.traits.allocator.free(this.traits.layout, this._buffer);
      this._buffer = this.traits.layout.create(0);
    }
    this._count = 0;
    this._allocated = 0;
  }

  // --------------------------------------------------------------------------
  // Element access
  // --------------------------------------------------------------------------

  get(index: number): T {
    if (this.traits.checks) this.checkIndex(index, "get");
    return this._buffer[index];
  }

  set(index: number, item: T): void {
    if (this.traits.checks) this.checkIndex(index, "set");
    this._buffer[index] = item;
  }

  first(): T {
    if (this.traits.checks) requires(this._count > 0, this.operation("first"), "vector is empty");
    return this._buffer[0];
  }

  last(): T {
    if (this.traits.checks) requires(this._count > 0, this.operation("last"), "vector is empty");
    return this._buffer[this._count - 1];
  }

  // --------------------------------------------------------------------------
  // Insertion and removal
  // --------------------------------------------------------------------------

  push(item: T): VecStatus {
    const status = this.growIfFull("push");
    if (status !== "ok") return status;
    this._buffer[this._count++] = item;
    return "ok";
  }

  /** Remove and return the last element. The count never drops below 0. */
  pop(): T {
    if (this.traits.checks) requires(this._count > 0, this.operation("pop"), "vector is empty");
    const item = this._buffer[this._count - 1];
    if (this._count > 0) this.dropTail(1);
    return item;
  }

  /** Insert at `index`, shifting `[index, count)` right. `index === count` appends. */
  insertAt(index: number, item: T): VecStatus {
    if (this.traits.checks) this.checkPosition(index, "insertAt");
    const status = this.growIfFull("insertAt");
    if (status !== "ok") return status;

    if (index < this._count) this._buffer.copyWithin(index + 1, index, this._count);
    this._buffer[index] = item;
    this._count++;
    return "ok";
  }

  /** Remove the element at `index`, shifting `(index, count)` left. */
  removeAt(index: number): T {
    if (this.traits.checks) this.checkIndex(index, "removeAt");
    const item = this._buffer[index];
    if (index >= this._count) return item;

    if (index < this._count - 1) this._buffer.copyWithin(index, index + 1, this._count);
    this.dropTail(1);
    return item;
  }

  /** Remove every element, keeping the capacity. */
  removeAll(): void {
    this.dropTail(this._count);
  }

  /**
   * Append the first `n` items of `items` with at most one reallocation and
   * one block copy.
   */
  appendArray(items: ArrayLike<T>, n: number = items.length): VecStatus {
    if (this.traits.checks) {
      requires(
        Number.isInteger(n) && n >= 0 && n <= items.length,
        this.operation("appendArray"),
        `cannot take ${n} of ${items.length} items`,
      );
    }
    if (n === 0) return "ok";

    const status = this.reserveCapacity(this._count + n);
    if (status !== "ok") return status;

    copySlots(items, 0, this._buffer, this._count, n);
    this._count += n;
    return "ok";
  }

  append(other: Vector<T>): VecStatus {
    return this.appendArray(other === this ? this.toArray() : other._buffer, other._count);
  }

  appendItems(...items: T[]): VecStatus {
    return this.appendArray(items);
  }

  // --------------------------------------------------------------------------
  // Whole-vector operations
  // --------------------------------------------------------------------------

  reverse(): void {
    const buffer = this._buffer;
    for (let i = 0, j = this._count - 1; i < j; i++, j--) {
      const tmp = buffer[i];
      buffer[i] = buffer[j];
      buffer[j] = tmp;
    }
  }

  /** Shallow copy with its own buffer; `null` on allocation failure. */
  copy(): Option<Vector<T>> {
    return this.copyInto(new Vector(this.traits));
  }

  /** Write the elements into `target` from index 0 and return it. */
  copyToArray(target: T[] = []): T[] {
    for (let i = 0; i < this._count; i++) target[i] = this._buffer[i];
    return target;
  }

  toArray(): T[] {
    return this.copyToArray();
  }

  // --------------------------------------------------------------------------
  // Deep operations: callbacks run once per element, in order
  // --------------------------------------------------------------------------

  deepCopy(copyFn: (item: T) => T): Option<Vector<T>> {
    return this.deepCopyInto(new Vector(this.traits), copyFn);
  }

  /** Append `copyFn(item)` for every item of `source`. */
  deepAppend(source: Vector<T>, copyFn: (item: T) => T): VecStatus {
    const n = source._count;
    if (n === 0) return "ok";

    const status = this.reserveCapacity(this._count + n);
    if (status !== "ok") return status;

    const base = this._count;
    for (let i = 0; i < n; i++) {
      this._buffer[base + i] = copyFn(source._buffer[i]);
    }
    this._count = base + n;
    return "ok";
  }

  deepRemoveAll(freeFn: (item: T) => void): void {
    for (let i = 0; i < this._count; i++) freeFn(this._buffer[i]);
    this.removeAll();
  }

  deepFree(freeFn: (item: T) => void): void {
    this.deepRemoveAll(freeFn);
    this.deinit();
  }

  // --------------------------------------------------------------------------
  // Predicates
  // --------------------------------------------------------------------------

  firstIndexWhere(predicate: (item: T, index: number) => boolean): Option<number> {
    for (let i = 0; i < this._count; i++) {
      if (predicate(this._buffer[i], i)) return i;
    }
    return null;
  }

  containsWhere(predicate: (item: T, index: number) => boolean): boolean {
    return this.firstIndexWhere(predicate) !== null;
  }

  removeFirstWhere(
    predicate: (item: T, index: number) => boolean,
    freeFn?: (item: T) => void,
  ): boolean {
    const index = this.firstIndexWhere(predicate);
    if (index === null) return false;
    const item = this.removeAt(index);
    freeFn?.(item);
    return true;
  }

  /** Remove every match, scanning from the back. Returns how many were removed. */
  removeWhere(predicate: (item: T, index: number) => boolean, freeFn?: (item: T) => void): number {
    let removed = 0;
    for (let i = this._count; i-- > 0; ) {
      if (predicate(this._buffer[i], i)) {
        const item = this.removeAt(i);
        freeFn?.(item);
        removed++;
      }
    }
    return removed;
  }

  // --------------------------------------------------------------------------
  // Iteration
  // --------------------------------------------------------------------------

  *[Symbol.iterator](): IterableIterator<T> {
    for (let i = 0; i < this._count; i++) yield this._buffer[i];
  }

  values(): IterableIterator<T> {
    return this[Symbol.iterator]();
  }

  *reversed(): IterableIterator<T> {
    for (let i = this._count; i-- > 0; ) yield this._buffer[i];
  }

  forEach(fn: (item: T, index: number) => void): void {
    for (let i = 0; i < this._count; i++) fn(this._buffer[i], i);
  }

  // --------------------------------------------------------------------------
  // Comparator sort
  // --------------------------------------------------------------------------

  /** Sort with an ad hoc three-way comparator through the platform sort. */
  qsort(cmp: Comparator<T>): void {
    sortWith(this._buffer, 0, this._count, cmp);
  }

  qsortRange(start: number, length: number, cmp: Comparator<T>): void {
    if (this.traits.checks) this.checkRange(start, length, "qsortRange");
    sortWith(this._buffer, start, start + length, cmp);
  }

  // --------------------------------------------------------------------------
  // Internals
  // --------------------------------------------------------------------------

  protected copyInto<V extends Vector<T>>(target: V): Option<V> {
    return target.appendArray(this._buffer, this._count) === "ok" ? target : null;
  }

  protected deepCopyInto<V extends Vector<T>>(target: V, copyFn: (item: T) => T): Option<V> {
    return target.deepAppend(this, copyFn) === "ok" ? target : null;
  }

  protected operation(name: string): string {
    return `${this.traits.name}.${name}`;
  }

  protected checkIndex(index: number, operation: string): void {
    requires(
      Number.isInteger(index) && index >= 0 && index < this._count,
      this.operation(operation),
      `index ${index} out of range [0, ${this._count})`,
    );
  }

  protected checkPosition(index: number, operation: string): void {
    requires(
      Number.isInteger(index) && index >= 0 && index <= this._count,
      this.operation(operation),
      `position ${index} out of range [0, ${this._count}]`,
    );
  }

  protected checkRange(start: number, length: number, operation: string): void {
    requires(
      Number.isInteger(start) && Number.isInteger(length) && start >= 0 && length >= 0 &&
        start + length <= this._count,
      this.operation(operation),
      `range [${start}, ${start + length}) outside [0, ${this._count}]`,
    );
  }

  private dropTail(n: number): void {
    const count = this._count - n;
    this.traits.layout.vacate(this._buffer, count, this._count);
    this._count = count;
  }

  private growIfFull(operation: string): VecStatus {
    if (this._count < this._allocated) return "ok";
    return this.resize(this._allocated === 0 ? 2 : this._allocated * 2, operation);
  }

  private resize(capacity: number, operation: string): VecStatus {
    const { allocator, layout, maxCapacity } = this.traits;
    const op = this.operation(operation);

    if (capacity > maxCapacity) {
      log.warn(`${op}: ${capacity} slots exceed the ${maxCapacity}-slot limit`);
      return "allocation-failure";
    }

    const next =
      this._allocated === 0
        ? allocator.allocate(layout, capacity)
        : allocator.reallocate(layout, this._buffer, this._count, capacity);
    if (next === null) {
      log.warn(`${op}: could not allocate ${capacity} slots`);
      return "allocation-failure";
    }

    log.debug(`${op}: capacity ${this._allocated} -> ${capacity}`);
    this._buffer = next;
    this._allocated = capacity;
    return "ok";
  }
}
