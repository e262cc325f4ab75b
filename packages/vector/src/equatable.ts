/**
 * EquatableVector<T>: linear search and set-like operations over an
 * injected `Eq<T>`.
 */

import type { Option } from "@vecta/std";
import { bytesEqual } from "./buffer.js";
import type { VecStatus } from "./status.js";
import type { EquatableTraits } from "./traits.js";
import { Vector } from "./vector.js";

export class EquatableVector<T> extends Vector<T> {
  constructor(override readonly traits: EquatableTraits<T>) {
    super(traits);
  }

  indexOf(item: T): Option<number> {
    for (let i = 0; i < this._count; i++) {
      if (this.same(this._buffer[i], item)) return i;
    }
    return null;
  }

  indexOfReverse(item: T): Option<number> {
    for (let i = this._count; i-- > 0; ) {
      if (this.same(this._buffer[i], item)) return i;
    }
    return null;
  }

  contains(item: T): boolean {
    return this.indexOf(item) !== null;
  }

  pushUnique(item: T): VecStatus {
    return this.contains(item) ? "already-present" : this.push(item);
  }

  /** Remove the first occurrence of `item`. */
  remove(item: T): boolean {
    const index = this.indexOf(item);
    if (index === null) return false;
    this.removeAt(index);
    return true;
  }

  equals(other: EquatableVector<T>): boolean {
    if (other === this) return true;
    if (other._count !== this._count) return false;
    if (this._count === 0) return true;

    if (this.traits.equality === "bitwise") {
      const equal = bytesEqual(this._buffer, other._buffer, this._count);
      if (equal !== null) return equal;
    }

    for (let i = 0; i < this._count; i++) {
      if (!this.same(this._buffer[i], other._buffer[i])) return false;
    }
    return true;
  }

  containsAll(other: Vector<T>): boolean {
    if (other === this) return true;
    for (const item of other) {
      if (!this.contains(item)) return false;
    }
    return true;
  }

  containsAny(other: Vector<T>): boolean {
    if (other === this) return true;
    for (const item of other) {
      if (this.contains(item)) return true;
    }
    return false;
  }

  /** `pushUnique` every element of `other`, stopping at the first allocation failure. */
  appendUnique(other: Vector<T>): VecStatus {
    if (other === this) return "ok";
    for (const item of other) {
      if (this.pushUnique(item) === "allocation-failure") return "allocation-failure";
    }
    return "ok";
  }

  /** Remove the first occurrence of every element of `other`. */
  removeAllFrom(other: Vector<T>): void {
    if (other === this) {
      this.removeAll();
      return;
    }
    for (const item of other) this.remove(item);
  }

  override copy(): Option<EquatableVector<T>> {
    return this.copyInto(new EquatableVector(this.traits));
  }

  override deepCopy(copyFn: (item: T) => T): Option<EquatableVector<T>> {
    return this.deepCopyInto(new EquatableVector(this.traits), copyFn);
  }

  protected same(a: T, b: T): boolean {
    return this.traits.equality === "predicate" ? this.traits.eq.equals(a, b) : a === b;
  }
}
