/**
 * Element layouts.
 *
 * A layout tells a vector module how its element type is stored: the
 * buffer kind, the size of one slot, and whether two elements are equal
 * exactly when their bytes are. Integer layouts are bitwise-comparable;
 * float layouts are not (`-0 === 0`, `NaN !== NaN`).
 */

import type { SlotBuffer } from "./buffer.js";

export interface ElementLayout<T> {
  readonly name: string;
  readonly bytesPerElement: number;
  readonly bitwiseComparable: boolean;
  create(capacity: number): SlotBuffer<T>;
  /** Drop whatever vacated slots still reference. */
  vacate(buffer: SlotBuffer<T>, start: number, end: number): void;
}

/** Plain JS array slots holding references (8 bytes each). */
export function objectLayout<T>(name = "object"): ElementLayout<T> {
  return {
    name,
    bytesPerElement: 8,
    bitwiseComparable: false,
    create: (capacity) => new Array<T>(capacity),
    vacate: (buffer, start, end) => {
      for (let i = start; i < end; i++) delete buffer[i];
    },
  };
}

interface TypedArrayConstructor<T> {
  new (length: number): SlotBuffer<T>;
  readonly BYTES_PER_ELEMENT: number;
}

function typedLayout<T extends number | bigint>(
  name: string,
  ctor: TypedArrayConstructor<T>,
  bitwiseComparable: boolean,
): ElementLayout<T> {
  return {
    name,
    bytesPerElement: ctor.BYTES_PER_ELEMENT,
    bitwiseComparable,
    create: (capacity) => new ctor(capacity),
    // numeric slots hold no references
    vacate: () => {},
  };
}

export const int8: ElementLayout<number> = typedLayout("int8", Int8Array, true);
export const uint8: ElementLayout<number> = typedLayout("uint8", Uint8Array, true);
export const int16: ElementLayout<number> = typedLayout("int16", Int16Array, true);
export const uint16: ElementLayout<number> = typedLayout("uint16", Uint16Array, true);
export const int32: ElementLayout<number> = typedLayout("int32", Int32Array, true);
export const uint32: ElementLayout<number> = typedLayout("uint32", Uint32Array, true);
export const float32: ElementLayout<number> = typedLayout("float32", Float32Array, false);
export const float64: ElementLayout<number> = typedLayout("float64", Float64Array, false);
export const bigint64: ElementLayout<bigint> = typedLayout("bigint64", BigInt64Array, true);
export const biguint64: ElementLayout<bigint> = typedLayout("biguint64", BigUint64Array, true);
