/**
 * Slot buffers: the backing storage of a vector.
 *
 * A buffer is either a plain JS array (reference elements) or a typed array
 * (fixed-width numeric elements). Both satisfy `SlotBuffer<T>`.
 */

import { Buffer } from "node:buffer";

export interface SlotBuffer<T> {
  readonly length: number;
  [index: number]: T;
  copyWithin(target: number, start: number, end?: number): unknown;
}

export interface ReadonlySlotBuffer<T> {
  readonly length: number;
  readonly [index: number]: T;
}

function sameKindOfView(a: object, b: object): boolean {
  return (
    ArrayBuffer.isView(a) &&
    ArrayBuffer.isView(b) &&
    Object.getPrototypeOf(a) === Object.getPrototypeOf(b)
  );
}

function byteView(view: ArrayBufferView, start: number, n: number, width: number): Uint8Array {
  return new Uint8Array(view.buffer, view.byteOffset + start * width, n * width);
}

function elementWidth(view: ArrayBufferView & { readonly length: number }): number {
  return view.byteLength / view.length;
}

/**
 * Copy `n` slots from `source[sourceStart..]` to `target[targetStart..]`.
 * Two typed arrays of the same kind are copied byte-wise in one block.
 */
export function copySlots<T>(
  source: ArrayLike<T>,
  sourceStart: number,
  target: SlotBuffer<T>,
  targetStart: number,
  n: number,
): void {
  if (n === 0) return;

  if (ArrayBuffer.isView(source) && ArrayBuffer.isView(target) && sameKindOfView(source, target)) {
    const width = elementWidth(source);
    byteView(target, targetStart, n, width).set(byteView(source, sourceStart, n, width));
    return;
  }

  for (let i = 0; i < n; i++) {
    target[targetStart + i] = source[sourceStart + i];
  }
}

/**
 * Compare the first `n` slots of two buffers byte by byte. Returns null when
 * the buffers are not typed arrays of the same kind.
 */
export function bytesEqual<T>(
  a: ReadonlySlotBuffer<T>,
  b: ReadonlySlotBuffer<T>,
  n: number,
): boolean | null {
  if (!(ArrayBuffer.isView(a) && ArrayBuffer.isView(b) && sameKindOfView(a, b))) return null;
  if (n === 0) return true;
  const width = elementWidth(a);
  return Buffer.compare(byteView(a, 0, n, width), byteView(b, 0, n, width)) === 0;
}
