/**
 * Allocators: pluggable storage strategies injected per vector module.
 *
 * Every operation returns `null` when memory cannot be obtained; vectors
 * turn that into an `"allocation-failure"` status and keep their state.
 */

import { copySlots, type SlotBuffer } from "./buffer.js";
import type { ElementLayout } from "./layout.js";

export interface Allocator {
  allocate<T>(layout: ElementLayout<T>, capacity: number): SlotBuffer<T> | null;
  /** Resize to `capacity` slots, keeping the first `count` elements. */
  reallocate<T>(
    layout: ElementLayout<T>,
    buffer: SlotBuffer<T>,
    count: number,
    capacity: number,
  ): SlotBuffer<T> | null;
  free<T>(layout: ElementLayout<T>, buffer: SlotBuffer<T>): void;
}

function allocateOnHeap<T>(layout: ElementLayout<T>, capacity: number): SlotBuffer<T> | null {
  try {
    return layout.create(capacity);
  } catch (error) {
    // Array and typed-array constructors throw RangeError past their limits
    if (error instanceof RangeError) return null;
    throw error;
  }
}

/**
 * Default allocator: fresh arrays from the JS heap.
 */
export const heapAllocator: Allocator = {
  allocate: allocateOnHeap,
  reallocate(layout, buffer, count, capacity) {
    const next = allocateOnHeap(layout, capacity);
    if (next === null) return null;
    copySlots(buffer, 0, next, 0, Math.min(count, capacity));
    return next;
  },
  free(layout, buffer) {
    layout.vacate(buffer, 0, buffer.length);
  },
};

/**
 * Allocator that refuses any buffer of more than `maxSlots` slots and
 * delegates the rest to `base`.
 */
export function boundedAllocator(maxSlots: number, base: Allocator = heapAllocator): Allocator {
  return {
    allocate(layout, capacity) {
      return capacity > maxSlots ? null : base.allocate(layout, capacity);
    },
    reallocate(layout, buffer, count, capacity) {
      return capacity > maxSlots ? null : base.reallocate(layout, buffer, count, capacity);
    },
    free(layout, buffer) {
      base.free(layout, buffer);
    },
  };
}
