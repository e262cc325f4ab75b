// Vectors
export { Vector } from "./vector.js";
export { EquatableVector } from "./equatable.js";
export { ComparableVector } from "./comparable.js";

// Instantiation
export {
  defineVector,
  defineEquatableVector,
  defineComparableVector,
  type VectorModule,
  type VectorOptions,
  type EquatableVectorOptions,
  type ComparableVectorOptions,
} from "./define.js";
export type { VectorTraits, EquatableTraits, ComparableTraits, EqualityMode } from "./traits.js";

// Storage
export {
  objectLayout,
  int8,
  uint8,
  int16,
  uint16,
  int32,
  uint32,
  float32,
  float64,
  bigint64,
  biguint64,
  type ElementLayout,
} from "./layout.js";
export type { SlotBuffer, ReadonlySlotBuffer } from "./buffer.js";
export { heapAllocator, boundedAllocator, type Allocator } from "./allocator.js";

// Status codes
export { assertOk, nextPowerOfTwo, type VecStatus, type SortedInsertResult } from "./status.js";

// Algorithms
export { quicksort, insertionSort, sortWith, type LessThan, type QuicksortOptions } from "./sort.js";
export { lowerBound } from "./search.js";

// Typeclasses
export type { IterableOnce, Iterable, Seq } from "./typeclasses.js";

// Instances
export { vectorSeqOf, arraySeqOf } from "./instances.js";

// Derived operations
export { toArray, exists, forAll, count, find, findLast, head, last, seqContains } from "./derived.js";
