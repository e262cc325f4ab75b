/**
 * Vector module instantiation.
 *
 * A module binds an element layout, optional `Eq`/`Ord` instances, an
 * allocator and tuning parameters once; every vector it creates shares
 * those traits. Unset tuning parameters come from `@vecta/core` config.
 *
 * @example
 * ```typescript
 * import { ordNumber } from "@vecta/std";
 * import { defineComparableVector, int32 } from "@vecta/vector";
 *
 * const Int32Vec = defineComparableVector({ layout: int32, ord: ordNumber });
 * const v = Int32Vec.of(3, 1, 2);
 * v.sort(); // [1, 2, 3]
 * ```
 */

import {
  AllocationError,
  INDEX_WIDTHS,
  LayoutError,
  config,
  readVectorDefaults,
  type IndexWidth,
} from "@vecta/core";
import type { Eq, Option, Ord } from "@vecta/std";
import { heapAllocator, type Allocator } from "./allocator.js";
import { ComparableVector } from "./comparable.js";
import { EquatableVector } from "./equatable.js";
import type { ElementLayout } from "./layout.js";
import { nextPowerOfTwo } from "./status.js";
import type {
  ComparableTraits,
  EqualityMode,
  EquatableTraits,
  VectorTraits,
} from "./traits.js";
import { Vector } from "./vector.js";

// ============================================================================
// Options
// ============================================================================

export interface VectorOptions<T> {
  readonly layout: ElementLayout<T>;
  /** Module name used in logs and errors (default `Vector<layout>` etc.) */
  readonly name?: string;
  readonly allocator?: Allocator;
  readonly indexWidth?: IndexWidth;
  /** Bytes per cache line (default: config `cache.line`) */
  readonly cacheLineSize?: number;
  /** Quicksort work-stack capacity (default: config `sort.depth`) */
  readonly sortStackDepth?: number;
  /** Contract checks (default: config `checks`) */
  readonly checks?: boolean;
}

export interface EquatableVectorOptions<T> extends VectorOptions<T> {
  readonly eq: Eq<T>;
  /**
   * Byte comparison in `equals`. Chosen automatically for identity `Eq`
   * instances on bitwise-comparable layouts; `false` opts out, `true`
   * asserts it is available.
   */
  readonly bitwiseEquals?: boolean;
}

export interface ComparableVectorOptions<T> extends VectorOptions<T> {
  readonly ord: Ord<T>;
  /** Equality used by searches (default: `ord`) */
  readonly eq?: Eq<T>;
  readonly bitwiseEquals?: boolean;
}

// ============================================================================
// Modules
// ============================================================================

export interface VectorModule<T, V extends Vector<T>> {
  readonly name: string;
  readonly traits: V["traits"];
  create(): V;
  /** Alias of `create`. */
  init(): V;
  /** A vector holding `items`; `null` on allocation failure. */
  from(items: ArrayLike<T>): Option<V>;
  /** Like `from`, but throws `AllocationError`. */
  of(...items: T[]): V;
}

function makeModule<T, V extends Vector<T>>(traits: V["traits"], create: () => V): VectorModule<T, V> {
  const from = (items: ArrayLike<T>): Option<V> => {
    const vector = create();
    return vector.appendArray(items) === "ok" ? vector : null;
  };

  return {
    name: traits.name,
    traits,
    create,
    init: create,
    from,
    of: (...items) => {
      const vector = from(items);
      if (vector === null) {
        throw new AllocationError(`${traits.name}.of`, nextPowerOfTwo(items.length));
      }
      return vector;
    },
  };
}

// ============================================================================
// Trait resolution
// ============================================================================

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

function resolveTraits<T>(kind: string, options: VectorOptions<T>): VectorTraits<T> {
  const { layout } = options;
  const defaults = readVectorDefaults();
  const indexWidth = options.indexWidth ?? defaults.indexWidth;
  const cacheLineSize = options.cacheLineSize ?? defaults.cacheLineSize;
  const sortStackDepth = options.sortStackDepth ?? defaults.sortStackDepth;

  if (!isPositiveInteger(layout.bytesPerElement)) {
    throw new LayoutError(
      layout.name,
      `bytesPerElement must be a positive integer, got ${layout.bytesPerElement}`,
    );
  }
  if (!INDEX_WIDTHS.includes(indexWidth)) {
    throw new LayoutError(
      layout.name,
      `indexWidth must be one of ${INDEX_WIDTHS.join(", ")}, got ${indexWidth}`,
    );
  }
  if (!isPositiveInteger(cacheLineSize)) {
    throw new LayoutError(layout.name, `cacheLineSize must be a positive integer, got ${cacheLineSize}`);
  }
  if (!isPositiveInteger(sortStackDepth)) {
    throw new LayoutError(layout.name, `sortStackDepth must be a positive integer, got ${sortStackDepth}`);
  }

  return {
    name: options.name ?? `${kind}<${layout.name}>`,
    layout,
    allocator: options.allocator ?? heapAllocator,
    indexWidth,
    maxCapacity: 2 ** (indexWidth - 1),
    cacheLineSize,
    sortStackDepth,
    checks: options.checks ?? config.has("checks"),
  };
}

function resolveEquality<T>(layout: ElementLayout<T>, eq: Eq<T>, bitwiseEquals?: boolean): EqualityMode {
  if (bitwiseEquals === true) {
    if (!layout.bitwiseComparable) {
      throw new LayoutError(layout.name, "bitwiseEquals needs a bitwise-comparable layout");
    }
    if (!eq.identity) {
      throw new LayoutError(layout.name, "bitwiseEquals needs an identity Eq instance");
    }
  }
  if (!eq.identity) return "predicate";
  return layout.bitwiseComparable && bitwiseEquals !== false ? "bitwise" : "identity";
}

// ============================================================================
// Public API
// ============================================================================

export function defineVector<T>(options: VectorOptions<T>): VectorModule<T, Vector<T>> {
  const traits = resolveTraits("Vector", options);
  return makeModule<T, Vector<T>>(traits, () => new Vector(traits));
}

export function defineEquatableVector<T>(
  options: EquatableVectorOptions<T>,
): VectorModule<T, EquatableVector<T>> {
  const traits: EquatableTraits<T> = {
    ...resolveTraits("EquatableVector", options),
    eq: options.eq,
    equality: resolveEquality(options.layout, options.eq, options.bitwiseEquals),
  };
  return makeModule<T, EquatableVector<T>>(traits, () => new EquatableVector(traits));
}

export function defineComparableVector<T>(
  options: ComparableVectorOptions<T>,
): VectorModule<T, ComparableVector<T>> {
  const eq = options.eq ?? options.ord;
  const base = resolveTraits("ComparableVector", options);
  const traits: ComparableTraits<T> = {
    ...base,
    eq,
    equality: resolveEquality(options.layout, eq, options.bitwiseEquals),
    ord: options.ord,
    linearSearchThreshold: Math.floor(base.cacheLineSize / options.layout.bytesPerElement),
  };
  return makeModule<T, ComparableVector<T>>(traits, () => new ComparableVector(traits));
}
