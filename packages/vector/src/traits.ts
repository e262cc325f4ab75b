/**
 * Resolved per-module settings shared by every vector of a module.
 */

import type { IndexWidth } from "@vecta/core";
import type { Eq, Ord } from "@vecta/std";
import type { Allocator } from "./allocator.js";
import type { ElementLayout } from "./layout.js";

export interface VectorTraits<T> {
  readonly name: string;
  readonly layout: ElementLayout<T>;
  readonly allocator: Allocator;
  readonly indexWidth: IndexWidth;
  /** `2^(indexWidth - 1)`, the largest power-of-two capacity. */
  readonly maxCapacity: number;
  readonly cacheLineSize: number;
  readonly sortStackDepth: number;
  /** Throw `PreconditionError` on contract violations. */
  readonly checks: boolean;
}

/**
 * How equality is evaluated:
 * - `"bitwise"`: byte comparison of whole buffers, `===` per element
 * - `"identity"`: `===` per element
 * - `"predicate"`: `eq.equals` per element
 */
export type EqualityMode = "bitwise" | "identity" | "predicate";

export interface EquatableTraits<T> extends VectorTraits<T> {
  readonly eq: Eq<T>;
  readonly equality: EqualityMode;
}

export interface ComparableTraits<T> extends EquatableTraits<T> {
  readonly ord: Ord<T>;
  /** Window size below which lower-bound search turns linear. */
  readonly linearSearchThreshold: number;
}
