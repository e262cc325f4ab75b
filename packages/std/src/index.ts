/**
 * @vecta/std: equality and ordering typeclasses plus the zero-cost Option
 * that vector modules are parameterised over.
 *
 * @example
 * ```ts
 * import { ordNumber, reverseOrd, ordBy } from "@vecta/std";
 *
 * const byAge = ordBy((p: { age: number }) => p.age, ordNumber);
 * const descending = reverseOrd(ordNumber);
 * ```
 */

// Typeclasses
export * from "./typeclasses/index.js";

// Data types
export * from "./data/option.js";
