/**
 * Runtime Safety Primitives
 *
 * - `requires(condition, operation, message)`: caller-contract check
 *
 * Vector modules only call `requires` when contract checks are enabled
 * (`checks` config flag or the `checks` instantiation option), so the
 * unchecked path stays free of bounds tests.
 *
 * @example
 * ```typescript
 * if (traits.checks) {
 *   requires(index < count, "removeAt", `index ${index} out of range`);
 * }
 * ```
 */

import { PreconditionError } from "./errors.js";

export function requires(
  condition: boolean,
  operation: string,
  message: string,
): asserts condition {
  if (!condition) {
    throw new PreconditionError(operation, message);
  }
}
