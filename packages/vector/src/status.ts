import { AllocationError } from "@vecta/core";

/**
 * Outcome of an operation that may allocate.
 *
 * - `"ok"`: done
 * - `"already-present"`: nothing inserted, the element is already there
 * - `"allocation-failure"`: storage could not be obtained; the vector is unchanged
 */
export type VecStatus = "ok" | "already-present" | "allocation-failure";

export interface SortedInsertResult {
  readonly status: VecStatus;
  /** Lower-bound index of the item (its position when inserted). */
  readonly index: number;
}

/**
 * Throw `AllocationError` for `"allocation-failure"`, pass any other status
 * through.
 */
export function assertOk(status: VecStatus, operation: string): Exclude<VecStatus, "allocation-failure"> {
  if (status === "allocation-failure") {
    throw new AllocationError(operation);
  }
  return status;
}

/**
 * Smallest power of two `>= n` (1 for `n <= 1`).
 */
export function nextPowerOfTwo(n: number): number {
  let capacity = 1;
  while (capacity < n) capacity *= 2;
  return capacity;
}
