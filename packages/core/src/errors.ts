/**
 * Error Types
 *
 * Capacity-affecting vector operations report failure through status codes;
 * the classes below cover programmer errors and the throwing conveniences
 * built on top of those codes.
 */

export type VectaErrorCode = "allocation" | "layout" | "precondition" | "config";

/**
 * Base class for all vecta errors.
 */
export class VectaError extends Error {
  constructor(
    message: string,
    readonly code: VectaErrorCode
  ) {
    super(message);
    this.name = "VectaError";
  }
}

/**
 * Thrown when a throwing convenience (`of`, `assertOk`) meets an
 * allocation failure.
 */
export class AllocationError extends VectaError {
  constructor(
    readonly operation: string,
    readonly requestedCapacity?: number
  ) {
    super(
      requestedCapacity === undefined
        ? `${operation}: allocation failed`
        : `${operation}: could not allocate ${requestedCapacity} slots`,
      "allocation"
    );
    this.name = "AllocationError";
  }
}

/**
 * Thrown at instantiation time when a layout or its options are invalid.
 */
export class LayoutError extends VectaError {
  constructor(
    readonly layoutName: string,
    message: string
  ) {
    super(`${layoutName}: ${message}`, "layout");
    this.name = "LayoutError";
  }
}

/**
 * Thrown when a caller contract is violated and `checks` is enabled.
 */
export class PreconditionError extends VectaError {
  constructor(
    readonly operation: string,
    message: string
  ) {
    super(`${operation}: ${message}`, "precondition");
    this.name = "PreconditionError";
  }
}

/**
 * Thrown when a configuration value has the wrong type or range.
 */
export class ConfigError extends VectaError {
  constructor(
    readonly path: string,
    message: string
  ) {
    super(message, "config");
    this.name = "ConfigError";
  }
}
