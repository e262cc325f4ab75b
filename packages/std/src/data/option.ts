/**
 * Option Data Type (Zero-Cost Implementation)
 *
 * Every Option<A> is either a value A or null. Vector lookups that can miss
 * (`indexOf`, `indexOfSorted`, `indexOfMin`, ...) return `Option<number>`,
 * so "not found" is `null` rather than a reserved index.
 *
 * ```typescript
 * Option<number>  // At runtime: number | null
 * Some(42)        // At runtime: 42
 * None            // At runtime: null
 * ```
 *
 * A must not include null.
 */

export type Option<A> = A | null;

export type Some<A> = A;

export type None = null;

// ============================================================================
// Constructors
// ============================================================================

export function Some<A>(value: A): Option<A> {
  return value;
}

export const None: Option<never> = null;

/**
 * Create an Option from a nullable value
 */
export function fromNullable<A>(value: A | null | undefined): Option<A> {
  return value === undefined ? null : value;
}

/**
 * Create an Option from a predicate
 */
export function fromPredicate<A>(value: A, predicate: (a: A) => boolean): Option<A> {
  return predicate(value) ? value : null;
}

// ============================================================================
// Type Guards
// ============================================================================

export function isSome<A>(opt: Option<A>): opt is A {
  return opt !== null;
}

export function isNone<A>(opt: Option<A>): opt is null {
  return opt === null;
}

// ============================================================================
// Operations
// ============================================================================

export function map<A, B>(opt: Option<A>, f: (a: A) => B): Option<B> {
  return opt === null ? null : f(opt);
}

export function flatMap<A, B>(opt: Option<A>, f: (a: A) => Option<B>): Option<B> {
  return opt === null ? null : f(opt);
}

export function getOrElse<A>(opt: Option<A>, defaultValue: () => A): A {
  return opt === null ? defaultValue() : opt;
}

/**
 * Extract the value, or throw with `message` if None.
 */
export function expect<A>(opt: Option<A>, message: string): A {
  if (opt === null) {
    throw new Error(message);
  }
  return opt;
}
