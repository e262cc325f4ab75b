/**
 * Derived operations: free functions built on the sequence typeclasses.
 */

import type { Eq } from "@vecta/std";
import type { IterableOnce, Seq } from "./typeclasses.js";

// ============================================================================
// From IterableOnce
// ============================================================================

export function toArray<I, A>(i: I, IO: IterableOnce<I, A>): A[] {
  return IO.fold<A[]>(i, [], (acc, a) => {
    acc.push(a);
    return acc;
  });
}

export function exists<I, A>(i: I, p: (a: A) => boolean, IO: IterableOnce<I, A>): boolean {
  return IO.fold(i, false, (acc, a) => acc || p(a));
}

export function forAll<I, A>(i: I, p: (a: A) => boolean, IO: IterableOnce<I, A>): boolean {
  return IO.fold(i, true, (acc, a) => acc && p(a));
}

export function count<I, A>(i: I, p: (a: A) => boolean, IO: IterableOnce<I, A>): number {
  return IO.fold(i, 0, (acc, a) => (p(a) ? acc + 1 : acc));
}

// ============================================================================
// From Seq
// ============================================================================

export function find<S, A>(s: S, p: (a: A) => boolean, SQ: Seq<S, A>): A | undefined {
  for (const a of SQ.iterator(s)) {
    if (p(a)) return a;
  }
  return undefined;
}

/** Last element satisfying `p`, scanning from the back. */
export function findLast<S, A>(s: S, p: (a: A) => boolean, SQ: Seq<S, A>): A | undefined {
  for (const a of SQ.reverseIterator(s)) {
    if (p(a)) return a;
  }
  return undefined;
}

export function head<S, A>(s: S, SQ: Seq<S, A>): A | undefined {
  return SQ.nth(s, 0);
}

export function last<S, A>(s: S, SQ: Seq<S, A>): A | undefined {
  return SQ.nth(s, SQ.length(s) - 1);
}

export function seqContains<S, A>(s: S, a: A, SQ: Seq<S, A>, eq: Eq<A>): boolean {
  for (const x of SQ.iterator(s)) {
    if (eq.equals(x, a)) return true;
  }
  return false;
}
