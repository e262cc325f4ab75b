/**
 * Seq instances for vectors and plain arrays.
 */

import type { Seq } from "./typeclasses.js";
import type { Vector } from "./vector.js";

function inBounds(index: number, length: number): boolean {
  return Number.isInteger(index) && index >= 0 && index < length;
}

export function vectorSeqOf<A>(): Seq<Vector<A>, A> {
  return {
    fold: (v, z, f) => {
      let acc = z;
      v.forEach((a) => {
        acc = f(acc, a);
      });
      return acc;
    },
    iterator: (v) => v.values(),
    reverseIterator: (v) => v.reversed(),
    length: (v) => v.count,
    nth: (v, index) => (inBounds(index, v.count) ? v.get(index) : undefined),
  };
}

export function arraySeqOf<A>(): Seq<readonly A[], A> {
  return {
    fold: (xs, z, f) => xs.reduce(f, z),
    iterator: (xs) => xs.values(),
    *reverseIterator(xs) {
      for (let i = xs.length; i-- > 0; ) yield xs[i];
    },
    length: (xs) => xs.length,
    nth: (xs, index) => (inBounds(index, xs.length) ? xs[index] : undefined),
  };
}
