/**
 * Sequence Typeclasses
 *
 * Multi-parameter typeclasses over concrete sequence types, so the derived
 * operations in `derived.ts` run the same over vectors and plain arrays.
 *
 *   IterableOnce<I, A>      fold
 *     └── Iterable<I, A>    + fresh iterators
 *           └── Seq<S, A>   + length, nth, reverse iteration
 */

export interface IterableOnce<I, A> {
  fold<B>(i: I, z: B, f: (acc: B, a: A) => B): B;
}

export interface Iterable<I, A> extends IterableOnce<I, A> {
  iterator(i: I): globalThis.IterableIterator<A>;
}

/**
 * An ordered, indexable sequence. `nth` is bounds-checked and yields
 * `undefined` outside `[0, length)`.
 */
export interface Seq<S, A> extends Iterable<S, A> {
  length(s: S): number;
  nth(s: S, index: number): A | undefined;
  reverseIterator(s: S): globalThis.IterableIterator<A>;
}
