import { describe, it, expect } from "vitest";
import { eqNumber } from "@vecta/std";
import {
  arraySeqOf,
  count,
  defineVector,
  exists,
  find,
  findLast,
  forAll,
  head,
  int32,
  last,
  seqContains,
  toArray,
  vectorSeqOf,
} from "../src/index.js";

const Ints = defineVector({ layout: int32 });

describe("vectorSeqOf", () => {
  const S = vectorSeqOf<number>();
  const v = Ints.of(1, 2, 3);

  it("implements the Seq operations", () => {
    expect(S.length(v)).toBe(3);
    expect(S.nth(v, 1)).toBe(2);
    expect(S.fold(v, 0, (acc, a) => acc + a)).toBe(6);
    expect([...S.iterator(v)]).toEqual([1, 2, 3]);
    expect([...S.reverseIterator(v)]).toEqual([3, 2, 1]);
  });

  it("nth is bounds-checked", () => {
    expect(S.nth(v, 3)).toBeUndefined();
    expect(S.nth(v, -1)).toBeUndefined();
    expect(S.nth(v, 0.5)).toBeUndefined();
  });

  it("works with the derived operations", () => {
    expect(toArray(v, S)).toEqual([1, 2, 3]);
    expect(head(v, S)).toBe(1);
    expect(last(v, S)).toBe(3);
    expect(last(Ints.create(), S)).toBeUndefined();
    expect(find(v, (x) => x > 1, S)).toBe(2);
    expect(findLast(v, (x) => x < 3, S)).toBe(2);
    expect(exists(v, (x) => x === 3, S)).toBe(true);
    expect(forAll(v, (x) => x > 1, S)).toBe(false);
    expect(count(v, (x) => x % 2 === 1, S)).toBe(2);
    expect(seqContains(v, 2, S, eqNumber)).toBe(true);
    expect(seqContains(v, 4, S, eqNumber)).toBe(false);
  });
});

describe("arraySeqOf", () => {
  const S = arraySeqOf<string>();
  const xs = ["a", "bb", "ccc"];

  it("implements the Seq operations", () => {
    expect(S.length(xs)).toBe(3);
    expect(S.nth(xs, 2)).toBe("ccc");
    expect(S.nth(xs, 3)).toBeUndefined();
    expect(S.fold(xs, "", (acc, a) => acc + a)).toBe("abbccc");
    expect([...S.reverseIterator(xs)]).toEqual(["ccc", "bb", "a"]);
  });

  it("works with the derived operations", () => {
    expect(find(xs, (s) => s.length > 1, S)).toBe("bb");
    expect(findLast(xs, (s) => s.length < 3, S)).toBe("bb");
    expect(forAll(xs, (s) => s.length > 0, S)).toBe(true);
    expect(count(xs, (s) => s.startsWith("c"), S)).toBe(1);
    expect(head([], S)).toBeUndefined();
  });
});
