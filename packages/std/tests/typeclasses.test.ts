import { describe, it, expect } from "vitest";
import {
  eqArray,
  eqBigInt,
  eqBoolean,
  eqBy,
  eqDate,
  eqNumber,
  eqString,
  eqStrict,
  makeEq,
  makeOrd,
  ordArray,
  ordBoolean,
  ordBy,
  ordDate,
  ordFromLessThan,
  ordNumber,
  ordString,
  reverseOrd,
  EQ_ORD,
  GT,
  LT,
} from "../src/index.js";

describe("Eq", () => {
  it("primitive instances compare with ===", () => {
    expect(eqNumber.equals(1, 1)).toBe(true);
    expect(eqNumber.notEquals(1, 2)).toBe(true);
    expect(eqNumber.equals(NaN, NaN)).toBe(false);
  });

  it("string, bigint and boolean instances", () => {
    expect(eqString.equals("a", "a")).toBe(true);
    expect(eqString.notEquals("a", "A")).toBe(true);
    expect(eqBigInt.equals(2n ** 64n, 2n ** 64n)).toBe(true);
    expect(eqBigInt.notEquals(1n, -1n)).toBe(true);
    expect(eqBoolean.equals(false, false)).toBe(true);
    expect(eqBoolean.notEquals(true, false)).toBe(true);
    expect([eqString.identity, eqBigInt.identity, eqBoolean.identity]).toEqual([true, true, true]);
  });

  it("marks === instances as identity", () => {
    expect(eqNumber.identity).toBe(true);
    expect(eqStrict<object>().identity).toBe(true);
    expect(eqDate.identity).toBeUndefined();
    expect(makeEq<number>((a, b) => a === b).identity).toBeUndefined();
  });

  it("eqDate compares timestamps", () => {
    expect(eqDate.equals(new Date(5), new Date(5))).toBe(true);
    expect(eqDate.equals(new Date(5), new Date(6))).toBe(false);
  });

  it("eqBy projects before comparing", () => {
    const byId = eqBy((x: { id: number; label: string }) => x.id);
    expect(byId.equals({ id: 1, label: "a" }, { id: 1, label: "b" })).toBe(true);
    expect(byId.notEquals({ id: 1, label: "a" }, { id: 2, label: "a" })).toBe(true);
  });

  it("eqArray compares element-wise", () => {
    const E = eqArray(eqNumber);
    expect(E.equals([1, 2], [1, 2])).toBe(true);
    expect(E.equals([1, 2], [1, 2, 3])).toBe(false);
    expect(E.notEquals([1, 2], [1, 3])).toBe(true);
  });
});

describe("Ord", () => {
  it("ordNumber", () => {
    expect(ordNumber.compare(1, 2)).toBe(LT);
    expect(ordNumber.compare(2, 2)).toBe(EQ_ORD);
    expect(ordNumber.compare(3, 2)).toBe(GT);
    expect(ordNumber.lessThan(1, 2)).toBe(true);
    expect(ordNumber.lessThan(2, 2)).toBe(false);
  });

  it("ordString and ordBoolean", () => {
    expect(ordString.lessThan("a", "b")).toBe(true);
    expect(ordBoolean.compare(false, true)).toBe(LT);
    expect(ordBoolean.lessThanOrEqual(true, true)).toBe(true);
    expect(ordBoolean.greaterThan(true, false)).toBe(true);
  });

  it("ordDate orders by timestamp", () => {
    const early = new Date(1000);
    const late = new Date(2000);
    expect(ordDate.compare(early, late)).toBe(LT);
    expect(ordDate.compare(late, early)).toBe(GT);
    expect(ordDate.compare(early, new Date(1000))).toBe(EQ_ORD);
    expect(ordDate.equals(early, new Date(1000))).toBe(true);
    expect(ordDate.lessThan(early, late)).toBe(true);
    expect(ordDate.greaterThanOrEqual(early, late)).toBe(false);
    expect(ordDate.identity).toBeUndefined();
  });

  it("makeOrd derives every relation from compare", () => {
    const O = makeOrd<number>((a, b) => (a < b ? LT : a > b ? GT : EQ_ORD));
    expect(O.equals(4, 4)).toBe(true);
    expect(O.greaterThanOrEqual(4, 3)).toBe(true);
    expect(O.lessThanOrEqual(5, 3)).toBe(false);
  });

  it("ordFromLessThan treats incomparable values as equal", () => {
    const byLength = ordFromLessThan((a: string, b: string) => a.length < b.length);
    expect(byLength.compare("ab", "xyz")).toBe(LT);
    expect(byLength.compare("abc", "x")).toBe(GT);
    expect(byLength.equals("ab", "cd")).toBe(true);
    expect(byLength.identity).toBeUndefined();
  });

  it("ordFromLessThan keeps the identity marker of a given Eq", () => {
    const O = ordFromLessThan((a: number, b: number) => a < b, eqNumber);
    expect(O.identity).toBe(true);
    expect(O.equals(1, 1)).toBe(true);
  });

  it("ordBy projects before comparing", () => {
    const byAge = ordBy((p: { age: number }) => p.age, ordNumber);
    expect(byAge.lessThan({ age: 3 }, { age: 9 })).toBe(true);
    expect(byAge.identity).toBeUndefined();
  });

  it("reverseOrd flips the order", () => {
    const desc = reverseOrd(ordNumber);
    expect(desc.compare(1, 2)).toBe(GT);
    expect(desc.lessThan(2, 1)).toBe(true);
    expect(desc.equals(2, 2)).toBe(true);
    expect([3, 1, 2].sort(desc.compare)).toEqual([3, 2, 1]);
  });

  it("ordArray is lexicographic", () => {
    const O = ordArray(ordNumber);
    expect(O.compare([1, 2], [1, 3])).toBe(LT);
    expect(O.compare([1, 2], [1, 2, 0])).toBe(LT);
    expect(O.compare([2], [1, 9])).toBe(GT);
    expect(O.equals([1, 2], [1, 2])).toBe(true);
  });
});
