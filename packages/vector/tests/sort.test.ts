import { describe, it, expect, vi } from "vitest";
import { insertionSort, lowerBound, quicksort, sortWith } from "../src/index.js";

const lessThan = (a: number, b: number) => a < b;

describe("quicksort", () => {
  it("sorts a whole array", () => {
    const a = [3, 2, 2, 2, 4, 1, 5, 6, 5];
    quicksort(a, 0, a.length, lessThan, { stackDepth: 64 });
    expect(a).toEqual([1, 2, 2, 2, 3, 4, 5, 5, 6]);
  });

  it("touches only [start, end)", () => {
    const a = [9, 8, 7, 6, 5, 4];
    quicksort(a, 1, 4, lessThan, { stackDepth: 64 });
    expect(a).toEqual([9, 6, 7, 8, 5, 4]);
  });

  it("sorts two elements in either order", () => {
    const up = [1, 2];
    quicksort(up, 0, 2, lessThan, { stackDepth: 64 });
    expect(up).toEqual([1, 2]);

    const down = [2, 1];
    quicksort(down, 0, 2, lessThan, { stackDepth: 64 });
    expect(down).toEqual([1, 2]);
  });

  it("sorts typed arrays in place", () => {
    const a = Float64Array.of(2.5, -1, 0, 7);
    quicksort(a, 0, a.length, lessThan, { stackDepth: 64 });
    expect(Array.from(a)).toEqual([-1, 0, 2.5, 7]);
  });

  it("insertion-sorts the current range once the stack is full", () => {
    const onOverflow = vi.fn();
    const a = [3, 2, 2, 2, 4, 1, 5, 6, 5];
    quicksort(a, 0, a.length, lessThan, { stackDepth: 1, onOverflow });
    expect(a).toEqual([1, 2, 2, 2, 3, 4, 5, 5, 6]);
    expect(onOverflow).toHaveBeenNthCalledWith(1, 4);
  });

  it("never overflows a deep stack on moderate input", () => {
    const onOverflow = vi.fn();
    const a = Array.from({ length: 2000 }, (_, i) => (i * 7919) % 2003);
    quicksort(a, 0, a.length, lessThan, { stackDepth: 64, onOverflow });
    expect(onOverflow).not.toHaveBeenCalled();
    for (let i = 1; i < a.length; i++) expect(a[i - 1] <= a[i]).toBe(true);
  });
});

describe("insertionSort", () => {
  it("sorts a range", () => {
    const a = [5, 4, 3, 2, 1];
    insertionSort(a, 1, 4, lessThan);
    expect(a).toEqual([5, 2, 3, 4, 1]);
  });
});

describe("sortWith", () => {
  it("sorts a range with a three-way comparator", () => {
    const a = Int32Array.of(4, 3, 2, 1);
    sortWith(a, 0, 3, (x, y) => x - y);
    expect(Array.from(a)).toEqual([2, 3, 4, 1]);
  });
});

describe("lowerBound", () => {
  const a = [1, 2, 2, 2, 3, 4, 5, 5, 6];

  it.each([0, 1, 2, 100])("finds the leftmost position with a threshold of %i", (threshold) => {
    expect(lowerBound(a, a.length, 2, lessThan, threshold)).toBe(1);
    expect(lowerBound(a, a.length, 5, lessThan, threshold)).toBe(6);
    expect(lowerBound(a, a.length, 0, lessThan, threshold)).toBe(0);
    expect(lowerBound(a, a.length, 9, lessThan, threshold)).toBe(9);
  });

  it("searches only the first count elements", () => {
    expect(lowerBound(a, 4, 3, lessThan, 0)).toBe(4);
  });

  it("returns 0 for an empty prefix", () => {
    expect(lowerBound([], 0, 1, lessThan, 16)).toBe(0);
  });
});
