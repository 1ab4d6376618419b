import { describe, expect, it } from "vitest";
import { MinHeapTopKSelector } from "../minHeapTopK.js";

describe("MinHeapTopKSelector", () => {
  const desc = (a: number, b: number) => b - a;

  it("returns best K by comparator", () => {
    const sel = new MinHeapTopKSelector<number>();
    expect(sel.topK([5, 1, 3, 2, 4], 3, desc)).toEqual([5, 4, 3]);
  });

  it("returns everything when K exceeds the input", () => {
    const sel = new MinHeapTopKSelector<number>();
    expect(sel.topK([2, 9, 4], 10, desc)).toEqual([9, 4, 2]);
  });

  it("returns nothing for K <= 0", () => {
    expect(new MinHeapTopKSelector<number>().topK([1, 2], 0, desc)).toEqual([]);
  });

  it("keeps the earliest items when the comparator breaks ties by position", () => {
    const items = [7, 3, 7, 7, 1].map((score, index) => ({ score, index }));
    const out = new MinHeapTopKSelector<{ score: number; index: number }>().topK(
      items,
      2,
      (a, b) => b.score - a.score || a.index - b.index,
    );
    expect(out.map((x) => x.index)).toEqual([0, 2]);
  });
});
