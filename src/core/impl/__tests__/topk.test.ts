import { describe, expect, it } from "vitest";
import { HeapTopKSelector } from "../heapTopK.js";

const byValue = (a: number, b: number) => a - b;

describe("HeapTopKSelector", () => {
  it("keeps the earliest deadlines from a stream", () => {
    const tasks = [
      { id: "t1", due: 30 },
      { id: "t2", due: 10 },
      { id: "t3", due: 50 },
      { id: "t4", due: 20 },
      { id: "t5", due: 40 },
    ];
    const out = new HeapTopKSelector<{ id: string; due: number }>().topK(tasks, 2, (a, b) => a.due - b.due);
    expect(out.map((t) => t.id)).toEqual(["t2", "t4"]);
  });

  it("picks the largest values out of a long permutation", () => {
    function* permutation(): Generator<number> {
      for (let i = 0; i < 10007; i++) yield (i * 7919) % 10007;
    }
    const out = new HeapTopKSelector<number>().topK(permutation(), 5, (a, b) => b - a);
    expect(out).toEqual([10006, 10005, 10004, 10003, 10002]);
  });

  it("keeps duplicates when K equals the input size", () => {
    expect(new HeapTopKSelector<number>().topK([4, 4, 1], 3, byValue)).toEqual([1, 4, 4]);
  });

  it.each([Number.POSITIVE_INFINITY, Number.MAX_SAFE_INTEGER])("returns the whole input sorted for K = %s", (k) => {
    expect(new HeapTopKSelector<number>().topK([3, 1, 2], k, byValue)).toEqual([1, 2, 3]);
  });

  it("floors a fractional K", () => {
    expect(new HeapTopKSelector<number>().topK([3, 1, 2], 1.5, byValue)).toEqual([1]);
    expect(new HeapTopKSelector<number>().topK([3, 1, 2], 0.5, byValue)).toEqual([]);
  });

  it.each([0, -1, Number.NaN])("returns nothing for K = %s", (k) => {
    expect(new HeapTopKSelector<number>().topK([3, 1, 2], k, byValue)).toEqual([]);
  });

  it("returns nothing for an empty input", () => {
    expect(new HeapTopKSelector<number>().topK([], 4, byValue)).toEqual([]);
  });
});
