import type { TopKSelector } from "../heap.js";
import type { Comparator } from "../types.js";
import { TernaryHeap } from "./ternaryHeap.js";

/**
 * Streams `items` once, holding at most `k` of them. The first `k` are bulk-built into a
 * heap rooted at the weakest kept item; every later item that beats the root takes its
 * slot through `replaceTop`. Fractional `k` is floored; `k` larger than the input keeps
 * everything, and nothing is allocated up front for it.
 */
export class HeapTopKSelector<T> implements TopKSelector<T> {
  topK(items: Iterable<T>, k: number, comparator: Comparator<T>): T[] {
    const limit = Math.floor(k);
    if (!(limit > 0)) return [];

    const seed: T[] = [];
    let kept: TernaryHeap<T> | undefined;

    for (const item of items) {
      if (!kept) {
        seed.push(item);
        if (seed.length === limit) {
          kept = TernaryHeap.fromUnordered(seed, (a, b) => comparator(a, b) > 0);
        }
        continue;
      }
      if (comparator(item, kept.peek()!) < 0) kept.replaceTop(item);
    }

    const out = kept ? kept.toArray() : seed;
    return out.sort(comparator);
  }
}
