import type { Comparator, MatchPredicate, Order } from "./types.js";

/**
 * Priority queue contract. The root is always the best-ranked live element
 * under `ordering()`.
 */
export interface Heap<T> extends Iterable<T> {
  size(): number;
  isEmpty(): boolean;
  peek(): T | undefined;
  /** Returns the inserted item for chaining. */
  push(item: T): T;
  pop(): T | undefined;
  /** Swaps the root for `item` and returns the old root; pushes when empty. */
  replaceTop(item: T): T | undefined;
  /**
   * Replaces the first live item (in storage order, not priority order) matching
   * `match` and restores heap order. Returns false when nothing matched.
   */
  modify(match: MatchPredicate<T>, value: T): boolean;
  /** Drops every item and returns how many there were. */
  clear(): number;
  clone(): Heap<T>;
  merge(...others: Heap<T>[]): Heap<T>;
  ordering(): Order<T>;
  /** Drains a private copy, best first. The heap itself is left untouched. */
  ascending(): IterableIterator<T>;
  /** Converts heap contents to array (order implementation-defined). */
  toArray(): T[];
}

export interface TopKSelector<T> {
  /**
   * Returns top K items by comparator.
   * Comparator should behave like Array.sort: <0 means a before b.
   */
  topK(items: Iterable<T>, k: number, comparator: Comparator<T>): T[];
}
