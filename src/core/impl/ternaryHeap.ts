import type { Heap } from "../heap.js";
import { HeapConfigError, type FieldError } from "../errors.js";
import {
  DEFAULT_GROWTH_FACTOR,
  DEFAULT_INITIAL_CAPACITY,
  type HeapLogger,
  type HeapOptions,
  type MatchPredicate,
  type Order,
} from "../types.js";
import { asInt, asNumber, pushErr } from "../validation.js";

/** Options accepted by bulk build; capacity always equals the element count there. */
export type BuildOptions = Omit<HeapOptions, "initialCapacity">;

/**
 * Array-backed ternary heap.
 *
 * Node `i` has children `3i+1..3i+3` and parent `floor((i-1)/3)`. Slots in
 * `[length, capacity)` are kept `undefined`. When full, the buffer is
 * reallocated at `capacity * growthFactor` slots.
 */
export class TernaryHeap<T> implements Heap<T> {
  private buffer: Array<T | undefined>;
  private length = 0;
  private readonly order: Order<T>;
  private readonly factor: number;
  private readonly logger: HeapLogger | undefined;

  constructor(order: Order<T>, options: HeapOptions = {}) {
    const errors: FieldError[] = [];
    if (typeof order !== "function") pushErr(errors, "$.order", "must be a function");

    const initialCapacity =
      options.initialCapacity === undefined ? DEFAULT_INITIAL_CAPACITY : asInt(options.initialCapacity);
    if (initialCapacity === undefined || initialCapacity < 0) {
      pushErr(errors, "$.initialCapacity", "must be a non-negative integer");
    }

    const growthFactor = options.growthFactor === undefined ? DEFAULT_GROWTH_FACTOR : asNumber(options.growthFactor);
    if (growthFactor === undefined || growthFactor <= 1) {
      pushErr(errors, "$.growthFactor", "must be a finite number greater than 1");
    }

    if (errors.length || initialCapacity === undefined || growthFactor === undefined) {
      throw new HeapConfigError({ code: "INVALID_ARGUMENT", errors });
    }

    this.order = order;
    this.factor = growthFactor;
    this.logger = options.logger;
    this.buffer = emptySlots<T>(initialCapacity);
  }

  /** Builds a heap from arbitrary elements in O(n). The input is copied, never aliased. */
  static fromUnordered<T>(elements: Iterable<T>, order: Order<T>, options: BuildOptions = {}): TernaryHeap<T> {
    const heap = new TernaryHeap<T>(order, { ...options, initialCapacity: 0 });
    heap.adopt(Array.from(elements));
    return heap;
  }

  size(): number {
    return this.length;
  }

  isEmpty(): boolean {
    return this.length === 0;
  }

  capacity(): number {
    return this.buffer.length;
  }

  growthFactor(): number {
    return this.factor;
  }

  ordering(): Order<T> {
    return this.order;
  }

  peek(): T | undefined {
    return this.length ? this.buffer[0] : undefined;
  }

  push(item: T): T {
    if (this.length === this.buffer.length) this.grow();
    const i = this.length++;
    this.buffer[i] = item;
    this.siftUp(i);
    return item;
  }

  pop(): T | undefined {
    if (this.length === 0) return undefined;
    const a = this.buffer;
    const top = a[0];
    const last = --this.length;

    if (last === 0) {
      a[0] = undefined;
      return top;
    }

    a[0] = a[last];
    a[last] = undefined;
    this.siftDown(0);
    return top;
  }

  /** Pop + push in one sift. Returns the old root, or undefined (after a plain push) when empty. */
  replaceTop(value: T): T | undefined {
    if (this.length === 0) {
      this.push(value);
      return undefined;
    }
    const top = this.buffer[0];
    this.buffer[0] = value;
    this.siftDown(0);
    return top;
  }

  modify(match: MatchPredicate<T>, value: T): boolean {
    const a = this.buffer;
    for (let i = 0; i < this.length; i++) {
      const old = a[i]!;
      if (!match(old)) continue;

      a[i] = value;
      if (this.order(value, old)) this.siftUp(i);
      else this.siftDown(i);
      return true;
    }
    return false;
  }

  clear(): number {
    const n = this.length;
    this.buffer.fill(undefined, 0, n);
    this.length = 0;
    return n;
  }

  clone(): TernaryHeap<T> {
    const copy = new TernaryHeap<T>(this.order, { initialCapacity: 0, growthFactor: this.factor, logger: this.logger });
    copy.buffer = this.buffer.slice();
    copy.length = this.length;
    return copy;
  }

  /**
   * Concatenates the live items of this heap and `others` into a fresh heap built
   * with this heap's order and growth factor. Inputs are left as they are.
   */
  merge(...others: Heap<T>[]): TernaryHeap<T> {
    const items = this.toArray();
    for (const other of others) {
      for (const item of other.toArray()) items.push(item);
    }
    return TernaryHeap.fromUnordered(items, this.order, { growthFactor: this.factor, logger: this.logger });
  }

  ascending(): IterableIterator<T> {
    return drain(this.clone());
  }

  [Symbol.iterator](): IterableIterator<T> {
    return this.ascending();
  }

  toArray(): T[] {
    const out: T[] = [];
    for (let i = 0; i < this.length; i++) out.push(this.buffer[i]!);
    return out;
  }

  private adopt(items: T[]): void {
    this.buffer = items;
    this.length = items.length;
    for (let i = Math.floor((this.length - 1) / 3); i >= 0; i--) {
      this.siftDown(i);
    }
  }

  private grow(): void {
    const prev = this.buffer.length;
    const next = Math.max(prev + 1, Math.floor(prev * this.factor));
    const slots = emptySlots<T>(next);
    for (let i = 0; i < this.length; i++) slots[i] = this.buffer[i];
    this.buffer = slots;
    this.logger?.debug(`resize: ${prev} -> ${next} slots`);
  }

  private siftUp(i: number): void {
    const a = this.buffer;
    while (i > 0) {
      const p = Math.floor((i - 1) / 3);
      if (!this.order(a[i]!, a[p]!)) break;
      [a[i], a[p]] = [a[p], a[i]];
      i = p;
    }
  }

  private siftDown(i: number): void {
    const a = this.buffer;
    const n = this.length;

    while (true) {
      const first = i * 3 + 1;
      if (first >= n) return;

      // earliest child wins ties
      let best = first;
      for (let c = first + 1; c <= first + 2 && c < n; c++) {
        if (this.order(a[c]!, a[best]!)) best = c;
      }
      if (!this.order(a[best]!, a[i]!)) return;

      [a[i], a[best]] = [a[best], a[i]];
      i = best;
    }
  }
}

function emptySlots<T>(n: number): Array<T | undefined> {
  return new Array<T | undefined>(n).fill(undefined);
}

function* drain<T>(heap: TernaryHeap<T>): Generator<T, void, undefined> {
  while (!heap.isEmpty()) {
    yield heap.pop()!;
  }
}
