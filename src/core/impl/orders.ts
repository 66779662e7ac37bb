import type { Comparator, Order } from "../types.js";

type Key = number | string;

/** Smallest key at the root. */
export function ascendingBy<T>(key: (item: T) => Key): Order<T> {
  return (a, b) => key(a) < key(b);
}

/** Largest key at the root. */
export function descendingBy<T>(key: (item: T) => Key): Order<T> {
  return (a, b) => key(a) > key(b);
}

export function fromComparator<T>(cmp: Comparator<T>): Order<T> {
  return (a, b) => cmp(a, b) < 0;
}
