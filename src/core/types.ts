/** Shared core types used by module contracts. */

/**
 * Strict ranking predicate: true when `a` should sit closer to the root than `b`.
 * Must be irreflexive; ties are broken by position.
 */
export type Order<T> = (a: T, b: T) => boolean;

/** Array.sort-style comparator: <0 means a before b. */
export type Comparator<T> = (a: T, b: T) => number;

export type MatchPredicate<T> = (item: T) => boolean;

/** Anything console-compatible. `console` itself qualifies. */
export interface HeapLogger {
  debug(message: string): void;
}

export interface HeapOptions {
  /** Slots allocated up front. Default 10. */
  initialCapacity?: number;
  /** Capacity multiplier applied when the buffer is full. Must be > 1. Default 2. */
  growthFactor?: number;
  logger?: HeapLogger;
}

export const DEFAULT_INITIAL_CAPACITY = 10;
export const DEFAULT_GROWTH_FACTOR = 2;
