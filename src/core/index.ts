export * from "./impl/index.js";
export type { Heap, TopKSelector } from "./heap.js";
export { HeapConfigError, type FieldError, type HeapErrorCode } from "./errors.js";
export {
  DEFAULT_GROWTH_FACTOR,
  DEFAULT_INITIAL_CAPACITY,
  type Comparator,
  type HeapLogger,
  type HeapOptions,
  type MatchPredicate,
  type Order,
} from "./types.js";
