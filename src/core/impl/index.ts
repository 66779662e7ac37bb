export { TernaryHeap, type BuildOptions } from "./ternaryHeap.js";
export { HeapTopKSelector } from "./heapTopK.js";
export { ascendingBy, descendingBy, fromComparator } from "./orders.js";
