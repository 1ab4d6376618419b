/** Array.sort semantics: <0 means a ranks before b. */
export type Comparator<T> = (a: T, b: T) => number;

/** Bounded priority queue backing top-K selection. */
export interface Heap<T> {
  size(): number;
  peek(): T | undefined;
  push(item: T): void;
  pop(): T | undefined;
  /** Snapshot of the contents, in heap order. */
  toArray(): T[];
}

export interface TopKSelector<T> {
  /**
   * Returns at most k items, best first.
   * Items the comparator ranks equal keep no particular order; callers that
   * need determinism must break ties in the comparator.
   */
  topK(items: Iterable<T>, k: number, comparator: Comparator<T>): T[];
}
