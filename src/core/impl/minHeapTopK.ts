import type { Comparator, Heap, TopKSelector } from "../heap.js";

/** Binary heap whose root is the item ranked last by `comparator`. */
class WorstFirstHeap<T> implements Heap<T> {
  private readonly items: T[] = [];

  constructor(private readonly comparator: Comparator<T>) {}

  size(): number {
    return this.items.length;
  }

  peek(): T | undefined {
    return this.items[0];
  }

  push(item: T): void {
    this.items.push(item);
    this.swim(this.items.length - 1);
  }

  pop(): T | undefined {
    const items = this.items;
    const root = items[0];
    const tail = items.pop();
    if (items.length > 0 && tail !== undefined) {
      items[0] = tail;
      this.sink(0);
    }
    return root;
  }

  toArray(): T[] {
    return [...this.items];
  }

  /** a sits above b when a ranks after b */
  private above(i: number, j: number): boolean {
    return this.comparator(this.items[i]!, this.items[j]!) > 0;
  }

  private swap(i: number, j: number): void {
    const tmp = this.items[i]!;
    this.items[i] = this.items[j]!;
    this.items[j] = tmp;
  }

  private swim(i: number): void {
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (!this.above(i, parent)) return;
      this.swap(i, parent);
      i = parent;
    }
  }

  private sink(i: number): void {
    const n = this.items.length;
    for (;;) {
      let top = i;
      for (const child of [2 * i + 1, 2 * i + 2]) {
        if (child < n && this.above(child, top)) top = child;
      }
      if (top === i) return;
      this.swap(i, top);
      i = top;
    }
  }
}

/**
 * Keeps the best K items seen so far in a fixed-size heap.
 *
 * The heap root is the worst of the kept items, so each new item costs one
 * comparison against it and at most O(log K) to replace it.
 */
export class MinHeapTopKSelector<T> implements TopKSelector<T> {
  topK(items: Iterable<T>, k: number, comparator: Comparator<T>): T[] {
    if (k <= 0) return [];

    const heap = new WorstFirstHeap<T>(comparator);
    for (const item of items) {
      if (heap.size() < k) {
        heap.push(item);
        continue;
      }
      const worst = heap.peek();
      if (worst !== undefined && comparator(item, worst) < 0) {
        heap.pop();
        heap.push(item);
      }
    }

    return heap.toArray().sort(comparator);
  }
}
