/**
 * Binary max-heap of node ids keyed by an integer priority.
 * Equal keys pop in insertion order, so a re-inserted node queues behind
 * its equal-key peers and the pop sequence is fully determined.
 */

export interface HeapEntry {
  node: number;
  key: number;
  /** Insertion counter; lower pops first among equal keys. */
  order: number;
}

export class MaxPriorityQueue {
  private readonly heap: HeapEntry[] = [];
  private inserted = 0;

  get size(): number {
    return this.heap.length;
  }

  isEmpty(): boolean {
    return this.heap.length === 0;
  }

  push(node: number, key: number): void {
    this.heap.push({ node, key, order: this.inserted++ });
    this.siftUp(this.heap.length - 1);
  }

  peek(): HeapEntry | undefined {
    return this.heap[0];
  }

  pop(): HeapEntry | undefined {
    const top = this.heap[0];
    const last = this.heap.pop();
    if (top === undefined || last === undefined) return undefined;
    if (this.heap.length > 0) {
      this.heap[0] = last;
      this.siftDown(0);
    }
    return top;
  }

  private before(a: HeapEntry, b: HeapEntry): boolean {
    return a.key > b.key || (a.key === b.key && a.order < b.order);
  }

  private siftUp(i: number): void {
    const heap = this.heap;
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (!this.before(heap[i]!, heap[parent]!)) break;
      [heap[i], heap[parent]] = [heap[parent]!, heap[i]!];
      i = parent;
    }
  }

  private siftDown(i: number): void {
    const heap = this.heap;
    const n = heap.length;
    for (;;) {
      const left = 2 * i + 1;
      const right = left + 1;
      let best = i;
      if (left < n && this.before(heap[left]!, heap[best]!)) best = left;
      if (right < n && this.before(heap[right]!, heap[best]!)) best = right;
      if (best === i) return;
      [heap[i], heap[best]] = [heap[best]!, heap[i]!];
      i = best;
    }
  }
}
