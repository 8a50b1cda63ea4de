// priorityQueue.ts
// Binary min-heap with FIFO order among equal priorities.

interface HeapEntry<T> {
  priority: number;
  seq: number;
  value: T;
}

export class StablePriorityQueue<T> {
  private heap: HeapEntry<T>[] = [];
  private nextSeq = 0;

  get size(): number {
    return this.heap.length;
  }

  push(value: T, priority: number): void {
    this.heap.push({ priority, seq: this.nextSeq++, value });
    this.siftUp(this.heap.length - 1);
  }

  /** Remove and return the lowest-priority value, earliest insertion first on ties. */
  pop(): T | undefined {
    const top = this.heap[0];
    const last = this.heap.pop();
    if (!top || !last) return undefined;
    if (this.heap.length > 0) {
      this.heap[0] = last;
      this.siftDown(0);
    }
    return top.value;
  }

  private less(a: HeapEntry<T>, b: HeapEntry<T>): boolean {
    return a.priority < b.priority || (a.priority === b.priority && a.seq < b.seq);
  }

  private swap(i: number, j: number): void {
    const a = this.heap[i];
    const b = this.heap[j];
    if (!a || !b) return;
    this.heap[i] = b;
    this.heap[j] = a;
  }

  private siftUp(index: number): void {
    let i = index;
    while (i > 0) {
      const parent = (i - 1) >> 1;
      const node = this.heap[i];
      const up = this.heap[parent];
      if (!node || !up || !this.less(node, up)) break;
      this.swap(i, parent);
      i = parent;
    }
  }

  private siftDown(index: number): void {
    let i = index;
    const n = this.heap.length;
    for (;;) {
      const left = i * 2 + 1;
      const right = left + 1;
      let smallest = i;
      const leftEntry = this.heap[left];
      const rightEntry = this.heap[right];
      const current = this.heap[smallest];
      if (left < n && leftEntry && current && this.less(leftEntry, current)) smallest = left;
      const best = this.heap[smallest];
      if (right < n && rightEntry && best && this.less(rightEntry, best)) smallest = right;
      if (smallest === i) break;
      this.swap(i, smallest);
      i = smallest;
    }
  }
}
