// Binary min-heap with caller-supplied ordering

export type HeapCompare<T> = (a: T, b: T) => number;

export class MinHeap<T> {
  private readonly heap: T[] = [];

  constructor(private readonly compare: HeapCompare<T>) {}

  push(item: T): void {
    const heap = this.heap;
    let i = heap.length;
    heap.push(item);

    // Bubble up
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (this.compare(heap[parent], heap[i]) <= 0) break;
      const tmp = heap[parent];
      heap[parent] = heap[i];
      heap[i] = tmp;
      i = parent;
    }
  }

  pop(): T | undefined {
    const heap = this.heap;
    if (heap.length === 0) return undefined;

    const result = heap[0];
    const last = heap.pop();
    if (heap.length === 0 || last === undefined) return result;
    heap[0] = last;

    // Bubble down
    let i = 0;
    const size = heap.length;
    while (true) {
      const left = (i << 1) + 1;
      const right = left + 1;
      let smallest = i;

      if (left < size && this.compare(heap[left], heap[smallest]) < 0) {
        smallest = left;
      }
      if (right < size && this.compare(heap[right], heap[smallest]) < 0) {
        smallest = right;
      }
      if (smallest === i) break;

      const tmp = heap[smallest];
      heap[smallest] = heap[i];
      heap[i] = tmp;
      i = smallest;
    }

    return result;
  }

  isEmpty(): boolean {
    return this.heap.length === 0;
  }
}
