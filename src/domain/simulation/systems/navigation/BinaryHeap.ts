/**
 * Binary min-heap ordered by a caller-supplied comparator.
 * Used as the A* open set; stale entries are skipped by the caller on pop
 * instead of being re-keyed in place.
 */
export class BinaryHeap<T> {
  private nodes: T[] = [];

  constructor(private readonly compare: (a: T, b: T) => number) {}

  public get length(): number {
    return this.nodes.length;
  }

  public push(node: T): void {
    this.nodes.push(node);
    this.bubbleUp(this.nodes.length - 1);
  }

  public pop(): T | undefined {
    const top = this.nodes[0];
    const end = this.nodes.pop();
    if (this.nodes.length > 0 && end !== undefined) {
      this.nodes[0] = end;
      this.sinkDown(0);
    }
    return top;
  }

  private bubbleUp(index: number): void {
    const node = this.nodes[index];

    while (index > 0) {
      const parentIndex = ((index - 1) / 2) | 0;
      const parent = this.nodes[parentIndex];
      if (this.compare(node, parent) >= 0) break;

      this.nodes[parentIndex] = node;
      this.nodes[index] = parent;
      index = parentIndex;
    }
  }

  private sinkDown(index: number): void {
    const length = this.nodes.length;

    while (true) {
      const left = 2 * index + 1;
      const right = left + 1;
      let smallest = index;

      if (left < length && this.compare(this.nodes[left], this.nodes[smallest]) < 0) {
        smallest = left;
      }
      if (right < length && this.compare(this.nodes[right], this.nodes[smallest]) < 0) {
        smallest = right;
      }
      if (smallest === index) break;

      const swap = this.nodes[smallest];
      this.nodes[smallest] = this.nodes[index];
      this.nodes[index] = swap;
      index = smallest;
    }
  }
}
