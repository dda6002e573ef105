/**
 * Fixed-capacity heap that retains the `capacity` best items seen.
 *
 * The root is always the weakest retained item, so a new candidate costs one
 * comparison when it does not qualify and O(log k) when it replaces the root.
 */
export class BoundedHeap<T> {
  private readonly items: T[] = [];

  /** `isBetter(a, b)` is true when a should rank ahead of b. */
  constructor(
    private readonly capacity: number,
    private readonly isBetter: (a: T, b: T) => boolean
  ) {}

  get size(): number {
    return this.items.length;
  }

  offer(item: T): boolean {
    if (this.capacity <= 0) return false;

    if (this.items.length < this.capacity) {
      this.items.push(item);
      this.siftUp(this.items.length - 1);
      return true;
    }

    if (!this.isBetter(item, this.items[0])) {
      return false;
    }
    this.items[0] = item;
    this.siftDown(0);
    return true;
  }

  /** Retained items, best first. Leaves the heap untouched. */
  sorted(): T[] {
    return [...this.items].sort((a, b) => (this.isBetter(a, b) ? -1 : this.isBetter(b, a) ? 1 : 0));
  }

  private siftUp(index: number): void {
    let child = index;
    while (child > 0) {
      const parent = (child - 1) >> 1;
      if (!this.isBetter(this.items[parent], this.items[child])) break;
      this.swap(parent, child);
      child = parent;
    }
  }

  private siftDown(index: number): void {
    let parent = index;
    const length = this.items.length;
    for (;;) {
      const left = 2 * parent + 1;
      const right = left + 1;
      let weakest = parent;
      if (left < length && this.isBetter(this.items[weakest], this.items[left])) weakest = left;
      if (right < length && this.isBetter(this.items[weakest], this.items[right])) weakest = right;
      if (weakest === parent) return;
      this.swap(parent, weakest);
      parent = weakest;
    }
  }

  private swap(a: number, b: number): void {
    const tmp = this.items[a];
    this.items[a] = this.items[b];
    this.items[b] = tmp;
  }
}
