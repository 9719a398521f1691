/**
 * Binary min-heap over integer keys in `[0, capacity)` with an index from key
 * to heap slot, so membership checks are O(1) and `decreaseKey` is O(log n).
 *
 * Entries with equal priority come out in the order they were last
 * pushed or decreased.
 */
export class IndexedMinHeap {
  private readonly heap: Int32Array;
  private readonly slotOf: Int32Array;
  private readonly priorities: Float64Array;
  private readonly stamps: Float64Array;
  private count = 0;
  private stampCounter = 0;

  constructor(public readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 0) {
      throw new Error(`Invalid heap capacity: ${capacity}`);
    }
    this.heap = new Int32Array(capacity);
    this.slotOf = new Int32Array(capacity).fill(-1);
    this.priorities = new Float64Array(capacity);
    this.stamps = new Float64Array(capacity);
  }

  public get size(): number {
    return this.count;
  }

  public isEmpty(): boolean {
    return this.count === 0;
  }

  public contains(key: number): boolean {
    return key >= 0 && key < this.capacity && this.slotOf[key] !== -1;
  }

  public getPriority(key: number): number | undefined {
    return this.contains(key) ? this.priorities[key] : undefined;
  }

  public push(key: number, priority: number): void {
    this.assertKey(key);
    if (this.slotOf[key] !== -1) {
      throw new Error(`Key ${key} is already in the heap`);
    }
    const slot = this.count++;
    this.heap[slot] = key;
    this.slotOf[key] = slot;
    this.priorities[key] = priority;
    this.stamps[key] = this.stampCounter++;
    this.siftUp(slot);
  }

  /**
   * Lowers the priority of a key already in the heap.
   */
  public decreaseKey(key: number, priority: number): void {
    this.assertKey(key);
    const slot = this.slotOf[key];
    if (slot === -1) {
      throw new Error(`Key ${key} is not in the heap`);
    }
    if (priority > this.priorities[key]) {
      throw new Error(
        `decreaseKey would raise priority of ${key} from ${this.priorities[key]} to ${priority}`,
      );
    }
    this.priorities[key] = priority;
    this.stamps[key] = this.stampCounter++;
    this.siftUp(slot);
  }

  public peek(): number | undefined {
    return this.count > 0 ? this.heap[0] : undefined;
  }

  /**
   * Removes and returns the key with the lowest priority.
   */
  public pop(): number | undefined {
    if (this.count === 0) return undefined;

    const top = this.heap[0];
    const last = this.heap[--this.count];
    this.slotOf[top] = -1;

    if (this.count > 0) {
      this.heap[0] = last;
      this.slotOf[last] = 0;
      this.siftDown(0);
    }
    return top;
  }

  public clear(): void {
    for (let i = 0; i < this.count; i++) {
      this.slotOf[this.heap[i]] = -1;
    }
    this.count = 0;
    this.stampCounter = 0;
  }

  private assertKey(key: number): void {
    if (!Number.isInteger(key) || key < 0 || key >= this.capacity) {
      throw new Error(`Key ${key} out of range [0, ${this.capacity})`);
    }
  }

  private less(a: number, b: number): boolean {
    const pa = this.priorities[a];
    const pb = this.priorities[b];
    return pa < pb || (pa === pb && this.stamps[a] < this.stamps[b]);
  }

  private swap(i: number, j: number): void {
    const a = this.heap[i];
    const b = this.heap[j];
    this.heap[i] = b;
    this.heap[j] = a;
    this.slotOf[b] = i;
    this.slotOf[a] = j;
  }

  private siftUp(slot: number): void {
    let i = slot;
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (!this.less(this.heap[i], this.heap[parent])) break;
      this.swap(i, parent);
      i = parent;
    }
  }

  private siftDown(slot: number): void {
    let i = slot;
    for (;;) {
      const left = 2 * i + 1;
      const right = left + 1;
      let smallest = i;
      if (left < this.count && this.less(this.heap[left], this.heap[smallest])) {
        smallest = left;
      }
      if (
        right < this.count &&
        this.less(this.heap[right], this.heap[smallest])
      ) {
        smallest = right;
      }
      if (smallest === i) return;
      this.swap(i, smallest);
      i = smallest;
    }
  }
}
