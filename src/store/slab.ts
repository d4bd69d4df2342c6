type Slot<T> = { occupied: true; value: T } | { occupied: false };

/**
 * Min-heap of freed slot indices, so the lowest one is always handed out first.
 */
class FreeIndexHeap {
  private heap: number[] = [];

  get size(): number {
    return this.heap.length;
  }

  push(index: number): void {
    const heap = this.heap;
    heap.push(index);
    let i = heap.length - 1;
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (heap[parent] <= heap[i]) break;
      [heap[parent], heap[i]] = [heap[i], heap[parent]];
      i = parent;
    }
  }

  pop(): number | undefined {
    const heap = this.heap;
    if (heap.length === 0) return undefined;
    const top = heap[0];
    const last = heap.pop();
    if (heap.length > 0 && last !== undefined) {
      heap[0] = last;
      let i = 0;
      while (true) {
        const left = 2 * i + 1;
        const right = left + 1;
        let smallest = i;
        if (left < heap.length && heap[left] < heap[smallest]) smallest = left;
        if (right < heap.length && heap[right] < heap[smallest]) smallest = right;
        if (smallest === i) break;
        [heap[smallest], heap[i]] = [heap[i], heap[smallest]];
        i = smallest;
      }
    }
    return top;
  }
}

/**
 * Slot-addressed collection. Removed slots are recycled, lowest index first,
 * before the collection grows.
 */
export class Slab<T> {
  private slots: Array<Slot<T>> = [];
  private free = new FreeIndexHeap();
  private occupiedCount = 0;

  /**
   * Number of occupied slots.
   */
  get size(): number {
    return this.occupiedCount;
  }

  /**
   * Number of slots ever allocated, occupied or free.
   */
  get capacity(): number {
    return this.slots.length;
  }

  insert(value: T): number {
    const index = this.free.pop() ?? this.slots.length;
    this.slots[index] = { occupied: true, value };
    this.occupiedCount++;
    return index;
  }

  contains(index: number): boolean {
    return this.slotAt(index)?.occupied === true;
  }

  get(index: number): T | null {
    const slot = this.slotAt(index);
    return slot?.occupied ? slot.value : null;
  }

  /**
   * Overwrite an occupied slot. Returns false when the slot is free.
   */
  set(index: number, value: T): boolean {
    if (!this.contains(index)) return false;
    this.slots[index] = { occupied: true, value };
    return true;
  }

  /**
   * Free a slot and queue its index for reuse. Returns false when it was already free.
   */
  remove(index: number): boolean {
    if (!this.contains(index)) return false;
    this.slots[index] = { occupied: false };
    this.free.push(index);
    this.occupiedCount--;
    return true;
  }

  /**
   * Occupied indices in slot order.
   */
  keys(): number[] {
    const result: number[] = [];
    this.slots.forEach((slot, index) => {
      if (slot.occupied) result.push(index);
    });
    return result;
  }

  private slotAt(index: number): Slot<T> | undefined {
    if (!Number.isInteger(index) || index < 0 || index >= this.slots.length) return undefined;
    return this.slots[index];
  }
}
