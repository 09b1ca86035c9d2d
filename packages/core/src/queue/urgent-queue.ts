/**
 * First-in-first-out queue backing a category's urgent tasks.
 * Items leave only from the head, in the order they were enqueued.
 */
export class UrgentQueue<T> {
  private items: T[] = [];
  private head = 0;

  get size(): number { return this.items.length - this.head; }
  get isEmpty(): boolean { return this.size === 0; }

  enqueue(item: T): void {
    this.items.push(item);
  }

  /** Remove and return the head, or undefined when the queue is empty */
  dequeue(): T | undefined {
    if (this.isEmpty) return undefined;

    const item = this.items[this.head];
    delete this.items[this.head];
    this.head++;

    if (this.head === this.items.length) {
      this.items = [];
      this.head = 0;
    } else if (this.head > 32 && this.head * 2 > this.items.length) {
      // Compact once the consumed prefix dominates the backing array
      this.items = this.items.slice(this.head);
      this.head = 0;
    }
    return item;
  }

  /** Snapshot of all queued items, head first */
  toArray(): T[] {
    return this.items.slice(this.head);
  }
}
