/**
 * @spanline/core — Bounded Queue
 *
 * FIFO buffer with a hard capacity and a drop-new overflow policy: once
 * full, offered items are rejected and counted, queued items are kept.
 */

export class BoundedQueue<T> {
  private items: T[] = [];
  private droppedCount = 0;

  constructor(private readonly capacity: number) {}

  /** Returns false (and counts the drop) when the queue is full. */
  offer(item: T): boolean {
    if (this.items.length >= this.capacity) {
      this.droppedCount++;
      return false;
    }
    this.items.push(item);
    return true;
  }

  /** Remove and return up to max items from the head. */
  take(max: number): T[] {
    return this.items.splice(0, max);
  }

  /** Remove everything, returning how many items were discarded. */
  clear(): number {
    const count = this.items.length;
    this.items = [];
    return count;
  }

  get size(): number {
    return this.items.length;
  }

  get dropped(): number {
    return this.droppedCount;
  }
}
