/**
 * Outbound Queue - frames held while the cloud connection is down
 */

export interface OutboundQueueStats {
  size: number;
  capacity: number;
  dropped: number;
}

/**
 * Bounded FIFO; when full, the oldest frame is dropped to make room.
 */
export class OutboundQueue<T> {
  private readonly items: T[] = [];
  private droppedCount = 0;

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 0) {
      throw new Error(`Invalid outbound queue capacity: ${capacity}`);
    }
  }

  /**
   * Returns the frame dropped to make room, if any
   */
  enqueue(item: T): T | undefined {
    if (this.capacity === 0) {
      this.droppedCount++;
      return item;
    }
    this.items.push(item);
    if (this.items.length > this.capacity) {
      this.droppedCount++;
      return this.items.shift();
    }
    return undefined;
  }

  /**
   * Remove and return every queued frame, oldest first
   */
  drain(): T[] {
    return this.items.splice(0);
  }

  get size(): number {
    return this.items.length;
  }

  stats(): OutboundQueueStats {
    return { size: this.items.length, capacity: this.capacity, dropped: this.droppedCount };
  }
}
