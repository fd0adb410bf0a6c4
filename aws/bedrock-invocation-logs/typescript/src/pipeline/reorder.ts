/**
 * Holds items until they can be released in timestamp order.
 *
 * Items with equal timestamps keep their insertion order.
 */
export class ReorderBuffer<T extends { readonly timestamp: number }> {
  private readonly items: T[] = [];

  push(item: T): void {
    let low = 0;
    let high = this.items.length;
    while (low < high) {
      const mid = (low + high) >>> 1;
      if (this.items[mid].timestamp <= item.timestamp) {
        low = mid + 1;
      } else {
        high = mid;
      }
    }
    this.items.splice(low, 0, item);
  }

  /**
   * Removes and returns, oldest first, every item whose timestamp is at most `threshold`.
   */
  drainUpTo(threshold: number): T[] {
    let count = 0;
    while (count < this.items.length && this.items[count].timestamp <= threshold) {
      count++;
    }
    return this.items.splice(0, count);
  }

  drainAll(): T[] {
    return this.items.splice(0, this.items.length);
  }

  get size(): number {
    return this.items.length;
  }
}
