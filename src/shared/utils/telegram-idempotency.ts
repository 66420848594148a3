const DEFAULT_MAX_SIZE = 5_000;

/**
 * Remembers recently seen Telegram update ids so redelivered webhooks are
 * acknowledged without being processed twice. Oldest ids are evicted first.
 */
export class UpdateDeduplicator {
  private readonly seen = new Set<number>();
  private readonly order: number[] = [];

  constructor(private readonly maxSize = DEFAULT_MAX_SIZE) {}

  markIfNew(updateId: number): boolean {
    if (this.seen.has(updateId)) {
      return false;
    }
    this.seen.add(updateId);
    this.order.push(updateId);
    if (this.order.length > this.maxSize) {
      const oldest = this.order.shift();
      if (typeof oldest === "number") {
        this.seen.delete(oldest);
      }
    }
    return true;
  }

  size(): number {
    return this.seen.size;
  }
}
