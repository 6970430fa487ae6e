export interface SubscriptionEntry {
  symbol: string;
  /** Data-type filter the subscription was made with, if any */
  dataTypes?: readonly string[];
}

/**
 * Local record of what the broker believes is subscribed.
 *
 * Entries are added only after the broker acknowledges a subscribe and
 * removed after it acknowledges an unsubscribe. After a reconnect the
 * registry is the source of truth for what must be requested again.
 */
export class SubscriptionRegistry {
  private readonly subs = new Map<string, SubscriptionEntry>();

  /** Idempotent; a repeated add keeps a single entry with the latest filter. */
  add(symbol: string, dataTypes?: readonly string[]) {
    this.subs.set(symbol, dataTypes ? { symbol, dataTypes: [...dataTypes] } : { symbol });
  }

  remove(symbol: string): boolean {
    return this.subs.delete(symbol);
  }

  has(symbol: string): boolean {
    return this.subs.has(symbol);
  }

  current(): string[] {
    return [...this.subs.keys()];
  }

  entries(): SubscriptionEntry[] {
    return [...this.subs.values()];
  }

  clear() {
    this.subs.clear();
  }

  get size(): number {
    return this.subs.size;
  }
}
