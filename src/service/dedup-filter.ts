export interface DedupOptions {
  /** Upper bound on remembered messages; the oldest is forgotten first. */
  maxEntries?: number;
  /** Forget a message this long after it was first seen. 0 keeps it for the whole run. */
  ttlMs?: number;
  now?: () => number;
}

/**
 * Suppresses messages already seen during one monitoring run. Each monitor
 * owns its own filter.
 */
export class DedupFilter {
  // Insertion order doubles as age order for eviction.
  private seen: Map<string, number> = new Map();
  private readonly maxEntries: number;
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: DedupOptions = {}) {
    this.maxEntries = options.maxEntries ?? 10000;
    this.ttlMs = options.ttlMs ?? 0;
    this.now = options.now ?? Date.now;

    if (this.maxEntries < 1) {
      throw new RangeError('maxEntries must be at least 1');
    }
  }

  shouldEmit(message: string): boolean {
    if (!message) {
      return false;
    }

    const now = this.now();
    this.expire(now);

    if (this.seen.has(message)) {
      return false;
    }

    this.seen.set(message, now);
    while (this.seen.size > this.maxEntries) {
      const oldest = this.seen.keys().next();
      if (oldest.done) {
        break;
      }
      this.seen.delete(oldest.value);
    }
    return true;
  }

  get size(): number {
    return this.seen.size;
  }

  clear(): void {
    this.seen.clear();
  }

  private expire(now: number): void {
    if (this.ttlMs <= 0) {
      return;
    }
    for (const [message, firstSeen] of this.seen) {
      if (now - firstSeen < this.ttlMs) {
        break;
      }
      this.seen.delete(message);
    }
  }
}
