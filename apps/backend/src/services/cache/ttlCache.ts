import type { Clock } from "../clock.js";
import { systemClock } from "../clock.js";

export type TtlCacheOptions = {
  ttlMs: number;
  maxEntries: number;
  clock?: Clock;
};

type Entry<V> = { value: V; expiresAt: number };

/**
 * Process-wide cache whose entries only ever expire.
 * Insertion order doubles as age order, so the first key is the oldest.
 */
export class TtlCache<V> {
  private readonly entries = new Map<string, Entry<V>>();
  private readonly ttlMs: number;
  private readonly maxEntries: number;
  private readonly clock: Clock;

  constructor(opts: TtlCacheOptions) {
    this.ttlMs = opts.ttlMs;
    this.maxEntries = opts.maxEntries;
    this.clock = opts.clock ?? systemClock;
  }

  get(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt <= this.clock().getTime()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  set(key: string, value: V): void {
    this.entries.delete(key);
    while (this.entries.size >= this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
    this.entries.set(key, { value, expiresAt: this.clock().getTime() + this.ttlMs });
  }

  get size(): number {
    return this.entries.size;
  }
}
