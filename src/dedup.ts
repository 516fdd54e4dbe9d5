/**
 * Time-windowed deduplication set.
 *
 * Remembers recently seen message ids per caller so a redelivered Telegram
 * update is handled once. Entries are pruned on every lookup and by
 * `sweep()`; the owner decides when to sweep.
 */

interface SeenId {
  id: number;
  seenAt: number;
}

export class DedupSet<K = string> {
  private readonly map = new Map<K, SeenId[]>();

  constructor(private readonly windowMs = 60_000) {}

  /**
   * True if `id` was already recorded for `key` within the window.
   * Otherwise records it and returns false.
   */
  isDuplicate(key: K, id: number): boolean {
    const now = Date.now();
    const entries = (this.map.get(key) ?? []).filter((e) => now - e.seenAt < this.windowMs);

    if (entries.some((e) => e.id === id)) {
      this.map.set(key, entries);
      return true;
    }

    entries.push({ id, seenAt: now });
    this.map.set(key, entries);
    return false;
  }

  /** Drop expired ids; returns how many were dropped. */
  sweep(): number {
    const now = Date.now();
    let dropped = 0;
    for (const [key, entries] of this.map) {
      const fresh = entries.filter((e) => now - e.seenAt < this.windowMs);
      dropped += entries.length - fresh.length;
      if (fresh.length === 0) {
        this.map.delete(key);
      } else {
        this.map.set(key, fresh);
      }
    }
    return dropped;
  }
}
