import type { Bias } from "../types.js";

export type MemoryEntry = {
  atMs: number;
  notional: number;
};

/**
 * Recent qualifying prints per (ticker, direction), used by the swing repeated-buying
 * gate. One instance per emitter; keys never share entries.
 *
 * Entries older than the lookback window are evicted on every write, and each key keeps
 * at most `cap` entries (oldest dropped first).
 */
export class RepeatBuyingMemory {
  private readonly arena = new Map<string, MemoryEntry[]>();

  static keyFor(ticker: string, bias: Bias): string {
    return `${ticker.toUpperCase()}:${bias}`;
  }

  /**
   * Prune, append `entry`, enforce the cap, and return how many entries remain.
   */
  record(key: string, entry: MemoryEntry, opts: { lookbackMs: number; cap: number }): number {
    const kept = this.prune(key, entry.atMs, opts.lookbackMs);
    kept.push(entry);
    while (kept.length > opts.cap) kept.shift();
    this.arena.set(key, kept);
    return kept.length;
  }

  entries(key: string): readonly MemoryEntry[] {
    return this.arena.get(key) ?? [];
  }

  private prune(key: string, nowMs: number, lookbackMs: number): MemoryEntry[] {
    const cutoff = nowMs - lookbackMs;
    return (this.arena.get(key) ?? []).filter((e) => e.atMs >= cutoff);
  }
}
