import type { MarketSnapshot } from '../types/index.js';

export const DEFAULT_HISTORY_SIZE = 100;

/** Bounded FIFO of past snapshots, oldest first. */
export class HistoryWindow {
  private entries: MarketSnapshot[] = [];
  readonly capacity: number;

  constructor(capacity: number = DEFAULT_HISTORY_SIZE, initial: readonly MarketSnapshot[] = []) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new Error(`History capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    for (const entry of initial) {
      this.push(entry);
    }
  }

  push(snapshot: MarketSnapshot): void {
    this.entries.push(snapshot);
    if (this.entries.length > this.capacity) {
      this.entries.splice(0, this.entries.length - this.capacity);
    }
  }

  /** Replaces the newest entry with a patched copy; no-op when empty. */
  amendLatest(patch: Partial<MarketSnapshot>): void {
    const index = this.entries.length - 1;
    const current = this.entries[index];
    if (!current) return;
    this.entries[index] = { ...current, ...patch };
  }

  latest(): MarketSnapshot | null {
    return this.entries[this.entries.length - 1] ?? null;
  }

  get size(): number {
    return this.entries.length;
  }

  toArray(): readonly MarketSnapshot[] {
    return this.entries;
  }

  clear(): void {
    this.entries = [];
  }
}
