import type { MarketSnapshot } from '../types/index.js';

export interface SnapshotProvider {
  readonly name: string;
  getLatestSnapshot(): Promise<MarketSnapshot>;
}
