import type { Clock, NormalizedSnapshot } from '../types/index.js';
import type { SnapshotProvider } from './types.js';

export const MOCK_SECTORS = ['Semiconductor', 'Banking', 'Liquor', 'New Energy', 'Medicine'] as const;

const BASE_VOLUME = 1_000_000;

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

/**
 * Random-walk market generator for demos and soak runs. `random` must return
 * values in [0, 1).
 */
export class MockSnapshotProvider implements SnapshotProvider {
  readonly name = 'mock';
  private trend = 0;
  private random: () => number;
  private now: Clock;

  constructor(options?: { random?: () => number; now?: Clock }) {
    this.random = options?.random ?? Math.random;
    this.now = options?.now ?? Date.now;
  }

  getTrend(): number {
    return this.trend;
  }

  async getLatestSnapshot(): Promise<NormalizedSnapshot> {
    return this.next();
  }

  next(): NormalizedSnapshot {
    this.trend = clamp(this.trend + this.uniform(-0.1, 0.1), -1, 1);
    const trend = this.trend;
    const sectorIndex = Math.min(Math.floor(this.random() * MOCK_SECTORS.length), MOCK_SECTORS.length - 1);

    return {
      timestamp: this.now(),
      volume: BASE_VOLUME * (1 + this.uniform(-0.2, 0.5)),
      indexChangePct: trend + this.uniform(-0.2, 0.2),
      northBoundFlow: this.uniform(-10_000_000, 10_000_000) + trend * 5_000_000,
      limitDownCount: Math.trunc(Math.max(0, 5 - trend * 5 + this.randomInt(-1, 2))),
      bombRate: clamp(20 - trend * 10 + this.uniform(-5, 5), 0, 100),
      topSector: MOCK_SECTORS[sectorIndex] ?? 'Banking',
      topSectorChangePct: trend * 2 + this.uniform(-0.5, 0.5),
    };
  }

  private uniform(min: number, max: number): number {
    return min + (max - min) * this.random();
  }

  /** Inclusive on both ends. */
  private randomInt(min: number, max: number): number {
    return min + Math.min(Math.floor(this.random() * (max - min + 1)), max - min);
  }
}
