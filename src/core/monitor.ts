/**
 * Market Monitor
 *
 * Drives the pipeline on a timer:
 * - Pulls one snapshot per tick from a provider
 * - Runs a single cycle and emits the result
 * - Falls back to a neutral snapshot when the provider fails
 */

import { EventEmitter } from 'eventemitter3';

import type { Clock, CycleResult, MarketSnapshot } from '../types/index.js';
import { neutralSnapshot } from '../types/index.js';
import type { SnapshotProvider } from '../providers/types.js';
import { MarketPipeline } from './pipeline.js';
import { Logger } from './logger.js';

export interface MonitorEvents {
  cycle: (result: CycleResult) => void;
  error: (error: Error) => void;
  stopped: (cycles: number) => void;
}

export interface MonitorOptions {
  provider: SnapshotProvider;
  pipeline?: MarketPipeline;
  intervalSeconds?: number;
  maxCycles?: number;
  now?: Clock;
  logger?: Logger;
}

export class MarketMonitor extends EventEmitter<MonitorEvents> {
  private timer: NodeJS.Timeout | null = null;
  private stopped = true;
  private cycles = 0;
  private provider: SnapshotProvider;
  private intervalSeconds: number;
  private maxCycles?: number;
  private now: Clock;
  private logger: Logger;
  readonly pipeline: MarketPipeline;

  constructor(options: MonitorOptions) {
    super();
    this.provider = options.provider;
    this.intervalSeconds = options.intervalSeconds ?? 60;
    this.maxCycles = options.maxCycles;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? new Logger('info');
    this.pipeline =
      options.pipeline ?? new MarketPipeline({ now: this.now, logger: this.logger });
  }

  start(): void {
    if (this.timer || !this.stopped) return;
    this.stopped = false;
    this.logger.info(
      `Market monitor started. Provider: ${this.provider.name}. Interval: ${this.intervalSeconds}s`
    );
    this.scheduleNext(0);
  }

  stop(): void {
    if (this.stopped) return;
    this.stopped = true;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.logger.info(`Market monitor stopped after ${this.cycles} cycle(s)`);
    this.emit('stopped', this.cycles);
  }

  isRunning(): boolean {
    return !this.stopped;
  }

  get cycleCount(): number {
    return this.cycles;
  }

  private scheduleNext(delaySeconds: number): void {
    if (this.stopped) return;
    if (this.timer) clearTimeout(this.timer);
    this.timer = setTimeout(() => {
      this.timer = null;
      this.scheduledTick()
        .catch((err) => this.logger.error('Market monitor tick failed', err))
        .finally(() => {
          if (this.maxCycles !== undefined && this.cycles >= this.maxCycles) {
            this.stop();
            return;
          }
          this.scheduleNext(this.intervalSeconds);
        });
    }, Math.max(0, delaySeconds) * 1000);
  }

  async tick(): Promise<CycleResult> {
    return this.runCycle(await this.fetchSnapshot());
  }

  private async scheduledTick(): Promise<void> {
    const snapshot = await this.fetchSnapshot();
    // stop() may land while the provider is still answering
    if (this.stopped) {
      this.logger.debug('Market monitor stopped mid-fetch; cycle skipped');
      return;
    }
    this.runCycle(snapshot);
  }

  private runCycle(snapshot: MarketSnapshot): CycleResult {
    const result = this.pipeline.runCycle(snapshot);
    this.cycles += 1;
    this.emit('cycle', result);
    return result;
  }

  private async fetchSnapshot(): Promise<MarketSnapshot> {
    try {
      return await this.provider.getLatestSnapshot();
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      this.logger.error(`Snapshot provider ${this.provider.name} failed; using neutral snapshot`, err);
      this.emit('error', err);
      return neutralSnapshot(this.now());
    }
  }
}
