/**
 * Market Pulse - market snapshot anomaly detection and alerting
 *
 * Main entry point for the Market Pulse library.
 */

import { loadConfig, type MarketPulseConfig } from './core/config.js';
import { Logger } from './core/logger.js';
import { MarketPipeline } from './core/pipeline.js';
import { normalizeSnapshot } from './types/index.js';
import type { Clock, CycleResult, MarketState, Notification } from './types/index.js';

// Re-export types
export * from './types/index.js';

export { loadConfig, parseConfig, type MarketPulseConfig } from './core/config.js';
export { Logger, parseLogLevel, type LogLevel } from './core/logger.js';
export { HistoryWindow, DEFAULT_HISTORY_SIZE } from './core/history.js';
export { MarketPipeline, type PipelineOptions } from './core/pipeline.js';
export { MarketMonitor, type MonitorEvents, type MonitorOptions } from './core/monitor.js';
export { formatCycle, formatNotificationFeed } from './core/format.js';
export { RuleEngine, createDefaultRuleEngine } from './detection/engine.js';
export * from './detection/rules.js';
export type { Rule, RuleContext } from './detection/types.js';
export {
  StateManager,
  statusForScore,
  scoreDelta,
  SCORE_WEIGHTS,
  RECENT_EVENT_WINDOW_MS,
} from './state/manager.js';
export { NotificationService, THROTTLE_WINDOW_MS } from './notify/service.js';
export type { SnapshotProvider } from './providers/types.js';
export { MockSnapshotProvider } from './providers/mock.js';
export { ReplaySnapshotProvider, loadSnapshotFile, parseSnapshotDocument } from './providers/replay.js';
export { buildDemoScenario, runScenario } from './simulation/scenario.js';

// Version
export const VERSION = '0.1.0';

/**
 * Market Pulse client for programmatic access.
 *
 * @example
 * ```typescript
 * import { MarketPulse } from 'market-pulse';
 *
 * const pulse = new MarketPulse({ configPath: '~/.market-pulse/config.yaml' });
 * pulse.start();
 *
 * const { events, state, notifications } = pulse.process({
 *   volume: 1_400_000,
 *   indexChangePct: 0.5,
 * });
 * ```
 */
export class MarketPulse {
  private configPath?: string;
  private config?: MarketPulseConfig;
  private now?: Clock;
  private pipeline?: MarketPipeline;
  private started = false;

  constructor(options?: { configPath?: string; config?: MarketPulseConfig; now?: Clock }) {
    this.configPath = options?.configPath;
    this.config = options?.config;
    this.now = options?.now;
  }

  /**
   * Load configuration and build a fresh pipeline.
   */
  start(): void {
    if (this.started) {
      throw new Error('MarketPulse already started');
    }

    const config = this.config ?? loadConfig(this.configPath);
    this.config = config;
    this.pipeline = new MarketPipeline({
      historySize: config.pipeline.historySize,
      initialScore: config.pipeline.initialScore,
      now: this.now,
      logger: new Logger(config.logging.level),
    });
    this.started = true;
  }

  /**
   * Drop the pipeline and all of its state.
   */
  stop(): void {
    this.pipeline = undefined;
    this.started = false;
  }

  /**
   * Run one cycle on a raw snapshot record; missing metrics read as 0.
   */
  process(raw: unknown): CycleResult {
    const pipeline = this.ensureStarted();
    return pipeline.runCycle(normalizeSnapshot(raw, (this.now ?? Date.now)()));
  }

  getState(): MarketState {
    return this.ensureStarted().stateManager.getCurrentState();
  }

  getNotifications(limit?: number): Notification[] {
    const pipeline = this.ensureStarted();
    return pipeline.notificationService.getSentNotifications(
      limit ?? this.config?.notifications.displayLimit
    );
  }

  private ensureStarted(): MarketPipeline {
    if (!this.started || !this.pipeline) {
      throw new Error('MarketPulse not started. Call start() first.');
    }
    return this.pipeline;
  }
}
