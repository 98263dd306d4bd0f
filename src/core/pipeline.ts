import type { Clock, CycleResult, MarketSnapshot } from '../types/index.js';
import { createDefaultRuleEngine, type RuleEngine } from '../detection/engine.js';
import { StateManager } from '../state/manager.js';
import { NotificationService } from '../notify/service.js';
import { HistoryWindow, DEFAULT_HISTORY_SIZE } from './history.js';
import { Logger } from './logger.js';

export interface PipelineOptions {
  historySize?: number;
  initialScore?: number;
  now?: Clock;
  /** Read "now" from each snapshot's own timestamp while its cycle runs. */
  useSnapshotTime?: boolean;
  logger?: Logger;
  ruleEngine?: RuleEngine;
  stateManager?: StateManager;
  notificationService?: NotificationService;
  history?: HistoryWindow;
}

/**
 * One update cycle: rules -> state -> notifications. The current snapshot
 * joins the history only after the rules have seen it.
 */
export class MarketPipeline {
  readonly ruleEngine: RuleEngine;
  readonly stateManager: StateManager;
  readonly notificationService: NotificationService;
  readonly history: HistoryWindow;
  private logger: Logger;
  private cycles = 0;
  private useSnapshotTime: boolean;
  private cycleTime: number | undefined;

  constructor(options: PipelineOptions = {}) {
    const baseClock = options.now ?? Date.now;
    const now: Clock = () => this.cycleTime ?? baseClock();
    this.useSnapshotTime = options.useSnapshotTime ?? false;
    this.logger = options.logger ?? new Logger('info');
    this.ruleEngine =
      options.ruleEngine ?? createDefaultRuleEngine({ now, logger: this.logger });
    this.stateManager =
      options.stateManager ??
      new StateManager({ now, initialScore: options.initialScore, logger: this.logger });
    this.notificationService =
      options.notificationService ?? new NotificationService({ now, logger: this.logger });
    this.history = options.history ?? new HistoryWindow(options.historySize ?? DEFAULT_HISTORY_SIZE);
  }

  runCycle(snapshot: MarketSnapshot): CycleResult {
    this.cycleTime = this.useSnapshotTime ? snapshot.timestamp : undefined;
    try {
      return this.evaluate(snapshot);
    } finally {
      this.cycleTime = undefined;
    }
  }

  private evaluate(snapshot: MarketSnapshot): CycleResult {
    const events = this.ruleEngine.evaluateAll(snapshot, this.history.toArray());
    const state = this.stateManager.updateState(events);
    const notifications = this.notificationService.generateNotifications(events, state);
    this.history.push({ ...snapshot });
    this.cycles += 1;

    this.logger.debug(
      `Cycle ${this.cycles}: ${events.length} event(s), ${state.status} ${state.sentimentScore}, ${notifications.length} notification(s)`
    );

    return { snapshot, events, state, notifications };
  }

  get cycleCount(): number {
    return this.cycles;
  }
}
