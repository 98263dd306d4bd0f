import type {
  Clock,
  EventSubtype,
  MarketEvent,
  MarketState,
  MarketStatus,
} from '../types/index.js';
import { Logger } from '../core/logger.js';

export const RECENT_EVENT_WINDOW_MS = 30 * 60 * 1000;
export const GREEN_THRESHOLD = 70;
export const RED_THRESHOLD = 30;

export const SCORE_WEIGHTS: Record<EventSubtype, number> = {
  sentiment_turning_up: 10,
  flow_reversal: 5,
  theme_emergence: 5,
  sentiment_turning_down: -10,
  flow_withdrawal: -10,
  theme_exhaustion: -5,
};

function clampScore(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(Math.max(value, 0), 100);
}

export function statusForScore(score: number): MarketStatus {
  if (score >= GREEN_THRESHOLD) return 'green';
  if (score <= RED_THRESHOLD) return 'red';
  return 'yellow';
}

export function scoreDelta(events: readonly MarketEvent[]): number {
  return events.reduce((sum, event) => sum + (SCORE_WEIGHTS[event.subtype] ?? 0), 0);
}

export class StateManager {
  private currentState: MarketState;
  private recentEvents: MarketEvent[] = [];
  private now: Clock;
  private logger: Logger;

  constructor(options?: { now?: Clock; initialScore?: number; logger?: Logger }) {
    this.now = options?.now ?? Date.now;
    this.logger = options?.logger ?? new Logger('info');
    const score = clampScore(options?.initialScore ?? 50);
    this.currentState = Object.freeze({
      timestamp: this.now(),
      status: statusForScore(score),
      sentimentScore: score,
      mainDriver: 'Initialization',
      summary: 'System starting up...',
    });
  }

  /**
   * Folds one cycle's events into a new state. Always returns a state; with no
   * events the score, driver and summary carry forward.
   */
  updateState(events: readonly MarketEvent[]): MarketState {
    const now = this.now();
    const cutoff = now - RECENT_EVENT_WINDOW_MS;
    this.recentEvents = this.recentEvents.filter((event) => event.timestamp > cutoff);
    this.recentEvents.push(...events);

    const previous = this.currentState;
    const delta = scoreDelta(events);
    const score = clampScore(previous.sentimentScore + delta);

    let mainDriver = previous.mainDriver;
    let summary = previous.summary;
    const lastEvent = events[events.length - 1];
    if (lastEvent) {
      mainDriver = lastEvent.description;
      summary = `Updated by ${lastEvent.subtype}`;
    }

    this.currentState = Object.freeze({
      timestamp: now,
      status: statusForScore(score),
      sentimentScore: score,
      mainDriver,
      summary,
    });

    if (this.currentState.status !== previous.status) {
      this.logger.info(
        `Market status ${previous.status} -> ${this.currentState.status} (score ${score})`
      );
    }

    return this.currentState;
  }

  getCurrentState(): MarketState {
    return this.currentState;
  }

  getRecentEvents(): MarketEvent[] {
    return [...this.recentEvents];
  }
}
