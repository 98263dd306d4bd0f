import { randomUUID } from 'node:crypto';

import { toFiniteNumber } from '../types/index.js';
import type {
  EventLevel,
  EventSubtype,
  MarketEvent,
  MarketSnapshot,
} from '../types/index.js';
import type { Rule, RuleContext } from './types.js';

export const VOLUME_LOOKBACK = 30;
export const VOLUME_SPIKE_RATIO = 1.3;
export const LIMIT_DOWN_THRESHOLD = 3;
export const BOMB_RATE_THRESHOLD = 30;
export const WITHDRAWAL_THRESHOLD = -10_000_000;
export const THEME_LOOKBACK = 15;
export const SECTOR_DROP_THRESHOLD = -2.0;

function average(values: number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

function sectorOf(snapshot: MarketSnapshot | undefined): string {
  return typeof snapshot?.topSector === 'string' ? snapshot.topSector : '';
}

function buildEvent(
  ctx: RuleContext,
  subtype: EventSubtype,
  level: EventLevel,
  data: MarketEvent['data'],
  description: string
): MarketEvent {
  return {
    id: `evt_${randomUUID()}`,
    timestamp: ctx.now(),
    type: 'anomaly_detection',
    subtype,
    level,
    data,
    description,
  };
}

/** Volume spike over the trailing average while the index is rising. */
export class SentimentTurningUpRule implements Rule {
  readonly name = 'sentiment_turning_up' as const;

  evaluate(snapshot: MarketSnapshot, history: readonly MarketSnapshot[], ctx: RuleContext) {
    const window = history.slice(-VOLUME_LOOKBACK).map((entry) => toFiniteNumber(entry.volume));
    const baseline = average(window);
    if (baseline === null || baseline <= 0) return null;

    const volume = toFiniteNumber(snapshot.volume);
    const indexChange = toFiniteNumber(snapshot.indexChangePct);
    if (volume <= baseline * VOLUME_SPIKE_RATIO || indexChange <= 0) return null;

    return buildEvent(
      ctx,
      this.name,
      'medium',
      {
        metric: 'volume_spike',
        value: volume,
        baseline,
        changePct: (volume - baseline) / baseline,
      },
      'Market sentiment turning up: volume spike with index rise.'
    );
  }
}

export class SentimentTurningDownRule implements Rule {
  readonly name = 'sentiment_turning_down' as const;

  evaluate(snapshot: MarketSnapshot, _history: readonly MarketSnapshot[], ctx: RuleContext) {
    const indexChange = toFiniteNumber(snapshot.indexChangePct);
    const limitDown = toFiniteNumber(snapshot.limitDownCount);
    const bombRate = toFiniteNumber(snapshot.bombRate);
    if (indexChange >= 0 || limitDown <= LIMIT_DOWN_THRESHOLD || bombRate <= BOMB_RATE_THRESHOLD) {
      return null;
    }

    return buildEvent(
      ctx,
      this.name,
      'high',
      { metric: 'sentiment_drop', limitDown, bombRate },
      'Market sentiment turning down: limit downs increasing.'
    );
  }
}

/** Net flow flips positive right after a negative reading. */
export class FlowReversalRule implements Rule {
  readonly name = 'flow_reversal' as const;

  evaluate(snapshot: MarketSnapshot, history: readonly MarketSnapshot[], ctx: RuleContext) {
    const previousEntry = history[history.length - 1];
    if (!previousEntry) return null;

    const current = toFiniteNumber(snapshot.northBoundFlow);
    const previous = toFiniteNumber(previousEntry.northBoundFlow);
    if (current <= 0 || previous >= 0) return null;

    return buildEvent(
      ctx,
      this.name,
      'medium',
      { metric: 'flow_reversal', current, previous },
      'Capital flow reversal: northbound funds turning positive.'
    );
  }
}

export class FlowWithdrawalRule implements Rule {
  readonly name = 'flow_withdrawal' as const;

  evaluate(snapshot: MarketSnapshot, _history: readonly MarketSnapshot[], ctx: RuleContext) {
    const value = toFiniteNumber(snapshot.northBoundFlow);
    if (value >= WITHDRAWAL_THRESHOLD) return null;

    return buildEvent(
      ctx,
      this.name,
      'high',
      { metric: 'rapid_outflow', value },
      'Significant capital withdrawal detected.'
    );
  }
}

/** Leading sector differs from the one THEME_LOOKBACK cycles back. */
export class ThemeEmergenceRule implements Rule {
  readonly name = 'theme_emergence' as const;

  evaluate(snapshot: MarketSnapshot, history: readonly MarketSnapshot[], ctx: RuleContext) {
    if (history.length < THEME_LOOKBACK) return null;

    const sector = sectorOf(snapshot);
    const oldLeader = sectorOf(history[history.length - THEME_LOOKBACK]);
    if (sector === '' || sector === oldLeader) return null;

    return buildEvent(
      ctx,
      this.name,
      'medium',
      { metric: 'new_leader', sector, oldLeader },
      `New market theme emerging: ${sector}.`
    );
  }
}

export class ThemeExhaustionRule implements Rule {
  readonly name = 'theme_exhaustion' as const;

  evaluate(snapshot: MarketSnapshot, _history: readonly MarketSnapshot[], ctx: RuleContext) {
    const value = toFiniteNumber(snapshot.topSectorChangePct);
    if (value >= SECTOR_DROP_THRESHOLD) return null;

    return buildEvent(
      ctx,
      this.name,
      'medium',
      { metric: 'sector_drop', value },
      'Leading theme shows signs of exhaustion.'
    );
  }
}

export function createDefaultRules(): Rule[] {
  return [
    new SentimentTurningUpRule(),
    new SentimentTurningDownRule(),
    new FlowReversalRule(),
    new FlowWithdrawalRule(),
    new ThemeEmergenceRule(),
    new ThemeExhaustionRule(),
  ];
}
