import type { Clock, EventSubtype, MarketEvent, MarketSnapshot } from '../types/index.js';

export interface RuleContext {
  now: Clock;
}

/**
 * A detector over the current snapshot and the prior snapshots (oldest first,
 * current excluded). Returns at most one event and never throws on missing
 * metrics.
 */
export interface Rule {
  readonly name: EventSubtype;
  evaluate(
    snapshot: MarketSnapshot,
    history: readonly MarketSnapshot[],
    ctx: RuleContext
  ): MarketEvent | null;
}
