import type { Clock, MarketEvent, MarketSnapshot } from '../types/index.js';
import { Logger } from '../core/logger.js';
import { createDefaultRules } from './rules.js';
import type { Rule } from './types.js';

export class RuleEngine {
  private rules: Rule[] = [];
  private now: Clock;
  private logger: Logger;

  constructor(options?: { now?: Clock; logger?: Logger }) {
    this.now = options?.now ?? Date.now;
    this.logger = options?.logger ?? new Logger('info');
  }

  addRule(rule: Rule): this {
    this.rules.push(rule);
    return this;
  }

  listRules(): string[] {
    return this.rules.map((rule) => rule.name);
  }

  /**
   * Runs every rule in registration order; the returned events keep that order.
   */
  evaluateAll(snapshot: MarketSnapshot, history: readonly MarketSnapshot[]): MarketEvent[] {
    const ctx = { now: this.now };
    const events: MarketEvent[] = [];
    for (const rule of this.rules) {
      const event = rule.evaluate(snapshot, history, ctx);
      if (event) {
        this.logger.debug(`Rule ${rule.name} fired`, event.data);
        events.push(event);
      }
    }
    return events;
  }
}

export function createDefaultRuleEngine(options?: { now?: Clock; logger?: Logger }): RuleEngine {
  const engine = new RuleEngine(options);
  for (const rule of createDefaultRules()) {
    engine.addRule(rule);
  }
  return engine;
}
