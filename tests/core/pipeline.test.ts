import { describe, it, expect } from 'vitest';

import { MarketPipeline } from '../../src/core/pipeline.js';
import { HistoryWindow } from '../../src/core/history.js';
import { Logger } from '../../src/core/logger.js';
import { buildDemoScenario, runScenario } from '../../src/simulation/scenario.js';
import type { MarketSnapshot } from '../../src/types/index.js';

function createPipeline(initialScore?: number) {
  let now = 1_700_000_000_000;
  const pipeline = new MarketPipeline({
    now: () => now,
    initialScore,
    logger: new Logger('error'),
  });
  return {
    pipeline,
    advance(ms: number) {
      now += ms;
    },
  };
}

function baseline(count: number): MarketSnapshot[] {
  return Array.from({ length: count }, () => ({ volume: 1_000_000, topSector: 'Banking' }));
}

describe('core/pipeline', () => {
  it('detects a volume spike against a 1M baseline', () => {
    const { pipeline } = createPipeline();
    for (const snapshot of baseline(30)) pipeline.history.push(snapshot);

    const result = pipeline.runCycle({ volume: 1_400_000, indexChangePct: 0.5, topSector: 'Banking' });
    expect(result.events.map((e) => e.subtype)).toEqual(['sentiment_turning_up']);
    expect(result.state.sentimentScore).toBe(60);
    expect(result.state.status).toBe('yellow');
    expect(result.notifications.map((n) => n.format)).toEqual(['flash']);
    expect(result.notifications[0]?.relatedEvents).toEqual([result.events[0]?.id]);
  });

  it('appends the snapshot to history only after evaluation', () => {
    const { pipeline } = createPipeline();
    const snapshot = { northBoundFlow: 300_000 };
    pipeline.history.push({ northBoundFlow: -200_000 });
    const result = pipeline.runCycle(snapshot);
    expect(result.events.map((e) => e.subtype)).toEqual(['flow_reversal']);
    expect(pipeline.history.size).toBe(2);
    expect(pipeline.history.latest()).toEqual(snapshot);
    expect(pipeline.cycleCount).toBe(1);
  });

  it('keeps its own copy of each snapshot in history', () => {
    const { pipeline } = createPipeline();
    const snapshot: MarketSnapshot = { northBoundFlow: -200_000 };
    pipeline.runCycle(snapshot);
    snapshot.northBoundFlow = 999;

    expect(pipeline.history.latest()).toEqual({ northBoundFlow: -200_000 });
    expect(pipeline.runCycle({ northBoundFlow: 300_000 }).events.map((e) => e.subtype)).toEqual([
      'flow_reversal',
    ]);
  });

  it('runs replayed snapshots on their own timestamps', () => {
    const pipeline = new MarketPipeline({
      now: () => 42,
      useSnapshotTime: true,
      logger: new Logger('error'),
    });
    const outflow = { northBoundFlow: -15_000_000 };

    const first = pipeline.runCycle({ ...outflow, timestamp: 1_700_000_000_000 });
    expect(first.events[0]?.timestamp).toBe(1_700_000_000_000);
    expect(first.state.timestamp).toBe(1_700_000_000_000);
    expect(first.notifications[0]?.timestamp).toBe(1_700_000_000_000);

    const throttled = pipeline.runCycle({ ...outflow, timestamp: 1_700_000_600_000 });
    expect(throttled.notifications).toEqual([]);

    const hourLater = pipeline.runCycle({ ...outflow, timestamp: 1_700_003_600_000 });
    expect(hourLater.notifications).toHaveLength(1);
    expect(hourLater.events[0]?.timestamp).toBe(1_700_003_600_000);
  });

  it('falls back to its clock for snapshots without a timestamp', () => {
    const pipeline = new MarketPipeline({
      now: () => 42,
      useSnapshotTime: true,
      logger: new Logger('error'),
    });
    pipeline.runCycle({ northBoundFlow: -15_000_000, timestamp: 1_700_000_000_000 });
    const result = pipeline.runCycle({ northBoundFlow: -15_000_000 });
    expect(result.events[0]?.timestamp).toBe(42);
    expect(result.state.timestamp).toBe(42);
  });

  it('ignores snapshot timestamps unless asked to', () => {
    const { pipeline } = createPipeline();
    const result = pipeline.runCycle({ northBoundFlow: -15_000_000, timestamp: 5 });
    expect(result.events[0]?.timestamp).toBe(1_700_000_000_000);
  });

  it('reports withdrawal alone on a deep outflow', () => {
    const { pipeline } = createPipeline();
    pipeline.history.push({ northBoundFlow: -200_000 });
    const result = pipeline.runCycle({ northBoundFlow: -15_000_000 });
    expect(result.events.map((e) => e.subtype)).toEqual(['flow_withdrawal']);
    expect(result.notifications[0]?.format).toBe('alert');
    expect(result.notifications[0]?.lines).toEqual([
      'Significant capital withdrawal detected.',
      'Market Status: YELLOW',
    ]);
  });

  it('updates state on every cycle even when notifications are throttled', () => {
    const { pipeline, advance } = createPipeline();
    const selloff = { indexChangePct: -0.5, limitDownCount: 4, bombRate: 35 };

    const first = pipeline.runCycle(selloff);
    expect(first.notifications).toHaveLength(1);
    expect(first.state.sentimentScore).toBe(40);

    advance(60_000);
    const second = pipeline.runCycle(selloff);
    expect(second.events).toHaveLength(1);
    expect(second.notifications).toEqual([]);
    expect(second.state.sentimentScore).toBe(30);
    expect(second.state.status).toBe('red');
  });

  it('never lets related events point outside the cycle', () => {
    const { pipeline, advance } = createPipeline();
    const inputs: MarketSnapshot[] = [
      { northBoundFlow: -100 },
      { northBoundFlow: 500, topSectorChangePct: -3 },
      { indexChangePct: -1, limitDownCount: 5, bombRate: 40, topSectorChangePct: -3 },
    ];
    for (const input of inputs) {
      const result = pipeline.runCycle(input);
      const ids = new Set(result.events.map((e) => e.id));
      for (const notification of result.notifications) {
        expect(notification.relatedEvents.every((id) => ids.has(id))).toBe(true);
      }
      advance(1_000);
    }
  });

  it('gives each pipeline its own state', () => {
    const a = createPipeline().pipeline;
    const b = createPipeline().pipeline;
    a.runCycle({ northBoundFlow: -15_000_000 });
    expect(a.stateManager.getCurrentState().sentimentScore).toBe(40);
    expect(b.stateManager.getCurrentState().sentimentScore).toBe(50);
    expect(b.runCycle({ northBoundFlow: -15_000_000 }).notifications).toHaveLength(1);
  });

  it('uses an injected history window', () => {
    const history = new HistoryWindow(2);
    const pipeline = new MarketPipeline({ history, logger: new Logger('error') });
    pipeline.runCycle({ volume: 1 });
    pipeline.runCycle({ volume: 2 });
    pipeline.runCycle({ volume: 3 });
    expect(history.toArray().map((s) => s.volume)).toEqual([2, 3]);
  });

  it('plays the demo scenario', () => {
    const { pipeline } = createPipeline();
    const steps = runScenario(buildDemoScenario({ random: () => 0.5 }), pipeline);

    expect(steps.map((s) => s.result.events.map((e) => e.subtype))).toEqual([
      ['sentiment_turning_up'],
      ['flow_reversal'],
      ['sentiment_turning_down', 'theme_emergence'],
    ]);
    expect(steps.map((s) => s.result.state.sentimentScore)).toEqual([60, 65, 60]);
    expect(steps.map((s) => s.result.notifications[0]?.format)).toEqual(['flash', 'flash', 'alert']);

    const alert = steps[2]?.result.notifications[0];
    expect(alert?.lines).toEqual([
      'Market sentiment turning down: limit downs increasing.',
      'Market Status: YELLOW',
    ]);
    expect(alert?.relatedEvents).toEqual([steps[2]?.result.events[0]?.id]);
    expect(steps[2]?.result.state.mainDriver).toBe('New market theme emerging: Semiconductor.');
    expect(pipeline.history.size).toBe(33);
  });
});
