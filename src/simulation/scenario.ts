import type { Clock, CycleResult, MarketSnapshot } from '../types/index.js';
import type { MarketPipeline } from '../core/pipeline.js';

export interface ScenarioStep {
  label: string;
  snapshot: MarketSnapshot;
  /** Applied to the newest history entry before this step runs. */
  amendPrevious?: Partial<MarketSnapshot>;
}

export interface Scenario {
  baseline: MarketSnapshot[];
  steps: ScenarioStep[];
}

export interface ScenarioStepResult {
  label: string;
  result: CycleResult;
}

export const BASELINE_LENGTH = 30;

/**
 * Quiet Banking-led baseline followed by a volume spike, a northbound flow
 * reversal and a limit-down sell-off that also rotates the leading sector.
 */
export function buildDemoScenario(options?: { random?: () => number; now?: Clock }): Scenario {
  const random = options?.random ?? Math.random;
  const now = options?.now ?? Date.now;

  const baseline: MarketSnapshot[] = [];
  for (let i = 0; i < BASELINE_LENGTH; i++) {
    const jitter = Math.round((random() * 2 - 1) * 100_000);
    baseline.push({
      timestamp: now(),
      volume: 1_000_000 + jitter,
      indexChangePct: 0,
      northBoundFlow: 0,
      limitDownCount: 0,
      bombRate: 5,
      topSector: 'Banking',
    });
  }

  const steps: ScenarioStep[] = [
    {
      label: 'Sentiment turning up',
      snapshot: {
        timestamp: now(),
        volume: 1_400_000,
        indexChangePct: 0.5,
        northBoundFlow: 500_000,
        limitDownCount: 0,
        bombRate: 5,
        topSector: 'Banking',
      },
    },
    {
      label: 'Flow reversal',
      amendPrevious: { northBoundFlow: -200_000 },
      snapshot: {
        timestamp: now(),
        volume: 1_100_000,
        indexChangePct: 0.2,
        northBoundFlow: 300_000,
        limitDownCount: 0,
        bombRate: 5,
        topSector: 'Banking',
      },
    },
    {
      label: 'Multiple events (theme rotation + sentiment drop)',
      snapshot: {
        timestamp: now(),
        volume: 1_000_000,
        indexChangePct: -0.5,
        northBoundFlow: 0,
        limitDownCount: 4,
        bombRate: 35,
        topSector: 'Semiconductor',
        topSectorChangePct: 1.0,
      },
    },
  ];

  return { baseline, steps };
}

export function runScenario(scenario: Scenario, pipeline: MarketPipeline): ScenarioStepResult[] {
  for (const snapshot of scenario.baseline) {
    pipeline.history.push(snapshot);
  }

  const results: ScenarioStepResult[] = [];
  for (const step of scenario.steps) {
    if (step.amendPrevious) {
      pipeline.history.amendLatest(step.amendPrevious);
    }
    results.push({ label: step.label, result: pipeline.runCycle(step.snapshot) });
  }
  return results;
}
