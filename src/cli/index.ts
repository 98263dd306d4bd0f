#!/usr/bin/env node
import 'dotenv/config';
/**
 * Market Pulse CLI
 *
 * Command-line interface for running the detection pipeline.
 */

import { Command } from 'commander';
import { ZodError } from 'zod';
import yaml from 'yaml';

import { VERSION } from '../index.js';
import { loadConfig, type MarketPulseConfig } from '../core/config.js';
import { Logger } from '../core/logger.js';
import { MarketPipeline } from '../core/pipeline.js';
import { MarketMonitor } from '../core/monitor.js';
import { formatCycle, formatNotificationFeed } from '../core/format.js';
import { MockSnapshotProvider } from '../providers/mock.js';
import { ReplaySnapshotProvider, loadSnapshotFile } from '../providers/replay.js';
import type { SnapshotProvider } from '../providers/types.js';
import { buildDemoScenario, runScenario } from '../simulation/scenario.js';
import { parsePositive, parsePositiveInt } from './options.js';
import type { CycleResult } from '../types/index.js';

function resolveConfig(): MarketPulseConfig {
  const { config: configPath } = program.opts<{ config?: string }>();
  return loadConfig(configPath);
}

function createPipeline(
  config: MarketPulseConfig,
  logger: Logger,
  useSnapshotTime = false
): MarketPipeline {
  return new MarketPipeline({
    historySize: config.pipeline.historySize,
    initialScore: config.pipeline.initialScore,
    useSnapshotTime,
    logger,
  });
}

function printCycle(result: CycleResult, label: string | undefined, json: boolean): void {
  if (json) {
    console.log(JSON.stringify({ label, ...result }));
    return;
  }
  console.log(formatCycle(result, label));
  console.log('');
}

function reportFailure(error: unknown): void {
  if (error instanceof ZodError) {
    console.error('Invalid configuration:');
    for (const issue of error.issues) {
      console.error(`- ${issue.path.join('.') || '(root)'}: ${issue.message}`);
    }
  } else {
    console.error(error instanceof Error ? error.message : String(error));
  }
  process.exitCode = 1;
}

const program = new Command();

program
  .name('pulse')
  .description('Market snapshot anomaly detection and alerting')
  .option('-c, --config <path>', 'Path to config.yaml')
  .version(VERSION);

// ============================================================================
// Simulation Commands
// ============================================================================

program
  .command('simulate')
  .description('Run the scripted demo scenario through a fresh pipeline')
  .option('--json', 'Print one JSON record per step', false)
  .action((options: { json: boolean }) => {
    try {
      const config = resolveConfig();
      const logger = new Logger(config.logging.level);
      const pipeline = createPipeline(config, logger);
      if (!options.json) {
        console.log('System initialized. Starting simulation...');
        console.log('─'.repeat(40));
      }
      for (const step of runScenario(buildDemoScenario(), pipeline)) {
        printCycle(step.result, step.label, options.json);
      }
    } catch (error) {
      reportFailure(error);
    }
  });

program
  .command('replay <file>')
  .description('Run every snapshot in a YAML/JSON file through one pipeline')
  .option('--json', 'Print one JSON record per cycle', false)
  .option('--quiet', 'Only print cycles that produced a notification', false)
  .action((file: string, options: { json: boolean; quiet: boolean }) => {
    try {
      const config = resolveConfig();
      const logger = new Logger(config.logging.level);
      const pipeline = createPipeline(config, logger, true);
      const snapshots = loadSnapshotFile(file);
      snapshots.forEach((snapshot, idx) => {
        const result = pipeline.runCycle(snapshot);
        if (options.quiet && result.notifications.length === 0) return;
        printCycle(result, `Cycle ${idx + 1}`, options.json);
      });
      if (!options.json) {
        console.log(
          formatNotificationFeed(
            pipeline.notificationService.getSentNotifications(),
            config.notifications.displayLimit
          )
        );
      }
    } catch (error) {
      reportFailure(error);
    }
  });

program
  .command('watch')
  .description('Poll a snapshot provider on an interval and print each cycle')
  .option('-n, --cycles <number>', 'Stop after this many cycles')
  .option('-i, --interval <seconds>', 'Seconds between cycles')
  .option('--replay <file>', 'Replay snapshots from a file instead of the mock feed')
  .option('--json', 'Print one JSON record per cycle', false)
  .action((options: { cycles?: string; interval?: string; replay?: string; json: boolean }) => {
    try {
      const config = resolveConfig();
      const logger = new Logger(config.logging.level);
      const replayFile =
        options.replay ?? (config.monitor.provider === 'replay' ? config.monitor.replayFile : undefined);
      if (config.monitor.provider === 'replay' && !replayFile) {
        throw new Error('monitor.provider is "replay" but no replay file was given.');
      }
      const provider: SnapshotProvider = replayFile
        ? ReplaySnapshotProvider.fromFile(replayFile)
        : new MockSnapshotProvider();

      const monitor = new MarketMonitor({
        provider,
        pipeline: createPipeline(config, logger, replayFile !== undefined),
        intervalSeconds: parsePositive(options.interval, 'Interval') ?? config.monitor.intervalSeconds,
        maxCycles: parsePositiveInt(options.cycles, 'Cycles') ?? config.monitor.maxCycles,
        logger,
      });

      monitor.on('cycle', (result) => {
        printCycle(result, `Cycle ${monitor.cycleCount}`, options.json);
      });
      monitor.on('stopped', () => {
        process.off('SIGINT', onInterrupt);
        if (!options.json) {
          console.log(
            formatNotificationFeed(
              monitor.pipeline.notificationService.getSentNotifications(),
              config.notifications.displayLimit
            )
          );
        }
      });

      const onInterrupt = (): void => monitor.stop();
      process.on('SIGINT', onInterrupt);
      monitor.start();
    } catch (error) {
      reportFailure(error);
    }
  });

// ============================================================================
// Config Commands
// ============================================================================

const configCmd = program.command('config').description('Configuration');

configCmd
  .command('show')
  .description('Print the effective configuration')
  .action(() => {
    try {
      console.log(yaml.stringify(resolveConfig()));
    } catch (error) {
      reportFailure(error);
    }
  });

// ============================================================================
// Parse and Run
// ============================================================================

program.parse();
