import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';

import { z } from 'zod';
import yaml from 'yaml';

import { parseLogLevel } from './logger.js';

const expandHome = (value: string): string => {
  if (value.startsWith('~/')) {
    return join(homedir(), value.slice(2));
  }
  return value;
};

const ConfigSchema = z.object({
  pipeline: z
    .object({
      historySize: z.number().int().positive().default(100),
      initialScore: z.number().min(0).max(100).default(50),
    })
    .default({}),
  monitor: z
    .object({
      intervalSeconds: z.number().positive().default(60),
      maxCycles: z.number().int().positive().optional(),
      provider: z.enum(['mock', 'replay']).default('mock'),
      replayFile: z.string().optional(),
    })
    .default({}),
  notifications: z
    .object({
      displayLimit: z.number().int().positive().default(20),
    })
    .default({}),
  logging: z
    .object({
      level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    })
    .default({}),
});

export type MarketPulseConfig = z.infer<typeof ConfigSchema>;

export function defaultConfigPath(): string {
  return join(homedir(), '.market-pulse', 'config.yaml');
}

export function parseConfig(raw: unknown): MarketPulseConfig {
  return ConfigSchema.parse(raw ?? {});
}

export function loadConfig(configPath?: string): MarketPulseConfig {
  const path = expandHome(configPath ?? process.env.PULSE_CONFIG_PATH ?? defaultConfigPath());

  let parsed: unknown = {};
  if (existsSync(path)) {
    const raw = readFileSync(path, 'utf-8');
    parsed = yaml.parse(raw) ?? {};
  } else if (configPath) {
    throw new Error(`Config file not found: ${path}`);
  }

  const cfg = parseConfig(parsed);

  cfg.logging.level = parseLogLevel(process.env.PULSE_LOG_LEVEL, cfg.logging.level);

  const envInterval = process.env.PULSE_INTERVAL_SECONDS;
  if (envInterval) {
    const interval = Number(envInterval);
    if (!Number.isNaN(interval) && interval > 0) {
      cfg.monitor.intervalSeconds = interval;
    }
  }

  if (cfg.monitor.replayFile) {
    cfg.monitor.replayFile = expandHome(cfg.monitor.replayFile);
  }

  return cfg;
}
