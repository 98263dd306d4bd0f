import { afterEach, describe, it, expect } from 'vitest';
import { mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ZodError } from 'zod';

import { loadConfig, parseConfig } from '../../src/core/config.js';

function writeConfig(lines: string[]): string {
  const dir = mkdtempSync(join(tmpdir(), 'pulse-config-'));
  const path = join(dir, 'config.yaml');
  writeFileSync(path, lines.join('\n'), 'utf-8');
  return path;
}

describe('core/config', () => {
  const savedEnv = { ...process.env };

  afterEach(() => {
    process.env = { ...savedEnv };
  });

  it('fills every default from an empty document', () => {
    expect(parseConfig({})).toEqual({
      pipeline: { historySize: 100, initialScore: 50 },
      monitor: { intervalSeconds: 60, provider: 'mock' },
      notifications: { displayLimit: 20 },
      logging: { level: 'info' },
    });
    expect(parseConfig(null).pipeline.historySize).toBe(100);
  });

  it('loads a YAML file', () => {
    const path = writeConfig([
      'pipeline:',
      '  historySize: 50',
      'monitor:',
      '  intervalSeconds: 5',
      '  maxCycles: 12',
      'logging:',
      '  level: debug',
      '',
    ]);
    const cfg = loadConfig(path);
    expect(cfg.pipeline).toEqual({ historySize: 50, initialScore: 50 });
    expect(cfg.monitor.intervalSeconds).toBe(5);
    expect(cfg.monitor.maxCycles).toBe(12);
    expect(cfg.logging.level).toBe('debug');
  });

  it('rejects out-of-range values', () => {
    const path = writeConfig(['pipeline:', '  initialScore: 150', '']);
    expect(() => loadConfig(path)).toThrow(ZodError);
  });

  it('throws for an explicit path that does not exist', () => {
    const missing = join(tmpdir(), 'pulse-missing', 'config.yaml');
    expect(() => loadConfig(missing)).toThrow(`Config file not found: ${missing}`);
  });

  it('uses defaults when the env-selected file is absent', () => {
    process.env.PULSE_CONFIG_PATH = join(tmpdir(), 'pulse-missing', 'config.yaml');
    delete process.env.PULSE_LOG_LEVEL;
    delete process.env.PULSE_INTERVAL_SECONDS;
    expect(loadConfig().monitor.intervalSeconds).toBe(60);
  });

  it('applies environment overrides', () => {
    const path = writeConfig(['logging:', '  level: warn', '']);
    process.env.PULSE_LOG_LEVEL = 'ERROR';
    process.env.PULSE_INTERVAL_SECONDS = '15';
    const cfg = loadConfig(path);
    expect(cfg.logging.level).toBe('error');
    expect(cfg.monitor.intervalSeconds).toBe(15);
  });

  it('ignores an unknown log level from the environment', () => {
    const path = writeConfig(['logging:', '  level: warn', '']);
    process.env.PULSE_LOG_LEVEL = 'verbose';
    expect(loadConfig(path).logging.level).toBe('warn');
  });
});
