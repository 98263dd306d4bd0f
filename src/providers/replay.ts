import { readFileSync } from 'node:fs';

import yaml from 'yaml';

import { neutralSnapshot, normalizeSnapshot } from '../types/index.js';
import type { Clock, NormalizedSnapshot } from '../types/index.js';
import type { SnapshotProvider } from './types.js';

/**
 * Parses a YAML or JSON document holding a list of snapshots, either at the
 * top level or under a `snapshots` key.
 */
export function parseSnapshotDocument(raw: string, now: number = Date.now()): NormalizedSnapshot[] {
  const doc: unknown = yaml.parse(raw);
  let items: unknown = doc;
  if (doc && typeof doc === 'object' && !Array.isArray(doc) && 'snapshots' in doc) {
    items = doc.snapshots;
  }
  if (!Array.isArray(items)) {
    throw new Error('Snapshot document must be a list or contain a "snapshots" list');
  }
  return items.map((item: unknown) => normalizeSnapshot(item, now));
}

export function loadSnapshotFile(path: string, now: number = Date.now()): NormalizedSnapshot[] {
  const raw = readFileSync(path, 'utf-8');
  try {
    return parseSnapshotDocument(raw, now);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid snapshot file ${path}: ${message}`);
  }
}

/** Serves recorded snapshots in order, then neutral ones once exhausted. */
export class ReplaySnapshotProvider implements SnapshotProvider {
  readonly name = 'replay';
  private index = 0;
  private now: Clock;

  constructor(
    private snapshots: NormalizedSnapshot[],
    options?: { now?: Clock }
  ) {
    this.now = options?.now ?? Date.now;
  }

  static fromFile(path: string, options?: { now?: Clock }): ReplaySnapshotProvider {
    return new ReplaySnapshotProvider(loadSnapshotFile(path), options);
  }

  get remaining(): number {
    return Math.max(0, this.snapshots.length - this.index);
  }

  async getLatestSnapshot(): Promise<NormalizedSnapshot> {
    const next = this.snapshots[this.index];
    if (!next) {
      return neutralSnapshot(this.now());
    }
    this.index += 1;
    return next;
  }
}
