/**
 * Core type definitions for Market Pulse
 */

import { z } from 'zod';

// ============================================================================
// Snapshot Types
// ============================================================================

/**
 * One reading of market metrics. Any metric may be absent; consumers read an
 * absent or non-finite metric as 0 and an absent sector as ''.
 */
export interface MarketSnapshot {
  /** Epoch milliseconds */
  timestamp?: number;
  volume?: number;
  indexChangePct?: number;
  northBoundFlow?: number;
  limitDownCount?: number;
  /** Share of limit-up names that failed to hold, 0-100 */
  bombRate?: number;
  topSector?: string;
  topSectorChangePct?: number;
}

const SNAKE_CASE_ALIASES: Record<string, keyof MarketSnapshot> = {
  index_change_pct: 'indexChangePct',
  north_bound_flow: 'northBoundFlow',
  limit_down_count: 'limitDownCount',
  bomb_rate: 'bombRate',
  top_sector: 'topSector',
  top_sector_change_pct: 'topSectorChangePct',
};

export function toFiniteNumber(value: unknown): number {
  const n = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  return typeof n === 'number' && Number.isFinite(n) ? n : 0;
}

function toTimestamp(value: unknown): number | null {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : value.getTime();
  if (typeof value === 'string') {
    const parsed = Date.parse(value);
    return Number.isNaN(parsed) ? null : parsed;
  }
  return null;
}

function aliasSnakeCase(raw: unknown): Record<string, unknown> {
  if (!raw || typeof raw !== 'object' || Array.isArray(raw)) return {};
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(raw)) {
    const alias = SNAKE_CASE_ALIASES[key];
    if (alias) {
      if (out[alias] === undefined) out[alias] = value;
    } else {
      out[key] = value;
    }
  }
  return out;
}

const metric = z.preprocess(toFiniteNumber, z.number());

const SnapshotFieldsSchema = z.object({
  timestamp: z.preprocess(toTimestamp, z.number().nullable()),
  volume: metric,
  indexChangePct: metric,
  northBoundFlow: metric,
  limitDownCount: metric,
  bombRate: metric,
  topSector: z.preprocess((value) => (typeof value === 'string' ? value.trim() : ''), z.string()),
  topSectorChangePct: metric,
});

/** Accepts camelCase or snake_case keys; missing metrics parse to 0. */
export const SnapshotSchema = z.preprocess(aliasSnakeCase, SnapshotFieldsSchema);

export type NormalizedSnapshot = Required<MarketSnapshot>;

export function normalizeSnapshot(raw: unknown, now: number = Date.now()): NormalizedSnapshot {
  const parsed = SnapshotSchema.parse(raw);
  return { ...parsed, timestamp: parsed.timestamp ?? now };
}

export function neutralSnapshot(now: number = Date.now()): NormalizedSnapshot {
  return normalizeSnapshot({}, now);
}

// ============================================================================
// Event Types
// ============================================================================

export const EventTypeSchema = z.literal('anomaly_detection');
export type EventType = z.infer<typeof EventTypeSchema>;

export const EventSubtypeSchema = z.enum([
  'sentiment_turning_up',
  'sentiment_turning_down',
  'flow_reversal',
  'flow_withdrawal',
  'theme_emergence',
  'theme_exhaustion',
]);
export type EventSubtype = z.infer<typeof EventSubtypeSchema>;

export const EventLevelSchema = z.enum(['low', 'medium', 'high']);
export type EventLevel = z.infer<typeof EventLevelSchema>;

export const MarketEventSchema = z.object({
  id: z.string(),
  timestamp: z.number(),
  type: EventTypeSchema,
  subtype: EventSubtypeSchema,
  level: EventLevelSchema,
  data: z.record(z.union([z.number(), z.string()])),
  description: z.string(),
});
export type MarketEvent = z.infer<typeof MarketEventSchema>;

// ============================================================================
// State Types
// ============================================================================

export const MarketStatusSchema = z.enum(['red', 'yellow', 'green']);
export type MarketStatus = z.infer<typeof MarketStatusSchema>;

export const MarketStateSchema = z.object({
  timestamp: z.number(),
  status: MarketStatusSchema,
  sentimentScore: z.number().min(0).max(100),
  mainDriver: z.string(),
  summary: z.string(),
});
export type MarketState = z.infer<typeof MarketStateSchema>;

// ============================================================================
// Notification Types
// ============================================================================

export const NotificationFormatSchema = z.enum(['flash', 'card', 'alert']);
export type NotificationFormat = z.infer<typeof NotificationFormatSchema>;

export const NotificationSchema = z.object({
  id: z.string(),
  timestamp: z.number(),
  format: NotificationFormatSchema,
  title: z.string(),
  lines: z.array(z.string()),
  relatedEvents: z.array(z.string()),
});
export type Notification = z.infer<typeof NotificationSchema>;

// ============================================================================
// Serialization
// ============================================================================

export function serializeEvent(event: MarketEvent): string {
  return JSON.stringify(event);
}

export function parseEvent(text: string): MarketEvent {
  return MarketEventSchema.parse(JSON.parse(text));
}

export function serializeState(state: MarketState): string {
  return JSON.stringify(state);
}

export function parseState(text: string): MarketState {
  return MarketStateSchema.parse(JSON.parse(text));
}

export function serializeNotification(notification: Notification): string {
  return JSON.stringify(notification);
}

export function parseNotification(text: string): Notification {
  return NotificationSchema.parse(JSON.parse(text));
}

// ============================================================================
// Cycle Types
// ============================================================================

export interface CycleResult {
  snapshot: MarketSnapshot;
  events: MarketEvent[];
  state: MarketState;
  notifications: Notification[];
}

export type Clock = () => number;
