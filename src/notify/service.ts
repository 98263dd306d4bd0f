import { randomUUID } from 'node:crypto';

import type {
  Clock,
  EventSubtype,
  MarketEvent,
  MarketState,
  Notification,
  NotificationFormat,
} from '../types/index.js';
import { Logger } from '../core/logger.js';

export const THROTTLE_WINDOW_MS = 30 * 60 * 1000;
export const MAX_ALERT_LINES = 3;
export const MAX_CARD_LINES = 2;

export const NOTIFICATION_TITLES: Record<NotificationFormat, string> = {
  alert: 'Market Alert',
  card: 'Market Signals',
  flash: 'Market Flash',
};

export class NotificationService {
  private sentNotifications: Notification[] = [];
  private lastSentAt = new Map<EventSubtype, number>();
  private now: Clock;
  private logger: Logger;

  constructor(options?: { now?: Clock; logger?: Logger }) {
    this.now = options?.now ?? Date.now;
    this.logger = options?.logger ?? new Logger('info');
  }

  /**
   * Returns zero or one notification for the cycle. High-level events win:
   * medium and low events admitted alongside them are consumed by the throttle
   * but not shown.
   */
  generateNotifications(events: readonly MarketEvent[], state: MarketState): Notification[] {
    const admitted = this.admit(events);
    if (admitted.length === 0) return [];

    const notification = this.compose(admitted, state);
    this.sentNotifications.push(notification);
    this.logger.debug(`Notification ${notification.format}: ${notification.title}`, notification.lines);
    return [notification];
  }

  getSentNotifications(limit?: number): Notification[] {
    if (limit === undefined) return [...this.sentNotifications];
    return limit > 0 ? this.sentNotifications.slice(-limit) : [];
  }

  getLastSentAt(subtype: EventSubtype): number | null {
    return this.lastSentAt.get(subtype) ?? null;
  }

  private admit(events: readonly MarketEvent[]): MarketEvent[] {
    const admitted: MarketEvent[] = [];
    for (const event of events) {
      const now = this.now();
      const last = this.lastSentAt.get(event.subtype);
      if (last !== undefined && now - last <= THROTTLE_WINDOW_MS) {
        this.logger.debug(`Throttled ${event.subtype}`);
        continue;
      }
      this.lastSentAt.set(event.subtype, now);
      admitted.push(event);
    }
    return admitted;
  }

  private compose(admitted: MarketEvent[], state: MarketState): Notification {
    const high = admitted.filter((event) => event.level === 'high');
    if (high.length > 0) {
      const lines = high.slice(0, MAX_ALERT_LINES).map((event) => event.description);
      lines.push(`Market Status: ${state.status.toUpperCase()}`);
      return this.build('alert', lines, high);
    }

    if (admitted.length >= 2) {
      const lines = admitted.slice(0, MAX_CARD_LINES).map((event) => event.description);
      lines.push(`Sentiment Score: ${state.sentimentScore}`);
      return this.build('card', lines, admitted);
    }

    return this.build(
      'flash',
      admitted.map((event) => event.description),
      admitted
    );
  }

  private build(format: NotificationFormat, lines: string[], related: MarketEvent[]): Notification {
    return Object.freeze({
      id: `notif_${randomUUID()}`,
      timestamp: this.now(),
      format,
      title: NOTIFICATION_TITLES[format],
      lines,
      relatedEvents: related.map((event) => event.id),
    });
  }
}
