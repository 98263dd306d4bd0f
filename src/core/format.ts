import type { CycleResult, MarketEvent, MarketState, Notification } from '../types/index.js';

export function formatEvents(events: readonly MarketEvent[]): string[] {
  if (events.length === 0) {
    return ['-> No events generated'];
  }
  const lines = [`-> Generated ${events.length} event(s):`];
  for (const event of events) {
    lines.push(`   - [${event.subtype}] ${event.description}`);
  }
  return lines;
}

export function formatState(state: MarketState): string {
  return `-> Market state: ${state.status.toUpperCase()} (score: ${state.sentimentScore})`;
}

export function formatNotification(notification: Notification): string[] {
  const lines = [`-> Notification (${notification.format}): ${notification.title}`];
  for (const line of notification.lines) {
    lines.push(`   ${line}`);
  }
  return lines;
}

export function formatCycle(result: CycleResult, label?: string): string {
  const lines: string[] = [];
  if (label) {
    lines.push(`[${label}]`);
  }
  lines.push(...formatEvents(result.events));
  lines.push(formatState(result.state));
  if (result.notifications.length === 0) {
    lines.push('-> No notification (throttled or empty)');
  }
  for (const notification of result.notifications) {
    lines.push(...formatNotification(notification));
  }
  return lines.join('\n');
}

/** Newest first, capped for display. */
export function formatNotificationFeed(notifications: readonly Notification[], limit: number): string {
  const recent = limit > 0 ? notifications.slice(-limit).reverse() : [];
  if (recent.length === 0) {
    return 'No notifications yet.';
  }
  const lines: string[] = [];
  lines.push('Notification Feed');
  lines.push('─'.repeat(40));
  for (const notification of recent) {
    const time = new Date(notification.timestamp).toISOString();
    lines.push(`${time} [${notification.format.toUpperCase()}] ${notification.title}`);
    for (const line of notification.lines) {
      lines.push(`  - ${line}`);
    }
  }
  return lines.join('\n');
}
