import { describe, it, expect } from 'vitest';

import { HistoryWindow, DEFAULT_HISTORY_SIZE } from '../../src/core/history.js';

describe('core/history', () => {
  it('defaults to 100 entries and evicts the oldest first', () => {
    const history = new HistoryWindow();
    expect(history.capacity).toBe(DEFAULT_HISTORY_SIZE);
    for (let i = 0; i < 105; i++) {
      history.push({ volume: i });
    }
    expect(history.size).toBe(100);
    expect(history.toArray()[0]?.volume).toBe(5);
    expect(history.latest()?.volume).toBe(104);
  });

  it('seeds from an initial list within capacity', () => {
    const history = new HistoryWindow(2, [{ volume: 1 }, { volume: 2 }, { volume: 3 }]);
    expect(history.toArray().map((s) => s.volume)).toEqual([2, 3]);
  });

  it('amends the newest entry with a copy', () => {
    const original = { northBoundFlow: 500_000, volume: 10 };
    const history = new HistoryWindow(5, [original]);
    history.amendLatest({ northBoundFlow: -200_000 });
    expect(history.latest()).toEqual({ northBoundFlow: -200_000, volume: 10 });
    expect(original.northBoundFlow).toBe(500_000);
  });

  it('handles the empty window', () => {
    const history = new HistoryWindow(3);
    history.amendLatest({ volume: 1 });
    expect(history.latest()).toBeNull();
    expect(history.size).toBe(0);
  });

  it('rejects a non-positive capacity', () => {
    expect(() => new HistoryWindow(0)).toThrow('History capacity must be a positive integer, got 0');
  });

  it('clears', () => {
    const history = new HistoryWindow(3, [{ volume: 1 }]);
    history.clear();
    expect(history.size).toBe(0);
  });
});
