import { describe, expect, it } from 'vitest';
import { RECENT_RECALL_TTL_MS, RecentRecallCache } from '../src/recall/recent-recall-cache';

describe('recent recall cache', () => {
  it('remembers ids for five minutes', () => {
    const cache = new RecentRecallCache();
    cache.mark('123', 1_000);

    expect(RECENT_RECALL_TTL_MS).toBe(300_000);
    expect(cache.has('123', 1_000 + 299_999)).toBe(true);
    expect(cache.has('123', 1_000 + 300_000)).toBe(false);
    expect(cache.has('456', 1_000)).toBe(false);
  });

  it('restarts the window when an id is marked again', () => {
    const cache = new RecentRecallCache(1_000);
    cache.mark('123', 0);
    cache.mark('123', 900);

    expect(cache.has('123', 1_500)).toBe(true);
    expect(cache.has('123', 1_900)).toBe(false);
  });
});
