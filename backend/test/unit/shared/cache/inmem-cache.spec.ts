import { describe, it, expect } from 'vitest';
import { InMemCache } from '../../../../src/shared/cache/inmem-cache';

function makeClock(startMs = 1_000_000) {
  let now = startMs;
  return {
    now: () => now,
    advanceSeconds: (s: number) => {
      now += s * 1000;
    },
  };
}

describe('InMemCache', () => {
  it('get/set/del', async () => {
    const cache = new InMemCache();

    await cache.set('k', 'v');
    expect(await cache.get('k')).toBe('v');

    await cache.del('k');
    expect(await cache.get('k')).toBeNull();
  });

  it('expires entries after ttlSeconds', async () => {
    const clock = makeClock();
    const cache = new InMemCache(clock.now);

    await cache.set('k', 'v', { ttlSeconds: 10 });

    clock.advanceSeconds(9);
    expect(await cache.get('k')).toBe('v');

    clock.advanceSeconds(1);
    expect(await cache.get('k')).toBeNull();
  });

  it('incr counts from 1 and keeps the window of the first hit', async () => {
    const clock = makeClock();
    const cache = new InMemCache(clock.now);

    expect(await cache.incr('c', { ttlSeconds: 60 })).toBe(1);

    clock.advanceSeconds(30);
    expect(await cache.incr('c', { ttlSeconds: 60 })).toBe(2);

    // window started at the first hit, not the second
    clock.advanceSeconds(30);
    expect(await cache.incr('c', { ttlSeconds: 60 })).toBe(1);
  });
});
