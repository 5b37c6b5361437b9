import { describe, it, expect } from 'vitest';
import { TtlCache } from './ttl-cache.js';

describe('TtlCache', () => {
  function createClock(start = 0): { now: () => number; advance: (ms: number) => void } {
    let current = start;
    return {
      now: (): number => current,
      advance: (ms: number): void => {
        current += ms;
      },
    };
  }

  it('should return stored values before they expire', () => {
    const clock = createClock();
    const cache = new TtlCache<string>({ maxSize: 10, ttlMs: 1000, now: clock.now });

    cache.set('push:chest:5', 'cached');
    clock.advance(1000);

    expect(cache.get('push:chest:5')).toBe('cached');
  });

  it('should drop entries older than the ttl', () => {
    const clock = createClock();
    const cache = new TtlCache<string>({ maxSize: 10, ttlMs: 1000, now: clock.now });

    cache.set('key', 'value');
    clock.advance(1001);

    expect(cache.get('key')).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  it('should evict the oldest fifth when full', () => {
    const cache = new TtlCache<number>({ maxSize: 10, ttlMs: 60_000 });
    for (let i = 0; i < 10; i++) {
      cache.set(`k${i}`, i);
    }

    cache.set('k10', 10);

    expect(cache.size).toBe(9);
    expect(cache.get('k0')).toBeUndefined();
    expect(cache.get('k1')).toBeUndefined();
    expect(cache.get('k2')).toBe(2);
    expect(cache.get('k10')).toBe(10);
  });

  it('should evict at least one entry for tiny caches', () => {
    const cache = new TtlCache<number>({ maxSize: 2, ttlMs: 60_000 });
    cache.set('a', 1);
    cache.set('b', 2);
    cache.set('c', 3);

    expect(cache.get('a')).toBeUndefined();
    expect(cache.get('b')).toBe(2);
    expect(cache.get('c')).toBe(3);
  });

  it('should overwrite an existing key without evicting', () => {
    const cache = new TtlCache<number>({ maxSize: 2, ttlMs: 60_000 });
    cache.set('a', 1);
    cache.set('b', 2);
    cache.set('a', 3);

    expect(cache.size).toBe(2);
    expect(cache.get('a')).toBe(3);
    expect(cache.get('b')).toBe(2);
  });
});
