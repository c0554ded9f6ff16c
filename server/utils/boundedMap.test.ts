/**
 * Unit Tests for BoundedMap
 *
 * Run with: npx vitest run server/utils/boundedMap.test.ts
 */

import { describe, it, expect } from 'vitest';
import { BoundedMap } from './boundedMap';

const createClock = (start = 0) => {
  let now = start;
  return {
    now: () => now,
    advance: (ms: number) => {
      now += ms;
    },
  };
};

describe('BoundedMap', () => {
  it('should reject a non-positive size', () => {
    expect(() => new BoundedMap({ maxSize: 0 })).toThrow('maxSize must be at least 1');
  });

  it('should evict the least recently used entry when full', () => {
    const map = new BoundedMap<string, number>({ maxSize: 2 });
    map.set('a', 1);
    map.set('b', 2);
    map.get('a'); // a is now most recent
    map.set('c', 3);

    expect(map.has('a')).toBe(true);
    expect(map.has('b')).toBe(false);
    expect(map.get('c')).toBe(3);
    expect(map.size).toBe(2);
  });

  it('should not evict when overwriting an existing key', () => {
    const map = new BoundedMap<string, number>({ maxSize: 2 });
    map.set('a', 1);
    map.set('b', 2);
    map.set('a', 10);

    expect(map.get('a')).toBe(10);
    expect(map.get('b')).toBe(2);
  });

  it('should expire entries older than the TTL', () => {
    const clock = createClock();
    const map = new BoundedMap<string, string>({ maxSize: 10, ttlMs: 1000, now: clock.now });
    map.set('plan', 'value');

    clock.advance(1000);
    expect(map.get('plan')).toBe('value');

    clock.advance(1);
    expect(map.get('plan')).toBeUndefined();
    expect(map.has('plan')).toBe(false);
  });

  it('should prune expired entries when counting', () => {
    const clock = createClock();
    const map = new BoundedMap<string, number>({ maxSize: 10, ttlMs: 100, now: clock.now });
    map.set('old', 1);
    clock.advance(50);
    map.set('new', 2);
    clock.advance(60);

    expect(map.size).toBe(1);
    expect(map.get('new')).toBe(2);
  });
});
