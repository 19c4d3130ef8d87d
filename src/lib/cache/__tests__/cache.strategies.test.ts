/**
 * Cache Strategy Tests
 */

import { TTLCacheStrategy } from '../cache.strategies';
import type { CacheEntry } from '../cache.types';

function entry(value: string): CacheEntry<string> {
  return { value, createdAt: Date.now() };
}

describe('TTLCacheStrategy', () => {
  let nowSpy: jest.SpyInstance<number, []>;
  let now: number;

  beforeEach(() => {
    now = 1_700_000_000_000;
    nowSpy = jest.spyOn(Date, 'now').mockImplementation(() => now);
  });

  afterEach(() => {
    nowSpy.mockRestore();
  });

  it('should store and return entries', () => {
    const cache = new TTLCacheStrategy<string>();
    cache.set('a', entry('alpha'));

    expect(cache.get('a')?.value).toBe('alpha');
    expect(cache.get('missing')).toBeUndefined();
  });

  it('should expire entries after their TTL', () => {
    const cache = new TTLCacheStrategy<string>();
    cache.set('a', entry('alpha'), 60);

    now += 60_000;
    expect(cache.get('a')?.value).toBe('alpha');

    now += 1;
    expect(cache.get('a')).toBeUndefined();
    expect(cache.size()).toBe(0);
  });

  it('should evict the oldest entry when full', () => {
    const cache = new TTLCacheStrategy<string>(2);
    cache.set('a', entry('alpha'));
    cache.set('b', entry('beta'));
    cache.set('c', entry('gamma'));

    expect(cache.get('a')).toBeUndefined();
    expect(cache.get('b')?.value).toBe('beta');
    expect(cache.get('c')?.value).toBe('gamma');
  });

  it('should not evict when overwriting a key', () => {
    const cache = new TTLCacheStrategy<string>(2);
    cache.set('a', entry('alpha'));
    cache.set('b', entry('beta'));
    cache.set('a', entry('alpha 2'));

    expect(cache.size()).toBe(2);
    expect(cache.get('a')?.value).toBe('alpha 2');
    expect(cache.get('b')?.value).toBe('beta');
  });

  it('should clean only expired entries', () => {
    const cache = new TTLCacheStrategy<string>();
    cache.set('short', entry('s'), 1);
    cache.set('long', entry('l'), 100);
    cache.set('forever', entry('f'));

    now += 2_000;

    expect(cache.cleanExpired()).toBe(1);
    expect(cache.size()).toBe(2);
  });

  it('should delete and clear entries', () => {
    const cache = new TTLCacheStrategy<string>();
    cache.set('a', entry('alpha'));
    cache.set('b', entry('beta'));

    expect(cache.delete('a')).toBe(true);
    expect(cache.delete('a')).toBe(false);

    cache.clear();
    expect(cache.size()).toBe(0);
  });
});
