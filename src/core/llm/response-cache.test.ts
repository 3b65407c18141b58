/**
 * Tests for ResponseCache
 */

import { describe, it, expect } from 'vitest';
import { ResponseCache } from './response-cache.js';

describe('ResponseCache', () => {
  it('should keep the first response written for a prompt', () => {
    const cache = new ResponseCache(10);
    cache.set('q', 'first');
    cache.set('q', 'second');
    expect(cache.get('q')).toBe('first');
  });

  it('should evict the least recently used entry when full', () => {
    const cache = new ResponseCache(2);
    cache.set('a', '1');
    cache.set('b', '2');
    cache.get('a');
    cache.set('c', '3');

    expect(cache.has('a')).toBe(true);
    expect(cache.has('b')).toBe(false);
    expect(cache.has('c')).toBe(true);
    expect(cache.size).toBe(2);
  });

  it('should count hits and misses and reset them on clear', () => {
    const cache = new ResponseCache(3);
    cache.get('missing');
    cache.set('k', 'v');
    cache.get('k');

    expect(cache.stats()).toEqual({ hits: 1, misses: 1, size: 1, maxEntries: 3 });

    cache.clear();
    expect(cache.stats()).toEqual({ hits: 0, misses: 0, size: 0, maxEntries: 3 });
  });

  it('should reject a non-positive capacity', () => {
    expect(() => new ResponseCache(0)).toThrow('Response cache maxEntries must be at least 1');
  });
});
