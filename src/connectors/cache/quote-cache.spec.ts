import { describe, it, expect } from 'vitest';
import { QuoteCache } from './quote-cache';

describe('QuoteCache', () => {
  it('should serve an entry inside the TTL window', () => {
    const cache = new QuoteCache<number>(1000);
    cache.set('BTC/USDT', 45000, 10_000);

    expect(cache.get('BTC/USDT', 10_999)).toBe(45000);
  });

  it('should expire an entry at the TTL boundary', () => {
    const cache = new QuoteCache<number>(1000);
    cache.set('BTC/USDT', 45000, 10_000);

    expect(cache.get('BTC/USDT', 11_000)).toBeNull();
    expect(cache.size).toBe(0);
  });

  it('should never serve entries when TTL is zero', () => {
    const cache = new QuoteCache<number>(0);
    cache.set('ETH/USDT', 3200, 5_000);

    expect(cache.get('ETH/USDT', 5_000)).toBeNull();
  });

  it('should drop everything on clear', () => {
    const cache = new QuoteCache<string>(1000);
    cache.set('a', 'x');
    cache.set('b', 'y');

    cache.clear();

    expect(cache.size).toBe(0);
  });
});
