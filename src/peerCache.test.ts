import { describe, it, expect } from 'vitest';
import { PeerCache } from './peerCache';

describe('PeerCache', () => {
  function setup() {
    let now = 1_000_000;
    const cache = new PeerCache(90_000, () => now);
    return { cache, advance: (ms: number) => { now += ms; } };
  }

  it('reports and remembers a positive count', () => {
    const { cache } = setup();
    expect(cache.resolve(6)).toBe('6');
    expect(cache.resolve(null)).toBe('6');
  });

  it('stops bridging once the cached value is stale', () => {
    const { cache, advance } = setup();
    cache.resolve(6);
    advance(90_000);
    expect(cache.resolve(null)).toBe('6');
    advance(1);
    expect(cache.resolve(null)).toBe('N/A');
  });

  it('reports an observed zero as zero', () => {
    const { cache } = setup();
    cache.resolve(6);
    expect(cache.resolve(0)).toBe('0');
  });

  it('is N/A with no history', () => {
    expect(setup().cache.resolve(null)).toBe('N/A');
  });

  it('prefers a new signal over the cached one', () => {
    const { cache, advance } = setup();
    cache.resolve(6);
    advance(200_000);
    expect(cache.resolve(2)).toBe('2');
  });
});
