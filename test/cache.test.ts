import { describe, expect, it } from 'vitest';
import { ListingCache, NOT_FOUND, ResolutionCache, normalizeName, type Resolution } from '../src/resolve/cache.js';

describe('normalizeName', () => {
  it('trims, collapses whitespace and lowercases', () => {
    expect(normalizeName('  Jane   DOE ')).toBe('jane doe');
    expect(normalizeName(undefined)).toBe('');
  });
});

describe('ResolutionCache', () => {
  it('calls the loader once per key, negative outcomes included', async () => {
    const cache = new ResolutionCache();
    let loads = 0;
    const loader = async (): Promise<Resolution> => {
      loads++;
      return NOT_FOUND;
    };

    expect(await cache.resolve('user', 'Ghost', loader)).toBe(NOT_FOUND);
    expect(await cache.resolve('user', ' ghost ', loader)).toBe(NOT_FOUND);
    expect(loads).toBe(1);
    expect(cache.stats()).toEqual({ entries: 1, hits: 1, misses: 1 });
  });

  it('keeps kinds and scopes apart', async () => {
    const cache = new ResolutionCache();
    await cache.resolve('phase', 'Design', async () => 7, 33);
    await cache.resolve('phase', 'Design', async () => NOT_FOUND, 104);
    await cache.resolve('user', 'Design', async () => 1);

    expect(cache.peek('phase', 'Design', 33)).toBe(7);
    expect(cache.peek('phase', ' Design ', 104)).toBe(NOT_FOUND);
    expect(cache.peek('phase', 'design', 33)).toBeUndefined();
    expect(cache.peek('user', 'design')).toBe(1);
    expect(cache.peek('company', 'design')).toBeUndefined();
  });

  it('does not store loader errors', async () => {
    const cache = new ResolutionCache();
    await expect(
      cache.resolve('company', 'Acme', async () => {
        throw new Error('down');
      }),
    ).rejects.toThrow('down');

    expect(cache.peek('company', 'Acme')).toBeUndefined();
    expect(await cache.resolve('company', 'Acme', async () => 50)).toBe(50);
  });
});

describe('ListingCache', () => {
  it('loads once and appends to a loaded listing only', async () => {
    const listing = new ListingCache<number>();
    let loads = 0;
    const loader = async () => {
      loads++;
      return [1, 2];
    };

    listing.append('a', 9);
    expect(listing.has('a')).toBe(false);

    expect(await listing.get('a', loader)).toEqual([1, 2]);
    listing.append('a', 3);
    expect(await listing.get('a', loader)).toEqual([1, 2, 3]);
    expect(loads).toBe(1);
  });
});
