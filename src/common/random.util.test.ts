import { describe, expect, it } from '@jest/globals';
import { resolveCategories, resolveRegions } from '@/sampling/regions';
import { createRandomSource, seededRandom, shuffle } from './random.util';

describe('seededRandom', () => {
  it('repeats the same stream for the same seed', () => {
    const a = seededRandom('fixed');
    const b = seededRandom('fixed');
    const left = Array.from({ length: 5 }, () => a());
    const right = Array.from({ length: 5 }, () => b());
    expect(left).toEqual(right);
    for (const v of left) {
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(1);
    }
  });

  it('gives different streams for neighbouring seeds', () => {
    expect(seededRandom('1')()).not.toBe(seededRandom('2')());
  });
});

describe('createRandomSource', () => {
  it('falls back to Math.random without a seed', () => {
    expect(createRandomSource()).toBe(Math.random);
    expect(createRandomSource('')).toBe(Math.random);
  });
});

describe('shuffle', () => {
  const regions = resolveRegions('US_EU');

  it('returns a permutation and leaves the input alone', () => {
    const before = [...regions];
    const out = shuffle(regions, seededRandom('perm'));
    expect(regions).toEqual(before);
    expect([...out].sort()).toEqual([...regions].sort());
  });

  it('is reproducible for a seed', () => {
    expect(shuffle(regions, seededRandom(42))).toEqual(
      shuffle(regions, seededRandom(42)),
    );
  });

  it('does not give every seed the same order', () => {
    const orders = new Set(
      ['a', 'b', 'c', 'd', 'e'].map((s) =>
        shuffle(regions, seededRandom(s)).join(','),
      ),
    );
    expect(orders.size).toBeGreaterThan(1);
  });

  it('puts every region first about equally often', () => {
    const trials = 2000;
    const firsts = new Map<string, number>();
    for (let i = 0; i < trials; i++) {
      const first = shuffle(regions, seededRandom(`region-${i}`))[0];
      firsts.set(first, (firsts.get(first) ?? 0) + 1);
    }
    const expected = trials / regions.length;
    for (const region of regions) {
      const drift = Math.abs((firsts.get(region) ?? 0) - expected);
      expect(drift).toBeLessThanOrEqual(trials * 0.05);
    }
  });

  it('puts every category first about equally often', () => {
    const categories = resolveCategories();
    const trials = 3000;
    const firsts = new Map<string, number>();
    for (let i = 0; i < trials; i++) {
      const first = shuffle(categories, seededRandom(`category-${i}`))[0];
      firsts.set(first, (firsts.get(first) ?? 0) + 1);
    }
    const expected = trials / categories.length;
    for (const category of categories) {
      const drift = Math.abs((firsts.get(category) ?? 0) - expected);
      expect(drift).toBeLessThanOrEqual(trials * 0.05);
    }
  });
});
