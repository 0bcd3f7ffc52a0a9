import { describe, it, expect, vi, afterEach } from 'vitest';
import { findSortedAreas, uniqueKeepCombinations } from './subsets.js';
import { type Size } from '../types/rectangle.js';

const mixed: Size[] = [[4, 3], [4, 3], [2, 2]];

describe('uniqueKeepCombinations', () => {
  it('returns N+1 keep counts from none to all', () => {
    expect(uniqueKeepCombinations([2, 3], 2)).toEqual([[], [[2, 3]], [[2, 3], [2, 3]]]);
  });

  it('returns only the empty selection for zero copies', () => {
    expect(uniqueKeepCombinations([2, 3], 0)).toEqual([[]]);
  });

  it('rejects a negative count', () => {
    expect(() => uniqueKeepCombinations([2, 3], -2)).toThrow(
      'Invalid argument: count must be a non-negative integer, got -2.',
    );
  });

  it('rejects a malformed shape', () => {
    expect(() => uniqueKeepCombinations([0, 3], 1)).toThrow('Invalid argument: size 0');
  });
});

describe('findSortedAreas', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('lists every non-empty subset by descending area without a threshold', () => {
    expect(findSortedAreas(mixed, 30, null)).toEqual([
      { sizes: [[3, 4], [3, 4], [2, 2]], area: 28 },
      { sizes: [[3, 4], [3, 4]], area: 24 },
      { sizes: [[3, 4], [2, 2]], area: 16 },
      { sizes: [[3, 4]], area: 12 },
      { sizes: [[2, 2]], area: 4 },
    ]);
  });

  it('applies the default 0.9 coverage threshold', () => {
    expect(findSortedAreas(mixed, 30)).toEqual([{ sizes: [[3, 4], [3, 4], [2, 2]], area: 28 }]);
  });

  it('drops subsets below the threshold', () => {
    expect(findSortedAreas(mixed, 30, 0.5).map((c) => c.area)).toEqual([28, 24, 16]);
  });

  it('drops subsets above the area budget', () => {
    expect(findSortedAreas(mixed, 20, null).map((c) => c.area)).toEqual([16, 12, 4]);
  });

  it('has exactly N nonzero keep counts for a single group', () => {
    const squares: Size[] = [[1, 1], [1, 1], [1, 1]];
    expect(findSortedAreas(squares, 100, null)).toEqual([
      { sizes: [[1, 1], [1, 1], [1, 1]], area: 3 },
      { sizes: [[1, 1], [1, 1]], area: 2 },
      { sizes: [[1, 1]], area: 1 },
    ]);
  });

  it('keeps generation order between equal areas', () => {
    expect(findSortedAreas([[1, 4], [2, 2]], 16, null)).toEqual([
      { sizes: [[1, 4], [2, 2]], area: 8 },
      { sizes: [[2, 2]], area: 4 },
      { sizes: [[1, 4]], area: 4 },
    ]);
  });

  it('keeps every candidate within bounds and sorted', () => {
    const sizes: Size[] = [[1, 2], [2, 1], [3, 3], [1, 5], [2, 2], [2, 2]];
    const budget = 20;
    const threshold = 0.6;
    const result = findSortedAreas(sizes, budget, threshold);

    expect(result.length).toBeGreaterThan(0);
    for (let i = 0; i < result.length; i++) {
      expect(result[i].area).toBeGreaterThan(0);
      expect(result[i].area).toBeLessThanOrEqual(budget);
      expect(result[i].area).toBeGreaterThanOrEqual(threshold * budget);
      expect(result[i].sizes.length).toBeGreaterThan(0);
      if (i > 0) {
        expect(result[i].area).toBeLessThanOrEqual(result[i - 1].area);
      }
    }
  });

  it('returns an empty list when nothing fits', () => {
    expect(findSortedAreas([[7, 7]], 30, null)).toEqual([]);
    expect(findSortedAreas([], 30, null)).toEqual([]);
  });

  it('rejects thresholds outside (0, 1]', () => {
    expect(() => findSortedAreas(mixed, 30, 0)).toThrow('Invalid argument: threshold must be in (0, 1], got 0.');
    expect(() => findSortedAreas(mixed, 30, 1.5)).toThrow('Invalid argument: threshold must be in (0, 1], got 1.5.');
  });

  it('rejects an area budget that is not a positive number', () => {
    expect(() => findSortedAreas(mixed, -4, null)).toThrow('Invalid argument: area must be a positive number, got -4.');
    expect(() => findSortedAreas(mixed, NaN, null)).toThrow('Invalid argument: area must be a positive number, got NaN.');
  });

  it('logs the number of candidates when verbose', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    findSortedAreas(mixed, 30, null, { verbose: true });
    expect(spy).toHaveBeenCalledWith('Found 5 unique sets of 3 items within given area');
  });
});
