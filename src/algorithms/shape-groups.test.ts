import { describe, it, expect } from 'vitest';
import { canonicalShape, groupShapes, sameSize, totalArea, validateBin, validateSizes } from './shape-groups.js';
import { type Size } from '../types/rectangle.js';

describe('shape grouping', () => {
  it('canonicalizes sizes with the smaller dimension first', () => {
    expect(canonicalShape([4, 3])).toEqual([3, 4]);
    expect(canonicalShape([3, 4])).toEqual([3, 4]);
    expect(canonicalShape([5, 5])).toEqual([5, 5]);
  });

  it('groups sizes by canonical shape in first-seen order', () => {
    const groups = groupShapes([[4, 3], [2, 2], [3, 4], [4, 3], [2, 2], [1, 6]]);
    expect(groups).toEqual([
      { shape: [3, 4], count: 3, symmetric: false },
      { shape: [2, 2], count: 2, symmetric: true },
      { shape: [1, 6], count: 1, symmetric: false },
    ]);
  });

  it('returns no groups for an empty multiset', () => {
    expect(groupShapes([])).toEqual([]);
  });

  it('compares sizes orientation-sensitively', () => {
    expect(sameSize([3, 4], [3, 4])).toBe(true);
    expect(sameSize([3, 4], [4, 3])).toBe(false);
  });

  it('sums areas', () => {
    expect(totalArea([[3, 4], [2, 2]])).toBe(16);
    expect(totalArea([])).toBe(0);
  });

  describe('validateSizes', () => {
    it('accepts pairs of positive integers', () => {
      expect(() => validateSizes([[1, 1], [30, 3]])).not.toThrow();
    });

    it('rejects a zero dimension', () => {
      expect(() => validateSizes([[2, 2], [3, 0]])).toThrow(
        'Invalid argument: size 1 must be a [width, height] pair of positive integers, got [3,0].',
      );
    });

    it('rejects entries that are not 2-valued', () => {
      const bad: Size[] = JSON.parse('[[1, 2, 3]]');
      expect(() => validateSizes(bad)).toThrow('Invalid argument: size 0');
      expect(() => validateSizes(['4x3'])).toThrow('Invalid argument: size 0');
    });

    it('rejects fractional and negative dimensions', () => {
      expect(() => validateSizes([[1.5, 2]])).toThrow('Invalid argument');
      expect(() => validateSizes([[-1, 2]])).toThrow('Invalid argument');
    });
  });

  it('validateBin rejects non-positive sheets', () => {
    expect(() => validateBin(6, 5)).not.toThrow();
    expect(() => validateBin(0, 5)).toThrow('Invalid argument: sheet dimensions must be positive integers, got 0×5.');
  });
});
