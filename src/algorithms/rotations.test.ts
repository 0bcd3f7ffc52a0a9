import { describe, it, expect, vi, afterEach } from 'vitest';
import { findRotations, uniqueRotationCombinations } from './rotations.js';
import { sameSize } from './shape-groups.js';
import { type Size } from '../types/rectangle.js';

describe('uniqueRotationCombinations', () => {
  it('returns N+1 sequences ordered by number of unrotated copies', () => {
    expect(uniqueRotationCombinations([3, 4], 2)).toEqual([
      [[4, 3], [4, 3]],
      [[3, 4], [4, 3]],
      [[3, 4], [3, 4]],
    ]);
  });

  it('has exactly one sequence for each count of unrotated copies', () => {
    const shape: Size = [2, 5];
    const seqs = uniqueRotationCombinations(shape, 4);
    expect(seqs).toHaveLength(5);

    const unrotatedCounts = seqs.map((seq) => seq.filter((s) => sameSize(s, shape)).length).sort();
    expect(unrotatedCounts).toEqual([0, 1, 2, 3, 4]);
    for (const seq of seqs) {
      expect(seq).toHaveLength(4);
    }
  });

  it('returns a single unrotated sequence for a square regardless of count', () => {
    expect(uniqueRotationCombinations([2, 2], 3)).toEqual([[[2, 2], [2, 2], [2, 2]]]);
    expect(uniqueRotationCombinations([7, 7], 1)).toEqual([[[7, 7]]]);
  });

  it('returns one empty sequence for zero copies', () => {
    expect(uniqueRotationCombinations([3, 4], 0)).toEqual([[]]);
  });

  it('rejects a negative or fractional count', () => {
    expect(() => uniqueRotationCombinations([4, 3], -1)).toThrow(
      'Invalid argument: count must be a non-negative integer, got -1.',
    );
    expect(() => uniqueRotationCombinations([4, 3], 1.5)).toThrow(
      'Invalid argument: count must be a non-negative integer, got 1.5.',
    );
  });

  it('rejects a malformed shape', () => {
    expect(() => uniqueRotationCombinations([4, NaN], 1)).toThrow(
      'Invalid argument: size 0 must be a [width, height] pair of positive integers, got [4,null].',
    );
  });
});

describe('findRotations', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prefixes squares and branches only on rotatable groups', () => {
    expect(findRotations([[4, 3], [4, 3], [2, 2]])).toEqual([
      [[2, 2], [4, 3], [4, 3]],
      [[2, 2], [3, 4], [4, 3]],
      [[2, 2], [3, 4], [3, 4]],
    ]);
  });

  it('multiplies (N+1) across rotatable groups', () => {
    const rotations = findRotations([[1, 2], [2, 3], [3, 2]]);
    expect(rotations).toHaveLength(2 * 3);
    expect(rotations[0]).toEqual([[2, 1], [3, 2], [3, 2]]);
    expect(rotations[1]).toEqual([[2, 1], [2, 3], [3, 2]]);
    expect(rotations[3]).toEqual([[1, 2], [3, 2], [3, 2]]);
    expect(rotations[5]).toEqual([[1, 2], [2, 3], [2, 3]]);
  });

  it('produces no duplicate assignments', () => {
    const rotations = findRotations([[1, 3], [1, 3], [1, 3], [2, 5], [5, 2], [4, 4]]);
    expect(rotations).toHaveLength(4 * 3);
    const keys = new Set(rotations.map((r) => JSON.stringify(r)));
    expect(keys.size).toBe(rotations.length);
  });

  it('returns a single assignment of squares only', () => {
    expect(findRotations([[2, 2], [2, 2], [2, 2]])).toEqual([[[2, 2], [2, 2], [2, 2]]]);
  });

  it('returns one empty assignment for empty input', () => {
    expect(findRotations([])).toEqual([[]]);
  });

  it('fails fast on malformed sizes', () => {
    expect(() => findRotations([[4, 3], [0, 2]])).toThrow('Invalid argument: size 1');
  });

  it('logs the number of rotation sets when verbose', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    findRotations([[4, 3], [4, 3], [2, 2]], { verbose: true });
    expect(spy).toHaveBeenCalledWith('Found 3 unique rotation sets of 3 items');
  });
});
