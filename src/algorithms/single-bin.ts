import { type PackingResult, type Size } from '../types/rectangle.js';
import { type SearchOptions } from '../types/search.js';
import { maxRectsOracle } from './max-rects.js';
import { findRotations } from './rotations.js';
import { validateBin } from './shape-groups.js';

/**
 * Finds the densest feasible packing of a fixed set of rectangles on one sheet,
 * trying every distinct rotation assignment.
 *
 * Infeasible assignments are skipped. The best result is replaced only on a strict
 * density improvement, so the first assignment wins ties.
 *
 * @returns The best packing, or `null` if no rotation assignment fits or there is nothing to pack.
 */
export function findOptimalPacking(
  sizes: readonly Size[],
  width: number,
  height: number,
  options: SearchOptions = {},
): PackingResult | null {
  validateBin(width, height);
  const oracle = options.oracle ?? maxRectsOracle;

  // An empty set has no packing to score.
  const assignments = sizes.length === 0 ? [] : findRotations(sizes);

  let best: PackingResult | null = null;
  for (const candidate of assignments) {
    const positions = oracle.pack(candidate, width, height);
    if (positions === null) continue;

    const density = oracle.density(candidate, positions);
    if (best === null || density > best.density) {
      best = { sizes: candidate, positions, density };
    }
  }

  if (options.verbose) {
    if (best === null) {
      console.error('No solution found within max width and height!');
    } else {
      console.error(`Best Density: ${(best.density * 100).toFixed(1)}%`);
    }
  }

  return best;
}
