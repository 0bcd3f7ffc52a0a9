import { type Size, type UsageResult } from '../types/rectangle.js';
import { type MaxUsageOptions } from '../types/search.js';
import { validateBin } from './shape-groups.js';
import { findOptimalPacking } from './single-bin.js';
import { findSortedAreas } from './subsets.js';

/**
 * Finds the subset and rotation assignment that cover the most of one sheet.
 *
 * Subsets are tried in descending total-area order. With the default
 * `first-feasible` strategy the first subset that packs is returned. This is an
 * area-first greedy choice: it does not prove that no better-packing layout exists.
 * `densest-of-largest` also tries the remaining subsets of the same area and keeps
 * the densest of them.
 *
 * @returns The winning packing with its covered area, or `null` if no subset packs.
 */
export function findMaxUsage(
  sizes: readonly Size[],
  width: number,
  height: number,
  options: MaxUsageOptions = {},
): UsageResult | null {
  validateBin(width, height);
  const sheetArea = width * height;
  const strategy = options.strategy ?? 'first-feasible';
  const searchOptions = { oracle: options.oracle };

  const candidates = findSortedAreas(sizes, sheetArea, options.threshold === undefined ? 0.9 : options.threshold);
  const n = candidates.length;
  if (options.verbose) {
    console.error(`Found ${String(n)} sets of shapes that fit within given area`);
  }

  let best: UsageResult | null = null;
  for (let i = 0; i < n; i++) {
    const candidate = candidates[i];
    if (best !== null && candidate.area < best.area) break;

    if (options.verbose) {
      console.error(`> Trying set ${String(i + 1)} of ${String(n)}...`);
    }
    const packing = findOptimalPacking(candidate.sizes, width, height, searchOptions);
    if (packing === null) continue;

    if (best === null || packing.density > best.density) {
      best = { ...packing, area: candidate.area, coverage: candidate.area / sheetArea };
    }
    if (strategy === 'first-feasible') break;
  }

  if (options.verbose) {
    if (best === null) {
      console.error('No solutions found!');
    } else {
      console.error(`Best Area Usage: ${String(best.area)} of ${String(sheetArea)} (${(best.coverage * 100).toFixed(1)}%)`);
    }
  }

  return best;
}
