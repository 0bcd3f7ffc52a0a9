import { type Choice, type Size, type SubsetCandidate } from '../types/rectangle.js';
import { cartesianProduct, flattenChoices } from './cartesian.js';
import { groupShapes, totalArea, validateCount, validateSizes } from './shape-groups.js';
import { type SearchOptions } from '../types/search.js';
import * as errors from '../errors.js';

/**
 * Enumerates how many of `count` identical rectangles to keep: `[]`, `[shape]`, ...
 * up to `count` copies. Always `count + 1` options.
 */
export function uniqueKeepCombinations(shape: Size, count: number): Size[][] {
  validateSizes([shape]);
  validateCount(count);
  return Array.from({ length: count + 1 }, (_, i) => Array.from({ length: i }, () => shape));
}

/**
 * Finds the subsets of `sizes` whose total area fits within `area`, sorted by
 * total area descending. Ties keep generation order.
 *
 * Subset selection ignores orientation: every returned size is in canonical
 * (smaller-first) form, and rotation is decided later by the single-bin search.
 *
 * @param sizes The full multiset of rectangles.
 * @param area The area budget, usually the sheet area. Must be positive.
 * @param threshold Minimum fraction of `area` a subset must cover, in (0, 1]; `null` disables it.
 * @returns Candidates with `0 < area <= budget`, most covering first. Empty when nothing qualifies.
 */
export function findSortedAreas(
  sizes: readonly Size[],
  area: number,
  threshold: number | null = 0.9,
  options: Pick<SearchOptions, 'verbose'> = {},
): SubsetCandidate[] {
  validateSizes(sizes);
  if (!(Number.isFinite(area) && area > 0)) {
    throw errors.toError(errors.invalidArea(area));
  }
  if (threshold !== null && !(threshold > 0 && threshold <= 1)) {
    throw errors.toError(errors.invalidThreshold(threshold));
  }

  const groupChoices = groupShapes(sizes).map((group) =>
    uniqueKeepCombinations(group.shape, group.count).map((kept): Choice => ({ kind: 'group', sizes: kept })),
  );

  const output: SubsetCandidate[] = [];
  for (const combo of cartesianProduct(groupChoices)) {
    const subset = flattenChoices(combo);
    if (subset.length === 0) continue;

    const a = totalArea(subset);
    if (a > 0 && a <= area && (threshold === null || a >= threshold * area)) {
      output.push({ sizes: subset, area: a });
    }
  }

  // Array.prototype.sort is stable, so equal areas keep generation order
  output.sort((x, y) => y.area - x.area);

  if (options.verbose) {
    console.error(`Found ${String(output.length)} unique sets of ${String(sizes.length)} items within given area`);
  }

  return output;
}
