import { type Choice, type Size } from '../types/rectangle.js';
import { cartesianProduct, flattenChoices } from './cartesian.js';
import { groupShapes, swapped, validateCount, validateSizes } from './shape-groups.js';
import { type SearchOptions } from '../types/search.js';

/**
 * Enumerates the distinct rotation assignments of `count` identical rectangles.
 *
 * Identical items are indistinguishable, so only the number of rotated copies
 * matters: sequence `i` holds `i` copies of `shape` followed by `count - i`
 * swapped copies, giving `count + 1` sequences instead of `2^count`.
 * A square yields a single unrotated sequence.
 *
 * @param shape The shape as it should appear when unrotated.
 * @param count Number of copies (>= 0).
 */
export function uniqueRotationCombinations(shape: Size, count: number): Size[][] {
  validateSizes([shape]);
  validateCount(count);

  if (shape[0] === shape[1]) {
    return [Array.from({ length: count }, () => shape)];
  }

  const rotated = swapped(shape);
  const output: Size[][] = [];
  for (let i = 0; i <= count; i++) {
    output.push([
      ...Array.from({ length: i }, () => shape),
      ...Array.from({ length: count - i }, () => rotated),
    ]);
  }
  return output;
}

/**
 * Finds every distinct rotation assignment of an arbitrary multiset of sizes.
 *
 * Sizes are grouped by canonical shape. Square groups form a fixed prefix; the
 * per-group sequences of rotatable groups are combined by Cartesian product, so the
 * output has `prod(count_g + 1)` entries over rotatable groups. Sizes in the output
 * appear in canonical orientation or swapped, never in the caller's original order.
 */
export function findRotations(sizes: readonly Size[], options: Pick<SearchOptions, 'verbose'> = {}): Size[][] {
  validateSizes(sizes);

  const prefix: Choice[] = [];
  const branches: Choice[][] = [];

  for (const group of groupShapes(sizes)) {
    if (group.symmetric) {
      for (let i = 0; i < group.count; i++) {
        prefix.push({ kind: 'item', size: group.shape });
      }
    } else {
      branches.push(
        uniqueRotationCombinations(group.shape, group.count).map((seq): Choice => ({ kind: 'group', sizes: seq })),
      );
    }
  }

  const output = cartesianProduct(branches).map((combo) => flattenChoices([...prefix, ...combo]));

  if (options.verbose) {
    console.error(`Found ${String(output.length)} unique rotation sets of ${String(sizes.length)} items`);
  }

  return output;
}
