import { type AllocationResult, type AllocationStatus, type Size } from '../types/rectangle.js';
import { type AllocationOptions } from '../types/search.js';
import { ItemPool } from '../classes/item-pool.js';
import { SheetCollection } from '../classes/sheet-collection.js';
import { validateBin, validateSizes } from './shape-groups.js';
import { findMaxUsage } from './max-usage.js';
import * as errors from '../errors.js';

/**
 * Allocates rectangles across as many `width` x `height` sheets as needed.
 *
 * Each sheet takes the max-usage packing of whatever is left in the pool (with no
 * coverage threshold), and the placed items are removed from the pool. The loop
 * stops when the pool is empty, when no remaining item fits on a fresh sheet, or
 * when `maxSheets` sheets have been filled. Items left over are returned in
 * `unplaced`, in their original orientation.
 */
export function multiSheetPacking(
  sizes: readonly Size[],
  width: number,
  height: number,
  options: AllocationOptions = {},
): AllocationResult {
  validateSizes(sizes);
  validateBin(width, height);
  const { maxSheets } = options;
  if (maxSheets !== undefined && !(Number.isInteger(maxSheets) && maxSheets >= 0)) {
    throw errors.toError(errors.invalidArgument(`maxSheets must be a non-negative integer, got ${String(maxSheets)}.`));
  }

  const pool = new ItemPool(sizes);
  const sheets = new SheetCollection(width, height);
  let status: AllocationStatus = 'complete';

  while (!pool.isEmpty) {
    if (maxSheets !== undefined && sheets.length >= maxSheets) {
      status = 'sheet_limit';
      break;
    }

    const usage = findMaxUsage(pool.items, width, height, {
      threshold: null,
      strategy: options.strategy,
      oracle: options.oracle,
    });
    if (usage === null) {
      status = 'stalled';
      break;
    }

    const sheet = sheets.append(usage);
    for (const placed of sheet.packing.sizes) {
      if (!pool.take(placed)) {
        throw errors.toError(errors.unmatchedPlacement(placed));
      }
    }
  }

  const unplaced = pool.items;
  if (options.verbose) {
    console.error(`Fit ${String(sheets.placedCount)} items on ${String(sheets.length)} sheets`);
    if (unplaced.length > 0) {
      console.error(`${String(unplaced.length)} item(s) could not be placed`);
    }
  }

  return { sheets: sheets.sheets, unplaced, status };
}
