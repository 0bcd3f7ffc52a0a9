import { type Position, type Size } from './rectangle.js';

/**
 * A primitive that lays out an ordered list of sizes inside a bounded region
 * without overlap. It never rotates items: orientation is decided by the caller.
 *
 * Implementations must be deterministic so that "first feasible wins" searches
 * are reproducible.
 */
export interface PlacementOracle {
  /**
   * Returns one position per size (same index), or `null` when the sizes cannot
   * all be placed within `[0, binWidth] x [0, binHeight]`.
   */
  pack(sizes: readonly Size[], binWidth: number, binHeight: number): Position[] | null;

  /**
   * Scores a completed packing. Higher is better.
   */
  density(sizes: readonly Size[], positions: readonly Position[]): number;
}

/**
 * Options shared by every search entry point.
 */
export interface SearchOptions {
  /** Placement primitive to use (default: `maxRectsOracle`) */
  oracle?: PlacementOracle;
  /** Log progress to stderr */
  verbose?: boolean;
}

/**
 * How max-usage search picks among feasible subsets.
 * - `first-feasible`: the first feasible subset in descending-area order
 * - `densest-of-largest`: among feasible subsets sharing the largest feasible area, the densest
 */
export type UsageStrategy = 'first-feasible' | 'densest-of-largest';

export interface MaxUsageOptions extends SearchOptions {
  /**
   * Minimum fraction of the sheet area a subset must cover, in (0, 1].
   * `null` accepts any non-empty subset. Default 0.9.
   */
  threshold?: number | null;
  strategy?: UsageStrategy;
}

export interface AllocationOptions extends SearchOptions {
  strategy?: UsageStrategy;
  /** Stop after this many sheets, leaving the rest of the pool unplaced */
  maxSheets?: number;
}
