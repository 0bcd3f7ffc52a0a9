/**
 * Core types for rectangle packing.
 *
 * Sizes are orientation-significant `[width, height]` pairs as given by the caller.
 * Positions are the integer `[x, y]` of a rectangle's lower-left corner on a sheet.
 */

/**
 * A rectangle size `[width, height]`. Both dimensions are positive integers.
 */
export type Size = readonly [number, number];

/**
 * A placement coordinate `[x, y]`, relative to the sheet origin.
 */
export type Position = readonly [number, number];

/**
 * A set of identical rectangles, keyed by their canonical (smaller-first) shape.
 */
export interface ShapeGroup {
  /** Canonical shape: `shape[0] <= shape[1]` */
  shape: Size;
  /** Number of input items sharing this shape */
  count: number;
  /** True when width equals height, so rotation is a no-op */
  symmetric: boolean;
}

/**
 * One slot of a Cartesian product before flattening.
 * A single rectangle, or a run of rectangles contributed by one shape group.
 */
export type Choice =
  | { kind: 'item'; size: Size }
  | { kind: 'group'; sizes: readonly Size[] };

/**
 * A subset of the input multiset together with its total area.
 */
export interface SubsetCandidate {
  sizes: Size[];
  area: number;
}

/**
 * A feasible layout of oriented sizes. `positions[i]` belongs to `sizes[i]`.
 */
export interface PackingResult {
  sizes: Size[];
  positions: Position[];
  /** Oracle-defined score in (0, 1], higher is better */
  density: number;
}

/**
 * The winning packing of a max-usage search, with the area it covers.
 */
export interface UsageResult extends PackingResult {
  /** Total area of the packed subset */
  area: number;
  /** `area / (width * height)` of the target sheet */
  coverage: number;
}

/**
 * The packing recorded on a sheet. Read-only once the sheet is appended.
 */
export interface SheetPacking {
  readonly sizes: readonly Size[];
  readonly positions: readonly Position[];
  readonly density: number;
}

/**
 * A fixed-bounds sheet holding one packing result.
 */
export interface Sheet {
  /** Zero-based position in the sheet collection */
  readonly index: number;
  readonly width: number;
  readonly height: number;
  readonly packing: SheetPacking;
}

/**
 * Why an allocation run stopped.
 * - `complete`: every item was placed
 * - `stalled`: items remain but none of them fit on a fresh sheet
 * - `sheet_limit`: the `maxSheets` budget was reached
 */
export type AllocationStatus = 'complete' | 'stalled' | 'sheet_limit';

/**
 * The outcome of a multi-sheet allocation. `unplaced` is never silently dropped.
 */
export interface AllocationResult {
  sheets: readonly Sheet[];
  unplaced: Size[];
  status: AllocationStatus;
}
