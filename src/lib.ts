/**
 * Library entry point: the packing search, without the MCP server.
 */
export { findRotations, uniqueRotationCombinations } from './algorithms/rotations.js';
export { findSortedAreas, uniqueKeepCombinations } from './algorithms/subsets.js';
export { findOptimalPacking } from './algorithms/single-bin.js';
export { findMaxUsage } from './algorithms/max-usage.js';
export { multiSheetPacking } from './algorithms/multi-sheet.js';
export { maxRectsOracle, packMaxRects, packingDensity } from './algorithms/max-rects.js';
export { canonicalShape, groupShapes } from './algorithms/shape-groups.js';
export { ItemPool } from './classes/item-pool.js';
export { SheetCollection } from './classes/sheet-collection.js';
export { renderSheet, saveSheetPng } from './io/sheet-png.js';
export type * from './types/rectangle.js';
export type * from './types/search.js';
