import { type ShapeGroup, type Size } from '../types/rectangle.js';
import * as errors from '../errors.js';

function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

/**
 * Throws an `Invalid argument` error unless every entry is a `[width, height]`
 * pair of positive integers. Sizes often arrive from JSON, so the check runs at runtime.
 */
export function validateSizes(sizes: readonly unknown[]): asserts sizes is readonly Size[] {
  sizes.forEach((s, i) => {
    if (!Array.isArray(s) || s.length !== 2 || !isPositiveInteger(s[0]) || !isPositiveInteger(s[1])) {
      throw errors.toError(errors.invalidSize(i, s));
    }
  });
}

/**
 * Throws unless `count` is a non-negative integer number of copies.
 */
export function validateCount(count: number): void {
  if (!Number.isInteger(count) || count < 0) {
    throw errors.toError(errors.invalidCount(count));
  }
}

export function validateBin(width: number, height: number): void {
  if (!isPositiveInteger(width) || !isPositiveInteger(height)) {
    throw errors.toError(errors.invalidBin(width, height));
  }
}

/**
 * Returns the size with its smaller dimension first.
 */
export function canonicalShape(size: Size): Size {
  return size[0] <= size[1] ? size : [size[1], size[0]];
}

export function swapped(size: Size): Size {
  return [size[1], size[0]];
}

export function sameSize(a: Size, b: Size): boolean {
  return a[0] === b[0] && a[1] === b[1];
}

export function sizeArea(size: Size): number {
  return size[0] * size[1];
}

export function totalArea(sizes: readonly Size[]): number {
  let area = 0;
  for (const s of sizes) area += sizeArea(s);
  return area;
}

/**
 * Partitions sizes into groups of identical canonical shapes, in order of first appearance.
 */
export function groupShapes(sizes: readonly Size[]): ShapeGroup[] {
  const groups = new Map<string, ShapeGroup>();

  for (const size of sizes) {
    const shape = canonicalShape(size);
    const key = `${shape[0]}x${shape[1]}`;
    const group = groups.get(key);
    if (group) {
      group.count++;
    } else {
      groups.set(key, { shape, count: 1, symmetric: shape[0] === shape[1] });
    }
  }

  return [...groups.values()];
}
