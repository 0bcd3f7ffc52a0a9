import { type Position, type Size } from '../types/rectangle.js';
import { type PlacementOracle } from '../types/search.js';
import { totalArea } from './shape-groups.js';

interface FreeRect {
  x: number;
  y: number;
  w: number;
  h: number;
}

function intersects(a: FreeRect, b: FreeRect): boolean {
  return a.x < b.x + b.w && a.x + a.w > b.x && a.y < b.y + b.h && a.y + a.h > b.y;
}

function contains(outer: FreeRect, inner: FreeRect): boolean {
  return (
    inner.x >= outer.x &&
    inner.y >= outer.y &&
    inner.x + inner.w <= outer.x + outer.w &&
    inner.y + inner.h <= outer.y + outer.h
  );
}

/**
 * Splits every free rectangle overlapped by `used` into its (up to four) maximal
 * leftover strips, then drops rectangles fully contained in another one.
 */
function splitFreeRects(freeRects: FreeRect[], used: FreeRect): FreeRect[] {
  const next: FreeRect[] = [];
  for (const f of freeRects) {
    if (!intersects(f, used)) {
      next.push(f);
      continue;
    }
    if (used.x > f.x) next.push({ x: f.x, y: f.y, w: used.x - f.x, h: f.h });
    if (used.x + used.w < f.x + f.w) {
      next.push({ x: used.x + used.w, y: f.y, w: f.x + f.w - (used.x + used.w), h: f.h });
    }
    if (used.y > f.y) next.push({ x: f.x, y: f.y, w: f.w, h: used.y - f.y });
    if (used.y + used.h < f.y + f.h) {
      next.push({ x: f.x, y: used.y + used.h, w: f.w, h: f.y + f.h - (used.y + used.h) });
    }
  }

  // Prune. Of two identical rects only the first survives.
  return next.filter((r, i) =>
    !next.some((other, j) => j !== i && contains(other, r) && (!contains(r, other) || j < i)),
  );
}

/**
 * Packs `sizes` into a `binWidth` x `binHeight` region using MaxRects with the
 * Bottom-Left rule. Items are never rotated.
 *
 * Items are placed tallest first (then widest first, stable on input order), each at
 * the free rectangle with the lowest y, then lowest x, that can hold it.
 *
 * @returns One position per input size, in input order, or `null` if any item does not fit.
 */
export function packMaxRects(sizes: readonly Size[], binWidth: number, binHeight: number): Position[] | null {
  const order = sizes.map((_, i) => i).sort((a, b) => {
    const sa = sizes[a];
    const sb = sizes[b];
    if (sb[1] !== sa[1]) return sb[1] - sa[1];
    return sb[0] - sa[0];
  });

  let freeRects: FreeRect[] = [{ x: 0, y: 0, w: binWidth, h: binHeight }];
  const positions: Array<Position | undefined> = new Array<Position | undefined>(sizes.length);

  for (const index of order) {
    const [w, h] = sizes[index];

    let best: FreeRect | null = null;
    for (const r of freeRects) {
      if (w > r.w || h > r.h) continue;
      if (best === null || r.y < best.y || (r.y === best.y && r.x < best.x)) {
        best = r;
      }
    }
    if (best === null) {
      return null;
    }

    positions[index] = [best.x, best.y];
    freeRects = splitFreeRects(freeRects, { x: best.x, y: best.y, w, h });
  }

  const placed: Position[] = [];
  for (const p of positions) {
    if (p === undefined) return null;
    placed.push(p);
  }
  return placed;
}

/**
 * Total item area over the area of the placements' bounding box. 0 for an empty packing.
 */
export function packingDensity(sizes: readonly Size[], positions: readonly Position[]): number {
  let maxX = 0;
  let maxY = 0;
  sizes.forEach((s, i) => {
    const [x, y] = positions[i];
    maxX = Math.max(maxX, x + s[0]);
    maxY = Math.max(maxY, y + s[1]);
  });

  const box = maxX * maxY;
  return box === 0 ? 0 : totalArea(sizes) / box;
}

/**
 * The default placement oracle.
 */
export const maxRectsOracle: PlacementOracle = {
  pack: packMaxRects,
  density: packingDensity,
};
