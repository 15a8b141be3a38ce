/**
 * Row layout for objects that have no structural slot (furnishings, or every
 * object when the design type has no building shell).
 */

import type { Vec3 } from './types.js';

export interface LayoutRegion {
  x0: number;
  y0: number;
  /** Rows wrap once an item would cross this x */
  x1: number;
  z: number;
}

export interface Footprint {
  width: number;
  depth: number;
}

/**
 * Min corner for each item, left to right, wrapping to a new row (further
 * along +y) when the region's width is used up. A row always takes at least
 * one item.
 */
export function layoutLooseObjects(items: readonly Footprint[], region: LayoutRegion, gap: number): Vec3[] {
  const corners: Vec3[] = [];
  let x = region.x0;
  let y = region.y0;
  let rowDepth = 0;

  for (const item of items) {
    if (x > region.x0 && x + item.width > region.x1) {
      y += rowDepth + gap;
      x = region.x0;
      rowDepth = 0;
    }
    corners.push({ x, y, z: region.z });
    x += item.width + gap;
    rowDepth = Math.max(rowDepth, item.depth);
  }
  return corners;
}
