/**
 * Pierced wall
 *
 * A wall slab with rectangular holes, built as a set of closed boxes. The wall
 * is cut into columns at every opening edge; inside each column the solid
 * height is the wall height minus the openings that span that column.
 * Neighbouring columns with the same solid intervals are merged.
 */

import { box, mergePrimitives } from './primitives.js';
import type { Primitive, Vec3, WallOpening } from './types.js';

const EPSILON = 1e-9;

/**
 * Wall placement. `along` is the world axis the wall runs on; the thickness
 * extends along the other horizontal axis, height along +z.
 */
export interface WallFrame {
  origin: Vec3;
  along: 'x' | 'y';
}

export interface WallSpec {
  frame: WallFrame;
  span: number;
  thickness: number;
  height: number;
}

type Interval = readonly [number, number];

/**
 * World-space box for a wall-local block (u along, v through, w up)
 */
export function wallLocalBox(frame: WallFrame, u: Interval, v: Interval, w: Interval): Primitive {
  const { origin } = frame;
  const z0 = origin.z + w[0];
  const z1 = origin.z + w[1];
  if (frame.along === 'x') {
    return box({ x: origin.x + u[0], y: origin.y + v[0], z: z0 }, { x: origin.x + u[1], y: origin.y + v[1], z: z1 });
  }
  return box({ x: origin.x + v[0], y: origin.y + u[0], z: z0 }, { x: origin.x + v[1], y: origin.y + u[1], z: z1 });
}

function clipOpenings(openings: readonly WallOpening[], span: number, height: number): WallOpening[] {
  return openings
    .map((o) => ({
      u0: Math.max(0, o.u0),
      u1: Math.min(span, o.u1),
      w0: Math.max(0, o.w0),
      w1: Math.min(height, o.w1),
    }))
    .filter((o) => o.u1 - o.u0 > EPSILON && o.w1 - o.w0 > EPSILON);
}

/**
 * [0, height] minus the union of the given holes
 */
export function solidIntervals(height: number, holes: readonly Interval[]): Interval[] {
  const sorted = holes.slice().sort((a, b) => a[0] - b[0]);
  const solids: Interval[] = [];
  let cursor = 0;
  for (const [start, end] of sorted) {
    if (start - cursor > EPSILON) {
      solids.push([cursor, start]);
    }
    cursor = Math.max(cursor, end);
  }
  if (height - cursor > EPSILON) {
    solids.push([cursor, height]);
  }
  return solids;
}

function sameIntervals(a: readonly Interval[], b: readonly Interval[]): boolean {
  return (
    a.length === b.length &&
    a.every((interval, i) => Math.abs(interval[0] - b[i][0]) < EPSILON && Math.abs(interval[1] - b[i][1]) < EPSILON)
  );
}

/**
 * Build a wall with the given openings cut out of it
 */
export function piercedWall(wall: WallSpec, openings: readonly WallOpening[] = []): Primitive {
  const { frame, span, thickness, height } = wall;
  const through: Interval = [0, thickness];
  const holes = clipOpenings(openings, span, height);
  if (holes.length === 0) {
    return wallLocalBox(frame, [0, span], through, [0, height]);
  }

  const breaks = Array.from(new Set([0, span, ...holes.flatMap((h) => [h.u0, h.u1])])).sort((a, b) => a - b);

  const columns: Array<{ u: [number, number]; solids: Interval[] }> = [];
  for (let i = 0; i < breaks.length - 1; i++) {
    const u0 = breaks[i];
    const u1 = breaks[i + 1];
    if (u1 - u0 <= EPSILON) continue;
    const mid = (u0 + u1) / 2;
    const covering = holes.filter((h) => h.u0 < mid && mid < h.u1).map((h): Interval => [h.w0, h.w1]);
    const solids = solidIntervals(height, covering);

    const previous = columns[columns.length - 1];
    if (previous && Math.abs(previous.u[1] - u0) < EPSILON && sameIntervals(previous.solids, solids)) {
      previous.u[1] = u1;
    } else {
      columns.push({ u: [u0, u1], solids });
    }
  }

  const blocks: Primitive[] = [];
  for (const column of columns) {
    for (const solid of column.solids) {
      blocks.push(wallLocalBox(frame, column.u, through, solid));
    }
  }
  return mergePrimitives(blocks);
}
