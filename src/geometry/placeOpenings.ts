/**
 * Opening placement
 *
 * Windows alternate between the front wall and the right side wall by the
 * parity of a running placement index, so they never pile up at one
 * coordinate. Doors collapse to a single front-centre door on the ground story.
 *
 * Every opening is fitted to its wall and story before it is returned: the
 * rectangle never runs past a wall end, below its story's floor (or the slab
 * on upper stories) or above the story. A window that would overlap an
 * opening already on the same wall and story is moved to the nearest free
 * stretch of wall, or dropped when none is wide enough.
 */

import type { NormalizedObject, NormalizedSpec } from '../types/spec.js';
import { storyLayouts, wallSpan, type StoryLayout } from './storyLayout.js';
import type { OpeningPlacement, WallId, WallOpening } from './types.js';

const SIDE_WALL: WallId = 'right';

/** Wall left between neighbouring openings, meters */
export const OPENING_CLEARANCE = 0.1;

const EPSILON = 1e-9;

type Interval = readonly [number, number];

/**
 * Vertical band an opening may occupy on the given story
 */
export function storyBand(spec: NormalizedSpec, story: StoryLayout): Interval {
  const bottom = story.index > 0 ? story.z + spec.construction.floorSlabThickness : story.z;
  return [bottom, story.z + story.height];
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

function overlaps(a: Interval, b: Interval): boolean {
  return a[0] < b[1] - EPSILON && b[0] < a[1] - EPSILON;
}

function alongWall(p: OpeningPlacement): Interval {
  return [p.offsetAlongWall, p.offsetAlongWall + p.width];
}

function upWall(p: OpeningPlacement): Interval {
  return [p.offsetHeight, p.offsetHeight + p.height];
}

/**
 * Offset closest to `desired` at which an opening of `width` fits on
 * [0, span] without coming within the clearance of any blocked interval
 */
function nearestFreeOffset(desired: number, width: number, span: number, blocked: readonly Interval[]): number | null {
  const sorted = blocked
    .map((b): Interval => [b[0] - OPENING_CLEARANCE, b[1] + OPENING_CLEARANCE])
    .sort((a, b) => a[0] - b[0]);

  const free: Interval[] = [];
  let cursor = 0;
  for (const [start, end] of sorted) {
    if (start > cursor) {
      free.push([cursor, start]);
    }
    cursor = Math.max(cursor, end);
  }
  if (span > cursor) {
    free.push([cursor, span]);
  }

  let best: number | null = null;
  for (const [start, end] of free) {
    if (end - start < width - EPSILON) continue;
    const candidate = clamp(desired, start, end - width);
    if (best === null || Math.abs(candidate - desired) < Math.abs(best - desired)) {
      best = candidate;
    }
  }
  return best;
}

/**
 * Window placements for every window object, in object order. `occupied`
 * holds openings placed beforehand (the door) that windows must avoid.
 * Windows with no free wall left are omitted.
 */
export function placeWindows(
  spec: NormalizedSpec,
  windows: readonly NormalizedObject[],
  occupied: readonly OpeningPlacement[] = []
): OpeningPlacement[] {
  const stories = storyLayouts(spec);
  const { wallMargin } = spec.construction;
  const taken: OpeningPlacement[] = [...occupied];
  const placements: OpeningPlacement[] = [];
  let running = 0;

  for (const obj of windows) {
    const count = obj.count;
    const { thickness } = obj.dimensions;
    for (let k = 0; k < count; k++) {
      const wallId: WallId = running % 2 === 0 ? 'front' : SIDE_WALL;
      const slot = Math.floor(running / 2);
      running++;

      const span = wallSpan(spec, wallId);
      const story = stories[Math.floor((k * spec.stories) / count)];
      const [bandBottom, bandTop] = storyBand(spec, story);
      if (bandTop - bandBottom <= EPSILON) continue;
      const width = Math.min(obj.dimensions.width, span);
      const height = Math.min(obj.dimensions.height, bandTop - bandBottom);
      const sill = clamp(story.z + story.height / 2 - height / 2, bandBottom, bandTop - height);
      const desired = clamp(slot * (span / (count + 1)) + wallMargin, 0, span - width);

      const vertical: Interval = [sill, sill + height];
      const blocked = taken
        .filter((p) => p.wallId === wallId && p.story === story.index && overlaps(upWall(p), vertical))
        .map(alongWall);
      const offsetAlongWall = nearestFreeOffset(desired, width, span, blocked);
      if (offsetAlongWall === null) continue;

      const placement: OpeningPlacement = {
        kind: 'window',
        wallId,
        story: story.index,
        offsetAlongWall,
        offsetHeight: sill,
        width,
        height,
        thickness,
      };
      placements.push(placement);
      taken.push(placement);
    }
  }
  return placements;
}

/**
 * The front door, if any door object asks for at least one
 */
export function placeDoor(spec: NormalizedSpec, doors: readonly NormalizedObject[]): OpeningPlacement | null {
  const door = doors.find((d) => d.count > 0);
  if (!door) {
    return null;
  }
  const [ground] = storyLayouts(spec);
  const span = wallSpan(spec, 'front');
  const [bandBottom, bandTop] = storyBand(spec, ground);
  const width = Math.min(door.dimensions.width, span);
  return {
    kind: 'door',
    wallId: 'front',
    story: 0,
    offsetAlongWall: span / 2 - width / 2,
    offsetHeight: spec.construction.foundationThickness,
    width,
    height: Math.min(door.dimensions.height, bandTop - bandBottom),
    thickness: door.dimensions.thickness,
  };
}

/**
 * True when two openings on the same wall and story share any area
 */
export function openingsIntersect(a: OpeningPlacement, b: OpeningPlacement): boolean {
  return (
    a.wallId === b.wallId &&
    a.story === b.story &&
    overlaps(alongWall(a), alongWall(b)) &&
    overlaps(upWall(a), upWall(b))
  );
}

/**
 * Hole in wall-local coordinates for a wall whose base sits at `wallBaseZ`
 */
export function toWallOpening(placement: OpeningPlacement, wallBaseZ: number): WallOpening {
  const w0 = placement.offsetHeight - wallBaseZ;
  return {
    u0: placement.offsetAlongWall,
    u1: placement.offsetAlongWall + placement.width,
    w0,
    w1: w0 + placement.height,
  };
}
