/**
 * Unit tests for door and window placement
 */

import { describe, it, expect } from '@jest/globals';
import {
  OPENING_CLEARANCE,
  openingsIntersect,
  placeDoor,
  placeWindows,
  storyBand,
  toWallOpening,
} from '../src/geometry/placeOpenings.js';
import { roofBase, storyLayouts, storyWalls, wallSpan } from '../src/geometry/storyLayout.js';
import { normalizeSpec } from '../src/services/normalizeSpec.js';
import { ROW_HOUSE } from './helpers/fixtures.js';

const { spec } = normalizeSpec(ROW_HOUSE);
const windows = spec.objects.filter((o) => o.kind === 'window');
const doors = spec.objects.filter((o) => o.kind === 'door');

describe('storyLayouts', () => {
  it('should stack stories above the foundation', () => {
    expect(storyLayouts(spec)).toEqual([
      { index: 0, z: 0.5, height: 9 },
      { index: 1, z: 9.5, height: 9 },
    ]);
    expect(roofBase(spec)).toBe(18.5);
  });

  it('should keep every wall inside the footprint', () => {
    const walls = storyWalls(spec, { index: 1, z: 9.5, height: 9 });
    expect(walls.front.frame.origin).toEqual({ x: 0, y: 0, z: 9.5 });
    expect(walls.back.frame.origin).toEqual({ x: 0, y: 29.8, z: 9.5 });
    expect(walls.left.frame.origin).toEqual({ x: 0, y: 0, z: 9.5 });
    expect(walls.right.frame.origin).toEqual({ x: 9.8, y: 0, z: 9.5 });
    expect(wallSpan(spec, 'front')).toBe(10);
    expect(wallSpan(spec, 'right')).toBe(30);
  });
});

describe('placeWindows', () => {
  const placements = placeWindows(spec, windows);

  it('should split six windows three to the front and three to the side', () => {
    expect(placements.map((p) => p.wallId)).toEqual(['front', 'right', 'front', 'right', 'front', 'right']);
  });

  it('should space windows by wall span over count + 1 from the margin', () => {
    const offsets = placements.map((p) => p.offsetAlongWall);
    const expected = [1, 1, 10 / 7 + 1, 30 / 7 + 1, 20 / 7 + 1, 60 / 7 + 1];
    offsets.forEach((offset, i) => expect(offset).toBeCloseTo(expected[i], 10));
  });

  it('should never put two openings on the same wall at the same offset', () => {
    const keys = placements.map((p) => `${p.wallId}:${p.story}:${p.offsetAlongWall.toFixed(6)}`);
    expect(new Set(keys).size).toBe(placements.length);
    expect(new Set(placements.map((p) => p.wallId)).size).toBeGreaterThanOrEqual(2);
  });

  it('should distribute windows across stories and centre them vertically', () => {
    expect(placements.map((p) => p.story)).toEqual([0, 0, 0, 1, 1, 1]);
    expect(placements.map((p) => p.offsetHeight)).toEqual([4.5, 4.5, 4.5, 13.5, 13.5, 13.5]);
  });

  it('should carry the window dimensions', () => {
    expect(placements[0]).toMatchObject({ kind: 'window', width: 1.2, height: 1.0, thickness: 0.1 });
  });

  it('should keep the running index across window objects', () => {
    const { spec: twoGroups } = normalizeSpec({
      ...ROW_HOUSE,
      objects: [{ type: 'window', count: 1 }, { type: 'bay_window', count: 1 }],
    });
    const result = placeWindows(twoGroups, twoGroups.objects);
    expect(result.map((p) => p.wallId)).toEqual(['front', 'right']);
  });

  it('should fit windows inside a small wall and drop those with no room left', () => {
    const { spec: small } = normalizeSpec({
      design_type: 'house',
      dimensions: { width: 3, depth: 3, height: 3 },
      stories: 1,
      objects: [{ type: 'window', count: 6 }],
    });
    const result = placeWindows(small, small.objects);

    expect(result.map((p) => [p.wallId, p.offsetAlongWall])).toEqual([
      ['front', 1],
      ['right', 1],
    ]);
    for (const p of result) {
      expect(p.offsetAlongWall + p.width).toBeLessThanOrEqual(wallSpan(small, p.wallId));
    }
  });

  it('should shrink windows to fit a short story', () => {
    const { spec: short } = normalizeSpec({
      design_type: 'house',
      dimensions: { width: 10, depth: 10, height: 2 },
      stories: 4,
      objects: [{ type: 'window', count: 4 }],
    });
    const stories = storyLayouts(short);
    const result = placeWindows(short, short.objects);

    expect(result.map((p) => p.story)).toEqual([0, 1, 2, 3]);
    expect(result[0]).toMatchObject({ offsetHeight: 0.5, height: 0.5 });
    expect(result[1].offsetHeight).toBeCloseTo(1.15, 10);
    expect(result[1].height).toBeCloseTo(0.35, 10);
    for (const p of result) {
      const [bottom, top] = storyBand(short, stories[p.story]);
      expect(p.offsetHeight).toBeGreaterThanOrEqual(bottom - 1e-9);
      expect(p.offsetHeight + p.height).toBeLessThanOrEqual(top + 1e-9);
    }
  });

  it('should move a window that would overlap the door', () => {
    const { spec: house } = normalizeSpec({
      design_type: 'house',
      dimensions: { width: 10, depth: 10, height: 3 },
      stories: 1,
      objects: [
        { type: 'window', count: 6 },
        { type: 'door', count: 1 },
      ],
    });
    const door = placeDoor(house, house.objects.filter((o) => o.kind === 'door'));
    if (door === null) throw new Error('expected a door');
    const result = placeWindows(house, house.objects.filter((o) => o.kind === 'window'), [door]);

    const front = result.filter((p) => p.wallId === 'front').map((p) => p.offsetAlongWall);
    expect(front).toHaveLength(3);
    expect(front[0]).toBe(1);
    expect(front[1]).toBeCloseTo(10 / 7 + 1, 10);
    expect(front[2]).toBeCloseTo(door.offsetAlongWall + door.width + OPENING_CLEARANCE, 10);

    const all = [...result, door];
    all.forEach((a, i) => all.slice(i + 1).forEach((b) => expect(openingsIntersect(a, b)).toBe(false)));
  });

  it('should place nothing for a zero count', () => {
    const { spec: none } = normalizeSpec({ ...ROW_HOUSE, objects: [{ type: 'window', count: 0 }] });
    expect(placeWindows(none, none.objects)).toEqual([]);
  });
});

describe('placeDoor', () => {
  it('should centre one door on the front wall at foundation height', () => {
    const door = placeDoor(spec, doors);
    expect(door).not.toBeNull();
    expect(door?.wallId).toBe('front');
    expect(door?.story).toBe(0);
    expect(door?.offsetAlongWall).toBeCloseTo(4.55, 10);
    expect(door?.offsetHeight).toBe(0.5);
    expect(door?.width).toBe(0.9);
    expect(door?.height).toBe(2.1);
  });

  it('should keep the door inside a narrow front wall and a low story', () => {
    const { spec: tiny } = normalizeSpec({
      design_type: 'house',
      dimensions: { width: 0.6, depth: 4, height: 1.5 },
      stories: 1,
      objects: [{ type: 'door', count: 1 }],
    });
    expect(placeDoor(tiny, tiny.objects)).toMatchObject({ offsetAlongWall: 0, width: 0.6, height: 1.5 });
  });

  it('should return null when no door is requested', () => {
    expect(placeDoor(spec, [])).toBeNull();
  });
});

describe('toWallOpening', () => {
  it('should convert to wall-local coordinates', () => {
    const [first] = placeWindows(spec, windows);
    const hole = toWallOpening(first, 0.5);
    expect(hole.u0).toBe(1);
    expect(hole.u1).toBeCloseTo(2.2, 10);
    expect(hole.w0).toBe(4);
    expect(hole.w1).toBe(5);
  });
});
