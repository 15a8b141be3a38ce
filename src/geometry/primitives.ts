/**
 * Primitive generators
 *
 * Closed, outward-wound solids: every directed edge appears once and its
 * reverse appears once.
 */

import type { Primitive, Triangle, Vec3 } from './types.js';

/** Outward winding for the 8-corner box below */
const BOX_FACES: readonly Triangle[] = [
  [0, 2, 1], [0, 3, 2], // bottom
  [4, 5, 6], [4, 6, 7], // top
  [0, 1, 5], [0, 5, 4], // y-min
  [3, 7, 6], [3, 6, 2], // y-max
  [0, 4, 7], [0, 7, 3], // x-min
  [1, 2, 6], [1, 6, 5], // x-max
];

/**
 * Axis-aligned box between two corners
 */
export function box(min: Vec3, max: Vec3): Primitive {
  const { x: x0, y: y0, z: z0 } = min;
  const { x: x1, y: y1, z: z1 } = max;
  return {
    vertices: [
      { x: x0, y: y0, z: z0 },
      { x: x1, y: y0, z: z0 },
      { x: x1, y: y1, z: z0 },
      { x: x0, y: y1, z: z0 },
      { x: x0, y: y0, z: z1 },
      { x: x1, y: y0, z: z1 },
      { x: x1, y: y1, z: z1 },
      { x: x0, y: y1, z: z1 },
    ],
    faces: BOX_FACES.slice(),
  };
}

/**
 * Gable roof on a rectangular base at `origin`.
 *
 * The ridge runs along the longer span and sits over the midline of the
 * shorter one: 4 base corners, 2 peak points, two triangular gable ends, two
 * sloped rectangles and the base.
 */
export function gableRoof(origin: Vec3, width: number, depth: number, peakHeight: number): Primitive {
  if (width > depth) {
    // Build with the axes swapped, then swap back. The swap is a mirror, so
    // every triangle's winding is reversed to stay outward-facing.
    const swapped = gableRoof({ x: 0, y: 0, z: 0 }, depth, width, peakHeight);
    return {
      vertices: swapped.vertices.map((v) => ({ x: origin.x + v.y, y: origin.y + v.x, z: origin.z + v.z })),
      faces: swapped.faces.map(([a, b, c]) => [a, c, b] as const),
    };
  }

  const { x, y, z } = origin;
  const ridgeX = x + width / 2;
  return {
    vertices: [
      { x, y, z },
      { x: x + width, y, z },
      { x: x + width, y: y + depth, z },
      { x, y: y + depth, z },
      { x: ridgeX, y, z: z + peakHeight },
      { x: ridgeX, y: y + depth, z: z + peakHeight },
    ],
    faces: [
      [0, 1, 4], // front gable
      [1, 2, 5], [1, 5, 4], // x-max slope
      [2, 3, 5], // back gable
      [3, 0, 4], [3, 4, 5], // x-min slope
      [0, 3, 2], [0, 2, 1], // base
    ],
  };
}

/**
 * Concatenate primitives into one, offsetting each part's indices
 */
export function mergePrimitives(parts: readonly Primitive[]): Primitive {
  const vertices: Vec3[] = [];
  const faces: Triangle[] = [];
  for (const part of parts) {
    const offset = vertices.length;
    vertices.push(...part.vertices);
    for (const [a, b, c] of part.faces) {
      faces.push([a + offset, b + offset, c + offset]);
    }
  }
  return { vertices, faces };
}
