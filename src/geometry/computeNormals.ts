/**
 * Vertex normals
 *
 * Area-weighted average of the normals of every triangle touching a vertex.
 */

import type { Triangle, Vec3 } from './types.js';

const UP: Vec3 = { x: 0, y: 0, z: 1 };

/**
 * Unnormalized triangle normal; its length is twice the triangle's area
 */
export function faceNormal(a: Vec3, b: Vec3, c: Vec3): Vec3 {
  const e1 = { x: b.x - a.x, y: b.y - a.y, z: b.z - a.z };
  const e2 = { x: c.x - a.x, y: c.y - a.y, z: c.z - a.z };
  return {
    x: e1.y * e2.z - e1.z * e2.y,
    y: e1.z * e2.x - e1.x * e2.z,
    z: e1.x * e2.y - e1.y * e2.x,
  };
}

export function normalize(v: Vec3): Vec3 {
  const length = Math.sqrt(v.x * v.x + v.y * v.y + v.z * v.z);
  if (length < 1e-12) {
    return { ...UP };
  }
  return { x: v.x / length, y: v.y / length, z: v.z / length };
}

export function computeVertexNormals(vertices: readonly Vec3[], faces: readonly Triangle[]): Vec3[] {
  const sums: Vec3[] = vertices.map(() => ({ x: 0, y: 0, z: 0 }));
  for (const [a, b, c] of faces) {
    const n = faceNormal(vertices[a], vertices[b], vertices[c]);
    for (const index of [a, b, c]) {
      const sum = sums[index];
      sum.x += n.x;
      sum.y += n.y;
      sum.z += n.z;
    }
  }
  return sums.map(normalize);
}
