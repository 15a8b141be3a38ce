/**
 * Canonical Geometry Types
 *
 * Pure geometry model: no HTTP, no encoding. Z is up, units are meters.
 */

import type { PrimitiveKind, RoofStyle } from '../types/spec.js';

/**
 * 3D vector (x, y, z)
 */
export interface Vec3 {
  x: number;
  y: number;
  z: number;
}

/**
 * Triangle as three indices into a vertex list.
 * A face list is Triangle[]; it is never treated as a flat index buffer.
 */
export type Triangle = readonly [number, number, number];

/**
 * Standalone primitive with indices local to its own vertices
 */
export interface Primitive {
  vertices: Vec3[];
  faces: Triangle[];
}

/**
 * Assembled building mesh (read-only once the builder returns it)
 */
export interface Mesh {
  readonly vertices: readonly Vec3[];
  readonly faces: readonly Triangle[];
}

export type WallId = 'front' | 'back' | 'left' | 'right';

/**
 * Rectangular hole in a wall, in wall-local coordinates:
 * u runs along the wall from its start, w is height above the wall base.
 */
export interface WallOpening {
  u0: number;
  u1: number;
  w0: number;
  w1: number;
}

/**
 * Where one door or window ended up
 */
export interface OpeningPlacement {
  kind: 'door' | 'window';
  wallId: WallId;
  story: number;
  /** Distance along the wall to the opening's near edge */
  offsetAlongWall: number;
  /** Absolute z of the opening's bottom edge */
  offsetHeight: number;
  width: number;
  height: number;
  /** Panel thickness (door leaf or window pane) */
  thickness: number;
}

export interface BuildStats {
  vertexCount: number;
  faceCount: number;
  primitives: Partial<Record<PrimitiveKind, number>>;
  roofStyle: RoofStyle | null;
}

export interface BuildResult {
  mesh: Mesh;
  stats: BuildStats;
  placements: OpeningPlacement[];
  /** True when nothing matched and the footprint box was emitted instead */
  fallback: boolean;
}
