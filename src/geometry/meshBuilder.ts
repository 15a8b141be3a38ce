/**
 * Mesh assembly
 *
 * Append-only vertex/face buffers for one building. Each primitive brings
 * indices local to its own vertices; they are shifted by the vertex count at
 * the time of appending and earlier entries are never renumbered.
 */

import type { PrimitiveKind } from '../types/spec.js';
import { IndexOutOfRangeError } from '../utils/errors.js';
import type { Mesh, Primitive, Triangle, Vec3 } from './types.js';

export class MeshBuilder {
  private vertices: Vec3[] = [];
  private faces: Triangle[] = [];
  private counts: Partial<Record<PrimitiveKind, number>> = {};

  get vertexCount(): number {
    return this.vertices.length;
  }

  get faceCount(): number {
    return this.faces.length;
  }

  isEmpty(): boolean {
    return this.vertices.length === 0;
  }

  append(kind: PrimitiveKind, primitive: Primitive): void {
    const localCount = primitive.vertices.length;
    primitive.faces.forEach((face, faceIndex) => {
      for (const index of face) {
        if (!Number.isInteger(index) || index < 0 || index >= localCount) {
          throw new IndexOutOfRangeError(index, localCount, faceIndex);
        }
      }
    });

    const offset = this.vertices.length;
    for (const v of primitive.vertices) {
      this.vertices.push({ x: v.x, y: v.y, z: v.z });
    }
    for (const [a, b, c] of primitive.faces) {
      this.faces.push([a + offset, b + offset, c + offset]);
    }
    this.counts[kind] = (this.counts[kind] ?? 0) + 1;
  }

  primitiveCounts(): Partial<Record<PrimitiveKind, number>> {
    return { ...this.counts };
  }

  /** Snapshot of the assembled buffers; the builder can keep appending afterwards */
  toMesh(): Mesh {
    return Object.freeze({
      vertices: Object.freeze(this.vertices.map((v) => Object.freeze({ ...v }))),
      faces: Object.freeze(this.faces.slice()),
    });
  }
}
