/**
 * Mesh Encoder
 *
 * Serializes an assembled mesh into a GLB container:
 * 12-byte header + JSON chunk + BIN chunk (vertex data, then uint16 indices).
 *
 * Faces are flattened explicitly (face by face, three indices each) and every
 * index is bounds-checked before it is packed. Accessor counts are taken from
 * the packed buffers, never set ahead of packing.
 */

import { computeVertexNormals } from '../geometry/computeNormals.js';
import type { Mesh, Triangle } from '../geometry/types.js';
import { GeometryInternalError, IndexOutOfRangeError, MeshCapacityError } from '../utils/errors.js';
import {
  CHUNK_TYPE_BIN,
  CHUNK_TYPE_JSON,
  COMPONENT_FLOAT,
  COMPONENT_UNSIGNED_SHORT,
  GLB_CHUNK_HEADER_BYTES,
  GLB_HEADER_BYTES,
  GLB_MAGIC,
  GLB_VERSION,
  MAX_UINT16_VERTICES,
  MODE_TRIANGLES,
  TARGET_ARRAY_BUFFER,
  TARGET_ELEMENT_ARRAY_BUFFER,
  padding4,
  type GltfAccessor,
  type GltfDocument,
} from './gltf.js';

export interface EncodeOptions {
  /** Interleave a NORMAL attribute after each position (stride 24 instead of 12) */
  includeNormals?: boolean;
  /** Rotate the root node so the Z-up mesh displays Y-up */
  zUp?: boolean;
  generator?: string;
}

/**
 * Where everything sits in the BIN chunk
 */
export interface BufferLayout {
  vertexCount: number;
  faceCount: number;
  indexCount: number;
  vertexComponentType: typeof COMPONENT_FLOAT;
  indexComponentType: typeof COMPONENT_UNSIGNED_SHORT;
  vertexByteStride: number;
  vertexByteOffset: number;
  vertexByteLength: number;
  indexByteOffset: number;
  indexByteLength: number;
  /** BIN chunk payload length including padding */
  binaryByteLength: number;
  hasNormals: boolean;
}

/**
 * Encoded GLB. The bytes stay private; callers get copies.
 */
export class EncodedAsset {
  readonly layout: Readonly<BufferLayout>;
  readonly byteLength: number;
  private readonly bytes: Uint8Array;

  constructor(bytes: Uint8Array, layout: BufferLayout) {
    this.bytes = bytes;
    this.byteLength = bytes.byteLength;
    this.layout = Object.freeze({ ...layout });
    Object.freeze(this);
  }

  toBuffer(): Buffer {
    return Buffer.from(this.bytes);
  }

  toBase64(): string {
    return Buffer.from(this.bytes).toString('base64');
  }
}

export const DEFAULT_GENERATOR = 'massing-preview-service';

/** Quaternion for -90 degrees about X: maps +Z (mesh up) to +Y (glTF up) */
const Z_UP_TO_Y_UP: readonly number[] = [-Math.SQRT1_2, 0, 0, Math.SQRT1_2];

/**
 * Flatten a face list into a uint16 index buffer.
 *
 * @throws IndexOutOfRangeError on the first index outside [0, vertexCount)
 */
export function flattenFaces(faces: readonly Triangle[], vertexCount: number): Uint16Array {
  const indices = new Uint16Array(faces.length * 3);
  let cursor = 0;
  faces.forEach((face, faceIndex) => {
    for (const index of face) {
      if (!Number.isInteger(index) || index < 0 || index >= vertexCount) {
        throw new IndexOutOfRangeError(index, vertexCount, faceIndex);
      }
      indices[cursor++] = index;
    }
  });
  return indices;
}

function packVertices(mesh: Mesh, includeNormals: boolean): { bytes: Uint8Array; stride: number; min: number[]; max: number[] } {
  const stride = includeNormals ? 24 : 12;
  const bytes = new Uint8Array(mesh.vertices.length * stride);
  const view = new DataView(bytes.buffer);
  const normals = includeNormals ? computeVertexNormals(mesh.vertices, mesh.faces) : [];
  const min = [Infinity, Infinity, Infinity];
  const max = [-Infinity, -Infinity, -Infinity];

  mesh.vertices.forEach((v, i) => {
    const base = i * stride;
    const components = [Math.fround(v.x), Math.fround(v.y), Math.fround(v.z)];
    components.forEach((value, axis) => {
      view.setFloat32(base + axis * 4, value, true);
      min[axis] = Math.min(min[axis], value);
      max[axis] = Math.max(max[axis], value);
    });
    if (includeNormals) {
      const n = normals[i];
      view.setFloat32(base + 12, n.x, true);
      view.setFloat32(base + 16, n.y, true);
      view.setFloat32(base + 20, n.z, true);
    }
  });
  return { bytes, stride, min, max };
}

function packIndices(indices: Uint16Array): Uint8Array {
  const bytes = new Uint8Array(indices.length * 2);
  const view = new DataView(bytes.buffer);
  indices.forEach((index, i) => view.setUint16(i * 2, index, true));
  return bytes;
}

/**
 * Encode a mesh as GLB
 *
 * @throws MeshCapacityError when the mesh has more vertices than uint16 can address
 * @throws IndexOutOfRangeError when a face references a missing vertex
 * @throws GeometryInternalError when the mesh has no vertices or no faces
 */
export function encodeGlb(mesh: Mesh, options: EncodeOptions = {}): EncodedAsset {
  const includeNormals = options.includeNormals ?? false;
  const vertexCount = mesh.vertices.length;
  if (vertexCount > MAX_UINT16_VERTICES) {
    throw new MeshCapacityError(vertexCount, MAX_UINT16_VERTICES);
  }
  if (vertexCount === 0 || mesh.faces.length === 0) {
    throw new GeometryInternalError(
      `Cannot encode an empty mesh (${vertexCount} vertices, ${mesh.faces.length} faces)`
    );
  }

  const indexBytes = packIndices(flattenFaces(mesh.faces, vertexCount));
  const vertexData = packVertices(mesh, includeNormals);

  const indexCount = indexBytes.byteLength / 2;
  if (indexCount !== mesh.faces.length * 3) {
    throw new GeometryInternalError(`Packed ${indexCount} indices for ${mesh.faces.length} faces`);
  }

  const vertexByteLength = vertexData.bytes.byteLength;
  const indexByteOffset = vertexByteLength;
  const indexByteLength = indexBytes.byteLength;
  const binaryLength = vertexByteLength + indexByteLength;
  const binaryPadding = padding4(binaryLength);

  const accessors: GltfAccessor[] = [
    {
      bufferView: 0,
      byteOffset: 0,
      componentType: COMPONENT_FLOAT,
      count: vertexCount,
      type: 'VEC3',
      min: vertexData.min,
      max: vertexData.max,
    },
    {
      bufferView: 1,
      byteOffset: 0,
      componentType: COMPONENT_UNSIGNED_SHORT,
      count: indexCount,
      type: 'SCALAR',
    },
  ];
  const attributes: Record<string, number> = { POSITION: 0 };
  if (includeNormals) {
    accessors.push({ bufferView: 0, byteOffset: 12, componentType: COMPONENT_FLOAT, count: vertexCount, type: 'VEC3' });
    attributes.NORMAL = 2;
  }

  const node: { mesh: number; rotation?: number[] } = { mesh: 0 };
  if (options.zUp ?? true) {
    node.rotation = Z_UP_TO_Y_UP.slice();
  }

  const document: GltfDocument = {
    asset: { version: '2.0', generator: options.generator ?? DEFAULT_GENERATOR },
    scene: 0,
    scenes: [{ nodes: [0] }],
    nodes: [node],
    meshes: [{ primitives: [{ attributes, indices: 1, mode: MODE_TRIANGLES }] }],
    accessors,
    bufferViews: [
      {
        buffer: 0,
        byteOffset: 0,
        byteLength: vertexByteLength,
        byteStride: vertexData.stride,
        target: TARGET_ARRAY_BUFFER,
      },
      {
        buffer: 0,
        byteOffset: indexByteOffset,
        byteLength: indexByteLength,
        target: TARGET_ELEMENT_ARRAY_BUFFER,
      },
    ],
    buffers: [{ byteLength: binaryLength }],
  };

  const jsonBytes = Buffer.from(JSON.stringify(document), 'utf8');
  const jsonChunkLength = jsonBytes.byteLength + padding4(jsonBytes.byteLength);
  const binChunkLength = binaryLength + binaryPadding;
  const totalLength = GLB_HEADER_BYTES + GLB_CHUNK_HEADER_BYTES + jsonChunkLength + GLB_CHUNK_HEADER_BYTES + binChunkLength;

  const glb = new Uint8Array(totalLength);
  const view = new DataView(glb.buffer);
  let offset = 0;

  view.setUint32(offset, GLB_MAGIC, true);
  view.setUint32(offset + 4, GLB_VERSION, true);
  view.setUint32(offset + 8, totalLength, true);
  offset += GLB_HEADER_BYTES;

  view.setUint32(offset, jsonChunkLength, true);
  view.setUint32(offset + 4, CHUNK_TYPE_JSON, true);
  offset += GLB_CHUNK_HEADER_BYTES;
  glb.set(jsonBytes, offset);
  glb.fill(0x20, offset + jsonBytes.byteLength, offset + jsonChunkLength);
  offset += jsonChunkLength;

  view.setUint32(offset, binChunkLength, true);
  view.setUint32(offset + 4, CHUNK_TYPE_BIN, true);
  offset += GLB_CHUNK_HEADER_BYTES;
  glb.set(vertexData.bytes, offset);
  glb.set(indexBytes, offset + indexByteOffset);
  // Trailing BIN padding is already zero from allocation

  return new EncodedAsset(glb, {
    vertexCount,
    faceCount: mesh.faces.length,
    indexCount,
    vertexComponentType: COMPONENT_FLOAT,
    indexComponentType: COMPONENT_UNSIGNED_SHORT,
    vertexByteStride: vertexData.stride,
    vertexByteOffset: 0,
    vertexByteLength,
    indexByteOffset,
    indexByteLength,
    binaryByteLength: binChunkLength,
    hasNormals: includeNormals,
  });
}
