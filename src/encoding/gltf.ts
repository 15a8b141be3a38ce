/**
 * Binary glTF (GLB) constants and the subset of the glTF 2.0 JSON schema we
 * write and read back.
 */

export const GLB_MAGIC = 0x46546c67; // "glTF"
export const GLB_VERSION = 2;
export const GLB_HEADER_BYTES = 12;
export const GLB_CHUNK_HEADER_BYTES = 8;
export const CHUNK_TYPE_JSON = 0x4e4f534a; // "JSON"
export const CHUNK_TYPE_BIN = 0x004e4942; // "BIN\0"

export const COMPONENT_FLOAT = 5126;
export const COMPONENT_UNSIGNED_SHORT = 5123;
export const COMPONENT_UNSIGNED_INT = 5125;

export const TARGET_ARRAY_BUFFER = 34962;
export const TARGET_ELEMENT_ARRAY_BUFFER = 34963;

export const MODE_TRIANGLES = 4;

/** Largest vertex count addressable by 16-bit indices; 65535 is reserved for primitive restart */
export const MAX_UINT16_VERTICES = 65535;

export type AccessorType = 'SCALAR' | 'VEC3';

export interface GltfAccessor {
  bufferView: number;
  byteOffset?: number;
  componentType: number;
  count: number;
  type: AccessorType;
  min?: number[];
  max?: number[];
}

export interface GltfBufferView {
  buffer: number;
  byteOffset?: number;
  byteLength: number;
  byteStride?: number;
  target?: number;
}

export interface GltfPrimitive {
  attributes: Record<string, number>;
  indices?: number;
  mode?: number;
}

export interface GltfDocument {
  asset: { version: string; generator?: string };
  scene?: number;
  scenes?: Array<{ nodes: number[] }>;
  nodes?: Array<{ mesh?: number; rotation?: number[] }>;
  meshes: Array<{ primitives: GltfPrimitive[] }>;
  accessors: GltfAccessor[];
  bufferViews: GltfBufferView[];
  buffers: Array<{ byteLength: number }>;
}

/** Bytes needed to bring `length` up to a multiple of 4 */
export function padding4(length: number): number {
  return (4 - (length % 4)) % 4;
}
