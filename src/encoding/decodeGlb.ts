/**
 * GLB reader for the subset encodeGlb writes: one mesh, one triangle
 * primitive, float32 VEC3 positions (optionally normals) and uint16/uint32
 * indices in a single BIN buffer. Used by the inspect endpoint and tests.
 */

import type { Triangle, Vec3 } from '../geometry/types.js';
import { GlbFormatError } from '../utils/errors.js';
import {
  CHUNK_TYPE_BIN,
  CHUNK_TYPE_JSON,
  COMPONENT_FLOAT,
  COMPONENT_UNSIGNED_INT,
  COMPONENT_UNSIGNED_SHORT,
  GLB_CHUNK_HEADER_BYTES,
  GLB_HEADER_BYTES,
  GLB_MAGIC,
  GLB_VERSION,
  type AccessorType,
  type GltfAccessor,
  type GltfBufferView,
  type GltfDocument,
  type GltfPrimitive,
} from './gltf.js';

export interface DecodedGlb {
  document: GltfDocument;
  positions: Vec3[];
  faces: Triangle[];
  normals?: Vec3[];
  /** Total length declared in the GLB header */
  byteLength: number;
}

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNonNegativeInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

function optionalInteger(obj: JsonObject, key: string, where: string): number | undefined {
  const value = obj[key];
  if (value === undefined) return undefined;
  if (!isNonNegativeInteger(value)) {
    throw new GlbFormatError(`${where}.${key} must be a non-negative integer`);
  }
  return value;
}

function requiredInteger(obj: JsonObject, key: string, where: string): number {
  const value = optionalInteger(obj, key, where);
  if (value === undefined) {
    throw new GlbFormatError(`${where}.${key} is missing`);
  }
  return value;
}

function numberArray(value: unknown): number[] | undefined {
  if (!Array.isArray(value)) return undefined;
  const out: number[] = [];
  for (const item of value) {
    if (typeof item !== 'number') return undefined;
    out.push(item);
  }
  return out;
}

function objectArray(root: JsonObject, key: string): JsonObject[] {
  const value = root[key];
  if (!Array.isArray(value) || !value.every(isObject)) {
    throw new GlbFormatError(`'${key}' must be an array of objects`);
  }
  return value;
}

function parseAccessor(raw: JsonObject, index: number): GltfAccessor {
  const where = `accessors[${index}]`;
  const type = raw.type;
  let accessorType: AccessorType;
  if (type === 'SCALAR' || type === 'VEC3') {
    accessorType = type;
  } else {
    throw new GlbFormatError(`${where}.type must be SCALAR or VEC3`);
  }
  const accessor: GltfAccessor = {
    bufferView: requiredInteger(raw, 'bufferView', where),
    byteOffset: optionalInteger(raw, 'byteOffset', where),
    componentType: requiredInteger(raw, 'componentType', where),
    count: requiredInteger(raw, 'count', where),
    type: accessorType,
  };
  const min = numberArray(raw.min);
  const max = numberArray(raw.max);
  if (min) accessor.min = min;
  if (max) accessor.max = max;
  return accessor;
}

function parseBufferView(raw: JsonObject, index: number): GltfBufferView {
  const where = `bufferViews[${index}]`;
  return {
    buffer: requiredInteger(raw, 'buffer', where),
    byteOffset: optionalInteger(raw, 'byteOffset', where),
    byteLength: requiredInteger(raw, 'byteLength', where),
    byteStride: optionalInteger(raw, 'byteStride', where),
    target: optionalInteger(raw, 'target', where),
  };
}

function parsePrimitive(raw: JsonObject, where: string): GltfPrimitive {
  const attributes = raw.attributes;
  if (!isObject(attributes)) {
    throw new GlbFormatError(`${where}.attributes is missing`);
  }
  const parsed: Record<string, number> = {};
  for (const [name, value] of Object.entries(attributes)) {
    if (!isNonNegativeInteger(value)) {
      throw new GlbFormatError(`${where}.attributes.${name} must be an accessor index`);
    }
    parsed[name] = value;
  }
  return {
    attributes: parsed,
    indices: optionalInteger(raw, 'indices', where),
    mode: optionalInteger(raw, 'mode', where),
  };
}

function parseDocument(json: unknown): GltfDocument {
  if (!isObject(json)) {
    throw new GlbFormatError('JSON chunk is not an object');
  }
  const asset = json.asset;
  if (!isObject(asset) || typeof asset.version !== 'string') {
    throw new GlbFormatError('asset.version is missing');
  }

  const meshes = objectArray(json, 'meshes').map((mesh, m) => {
    const primitives = mesh.primitives;
    if (!Array.isArray(primitives) || !primitives.every(isObject)) {
      throw new GlbFormatError(`meshes[${m}].primitives must be an array of objects`);
    }
    return { primitives: primitives.map((p, i) => parsePrimitive(p, `meshes[${m}].primitives[${i}]`)) };
  });

  const buffers = objectArray(json, 'buffers').map((buffer, i) => ({
    byteLength: requiredInteger(buffer, 'byteLength', `buffers[${i}]`),
  }));

  const nodes = json.nodes === undefined
    ? undefined
    : objectArray(json, 'nodes').map((node, i) => ({
        mesh: optionalInteger(node, 'mesh', `nodes[${i}]`),
        rotation: numberArray(node.rotation),
      }));

  return {
    asset: {
      version: asset.version,
      generator: typeof asset.generator === 'string' ? asset.generator : undefined,
    },
    scene: optionalInteger(json, 'scene', 'document'),
    nodes,
    meshes,
    accessors: objectArray(json, 'accessors').map(parseAccessor),
    bufferViews: objectArray(json, 'bufferViews').map(parseBufferView),
    buffers,
  };
}

function lookup<T>(items: readonly T[], index: number, what: string): T {
  if (index >= items.length) {
    throw new GlbFormatError(`${what} ${index} does not exist`);
  }
  return items[index];
}

interface AccessorView {
  accessor: GltfAccessor;
  start: number;
  stride: number;
}

function accessorView(doc: GltfDocument, index: number, bin: DataView, elementSize: number): AccessorView {
  const accessor = lookup(doc.accessors, index, 'Accessor');
  const view = lookup(doc.bufferViews, accessor.bufferView, 'Buffer view');
  const stride = view.byteStride ?? elementSize;
  const start = (view.byteOffset ?? 0) + (accessor.byteOffset ?? 0);
  const viewEnd = (view.byteOffset ?? 0) + view.byteLength;
  const end = accessor.count === 0 ? start : start + (accessor.count - 1) * stride + elementSize;
  if (end > viewEnd || viewEnd > bin.byteLength) {
    throw new GlbFormatError(`Accessor ${index} reads past the end of its buffer view`);
  }
  return { accessor, start, stride };
}

function readVec3(doc: GltfDocument, index: number, bin: DataView, name: string): Vec3[] {
  const { accessor, start, stride } = accessorView(doc, index, bin, 12);
  if (accessor.type !== 'VEC3' || accessor.componentType !== COMPONENT_FLOAT) {
    throw new GlbFormatError(`${name} accessor must be float VEC3`);
  }
  const out: Vec3[] = [];
  for (let i = 0; i < accessor.count; i++) {
    const at = start + i * stride;
    out.push({
      x: bin.getFloat32(at, true),
      y: bin.getFloat32(at + 4, true),
      z: bin.getFloat32(at + 8, true),
    });
  }
  return out;
}

function readIndices(doc: GltfDocument, index: number, bin: DataView, vertexCount: number): Triangle[] {
  const accessor = lookup(doc.accessors, index, 'Accessor');
  let size: number;
  if (accessor.componentType === COMPONENT_UNSIGNED_SHORT) {
    size = 2;
  } else if (accessor.componentType === COMPONENT_UNSIGNED_INT) {
    size = 4;
  } else {
    throw new GlbFormatError(`Unsupported index component type ${accessor.componentType}`);
  }
  if (accessor.type !== 'SCALAR') {
    throw new GlbFormatError('Index accessor must be SCALAR');
  }
  if (accessor.count % 3 !== 0) {
    throw new GlbFormatError(`Index count ${accessor.count} is not a multiple of 3`);
  }
  const { start, stride } = accessorView(doc, index, bin, size);
  const read = (i: number): number => {
    const at = start + i * stride;
    const value = size === 2 ? bin.getUint16(at, true) : bin.getUint32(at, true);
    if (value >= vertexCount) {
      throw new GlbFormatError(`Index ${value} out of range for ${vertexCount} vertices`);
    }
    return value;
  };
  const faces: Triangle[] = [];
  for (let i = 0; i < accessor.count; i += 3) {
    faces.push([read(i), read(i + 1), read(i + 2)]);
  }
  return faces;
}

/**
 * Parse and validate a GLB container
 *
 * @throws GlbFormatError on any structural problem
 */
export function decodeGlb(data: Uint8Array): DecodedGlb {
  if (data.byteLength < GLB_HEADER_BYTES + GLB_CHUNK_HEADER_BYTES) {
    throw new GlbFormatError(`only ${data.byteLength} bytes`);
  }
  const view = new DataView(data.buffer, data.byteOffset, data.byteLength);

  if (view.getUint32(0, true) !== GLB_MAGIC) {
    throw new GlbFormatError('bad magic');
  }
  const version = view.getUint32(4, true);
  if (version !== GLB_VERSION) {
    throw new GlbFormatError(`unsupported version ${version}`);
  }
  const totalLength = view.getUint32(8, true);
  if (totalLength !== data.byteLength) {
    throw new GlbFormatError(`header declares ${totalLength} bytes, got ${data.byteLength}`);
  }

  let offset = GLB_HEADER_BYTES;
  const jsonLength = view.getUint32(offset, true);
  if (view.getUint32(offset + 4, true) !== CHUNK_TYPE_JSON) {
    throw new GlbFormatError('first chunk is not JSON');
  }
  if (jsonLength % 4 !== 0) {
    throw new GlbFormatError('JSON chunk is not 4-byte aligned');
  }
  offset += GLB_CHUNK_HEADER_BYTES;
  if (offset + jsonLength > totalLength) {
    throw new GlbFormatError('JSON chunk overruns the container');
  }

  let json: unknown;
  try {
    json = JSON.parse(Buffer.from(data.subarray(offset, offset + jsonLength)).toString('utf8'));
  } catch (err) {
    throw new GlbFormatError(`JSON chunk does not parse (${err instanceof Error ? err.message : String(err)})`);
  }
  const document = parseDocument(json);
  offset += jsonLength;

  if (offset + GLB_CHUNK_HEADER_BYTES > totalLength) {
    throw new GlbFormatError('BIN chunk is missing');
  }
  const binLength = view.getUint32(offset, true);
  if (view.getUint32(offset + 4, true) !== CHUNK_TYPE_BIN) {
    throw new GlbFormatError('second chunk is not BIN');
  }
  if (binLength % 4 !== 0) {
    throw new GlbFormatError('BIN chunk is not 4-byte aligned');
  }
  offset += GLB_CHUNK_HEADER_BYTES;
  if (offset + binLength !== totalLength) {
    throw new GlbFormatError('BIN chunk length does not match the container');
  }
  const declared = lookup(document.buffers, 0, 'Buffer').byteLength;
  if (declared > binLength) {
    throw new GlbFormatError(`buffer declares ${declared} bytes, BIN chunk holds ${binLength}`);
  }
  const bin = new DataView(data.buffer, data.byteOffset + offset, declared);

  const mesh = lookup(document.meshes, 0, 'Mesh');
  const primitive = lookup(mesh.primitives, 0, 'Primitive');
  const positionIndex = primitive.attributes.POSITION;
  if (positionIndex === undefined) {
    throw new GlbFormatError('primitive has no POSITION attribute');
  }
  if (primitive.indices === undefined) {
    throw new GlbFormatError('primitive has no indices');
  }

  const positions = readVec3(document, positionIndex, bin, 'POSITION');
  const faces = readIndices(document, primitive.indices, bin, positions.length);
  const normalIndex = primitive.attributes.NORMAL;
  const normals = normalIndex === undefined ? undefined : readVec3(document, normalIndex, bin, 'NORMAL');

  return { document, positions, faces, normals, byteLength: totalLength };
}
