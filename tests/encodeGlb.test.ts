/**
 * Unit tests for the GLB encoder
 * Byte layout, padding, index validation and determinism
 */

import { describe, it, expect } from '@jest/globals';
import { encodeGlb, flattenFaces } from '../src/encoding/encodeGlb.js';
import type { GltfDocument } from '../src/encoding/gltf.js';
import { box } from '../src/geometry/primitives.js';
import type { Mesh, Vec3 } from '../src/geometry/types.js';
import { GeometryInternalError, IndexOutOfRangeError, MeshCapacityError } from '../src/utils/errors.js';

const TRIANGLE: Mesh = {
  vertices: [
    { x: 0, y: 0, z: 0 },
    { x: 1, y: 0, z: 0 },
    { x: 0, y: 1, z: 0 },
  ],
  faces: [[0, 1, 2]],
};

interface Chunks {
  json: GltfDocument;
  jsonLength: number;
  jsonPadding: Buffer;
  binOffset: number;
  binLength: number;
  binType: number;
}

function readChunks(glb: Buffer): Chunks {
  const jsonLength = glb.readUInt32LE(12);
  const jsonBytes = glb.subarray(20, 20 + jsonLength);
  const text = jsonBytes.toString('utf8');
  const trimmed = text.trimEnd();
  const binHeader = 20 + jsonLength;
  return {
    json: JSON.parse(trimmed),
    jsonLength,
    jsonPadding: jsonBytes.subarray(Buffer.byteLength(trimmed)),
    binOffset: binHeader + 8,
    binLength: glb.readUInt32LE(binHeader),
    binType: glb.readUInt32LE(binHeader + 4),
  };
}

describe('flattenFaces', () => {
  it('should iterate faces, then the three indices of each face', () => {
    const indices = flattenFaces(
      [
        [0, 1, 2],
        [2, 1, 3],
      ],
      4
    );
    expect(Array.from(indices)).toEqual([0, 1, 2, 2, 1, 3]);
  });

  it('should throw on an index equal to the vertex count', () => {
    expect(() => flattenFaces([[0, 1, 2], [1, 2, 3]], 3)).toThrow(
      'Index 3 out of range for 3 vertices (face 1)'
    );
  });

  it('should throw on negative indices', () => {
    expect(() => flattenFaces([[0, -1, 2]], 3)).toThrow(IndexOutOfRangeError);
  });
});

describe('encodeGlb', () => {
  describe('single triangle', () => {
    const asset = encodeGlb(TRIANGLE);
    const glb = asset.toBuffer();
    const chunks = readChunks(glb);

    it('should write the 12-byte header', () => {
      expect(glb.subarray(0, 4).toString('ascii')).toBe('glTF');
      expect(glb.readUInt32LE(4)).toBe(2);
      expect(glb.readUInt32LE(8)).toBe(glb.byteLength);
      expect(asset.byteLength).toBe(glb.byteLength);
    });

    it('should pad the JSON chunk with spaces to a multiple of 4', () => {
      expect(glb.readUInt32LE(16)).toBe(0x4e4f534a);
      expect(chunks.jsonLength % 4).toBe(0);
      expect(chunks.jsonPadding.every((byte) => byte === 0x20)).toBe(true);
    });

    it('should pad the BIN chunk with zeros to a multiple of 4', () => {
      expect(chunks.binType).toBe(0x004e4942);
      expect(chunks.binLength).toBe(44);
      expect(glb.subarray(chunks.binOffset + 42, chunks.binOffset + 44)).toEqual(Buffer.from([0, 0]));
      expect(glb.byteLength).toBe(12 + 8 + chunks.jsonLength + 8 + 44);
    });

    it('should pack positions then uint16 indices, little-endian', () => {
      const bin = chunks.binOffset;
      expect(glb.readFloatLE(bin + 12)).toBe(1);
      expect(glb.readFloatLE(bin + 28)).toBe(1);
      expect([glb.readUInt16LE(bin + 36), glb.readUInt16LE(bin + 38), glb.readUInt16LE(bin + 40)]).toEqual([0, 1, 2]);
    });

    it('should describe the buffers in the JSON chunk', () => {
      const doc = chunks.json;
      expect(doc.asset).toEqual({ version: '2.0', generator: 'massing-preview-service' });
      expect(doc.meshes).toEqual([{ primitives: [{ attributes: { POSITION: 0 }, indices: 1, mode: 4 }] }]);
      expect(doc.accessors).toEqual([
        { bufferView: 0, byteOffset: 0, componentType: 5126, count: 3, type: 'VEC3', min: [0, 0, 0], max: [1, 1, 0] },
        { bufferView: 1, byteOffset: 0, componentType: 5123, count: 3, type: 'SCALAR' },
      ]);
      expect(doc.bufferViews).toEqual([
        { buffer: 0, byteOffset: 0, byteLength: 36, byteStride: 12, target: 34962 },
        { buffer: 0, byteOffset: 36, byteLength: 6, target: 34963 },
      ]);
      expect(doc.buffers).toEqual([{ byteLength: 42 }]);
    });

    it('should rotate the root node from Z-up to Y-up', () => {
      expect(chunks.json.nodes).toEqual([{ mesh: 0, rotation: [-Math.SQRT1_2, 0, 0, Math.SQRT1_2] }]);
    });

    it('should report the layout', () => {
      expect(asset.layout).toEqual({
        vertexCount: 3,
        faceCount: 1,
        indexCount: 3,
        vertexComponentType: 5126,
        indexComponentType: 5123,
        vertexByteStride: 12,
        vertexByteOffset: 0,
        vertexByteLength: 36,
        indexByteOffset: 36,
        indexByteLength: 6,
        binaryByteLength: 44,
        hasNormals: false,
      });
      expect(Object.isFrozen(asset.layout)).toBe(true);
    });
  });

  it('should set the index count to three times the face count', () => {
    const asset = encodeGlb(box({ x: 0, y: 0, z: 0 }, { x: 2, y: 3, z: 4 }));
    expect(asset.layout.indexCount).toBe(36);
    expect(readChunks(asset.toBuffer()).json.accessors[1].count).toBe(36);
  });

  it('should interleave normals with a 24-byte stride when asked', () => {
    const asset = encodeGlb(TRIANGLE, { includeNormals: true });
    const glb = asset.toBuffer();
    const { json, binOffset } = readChunks(glb);

    expect(asset.layout.vertexByteStride).toBe(24);
    expect(asset.layout.vertexByteLength).toBe(72);
    expect(asset.layout.hasNormals).toBe(true);
    expect(json.meshes[0].primitives[0].attributes).toEqual({ POSITION: 0, NORMAL: 2 });
    expect(json.accessors[2]).toEqual({ bufferView: 0, byteOffset: 12, componentType: 5126, count: 3, type: 'VEC3' });
    expect(json.bufferViews[0].byteStride).toBe(24);
    expect([glb.readFloatLE(binOffset + 12), glb.readFloatLE(binOffset + 16), glb.readFloatLE(binOffset + 20)]).toEqual([
      0, 0, 1,
    ]);
  });

  it('should leave out the node rotation when the mesh is already Y-up', () => {
    const { json } = readChunks(encodeGlb(TRIANGLE, { zUp: false }).toBuffer());
    expect(json.nodes).toEqual([{ mesh: 0 }]);
  });

  it('should abort on an out-of-range index without returning an asset', () => {
    const broken: Mesh = { vertices: TRIANGLE.vertices, faces: [[0, 1, 2], [0, 2, 3]] };
    expect(() => encodeGlb(broken)).toThrow(IndexOutOfRangeError);
  });

  it('should refuse meshes that 16-bit indices cannot address', () => {
    const vertices: Vec3[] = Array.from({ length: 65537 }, (_, i) => ({ x: i, y: 0, z: 0 }));
    expect(() => encodeGlb({ vertices, faces: [] })).toThrow(MeshCapacityError);
  });

  it('should stop at 65535 vertices so no index equals the restart value', () => {
    const vertices: Vec3[] = Array.from({ length: 65536 }, (_, i) => ({ x: i, y: 0, z: 0 }));
    expect(() => encodeGlb({ vertices, faces: [[0, 1, 65535]] })).toThrow(
      'Mesh has 65536 vertices; 16-bit indices address at most 65535'
    );
  });

  it('should refuse an empty mesh', () => {
    expect(() => encodeGlb({ vertices: [], faces: [] })).toThrow(GeometryInternalError);
    expect(() => encodeGlb({ vertices: TRIANGLE.vertices, faces: [] })).toThrow(
      'Cannot encode an empty mesh (3 vertices, 0 faces)'
    );
  });

  it('should produce byte-identical output for the same mesh', () => {
    const mesh = box({ x: 0, y: 0, z: 0 }, { x: 10, y: 30, z: 18 });
    expect(encodeGlb(mesh).toBuffer().equals(encodeGlb(mesh).toBuffer())).toBe(true);
  });

  it('should hand out copies of its bytes', () => {
    const asset = encodeGlb(TRIANGLE);
    const first = asset.toBuffer();
    first.fill(0);
    expect(asset.toBuffer().subarray(0, 4).toString('ascii')).toBe('glTF');
    expect(Buffer.from(asset.toBase64(), 'base64').equals(asset.toBuffer())).toBe(true);
  });
});
