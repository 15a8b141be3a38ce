/**
 * Unit tests for the GLB decoder
 */

import { describe, it, expect } from '@jest/globals';
import { decodeGlb } from '../src/encoding/decodeGlb.js';
import { encodeGlb } from '../src/encoding/encodeGlb.js';
import { box } from '../src/geometry/primitives.js';
import { GlbFormatError } from '../src/utils/errors.js';

const BOX = box({ x: 0, y: 0, z: 0 }, { x: 2, y: 3, z: 4 });

function encodedBox(): Buffer {
  return encodeGlb(BOX).toBuffer();
}

describe('decodeGlb', () => {
  it('should read back positions and faces', () => {
    const glb = encodedBox();
    const decoded = decodeGlb(glb);

    expect(decoded.byteLength).toBe(glb.byteLength);
    expect(decoded.positions).toEqual(BOX.vertices);
    expect(decoded.faces).toEqual(BOX.faces);
    expect(decoded.normals).toBeUndefined();
    expect(decoded.document.asset.generator).toBe('massing-preview-service');
  });

  it('should read interleaved normals', () => {
    const cube = box({ x: 0, y: 0, z: 0 }, { x: 1, y: 1, z: 1 });
    const decoded = decodeGlb(encodeGlb(cube, { includeNormals: true }).toBuffer());
    expect(decoded.positions).toEqual(cube.vertices);
    expect(decoded.normals).toHaveLength(8);
    const corner = decoded.normals?.[0];
    expect(corner?.x).toBeCloseTo(-1 / Math.sqrt(3), 6);
    expect(corner?.y).toBeCloseTo(-1 / Math.sqrt(3), 6);
    expect(corner?.z).toBeCloseTo(-1 / Math.sqrt(3), 6);
  });

  it('should reject input shorter than a header', () => {
    expect(() => decodeGlb(new Uint8Array(4))).toThrow('Malformed GLB: only 4 bytes');
  });

  it('should reject a bad magic number', () => {
    const glb = encodedBox();
    glb[0] = 0x00;
    expect(() => decodeGlb(glb)).toThrow('Malformed GLB: bad magic');
  });

  it('should reject other container versions', () => {
    const glb = encodedBox();
    glb.writeUInt32LE(1, 4);
    expect(() => decodeGlb(glb)).toThrow('Malformed GLB: unsupported version 1');
  });

  it('should reject a length that does not match the header', () => {
    const glb = encodedBox();
    const longer = Buffer.concat([glb, Buffer.alloc(4)]);
    expect(() => decodeGlb(longer)).toThrow(
      `Malformed GLB: header declares ${glb.byteLength} bytes, got ${glb.byteLength + 4}`
    );
  });

  it('should reject a JSON chunk that does not parse', () => {
    const glb = encodedBox();
    glb[20] = 0x21; // '!'
    expect(() => decodeGlb(glb)).toThrow(GlbFormatError);
  });

  it('should reject an index past the last vertex', () => {
    const glb = encodedBox();
    const jsonLength = glb.readUInt32LE(12);
    const bin = 20 + jsonLength + 8;
    glb.writeUInt16LE(99, bin + 8 * 12);
    expect(() => decodeGlb(glb)).toThrow('Malformed GLB: Index 99 out of range for 8 vertices');
  });

  it('should reject a BIN chunk of the wrong type', () => {
    const glb = encodedBox();
    const jsonLength = glb.readUInt32LE(12);
    glb.writeUInt32LE(0x12345678, 20 + jsonLength + 4);
    expect(() => decodeGlb(glb)).toThrow('Malformed GLB: second chunk is not BIN');
  });
});
