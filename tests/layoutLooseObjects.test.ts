/**
 * Unit tests for loose object row layout
 */

import { describe, it, expect } from '@jest/globals';
import { layoutLooseObjects } from '../src/geometry/layoutLooseObjects.js';

describe('layoutLooseObjects', () => {
  const region = { x0: 0, y0: 0, x1: 5, z: 0.5 };

  it('should place items left to right and wrap into a new row', () => {
    const items = [
      { width: 2, depth: 1 },
      { width: 2, depth: 1 },
      { width: 2, depth: 1 },
    ];
    expect(layoutLooseObjects(items, region, 0.5)).toEqual([
      { x: 0, y: 0, z: 0.5 },
      { x: 2.5, y: 0, z: 0.5 },
      { x: 0, y: 1.5, z: 0.5 },
    ]);
  });

  it('should step rows by the deepest item in the row', () => {
    const items = [
      { width: 3, depth: 4 },
      { width: 1, depth: 1 },
      { width: 3, depth: 1 },
    ];
    expect(layoutLooseObjects(items, region, 0.5)[2]).toEqual({ x: 0, y: 4.5, z: 0.5 });
  });

  it('should always put at least one item in a row', () => {
    expect(layoutLooseObjects([{ width: 9, depth: 1 }, { width: 9, depth: 1 }], region, 0)).toEqual([
      { x: 0, y: 0, z: 0.5 },
      { x: 0, y: 1, z: 0.5 },
    ]);
  });

  it('should return nothing for no items', () => {
    expect(layoutLooseObjects([], region, 0.5)).toEqual([]);
  });
});
