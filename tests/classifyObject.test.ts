/**
 * Unit tests for object classification
 */

import { describe, it, expect } from '@jest/globals';
import { classificationKey, classifyObject, containsAnyToken } from '../src/geometry/index.js';

describe('classifyObject', () => {
  const cases: Array<[{ type: string; id?: string }, string]> = [
    [{ type: 'exterior_wall_1' }, 'wall'],
    [{ type: 'Main Door' }, 'door'],
    [{ type: 'opening', id: 'front_door' }, 'door'],
    [{ type: 'WINDOW' }, 'window'],
    [{ type: 'roof_slab' }, 'roof'],
    [{ type: 'concrete_foundation' }, 'foundation'],
    [{ type: 'floor_slab' }, 'floor_slab'],
    [{ type: 'ground_floor' }, 'floor_slab'],
    [{ type: 'slab' }, 'floor_slab'],
    [{ type: 'partition', id: 'wall_2' }, 'wall'],
    [{ type: 'sofa' }, 'generic_box'],
  ];

  it.each(cases)('should classify %j as %s', (obj, kind) => {
    expect(classifyObject(obj)).toBe(kind);
  });

  it('should check doors before walls', () => {
    expect(classifyObject({ type: 'wall_door' })).toBe('door');
  });

  it('should build the key from type and id', () => {
    expect(classificationKey({ type: 'Window', id: 'W-1' })).toBe('window w-1');
    expect(classificationKey({ type: 'Window' })).toBe('window');
  });
});

describe('containsAnyToken', () => {
  it('should match case-insensitively', () => {
    expect(containsAnyToken('Flat_Complex', ['flat'])).toBe(true);
    expect(containsAnyToken('row_house', ['flat'])).toBe(false);
  });

  it('should ignore empty tokens', () => {
    expect(containsAnyToken('house', [''])).toBe(false);
  });
});
