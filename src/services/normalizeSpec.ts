/**
 * Specification Normalizer
 *
 * Validates a raw building spec and produces the canonical metric form the
 * geometry builder consumes. Every problem is collected before throwing so the
 * caller sees the whole list in one pass.
 */

import { classifyObject } from '../geometry/classifyObject.js';
import type {
  ConstructionDefaults,
  Dimensions,
  NormalizeResult,
  NormalizedObject,
  ObjectDimensions,
  PrimitiveKind,
  UnitSystem,
} from '../types/spec.js';
import {
  DimensionOutOfBoundsError,
  InvalidDimensionError,
  InvalidFieldError,
  MissingKeyError,
  SpecValidationError,
  type SpecFieldError,
} from '../utils/errors.js';

export const FEET_TO_METERS = 0.3048;

export interface NormalizeLimits {
  maxStories: number;
  /** Largest linear dimension accepted, in meters */
  maxDimension: number;
  /** Upper bound on the sum of all object counts */
  maxObjectInstances: number;
}

export interface NormalizeOptions {
  limits?: Partial<NormalizeLimits>;
  construction?: Partial<ConstructionDefaults>;
}

export const DEFAULT_LIMITS: NormalizeLimits = {
  maxStories: 100,
  maxDimension: 1000,
  maxObjectInstances: 1000,
};

export const DEFAULT_CONSTRUCTION: ConstructionDefaults = {
  wallThickness: 0.2,
  floorSlabThickness: 0.15,
  foundationThickness: 0.5,
  roofThickness: 0.2,
  roofPitchRatio: 0.3,
  wallMargin: 1.0,
  door: { width: 0.9, depth: 0.05, height: 2.1, thickness: 0.05 },
  window: { width: 1.2, depth: 0.1, height: 1.0, thickness: 0.1 },
  genericBox: { width: 1.0, depth: 1.0, height: 1.0, thickness: 1.0 },
};

const DIMENSION_ALIASES: Record<keyof Dimensions, readonly string[]> = {
  width: ['width', 'w'],
  depth: ['depth', 'length', 'd', 'l'],
  height: ['height', 'h'],
};

const OBJECT_DIMENSION_ALIASES: Record<keyof ObjectDimensions, readonly string[]> = {
  ...DIMENSION_ALIASES,
  thickness: ['thickness', 't'],
};

const OBJECT_DIMENSION_NAMES = ['width', 'depth', 'height', 'thickness'] as const;

const UNIT_ALIASES: Record<string, UnitSystem> = {
  meters: 'meters',
  metres: 'meters',
  meter: 'meters',
  metre: 'meters',
  m: 'meters',
  feet: 'feet',
  foot: 'feet',
  ft: 'feet',
};

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function hasKey(record: Record<string, unknown>, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(record, key) && record[key] !== undefined;
}

/**
 * Collects errors and warnings while a spec is being read
 */
class Collector {
  readonly errors: SpecFieldError[] = [];
  readonly warnings: string[] = [];

  /**
   * Resolve the first present alias. A differing value under a later alias is
   * reported as a warning, never merged.
   */
  pick(
    record: Record<string, unknown>,
    canonical: string,
    aliases: readonly string[],
    path: string
  ): { present: false } | { present: true; value: unknown } {
    const found = aliases.filter((alias) => hasKey(record, alias));
    if (found.length === 0) {
      return { present: false };
    }
    const [first, ...rest] = found;
    const value = record[first];
    for (const alias of rest) {
      if (record[alias] !== value) {
        this.warnings.push(
          `Conflicting values for ${path}${canonical}: using '${first}' (${String(value)}), ignoring '${alias}' (${String(record[alias])})`
        );
      }
    }
    return { present: true, value };
  }

  /**
   * Read a positive finite dimension and convert it to meters
   */
  dimension(
    record: Record<string, unknown>,
    canonical: string,
    aliases: readonly string[],
    path: string,
    unitFactor: number,
    maxDimension: number,
    required: boolean
  ): number | undefined {
    const key = `${path}${canonical}`;
    const picked = this.pick(record, canonical, aliases, path);
    if (!picked.present) {
      if (required) this.errors.push(new MissingKeyError(key));
      return undefined;
    }
    const raw = picked.value;
    if (typeof raw !== 'number' || !Number.isFinite(raw) || raw <= 0) {
      this.errors.push(new InvalidDimensionError(key, raw));
      return undefined;
    }
    const meters = raw * unitFactor;
    if (meters > maxDimension) {
      this.errors.push(new DimensionOutOfBoundsError(key, meters, maxDimension));
      return undefined;
    }
    return meters;
  }
}

function readUnits(raw: Record<string, unknown>, collector: Collector): UnitSystem {
  if (!hasKey(raw, 'units')) {
    return 'meters';
  }
  const value = raw.units;
  const unit = typeof value === 'string' ? UNIT_ALIASES[value.trim().toLowerCase()] : undefined;
  if (!unit) {
    collector.errors.push(new InvalidFieldError('units', value, "'meters' or 'feet'"));
    return 'meters';
  }
  return unit;
}

function readDesignType(raw: Record<string, unknown>, collector: Collector): string | undefined {
  const picked = collector.pick(raw, 'design_type', ['design_type', 'designType'], '');
  if (!picked.present) {
    collector.errors.push(new MissingKeyError('design_type'));
    return undefined;
  }
  const value = picked.value;
  if (typeof value !== 'string' || value.trim() === '') {
    collector.errors.push(new InvalidFieldError('design_type', value, 'a non-empty string'));
    return undefined;
  }
  return value.trim();
}

function readStories(raw: Record<string, unknown>, collector: Collector, limits: NormalizeLimits): number | undefined {
  const picked = collector.pick(raw, 'stories', ['stories', 'floors'], '');
  if (!picked.present) {
    collector.warnings.push("'stories' not specified, defaulting to 1");
    return 1;
  }
  const value = picked.value;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
    collector.errors.push(new InvalidFieldError('stories', value, 'an integer >= 1'));
    return undefined;
  }
  if (value > limits.maxStories) {
    collector.errors.push(new DimensionOutOfBoundsError('stories', value, limits.maxStories));
    return undefined;
  }
  return value;
}

function readDimensions(
  raw: Record<string, unknown>,
  collector: Collector,
  unitFactor: number,
  limits: NormalizeLimits
): Dimensions | undefined {
  if (!hasKey(raw, 'dimensions')) {
    collector.errors.push(new MissingKeyError('dimensions'));
    return undefined;
  }
  const dims = raw.dimensions;
  if (!isPlainObject(dims)) {
    collector.errors.push(new InvalidFieldError('dimensions', dims, 'an object'));
    return undefined;
  }
  const read = (name: keyof Dimensions) =>
    collector.dimension(dims, name, DIMENSION_ALIASES[name], '', unitFactor, limits.maxDimension, true);
  const width = read('width');
  const depth = read('depth');
  const height = read('height');
  if (width === undefined || depth === undefined || height === undefined) {
    return undefined;
  }
  return { width, depth, height };
}

/**
 * Defaults for an object's dimensions, derived from its kind and the building
 */
function defaultObjectDimensions(
  kind: PrimitiveKind,
  dims: Dimensions,
  storyHeight: number,
  construction: ConstructionDefaults
): ObjectDimensions {
  const footprint = { width: dims.width, depth: dims.depth };
  switch (kind) {
    case 'door':
      return { ...construction.door };
    case 'window':
      return { ...construction.window };
    case 'wall':
      return {
        width: dims.width,
        depth: construction.wallThickness,
        height: storyHeight,
        thickness: construction.wallThickness,
      };
    case 'roof':
      return { ...footprint, height: construction.roofThickness, thickness: construction.roofThickness };
    case 'floor_slab':
      return { ...footprint, height: construction.floorSlabThickness, thickness: construction.floorSlabThickness };
    case 'foundation':
      return { ...footprint, height: construction.foundationThickness, thickness: construction.foundationThickness };
    case 'generic_box':
      return { ...construction.genericBox };
  }
}

/**
 * Merge explicit dimensions over defaults. Each kind has one "through" extent:
 * thickness for openings and walls, height for slabs, depth for boxes.
 */
function resolveObjectDimensions(
  kind: PrimitiveKind,
  explicit: Partial<ObjectDimensions>,
  defaults: ObjectDimensions
): ObjectDimensions {
  const width = explicit.width ?? defaults.width;
  switch (kind) {
    case 'door':
    case 'window':
    case 'wall': {
      const thickness = explicit.thickness ?? explicit.depth ?? defaults.thickness;
      return { width, depth: thickness, height: explicit.height ?? defaults.height, thickness };
    }
    case 'roof':
    case 'floor_slab':
    case 'foundation': {
      const height = explicit.height ?? explicit.thickness ?? defaults.height;
      return { width, depth: explicit.depth ?? defaults.depth, height, thickness: height };
    }
    case 'generic_box': {
      const depth = explicit.depth ?? explicit.thickness ?? defaults.depth;
      return { width, depth, height: explicit.height ?? defaults.height, thickness: depth };
    }
  }
}

interface ParsedObject {
  type: string;
  id?: string;
  subtype?: string;
  count: number;
  explicit: Partial<ObjectDimensions>;
}

function readObject(
  value: unknown,
  index: number,
  collector: Collector,
  unitFactor: number,
  limits: NormalizeLimits
): ParsedObject | undefined {
  const path = `objects[${index}]`;
  if (!isPlainObject(value)) {
    collector.errors.push(new InvalidFieldError(path, value, 'an object'));
    return undefined;
  }
  let valid = true;

  let type: string | undefined;
  const rawType = value.type;
  if (!hasKey(value, 'type')) {
    collector.errors.push(new MissingKeyError(`${path}.type`));
    valid = false;
  } else if (typeof rawType !== 'string' || rawType.trim() === '') {
    collector.errors.push(new InvalidFieldError(`${path}.type`, rawType, 'a non-empty string'));
    valid = false;
  } else {
    type = rawType.trim();
  }

  let count = 1;
  if (hasKey(value, 'count')) {
    const raw = value.count;
    if (typeof raw !== 'number' || !Number.isInteger(raw) || raw < 0) {
      collector.errors.push(new InvalidFieldError(`${path}.count`, raw, 'an integer >= 0'));
      valid = false;
    } else {
      count = raw;
    }
  }

  const optionalString = (key: 'id' | 'subtype'): string | undefined => {
    if (!hasKey(value, key)) return undefined;
    const raw = value[key];
    if (typeof raw === 'string') return raw;
    if (typeof raw === 'number') return String(raw);
    collector.errors.push(new InvalidFieldError(`${path}.${key}`, raw, 'a string'));
    valid = false;
    return undefined;
  };
  const id = optionalString('id');
  const subtype = optionalString('subtype');

  const explicit: Partial<ObjectDimensions> = {};
  if (hasKey(value, 'dimensions')) {
    const dims = value.dimensions;
    if (!isPlainObject(dims)) {
      collector.errors.push(new InvalidFieldError(`${path}.dimensions`, dims, 'an object'));
      valid = false;
    } else {
      for (const name of OBJECT_DIMENSION_NAMES) {
        const errorsBefore = collector.errors.length;
        const meters = collector.dimension(
          dims,
          name,
          OBJECT_DIMENSION_ALIASES[name],
          `${path}.dimensions.`,
          unitFactor,
          limits.maxDimension,
          false
        );
        if (meters !== undefined) {
          explicit[name] = meters;
        }
        if (collector.errors.length > errorsBefore) valid = false;
      }
    }
  }

  if (!valid || type === undefined) {
    return undefined;
  }
  const parsed: ParsedObject = { type, count, explicit };
  if (id !== undefined) parsed.id = id;
  if (subtype !== undefined) parsed.subtype = subtype;
  return parsed;
}

function readObjects(
  raw: Record<string, unknown>,
  collector: Collector,
  unitFactor: number,
  limits: NormalizeLimits
): ParsedObject[] | undefined {
  if (!hasKey(raw, 'objects')) {
    collector.warnings.push('No objects defined, will generate basic structure only');
    return [];
  }
  const list = raw.objects;
  if (!Array.isArray(list)) {
    collector.errors.push(new InvalidFieldError('objects', list, 'an array'));
    return undefined;
  }
  if (list.length === 0) {
    collector.warnings.push('No objects defined, will generate basic structure only');
  }
  const parsed: ParsedObject[] = [];
  list.forEach((item: unknown, index) => {
    const obj = readObject(item, index, collector, unitFactor, limits);
    if (obj) parsed.push(obj);
  });
  const instances = parsed.reduce((sum, obj) => sum + obj.count, 0);
  if (instances > limits.maxObjectInstances) {
    collector.errors.push(new DimensionOutOfBoundsError('objects', instances, limits.maxObjectInstances));
  }
  return parsed;
}

/**
 * Validate and normalize a raw building specification.
 *
 * @throws SpecValidationError listing every problem found
 */
export function normalizeSpec(raw: unknown, options: NormalizeOptions = {}): NormalizeResult {
  const limits: NormalizeLimits = { ...DEFAULT_LIMITS, ...options.limits };
  const construction: ConstructionDefaults = { ...DEFAULT_CONSTRUCTION, ...options.construction };
  const collector = new Collector();

  if (!isPlainObject(raw)) {
    throw new SpecValidationError([new InvalidFieldError('spec', raw, 'an object')]);
  }

  const designType = readDesignType(raw, collector);
  const unitsOriginal = readUnits(raw, collector);
  const unitFactor = unitsOriginal === 'feet' ? FEET_TO_METERS : 1;
  const dimensions = readDimensions(raw, collector, unitFactor, limits);
  const stories = readStories(raw, collector, limits);
  const parsedObjects = readObjects(raw, collector, unitFactor, limits);

  if (
    collector.errors.length > 0 ||
    designType === undefined ||
    dimensions === undefined ||
    stories === undefined ||
    parsedObjects === undefined
  ) {
    throw new SpecValidationError(collector.errors);
  }

  if (unitsOriginal === 'feet') {
    collector.warnings.push('Converted dimensions from feet to meters');
  }

  const storyHeight = dimensions.height / stories;
  const objects: NormalizedObject[] = parsedObjects.map((obj) => {
    const kind = classifyObject(obj);
    const defaults = defaultObjectDimensions(kind, dimensions, storyHeight, construction);
    const normalized: NormalizedObject = {
      kind,
      type: obj.type,
      count: obj.count,
      dimensions: resolveObjectDimensions(kind, obj.explicit, defaults),
    };
    if (obj.id !== undefined) normalized.id = obj.id;
    if (obj.subtype !== undefined) normalized.subtype = obj.subtype;
    return normalized;
  });

  return {
    spec: {
      designType,
      dimensions,
      stories,
      storyHeight,
      units: 'meters',
      unitsOriginal,
      objects,
      construction,
    },
    warnings: collector.warnings,
  };
}
