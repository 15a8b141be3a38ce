/**
 * Geometry Builder
 *
 * Turns a normalized spec into one mesh: foundation, per-story perimeter walls
 * with openings cut out, floor slabs between stories, a roof, opening panels,
 * and any loose objects. Design types that are not buildings get their objects
 * laid out without a shell; when nothing at all is produced, the footprint box
 * is emitted and flagged as a fallback.
 */

import type { NormalizedObject, NormalizedSpec, RoofStyle } from '../types/spec.js';
import { createLogger, type Logger } from '../utils/debug.js';
import { classificationKey, containsAnyToken } from './classifyObject.js';
import { layoutLooseObjects, type LayoutRegion } from './layoutLooseObjects.js';
import { MeshBuilder } from './meshBuilder.js';
import { piercedWall } from './piercedWall.js';
import { placeDoor, placeWindows, toWallOpening } from './placeOpenings.js';
import { box, gableRoof } from './primitives.js';
import { roofBase, storyLayouts, storyWalls, WALL_IDS } from './storyLayout.js';
import type { BuildResult, OpeningPlacement, Primitive, Vec3, WallId } from './types.js';

export interface BuildOptions {
  /** design_type substrings that get a full building shell */
  buildingDesignTypes: readonly string[];
  /** design_type substrings that select a flat roof */
  flatRoofDesignTokens: readonly string[];
  /** object subtype substrings that select a flat roof */
  flatRoofSubtypeTokens: readonly string[];
  /** Spacing between loose objects, meters */
  looseObjectGap: number;
  logger: Logger;
}

export const DEFAULT_BUILDING_DESIGN_TYPES: readonly string[] = [
  'house',
  'building',
  'apartment',
  'villa',
  'bungalow',
  'row_house',
  'townhouse',
  'duplex',
  'penthouse',
  'cottage',
  'office',
  'flat',
];

export const DEFAULT_BUILD_OPTIONS: BuildOptions = {
  buildingDesignTypes: DEFAULT_BUILDING_DESIGN_TYPES,
  flatRoofDesignTokens: ['flat'],
  flatRoofSubtypeTokens: ['flat_roof'],
  looseObjectGap: 0.5,
  logger: createLogger('geometry'),
};

export function isBuildingDesignType(designType: string, options: Pick<BuildOptions, 'buildingDesignTypes'>): boolean {
  return containsAnyToken(designType, options.buildingDesignTypes);
}

export function selectRoofStyle(
  spec: NormalizedSpec,
  options: Pick<BuildOptions, 'flatRoofDesignTokens' | 'flatRoofSubtypeTokens'>
): RoofStyle {
  const flatByDesign = containsAnyToken(spec.designType, options.flatRoofDesignTokens);
  const flatBySubtype = spec.objects.some(
    (obj) => obj.subtype !== undefined && containsAnyToken(obj.subtype, options.flatRoofSubtypeTokens)
  );
  return flatByDesign || flatBySubtype ? 'flat' : 'pitched';
}

function roofPrimitive(style: RoofStyle, origin: Vec3, width: number, depth: number, spec: NormalizedSpec): Primitive {
  if (style === 'flat') {
    const thickness = spec.construction.roofThickness;
    return box(origin, { x: origin.x + width, y: origin.y + depth, z: origin.z + thickness });
  }
  return gableRoof(origin, width, depth, spec.construction.roofPitchRatio * spec.storyHeight);
}

/**
 * Door leaf or window pane sitting in the middle of the wall's thickness
 */
function openingPanel(spec: NormalizedSpec, placement: OpeningPlacement, panelThickness: number): Primitive {
  const { width, depth } = spec.dimensions;
  const t = spec.construction.wallThickness;
  const inset = (t - panelThickness) / 2;
  const u0 = placement.offsetAlongWall;
  const u1 = u0 + placement.width;
  const z0 = placement.offsetHeight;
  const z1 = z0 + placement.height;

  const wallStart: Record<WallId, number> = { front: 0, back: depth - t, left: 0, right: width - t };
  const v0 = wallStart[placement.wallId] + inset;
  const v1 = v0 + panelThickness;
  if (placement.wallId === 'front' || placement.wallId === 'back') {
    return box({ x: u0, y: v0, z: z0 }, { x: u1, y: v1, z: z1 });
  }
  return box({ x: v0, y: u0, z: z0 }, { x: v1, y: u1, z: z1 });
}

/**
 * Expand objects into one entry per instance
 */
function instances(objects: readonly NormalizedObject[]): NormalizedObject[] {
  return objects.flatMap((obj) => Array.from({ length: obj.count }, () => obj));
}

function loosePrimitive(
  obj: NormalizedObject,
  corner: Vec3,
  roofStyle: RoofStyle,
  spec: NormalizedSpec
): Primitive {
  const { width, depth, height } = obj.dimensions;
  if (obj.kind === 'roof') {
    return roofPrimitive(roofStyle, corner, width, depth, spec);
  }
  return box(corner, { x: corner.x + width, y: corner.y + depth, z: corner.z + height });
}

function placeLoose(
  builder: MeshBuilder,
  objects: readonly NormalizedObject[],
  region: LayoutRegion,
  roofStyle: RoofStyle,
  spec: NormalizedSpec,
  options: BuildOptions
): void {
  const items = instances(objects);
  const corners = layoutLooseObjects(
    items.map((obj) => obj.dimensions),
    region,
    options.looseObjectGap
  );
  items.forEach((obj, i) => {
    builder.append(obj.kind, loosePrimitive(obj, corners[i], roofStyle, spec));
  });
}

function warnUnmatched(objects: readonly NormalizedObject[], log: Logger): void {
  for (const obj of objects) {
    if (obj.kind === 'generic_box' && obj.count > 0) {
      log.warn('Unrecognized object type, placing generic box', {
        object: classificationKey(obj),
        count: obj.count,
      });
    }
  }
}

function buildShell(
  builder: MeshBuilder,
  spec: NormalizedSpec,
  roofStyle: RoofStyle,
  options: BuildOptions
): OpeningPlacement[] {
  const { width, depth } = spec.dimensions;
  const { construction } = spec;
  const log = options.logger;

  const windows = spec.objects.filter((obj) => obj.kind === 'window');
  const doors = spec.objects.filter((obj) => obj.kind === 'door');
  const door = placeDoor(spec, doors);
  const placements = placeWindows(spec, windows, door ? [door] : []);
  const requestedWindows = windows.reduce((sum, w) => sum + w.count, 0);
  if (placements.length < requestedWindows) {
    log.warn('Not enough free wall for every window; extra windows dropped', {
      requested: requestedWindows,
      placed: placements.length,
    });
  }
  if (door) {
    placements.push(door);
    const requested = doors.reduce((sum, d) => sum + d.count, 0);
    if (requested > 1) {
      log.debug('Door requests collapsed to a single front door', { requested });
    }
  }

  builder.append('foundation', box({ x: 0, y: 0, z: 0 }, { x: width, y: depth, z: construction.foundationThickness }));

  for (const story of storyLayouts(spec)) {
    const walls = storyWalls(spec, story);
    for (const wallId of WALL_IDS) {
      const openings = placements
        .filter((p) => p.wallId === wallId && p.story === story.index)
        .map((p) => toWallOpening(p, story.z));
      builder.append('wall', piercedWall(walls[wallId], openings));
    }
    if (story.index > 0) {
      builder.append(
        'floor_slab',
        box({ x: 0, y: 0, z: story.z }, { x: width, y: depth, z: story.z + construction.floorSlabThickness })
      );
    }
  }

  builder.append('roof', roofPrimitive(roofStyle, { x: 0, y: 0, z: roofBase(spec) }, width, depth, spec));

  for (const placement of placements) {
    builder.append(placement.kind, openingPanel(spec, placement, Math.min(placement.thickness, construction.wallThickness)));
  }

  const absorbed = spec.objects.filter(
    (obj) => obj.kind === 'wall' || obj.kind === 'roof' || obj.kind === 'floor_slab' || obj.kind === 'foundation'
  );
  for (const obj of absorbed) {
    log.debug('Object covered by the building shell', { object: classificationKey(obj), kind: obj.kind });
  }

  const loose = spec.objects.filter((obj) => obj.kind === 'generic_box');
  warnUnmatched(loose, log);
  const gap = options.looseObjectGap;
  placeLoose(
    builder,
    loose,
    {
      x0: construction.wallThickness + gap,
      y0: construction.wallThickness + gap,
      x1: width - construction.wallThickness - gap,
      z: construction.foundationThickness,
    },
    roofStyle,
    spec,
    options
  );

  return placements;
}

/**
 * Build the mesh for a normalized specification
 */
export function buildGeometry(spec: NormalizedSpec, options: Partial<BuildOptions> = {}): BuildResult {
  const opts: BuildOptions = { ...DEFAULT_BUILD_OPTIONS, ...options };
  const log = opts.logger;
  const builder = new MeshBuilder();
  const roofStyle = selectRoofStyle(spec, opts);
  let placements: OpeningPlacement[] = [];
  let shell = false;

  if (isBuildingDesignType(spec.designType, opts)) {
    placements = buildShell(builder, spec, roofStyle, opts);
    shell = true;
  } else {
    const requested = spec.objects.reduce((sum, obj) => sum + obj.count, 0);
    if (requested > 0) {
      log.warn('Design type is not a building; laying out objects without a shell', {
        designType: spec.designType,
        objects: requested,
      });
    }
    warnUnmatched(spec.objects, log);
    placeLoose(builder, spec.objects, { x0: 0, y0: 0, x1: spec.dimensions.width, z: 0 }, roofStyle, spec, opts);
  }

  let fallback = false;
  if (builder.isEmpty()) {
    const { width, depth, height } = spec.dimensions;
    log.warn('No recognized geometry; emitting footprint box fallback', {
      designType: spec.designType,
      footprint: { width, depth, height },
    });
    builder.append('generic_box', box({ x: 0, y: 0, z: 0 }, { x: width, y: depth, z: height }));
    fallback = true;
  }

  const mesh = builder.toMesh();
  return {
    mesh,
    placements,
    fallback,
    stats: {
      vertexCount: mesh.vertices.length,
      faceCount: mesh.faces.length,
      primitives: builder.primitiveCounts(),
      roofStyle: shell ? roofStyle : null,
    },
  };
}
