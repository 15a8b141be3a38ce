/**
 * Building specification types
 *
 * RawBuildingSpec is what the prompt-to-spec translator hands us (loosely
 * shaped JSON). NormalizedSpec is the only shape the geometry builder accepts:
 * metric, fully populated, already validated.
 */

export type UnitSystem = 'meters' | 'feet';

/** Closed set of primitive generators an object can be routed to */
export type PrimitiveKind =
  | 'wall'
  | 'door'
  | 'window'
  | 'roof'
  | 'floor_slab'
  | 'foundation'
  | 'generic_box';

export type RoofStyle = 'flat' | 'pitched';

export interface RawObjectSpec {
  type?: unknown;
  id?: unknown;
  subtype?: unknown;
  count?: unknown;
  dimensions?: unknown;
  [key: string]: unknown;
}

export interface RawBuildingSpec {
  design_type?: unknown;
  dimensions?: unknown;
  stories?: unknown;
  floors?: unknown;
  units?: unknown;
  objects?: unknown;
  [key: string]: unknown;
}

export interface Dimensions {
  width: number;
  depth: number;
  height: number;
}

/** Object dimensions after defaults; thickness is the extent through a wall */
export interface ObjectDimensions extends Dimensions {
  thickness: number;
}

export interface NormalizedObject {
  kind: PrimitiveKind;
  type: string;
  id?: string;
  subtype?: string;
  count: number;
  dimensions: ObjectDimensions;
}

/**
 * Construction constants, in meters. The normalizer is the single place these
 * get filled in; nothing downstream invents its own.
 */
export interface ConstructionDefaults {
  wallThickness: number;
  floorSlabThickness: number;
  foundationThickness: number;
  roofThickness: number;
  /** Gable peak height as a fraction of story height */
  roofPitchRatio: number;
  /** Distance from a wall's start to its first opening slot */
  wallMargin: number;
  door: ObjectDimensions;
  window: ObjectDimensions;
  genericBox: ObjectDimensions;
}

export interface NormalizedSpec {
  designType: string;
  dimensions: Dimensions;
  stories: number;
  /** height / stories */
  storyHeight: number;
  units: 'meters';
  unitsOriginal: UnitSystem;
  objects: NormalizedObject[];
  construction: ConstructionDefaults;
}

export interface NormalizeResult {
  spec: NormalizedSpec;
  warnings: string[];
}
