/**
 * Story stacking and wall frames
 */

import type { NormalizedSpec } from '../types/spec.js';
import type { WallSpec } from './piercedWall.js';
import type { WallId } from './types.js';

export interface StoryLayout {
  index: number;
  /** Base of the story: index * storyHeight + foundation thickness */
  z: number;
  height: number;
}

export const WALL_IDS: readonly WallId[] = ['front', 'back', 'left', 'right'];

export function storyLayouts(spec: NormalizedSpec): StoryLayout[] {
  const { stories, storyHeight, construction } = spec;
  return Array.from({ length: stories }, (_, index) => ({
    index,
    z: index * storyHeight + construction.foundationThickness,
    height: storyHeight,
  }));
}

/** z of the top of the uppermost story */
export function roofBase(spec: NormalizedSpec): number {
  return spec.stories * spec.storyHeight + spec.construction.foundationThickness;
}

/**
 * The four perimeter walls of one story. Front and back run along x, left and
 * right along y; each sits inside the footprint.
 */
export function storyWalls(spec: NormalizedSpec, story: StoryLayout): Record<WallId, WallSpec> {
  const { width, depth } = spec.dimensions;
  const t = spec.construction.wallThickness;
  const z = story.z;
  const height = story.height;
  return {
    front: { frame: { origin: { x: 0, y: 0, z }, along: 'x' }, span: width, thickness: t, height },
    back: { frame: { origin: { x: 0, y: depth - t, z }, along: 'x' }, span: width, thickness: t, height },
    left: { frame: { origin: { x: 0, y: 0, z }, along: 'y' }, span: depth, thickness: t, height },
    right: { frame: { origin: { x: width - t, y: 0, z }, along: 'y' }, span: depth, thickness: t, height },
  };
}

/** Length of the given wall */
export function wallSpan(spec: NormalizedSpec, wallId: WallId): number {
  return wallId === 'front' || wallId === 'back' ? spec.dimensions.width : spec.dimensions.depth;
}
