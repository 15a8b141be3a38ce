/**
 * Geometry Module Index
 */

export * from './types.js';
export * from './classifyObject.js';
export * from './primitives.js';
export * from './piercedWall.js';
export * from './meshBuilder.js';
export * from './storyLayout.js';
export * from './placeOpenings.js';
export * from './layoutLooseObjects.js';
export * from './computeNormals.js';
export * from './buildGeometry.js';
