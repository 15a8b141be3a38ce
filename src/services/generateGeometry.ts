/**
 * Generation pipeline: normalize → build → encode
 *
 * Synchronous and stateless; every call allocates its own builder and buffers.
 */

import { encodeGlb, type EncodedAsset } from '../encoding/encodeGlb.js';
import { buildGeometry, type BuildOptions } from '../geometry/buildGeometry.js';
import type { BuildStats, OpeningPlacement } from '../geometry/types.js';
import type { NormalizedSpec } from '../types/spec.js';
import { createLogger, type Logger } from '../utils/debug.js';
import { GeometryInternalError } from '../utils/errors.js';
import { Timer } from '../utils/timing.js';
import { normalizeSpec, type NormalizeOptions } from './normalizeSpec.js';

export interface GenerateOptions {
  normalize?: NormalizeOptions;
  build?: Partial<Omit<BuildOptions, 'logger'>>;
  includeNormals?: boolean;
  logger?: Logger;
}

export interface GenerationResult {
  asset: EncodedAsset;
  spec: NormalizedSpec;
  warnings: string[];
  stats: BuildStats;
  placements: OpeningPlacement[];
  fallback: boolean;
  generationTimeMs: number;
}

/**
 * Turn a raw building specification into a GLB asset
 *
 * @throws SpecValidationError when the specification is invalid
 * @throws GeometryInternalError when assembly or encoding breaks an invariant
 */
export function generateGeometry(raw: unknown, options: GenerateOptions = {}): GenerationResult {
  const log = options.logger ?? createLogger('geometry');
  const timer = new Timer('generateGeometry');

  const { spec, warnings } = normalizeSpec(raw, options.normalize);
  for (const warning of warnings) {
    log.warn(warning, { designType: spec.designType });
  }

  const built = buildGeometry(spec, { ...options.build, logger: log });

  let asset: EncodedAsset;
  try {
    asset = encodeGlb(built.mesh, { includeNormals: options.includeNormals ?? false });
  } catch (error) {
    if (error instanceof GeometryInternalError) {
      log.error('Mesh encoding failed', {
        error: error.name,
        message: error.message,
        ...error.diagnostics(),
        meshVertexCount: built.stats.vertexCount,
        meshFaceCount: built.stats.faceCount,
      });
    }
    throw error;
  }

  const generationTimeMs = timer.end(log);
  log.debug('Geometry generated', {
    designType: spec.designType,
    vertices: asset.layout.vertexCount,
    faces: asset.layout.faceCount,
    bytes: asset.byteLength,
  });

  return {
    asset,
    spec,
    warnings,
    stats: built.stats,
    placements: built.placements,
    fallback: built.fallback,
    generationTimeMs,
  };
}
