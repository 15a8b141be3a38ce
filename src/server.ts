/**
 * Express server setup
 */

import { randomUUID } from 'crypto';
import cors from 'cors';
import express, { type NextFunction, type Request, type Response } from 'express';
import { isOriginAllowed, loadConfig, type AppConfig } from './config.js';
import { decodeGlb } from './encoding/decodeGlb.js';
import { generateGeometry } from './services/generateGeometry.js';
import { normalizeSpec } from './services/normalizeSpec.js';
import { createLogger } from './utils/debug.js';
import { GeometryInternalError, GlbFormatError, SpecValidationError } from './utils/errors.js';

type OutputFormat = 'glb' | 'json';

const VALID_FORMATS: readonly OutputFormat[] = ['glb', 'json'];
const GLB_MIME = 'model/gltf-binary';
/** Header- and filename-safe ids only */
const REQUEST_ID_PATTERN = /^[A-Za-z0-9._:-]{1,128}$/;

const log = createLogger('server');

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isValidFormat(value: unknown): value is OutputFormat {
  return VALID_FORMATS.some((format) => format === value);
}

function isValidRequestId(value: unknown): value is string {
  return typeof value === 'string' && REQUEST_ID_PATTERN.test(value);
}

/** Status attached by body-parser to its own errors (bad JSON, too large) */
function clientErrorStatus(err: unknown): number | null {
  if (!isPlainObject(err) && !(err instanceof Error)) return null;
  const status: unknown = Reflect.get(err, 'status');
  return typeof status === 'number' && status >= 400 && status < 500 ? status : null;
}

export function createServer(config: AppConfig = loadConfig()): express.Application {
  const app = express();
  const production = config.nodeEnv === 'production';

  // Middleware
  app.use(
    cors({
      origin: (origin, callback) => {
        callback(null, origin === undefined || isOriginAllowed(origin, config.corsOrigins));
      },
      exposedHeaders: ['X-Request-Id', 'X-Vertex-Count', 'X-Index-Count', 'X-Generation-Time-Ms'],
    })
  );
  app.use(express.json({ limit: config.jsonBodyLimit }));

  // Health check endpoint; /api/health is the path Vercel routes to the function
  app.get(['/health', '/api/health'], (_req: Request, res: Response) => {
    res.json({ status: 'ok' });
  });

  const api = express.Router();

  // POST /api/geometry/validate
  api.post('/geometry/validate', (req: Request, res: Response, next: NextFunction): void => {
    try {
      const body: unknown = req.body;
      if (!isPlainObject(body) || body.spec === undefined) {
        res.status(400).json({ error: 'Request body must be a JSON object with a "spec" field' });
        return;
      }
      const { spec, warnings } = normalizeSpec(body.spec, { limits: config.geometry.limits });
      res.json({ spec, warnings });
    } catch (error) {
      next(error);
    }
  });

  // POST /api/geometry/generate
  api.post('/geometry/generate', (req: Request, res: Response, next: NextFunction): void => {
    const body: unknown = req.body;
    if (!isPlainObject(body) || body.spec === undefined) {
      res.status(400).json({ error: 'Request body must be a JSON object with a "spec" field' });
      return;
    }

    const format = body.format ?? 'glb';
    if (!isValidFormat(format)) {
      res.status(400).json({ error: `format must be one of: ${VALID_FORMATS.join(', ')}` });
      return;
    }
    if (body.requestId !== undefined && !isValidRequestId(body.requestId)) {
      res.status(400).json({
        error: 'requestId must be 1-128 characters from letters, digits, ".", "_", ":" and "-"',
      });
      return;
    }
    const requestId = isValidRequestId(body.requestId) ? body.requestId : randomUUID();
    res.locals.requestId = requestId;

    try {
      const result = generateGeometry(body.spec, {
        normalize: { limits: config.geometry.limits },
        build: {
          buildingDesignTypes: config.geometry.buildingDesignTypes,
          flatRoofDesignTokens: config.geometry.flatRoofDesignTokens,
          flatRoofSubtypeTokens: config.geometry.flatRoofSubtypeTokens,
        },
        includeNormals: config.geometry.includeNormals,
        logger: createLogger('geometry'),
      });
      const { asset } = result;
      const generationTimeMs = Math.round(result.generationTimeMs * 100) / 100;

      log.info('Geometry request completed', {
        requestId,
        format,
        designType: result.spec.designType,
        bytes: asset.byteLength,
        vertices: asset.layout.vertexCount,
        indices: asset.layout.indexCount,
        generationTimeMs,
      });

      if (format === 'json') {
        res.json({
          requestId,
          format: 'glb',
          fileSizeBytes: asset.byteLength,
          generationTimeMs,
          layout: asset.layout,
          stats: result.stats,
          fallback: result.fallback,
          warnings: result.warnings,
          glbBase64: asset.toBase64(),
        });
        return;
      }

      res.setHeader('Content-Type', GLB_MIME);
      res.setHeader('Content-Disposition', `attachment; filename="${requestId}.glb"`);
      res.setHeader('X-Request-Id', requestId);
      res.setHeader('X-Vertex-Count', String(asset.layout.vertexCount));
      res.setHeader('X-Index-Count', String(asset.layout.indexCount));
      res.setHeader('X-Generation-Time-Ms', String(generationTimeMs));
      res.send(asset.toBuffer());
    } catch (error) {
      next(error);
    }
  });

  // POST /api/geometry/inspect
  api.post(
    '/geometry/inspect',
    express.raw({ type: [GLB_MIME, 'application/octet-stream'], limit: config.jsonBodyLimit }),
    (req: Request, res: Response, next: NextFunction): void => {
      try {
        const body: unknown = req.body;
        if (!Buffer.isBuffer(body) || body.byteLength === 0) {
          res.status(400).json({ error: `Request body must be a ${GLB_MIME} payload` });
          return;
        }
        const decoded = decodeGlb(body);
        res.json({
          byteLength: decoded.byteLength,
          generator: decoded.document.asset.generator ?? null,
          vertexCount: decoded.positions.length,
          faceCount: decoded.faces.length,
          indexCount: decoded.faces.length * 3,
          hasNormals: decoded.normals !== undefined,
          bounds: {
            min: decoded.document.accessors[0]?.min ?? null,
            max: decoded.document.accessors[0]?.max ?? null,
          },
        });
      } catch (error) {
        next(error);
      }
    }
  );

  app.use('/api', api);

  // Error handling middleware
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction): void => {
    if (err instanceof SpecValidationError) {
      res.status(400).json({ error: 'Invalid specification', issues: err.issues() });
      return;
    }
    if (err instanceof GlbFormatError) {
      res.status(400).json({ error: err.message });
      return;
    }
    const status = clientErrorStatus(err);
    if (status !== null) {
      res.status(status).json({ error: err instanceof Error ? err.message : 'Bad request' });
      return;
    }

    const requestId: unknown = res.locals.requestId;
    log.error('Request failed', {
      requestId,
      error: err instanceof Error ? err.name : String(err),
      message: err instanceof Error ? err.message : undefined,
      ...(err instanceof GeometryInternalError ? err.diagnostics() : {}),
      stack: !production && err instanceof Error ? err.stack : undefined,
    });
    res.status(500).json({ error: 'Internal error', requestId: typeof requestId === 'string' ? requestId : null });
  });

  return app;
}

/**
 * Start the server
 */
export function startServer(config: AppConfig = loadConfig()): void {
  const app = createServer(config);

  app.listen(config.port, () => {
    log.info(`Server running on port ${config.port}`);
  });
}
