/**
 * Service configuration, read from the environment once at start-up
 */

import { DEFAULT_BUILDING_DESIGN_TYPES } from './geometry/buildGeometry.js';
import { DEFAULT_LIMITS, type NormalizeLimits } from './services/normalizeSpec.js';
import { ConfigError } from './utils/errors.js';

export interface GeometryConfig {
  includeNormals: boolean;
  flatRoofDesignTokens: string[];
  flatRoofSubtypeTokens: string[];
  buildingDesignTypes: string[];
  limits: NormalizeLimits;
}

export interface AppConfig {
  port: number;
  nodeEnv: string;
  /** Exact origins, `*.suffix` host patterns, or `*` */
  corsOrigins: string[];
  jsonBodyLimit: string;
  geometry: GeometryConfig;
}

export const DEFAULT_CORS_ORIGINS = ['http://localhost', 'https://localhost', 'http://127.0.0.1', 'https://127.0.0.1'];

type Env = Record<string, string | undefined>;

function readString(env: Env, name: string, fallback: string): string {
  const value = env[name]?.trim();
  return value ? value : fallback;
}

function readList(env: Env, name: string, fallback: readonly string[]): string[] {
  const value = env[name];
  if (value === undefined || value.trim() === '') {
    return [...fallback];
  }
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function readBoolean(env: Env, name: string, fallback: boolean): boolean {
  const value = env[name]?.trim().toLowerCase();
  if (!value) return fallback;
  if (['true', '1', 'yes', 'on'].includes(value)) return true;
  if (['false', '0', 'no', 'off'].includes(value)) return false;
  throw new ConfigError(name, value, 'a boolean (true/false)');
}

function readPositiveInteger(env: Env, name: string, fallback: number): number {
  const value = env[name]?.trim();
  if (!value) return fallback;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigError(name, value, 'a positive integer');
  }
  return parsed;
}

function readPositiveNumber(env: Env, name: string, fallback: number): number {
  const value = env[name]?.trim();
  if (!value) return fallback;
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new ConfigError(name, value, 'a positive number');
  }
  return parsed;
}

/**
 * @throws ConfigError when a variable is present but malformed
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const port = readPositiveInteger(env, 'PORT', 3001);
  if (port > 65535) {
    throw new ConfigError('PORT', String(port), 'a TCP port (1-65535)');
  }

  return {
    port,
    nodeEnv: readString(env, 'NODE_ENV', 'development'),
    corsOrigins: readList(env, 'CORS_ORIGINS', DEFAULT_CORS_ORIGINS),
    jsonBodyLimit: readString(env, 'JSON_BODY_LIMIT', '1mb'),
    geometry: {
      includeNormals: readBoolean(env, 'GEOMETRY_INCLUDE_NORMALS', false),
      flatRoofDesignTokens: readList(env, 'GEOMETRY_FLAT_ROOF_TOKENS', ['flat']),
      flatRoofSubtypeTokens: readList(env, 'GEOMETRY_FLAT_ROOF_SUBTYPE_TOKENS', ['flat_roof']),
      buildingDesignTypes: readList(env, 'GEOMETRY_BUILDING_TYPES', DEFAULT_BUILDING_DESIGN_TYPES),
      limits: {
        maxStories: readPositiveInteger(env, 'GEOMETRY_MAX_STORIES', DEFAULT_LIMITS.maxStories),
        maxDimension: readPositiveNumber(env, 'GEOMETRY_MAX_DIMENSION_M', DEFAULT_LIMITS.maxDimension),
        maxObjectInstances: readPositiveInteger(
          env,
          'GEOMETRY_MAX_OBJECT_INSTANCES',
          DEFAULT_LIMITS.maxObjectInstances
        ),
      },
    },
  };
}

function hostnameOf(origin: string): string | null {
  try {
    return new URL(origin).hostname;
  } catch {
    return null;
  }
}

/**
 * `*` allows everything; `*.example.com` matches any subdomain host;
 * anything else matches exactly or with an added port.
 */
export function isOriginAllowed(origin: string, patterns: readonly string[]): boolean {
  return patterns.some((pattern) => {
    if (pattern === '*') return true;
    if (pattern.startsWith('*.')) {
      const host = hostnameOf(origin);
      return host !== null && host.endsWith(pattern.slice(1));
    }
    return origin === pattern || origin.startsWith(`${pattern}:`);
  });
}
