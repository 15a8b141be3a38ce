/**
 * Error types
 *
 * Two families that callers must be able to tell apart:
 * - SpecValidationError: the caller sent a bad specification (HTTP 400)
 * - GeometryInternalError: mesh assembly or encoding broke an invariant (HTTP 500)
 */

export type SpecIssueCode =
  | 'missing_key'
  | 'invalid_dimension'
  | 'dimension_out_of_bounds'
  | 'invalid_field';

/** Serializable form of a field error, as returned to API callers */
export interface SpecIssue {
  code: SpecIssueCode;
  key: string;
  message: string;
  value?: unknown;
  limit?: number;
}

export abstract class SpecFieldError extends Error {
  abstract readonly code: SpecIssueCode;
  readonly key: string;

  protected constructor(key: string, message: string) {
    super(message);
    this.key = key;
  }

  toIssue(): SpecIssue {
    return { code: this.code, key: this.key, message: this.message };
  }
}

export class MissingKeyError extends SpecFieldError {
  readonly code = 'missing_key';

  constructor(key: string) {
    super(key, `Missing required key: '${key}'`);
    this.name = 'MissingKeyError';
  }
}

export class InvalidDimensionError extends SpecFieldError {
  readonly code = 'invalid_dimension';
  readonly value: unknown;

  constructor(key: string, value: unknown) {
    super(key, `Dimension '${key}' must be a positive finite number, got ${describeValue(value)}`);
    this.name = 'InvalidDimensionError';
    this.value = value;
  }

  override toIssue(): SpecIssue {
    return { ...super.toIssue(), value: this.value };
  }
}

export class DimensionOutOfBoundsError extends SpecFieldError {
  readonly code = 'dimension_out_of_bounds';
  readonly value: number;
  readonly limit: number;

  constructor(key: string, value: number, limit: number) {
    super(key, `'${key}' is ${value}, which exceeds the limit of ${limit}`);
    this.name = 'DimensionOutOfBoundsError';
    this.value = value;
    this.limit = limit;
  }

  override toIssue(): SpecIssue {
    return { ...super.toIssue(), value: this.value, limit: this.limit };
  }
}

/** Non-dimension field with the wrong shape (design_type, units, stories, objects...) */
export class InvalidFieldError extends SpecFieldError {
  readonly code = 'invalid_field';
  readonly value: unknown;

  constructor(key: string, value: unknown, expected: string) {
    super(key, `'${key}' must be ${expected}, got ${describeValue(value)}`);
    this.name = 'InvalidFieldError';
    this.value = value;
  }

  override toIssue(): SpecIssue {
    return { ...super.toIssue(), value: this.value };
  }
}

export class SpecValidationError extends Error {
  readonly errors: readonly SpecFieldError[];

  constructor(errors: SpecFieldError[]) {
    super(`Invalid specification: ${errors.map((e) => e.message).join('; ')}`);
    this.name = 'SpecValidationError';
    this.errors = errors;
  }

  issues(): SpecIssue[] {
    return this.errors.map((e) => e.toIssue());
  }
}

export class GeometryInternalError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GeometryInternalError';
  }

  /** Operator-facing detail; never sent to API callers */
  diagnostics(): Record<string, unknown> {
    return {};
  }
}

export class IndexOutOfRangeError extends GeometryInternalError {
  readonly index: number;
  readonly vertexCount: number;
  readonly faceIndex: number;

  constructor(index: number, vertexCount: number, faceIndex: number) {
    super(`Index ${index} out of range for ${vertexCount} vertices (face ${faceIndex})`);
    this.name = 'IndexOutOfRangeError';
    this.index = index;
    this.vertexCount = vertexCount;
    this.faceIndex = faceIndex;
  }

  override diagnostics(): Record<string, unknown> {
    return { index: this.index, vertexCount: this.vertexCount, faceIndex: this.faceIndex };
  }
}

export class MeshCapacityError extends GeometryInternalError {
  readonly vertexCount: number;
  readonly limit: number;

  constructor(vertexCount: number, limit: number) {
    super(`Mesh has ${vertexCount} vertices; 16-bit indices address at most ${limit}`);
    this.name = 'MeshCapacityError';
    this.vertexCount = vertexCount;
    this.limit = limit;
  }

  override diagnostics(): Record<string, unknown> {
    return { vertexCount: this.vertexCount, limit: this.limit };
  }
}

export class GlbFormatError extends Error {
  constructor(reason: string) {
    super(`Malformed GLB: ${reason}`);
    this.name = 'GlbFormatError';
  }
}

export class ConfigError extends Error {
  readonly variable: string;

  constructor(variable: string, value: string, expected: string) {
    super(`Environment variable ${variable} must be ${expected}, got '${value}'`);
    this.name = 'ConfigError';
    this.variable = variable;
  }
}

function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (value === undefined) return 'undefined';
  if (typeof value === 'string') return `'${value}'`;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return Array.isArray(value) ? 'an array' : `a ${typeof value}`;
}
