/**
 * Shared specs and helpers for the test suites
 */

import { jest } from '@jest/globals';
import type { Logger } from '../../src/utils/debug.js';
import { SpecValidationError } from '../../src/utils/errors.js';

export const ROW_HOUSE = {
  design_type: 'row_house',
  dimensions: { width: 10, length: 30, height: 18 },
  stories: 2,
  objects: [
    { type: 'window', count: 6 },
    { type: 'door', count: 1 },
  ],
};

export const SPACESHIP = {
  design_type: 'spaceship',
  dimensions: { width: 5, length: 5, height: 3 },
  stories: 1,
  objects: [],
};

type LogFn = (message: string, data?: unknown) => void;

export interface MockLogger extends Logger {
  debug: jest.Mock<LogFn>;
  info: jest.Mock<LogFn>;
  warn: jest.Mock<LogFn>;
  error: jest.Mock<LogFn>;
}

export function mockLogger(): MockLogger {
  return {
    debug: jest.fn<LogFn>(),
    info: jest.fn<LogFn>(),
    warn: jest.fn<LogFn>(),
    error: jest.fn<LogFn>(),
  };
}

/**
 * Run fn and return the SpecValidationError it throws
 */
export function captureValidation(fn: () => unknown): SpecValidationError {
  try {
    fn();
  } catch (error) {
    if (error instanceof SpecValidationError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected a SpecValidationError');
}

/**
 * Deterministic PRNG (mulberry32)
 */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}
