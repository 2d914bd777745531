import type { BallId } from './Types.js';

/**
 * Invalid static input (arena, population, radius, density, command line).
 * Raised before any simulation state exists.
 */
export class ConfigurationError extends Error {
  constructor(readonly field: string, message: string) {
    super(`Invalid ${field}: ${message}`);
    this.name = 'ConfigurationError';
  }
}

/**
 * Two balls share the exact same centre, so no collision normal exists
 */
export class DegenerateGeometryError extends Error {
  constructor(readonly a: BallId, readonly b: BallId) {
    super(`Balls ${a} and ${b} have coincident centres`);
    this.name = 'DegenerateGeometryError';
  }
}
