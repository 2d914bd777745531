import type { Vec2 } from '../common/Vec2.js';

/**
 * Index of a grid cell: column + row * columns
 */
export type CellId = number;

export type BallId = number;

/**
 * Fixed rectangular bounds, origin at the top-left corner
 */
export interface Arena {
  readonly width: number;
  readonly height: number;
}

/**
 * Circular rigid body. Position and velocity are replaced every tick,
 * radius and id never change.
 */
export interface Ball {
  readonly id: BallId;
  readonly radius: number;
  position: Vec2;
  velocity: Vec2; // units per tick
  cellMemberships: Set<CellId>; // 1-4 cells touched by the bounding square
}

/**
 * Read-only view of a ball handed to renderers
 */
export interface BallSnapshot {
  readonly id: BallId;
  readonly position: Vec2;
  readonly radius: number;
}

/**
 * Unordered overlapping pair, reported with a < b
 */
export interface CollisionPair {
  readonly a: BallId;
  readonly b: BallId;
}

/**
 * Immutable simulation parameters, fixed for the run
 */
export interface SimulationConfig {
  readonly arena: Arena;
  readonly ballCount: number;
  readonly ballRadius: number;
  readonly targetBallsPerCell: number;
  readonly maxInitialSpeed: number; // units per tick, per axis
  readonly wallMargin: number; // gap left between a bounced ball and the wall
}

/**
 * Counters gathered during a single tick
 */
export interface TickStats {
  tick: number;
  candidatePairs: number; // distinct broad-phase candidates
  collisions: number;
  degeneratePairs: number;
  wallHits: number;
}

/**
 * Physics constants
 */
export const PhysicsConfig = {
  TARGET_BALLS_PER_CELL: 4,
  MAX_INITIAL_SPEED: 5,
  WALL_MARGIN: 1,

  // Default arena (matches a 1200x1200 window)
  ARENA_WIDTH: 1200,
  ARENA_HEIGHT: 1200,
} as const;
