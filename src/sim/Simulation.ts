import { Vec2 } from '../common/Vec2.js';
import { SILENT_LOGGER, type Logger } from '../common/Logger.js';
import { randomBetween, type RandomSource } from '../common/Random.js';
import { CollisionDetector } from './CollisionDetector.js';
import { CollisionResolver } from './CollisionResolver.js';
import { ConfigurationError, DegenerateGeometryError } from './Errors.js';
import { SpatialGrid } from './SpatialGrid.js';
import { PhysicsConfig, type Ball, type BallSnapshot, type SimulationConfig, type TickStats } from './Types.js';

/**
 * Live simulation handle. The population is created once and mutated in
 * place by step(); renderers should read it through snapshot().
 */
export interface Simulation {
  readonly config: SimulationConfig;
  readonly grid: SpatialGrid;
  readonly balls: readonly Ball[];
  readonly logger: Logger;
  tick: number;
  lastTick: TickStats;
}

export interface SimulationOptions {
  random?: RandomSource;
  logger?: Logger;
  maxInitialSpeed?: number;
  wallMargin?: number;
}

/**
 * Create a simulation with a random population.
 *
 * @throws ConfigurationError for a non-positive arena, radius or density, a ball count
 * that is not a positive integer, or a ball too large to fit the arena
 */
export function createSimulation(
  arenaWidth: number,
  arenaHeight: number,
  ballCount: number,
  ballRadius: number,
  targetBallsPerCell: number = PhysicsConfig.TARGET_BALLS_PER_CELL,
  options: SimulationOptions = {}
): Simulation {
  const config = createSimulationConfig({
    arena: { width: arenaWidth, height: arenaHeight },
    ballCount,
    ballRadius,
    targetBallsPerCell,
    maxInitialSpeed: options.maxInitialSpeed ?? PhysicsConfig.MAX_INITIAL_SPEED,
    wallMargin: options.wallMargin ?? PhysicsConfig.WALL_MARGIN,
  });
  return createSimulationFromConfig(config, options);
}

/**
 * Validate and freeze a configuration
 */
export function createSimulationConfig(config: SimulationConfig): SimulationConfig {
  const { arena, ballCount, ballRadius, targetBallsPerCell, maxInitialSpeed, wallMargin } = config;

  if (!Number.isFinite(arena.width) || arena.width <= 0) {
    throw new ConfigurationError('arena width', `expected a positive number, got ${arena.width}`);
  }
  if (!Number.isFinite(arena.height) || arena.height <= 0) {
    throw new ConfigurationError('arena height', `expected a positive number, got ${arena.height}`);
  }
  if (!Number.isInteger(ballCount) || ballCount <= 0) {
    throw new ConfigurationError('ball count', `expected a positive integer, got ${ballCount}`);
  }
  if (!Number.isFinite(ballRadius) || ballRadius <= 0) {
    throw new ConfigurationError('ball radius', `expected a positive number, got ${ballRadius}`);
  }
  // Cells narrower than a ball would let overlapping balls miss each other in the broad phase
  if (!Number.isFinite(targetBallsPerCell) || targetBallsPerCell < 1) {
    throw new ConfigurationError('target balls per cell', `expected a number of at least 1, got ${targetBallsPerCell}`);
  }
  if (!Number.isFinite(maxInitialSpeed) || maxInitialSpeed < 0) {
    throw new ConfigurationError('max initial speed', `expected a non-negative number, got ${maxInitialSpeed}`);
  }
  if (!Number.isFinite(wallMargin) || wallMargin < 0) {
    throw new ConfigurationError('wall margin', `expected a non-negative number, got ${wallMargin}`);
  }

  const footprint = 2 * (ballRadius + wallMargin);
  if (footprint > arena.width || footprint > arena.height) {
    throw new ConfigurationError(
      'ball radius',
      `a ball of radius ${ballRadius} does not fit a ${arena.width}x${arena.height} arena`
    );
  }

  return Object.freeze({
    ...config,
    arena: Object.freeze({ width: arena.width, height: arena.height }),
  });
}

/**
 * Create a simulation from an already built configuration.
 * Each ball draws x, y, vx, vy from `random` in that order.
 */
export function createSimulationFromConfig(config: SimulationConfig, options: SimulationOptions = {}): Simulation {
  const validated = createSimulationConfig(config);
  const { arena, ballCount, ballRadius, maxInitialSpeed, wallMargin } = validated;
  const random = options.random ?? Math.random;
  const logger = options.logger ?? SILENT_LOGGER;

  const grid = SpatialGrid.create(arena, validated.targetBallsPerCell, ballRadius * 2);
  logger.debug(`Grid: ${grid.toString()}, ${grid.cellCount} cells`);

  const inset = ballRadius + wallMargin;
  const balls: Ball[] = [];
  for (let id = 0; id < ballCount; id++) {
    const position = Vec2.from(
      randomBetween(random, inset, arena.width - inset),
      randomBetween(random, inset, arena.height - inset)
    );
    const velocity = Vec2.from(
      randomBetween(random, -maxInitialSpeed, maxInitialSpeed),
      randomBetween(random, -maxInitialSpeed, maxInitialSpeed)
    );
    const ball: Ball = { id, radius: ballRadius, position, velocity, cellMemberships: new Set() };
    grid.updateMembership(ball);
    balls.push(ball);
  }

  return {
    config: validated,
    grid,
    balls,
    logger,
    tick: 0,
    lastTick: emptyTickStats(0),
  };
}

/**
 * Advance every ball by one tick:
 *   1. refresh grid memberships
 *   2. find overlapping pairs
 *   3. resolve each pair in candidate order
 *   4. move every ball by its velocity, then bounce it off the walls
 *
 * Pairs are resolved one after another against the velocities left by the
 * previous pair; a ball touching several others in the same tick is not
 * solved simultaneously.
 */
export function step(simulation: Simulation): void {
  const { balls, grid, config, logger } = simulation;
  const stats = emptyTickStats(simulation.tick + 1);

  for (const ball of balls) {
    grid.updateMembership(ball);
  }

  const { pairs, candidatePairs } = CollisionDetector.detect(balls, grid);
  stats.candidatePairs = candidatePairs;

  for (const pair of pairs) {
    try {
      CollisionResolver.resolveBallCollision(balls[pair.a], balls[pair.b]);
      stats.collisions++;
    } catch (error) {
      if (!(error instanceof DegenerateGeometryError)) throw error;
      stats.degeneratePairs++;
      logger.warn(`Tick ${stats.tick}: skipped collision. ${error.message}`);
    }
  }

  for (const ball of balls) {
    ball.position = ball.position.add(ball.velocity);
    if (CollisionResolver.resolveWallCollision(ball, config.arena, config.wallMargin)) {
      stats.wallHits++;
    }
  }

  simulation.tick = stats.tick;
  simulation.lastTick = stats;
}

/**
 * Read-only copy of the population for rendering
 */
export function snapshot(simulation: Simulation): readonly BallSnapshot[] {
  return simulation.balls.map(ball => ({
    id: ball.id,
    position: ball.position,
    radius: ball.radius,
  }));
}

/**
 * Sum of ½|v|² over the population, with unit mass per ball
 */
export function totalKineticEnergy(simulation: Simulation): number {
  return simulation.balls.reduce((sum, ball) => sum + 0.5 * ball.velocity.lengthSq(), 0);
}

function emptyTickStats(tick: number): TickStats {
  return { tick, candidatePairs: 0, collisions: 0, degeneratePairs: 0, wallHits: 0 };
}
