import { describe, it, expect } from 'vitest';
import { Vec2 } from '../common/Vec2.js';
import { mulberry32 } from '../common/Random.js';
import { ConfigurationError } from '../sim/Errors.js';
import {
  createSimulation,
  createSimulationConfig,
  createSimulationFromConfig,
  snapshot,
  step,
  totalKineticEnergy,
  type Simulation,
} from '../sim/Simulation.js';
import { createSpyLogger } from './helpers.js';

/**
 * Small arena with balls placed by hand: [x, y, vx, vy] per ball
 */
function arrange(layout: Array<[number, number, number, number]>, radius = 5): Simulation {
  const simulation = createSimulation(100, 100, layout.length, radius, 4, { random: mulberry32(1) });
  layout.forEach(([x, y, vx, vy], index) => {
    const ball = simulation.balls[index];
    ball.position = Vec2.from(x, y);
    ball.velocity = Vec2.from(vx, vy);
  });
  return simulation;
}

describe('createSimulation', () => {
  it('rejects invalid parameters before creating any state', () => {
    expect(() => createSimulation(100, 100, 0, 5)).toThrow(ConfigurationError);
    expect(() => createSimulation(100, 100, 2.5, 5)).toThrow(ConfigurationError);
    expect(() => createSimulation(100, 100, 10, 0)).toThrow(ConfigurationError);
    expect(() => createSimulation(100, 100, 10, -1)).toThrow(ConfigurationError);
    expect(() => createSimulation(0, 100, 10, 5)).toThrow(ConfigurationError);
    expect(() => createSimulation(100, Number.POSITIVE_INFINITY, 10, 5)).toThrow(ConfigurationError);
    expect(() => createSimulation(100, 100, 10, 5, 0.5)).toThrow(ConfigurationError);
  });

  it('rejects a ball that cannot fit between the walls', () => {
    expect(() => createSimulation(100, 10, 1, 5)).toThrow('Invalid ball radius: a ball of radius 5 does not fit a 100x10 arena');
    expect(() => createSimulation(100, 12, 1, 5)).not.toThrow();
  });

  it('creates the requested population with stable ids', () => {
    const simulation = createSimulation(400, 300, 50, 6, 4, { random: mulberry32(3) });

    expect(simulation.balls).toHaveLength(50);
    expect(simulation.balls.map(ball => ball.id)).toEqual([...Array(50).keys()]);
    expect(simulation.tick).toBe(0);
    for (const ball of simulation.balls) {
      expect(ball.radius).toBe(6);
      expect(ball.position.x).toBeGreaterThanOrEqual(7);
      expect(ball.position.x).toBeLessThanOrEqual(393);
      expect(ball.position.y).toBeGreaterThanOrEqual(7);
      expect(ball.position.y).toBeLessThanOrEqual(293);
      expect(Math.abs(ball.velocity.x)).toBeLessThanOrEqual(5);
      expect(Math.abs(ball.velocity.y)).toBeLessThanOrEqual(5);
      expect(ball.cellMemberships.size).toBeGreaterThanOrEqual(1);
      expect(ball.cellMemberships.size).toBeLessThanOrEqual(4);
    }
  });

  it('draws position then velocity from the random source', () => {
    const simulation = createSimulation(100, 100, 1, 5, 4, { random: () => 0.5 });

    expect(simulation.balls[0].position).toEqual(Vec2.from(50, 50));
    expect(simulation.balls[0].velocity).toEqual(Vec2.from(0, 0));
  });

  it('reproduces the same population from the same seed', () => {
    const first = createSimulation(500, 500, 30, 4, 4, { random: mulberry32(11) });
    const second = createSimulation(500, 500, 30, 4, 4, { random: mulberry32(11) });

    expect(snapshot(second)).toEqual(snapshot(first));
  });

  it('freezes its configuration', () => {
    const simulation = createSimulation(100, 100, 1, 5);

    expect(Object.isFrozen(simulation.config)).toBe(true);
    expect(Object.isFrozen(simulation.config.arena)).toBe(true);
    expect(simulation.config).toEqual({
      arena: { width: 100, height: 100 },
      ballCount: 1,
      ballRadius: 5,
      targetBallsPerCell: 4,
      maxInitialSpeed: 5,
      wallMargin: 1,
    });
  });

  it('builds from an explicit configuration', () => {
    const config = createSimulationConfig({
      arena: { width: 200, height: 100 },
      ballCount: 4,
      ballRadius: 3,
      targetBallsPerCell: 2,
      maxInitialSpeed: 0,
      wallMargin: 2,
    });

    const simulation = createSimulationFromConfig(config, { random: mulberry32(5) });

    expect(simulation.balls).toHaveLength(4);
    expect(simulation.balls.every(ball => ball.velocity.x === 0 && ball.velocity.y === 0)).toBe(true);
    // 3 * 2 * 2 = 12 -> 20 divides 200, 12 -> 20 divides 100
    expect(simulation.grid.cellWidth).toBe(20);
    expect(simulation.grid.cellHeight).toBe(20);
  });
});

describe('step', () => {
  it('bounces a ball off the left wall', () => {
    const simulation = arrange([[2, 50, -3, 0]]);

    step(simulation);

    const [ball] = simulation.balls;
    expect(ball.velocity.x).toBeGreaterThan(0);
    expect(ball.position.x).toBe(6);
    expect(ball.position.y).toBe(50);
    expect(simulation.lastTick.wallHits).toBe(1);
  });

  it('exchanges velocities of an overlapping pair, then moves both', () => {
    const simulation = arrange([
      [40, 50, 1, 0],
      [48, 50, -1, 0],
    ]);

    step(simulation);

    const [a, b] = simulation.balls;
    expect(a.velocity).toEqual(Vec2.from(-1, 0));
    expect(b.velocity).toEqual(Vec2.from(1, 0));
    expect(a.position).toEqual(Vec2.from(39, 50));
    expect(b.position).toEqual(Vec2.from(49, 50));
    expect(simulation.lastTick).toEqual({ tick: 1, candidatePairs: 1, collisions: 1, degeneratePairs: 0, wallHits: 0 });
  });

  it('resolves simultaneous contacts one pair at a time in candidate order', () => {
    // A hits B, B touches C. Pairs come out as (A, B) then (B, C), so the
    // momentum travels down the line within one tick. Resolving (B, C) first
    // would instead leave C at rest and B moving.
    const simulation = arrange([
      [40, 50, 2, 0],
      [48, 50, 0, 0],
      [56, 50, 0, 0],
    ]);

    step(simulation);

    const [a, b, c] = simulation.balls;
    expect(a.velocity).toEqual(Vec2.from(0, 0));
    expect(b.velocity).toEqual(Vec2.from(0, 0));
    expect(c.velocity).toEqual(Vec2.from(2, 0));
    expect(c.position).toEqual(Vec2.from(58, 50));
    expect(simulation.lastTick.collisions).toBe(2);
  });

  it('skips a pair with coincident centres and reports it', () => {
    const logger = createSpyLogger();
    const simulation = createSimulation(100, 100, 2, 5, 4, { random: mulberry32(1), logger });
    const [a, b] = simulation.balls;
    a.position = Vec2.from(50, 50);
    a.velocity = Vec2.from(1, 0);
    b.position = Vec2.from(50, 50);
    b.velocity = Vec2.from(-1, 0);

    step(simulation);

    expect(a.velocity).toEqual(Vec2.from(1, 0));
    expect(b.velocity).toEqual(Vec2.from(-1, 0));
    expect(a.position).toEqual(Vec2.from(51, 50));
    expect(b.position).toEqual(Vec2.from(49, 50));
    expect(simulation.lastTick.degeneratePairs).toBe(1);
    expect(simulation.lastTick.collisions).toBe(0);
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith('Tick 1: skipped collision. Balls 0 and 1 have coincident centres');
  });

  it('recomputes memberships before detection', () => {
    const simulation = arrange([[60, 60, 0, 0]]);
    simulation.balls[0].cellMemberships = new Set([999]);

    step(simulation);

    expect(simulation.balls[0].cellMemberships).toEqual(new Set([3]));
  });

  it('counts ticks', () => {
    const simulation = arrange([[50, 50, 1, 1]]);

    step(simulation);
    step(simulation);
    step(simulation);

    expect(simulation.tick).toBe(3);
    expect(simulation.lastTick.tick).toBe(3);
    expect(simulation.balls[0].position).toEqual(Vec2.from(53, 53));
  });

  it('keeps the population, radii and bounds over many ticks', () => {
    const simulation = createSimulation(300, 200, 200, 4, 4, { random: mulberry32(2024) });
    const epsilon = 1e-9;

    for (let tick = 0; tick < 500; tick++) {
      step(simulation);

      expect(simulation.balls).toHaveLength(200);
      simulation.balls.forEach((ball, index) => {
        expect(ball.id).toBe(index);
        expect(ball.radius).toBe(4);
        expect(ball.position.x).toBeGreaterThanOrEqual(-epsilon);
        expect(ball.position.x).toBeLessThanOrEqual(300 + epsilon);
        expect(ball.position.y).toBeGreaterThanOrEqual(-epsilon);
        expect(ball.position.y).toBeLessThanOrEqual(200 + epsilon);
      });
    }
    expect(simulation.grid.cellCount).toBe(30);
  });

  it('conserves kinetic energy', () => {
    const simulation = createSimulation(300, 200, 200, 4, 4, { random: mulberry32(99) });
    const before = totalKineticEnergy(simulation);

    for (let tick = 0; tick < 100; tick++) {
      step(simulation);
    }

    expect(Math.abs(totalKineticEnergy(simulation) - before) / before).toBeLessThan(1e-9);
  });
});

describe('snapshot', () => {
  it('lists id, position and radius of every ball', () => {
    const simulation = arrange([
      [20, 30, 1, 0],
      [70, 80, 0, -1],
    ]);

    expect(snapshot(simulation)).toEqual([
      { id: 0, position: Vec2.from(20, 30), radius: 5 },
      { id: 1, position: Vec2.from(70, 80), radius: 5 },
    ]);
  });

  it('is not affected by later ticks', () => {
    const simulation = arrange([[20, 30, 1, 0]]);
    const before = snapshot(simulation);

    step(simulation);

    expect(before[0].position).toEqual(Vec2.from(20, 30));
    expect(snapshot(simulation)[0].position).toEqual(Vec2.from(21, 30));
  });
});
