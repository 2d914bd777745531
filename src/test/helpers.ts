import { vi } from 'vitest';
import { Vec2 } from '../common/Vec2.js';
import type { Logger } from '../common/Logger.js';
import type { Ball, CollisionPair } from '../sim/Types.js';

export function makeBall(id: number, x: number, y: number, radius = 5, vx = 0, vy = 0): Ball {
  return {
    id,
    radius,
    position: Vec2.from(x, y),
    velocity: Vec2.from(vx, vy),
    cellMemberships: new Set(),
  };
}

export function createSpyLogger() {
  return {
    error: vi.fn<Logger['error']>(),
    warn: vi.fn<Logger['warn']>(),
    info: vi.fn<Logger['info']>(),
    debug: vi.fn<Logger['debug']>(),
  } satisfies Logger;
}

export function sortPairs(pairs: readonly CollisionPair[]): CollisionPair[] {
  return [...pairs].sort((x, y) => x.a - y.a || x.b - y.b);
}
