import { DegenerateGeometryError } from './Errors.js';
import { PhysicsConfig, type Arena, type Ball } from './Types.js';

/**
 * Collision response for equal-mass, perfectly elastic balls
 */
export class CollisionResolver {
  /**
   * Exchange the velocity components along the line of centres. Tangential
   * components are untouched and positions are left as they are, so an
   * overlapping pair may stay visibly interpenetrated for a tick.
   *
   * @throws DegenerateGeometryError when both centres coincide; neither ball is modified
   */
  static resolveBallCollision(a: Ball, b: Ball): void {
    const normal = b.position.sub(a.position).normalize();
    if (!normal) {
      throw new DegenerateGeometryError(a.id, b.id);
    }

    const exchange = a.velocity.dot(normal) - b.velocity.dot(normal);
    const impulse = normal.mul(exchange);

    a.velocity = a.velocity.sub(impulse);
    b.velocity = b.velocity.add(impulse);
  }

  /**
   * Bounce a ball whose bounding extent left the arena. Each axis is checked on
   * its own, so a corner hit flips both components in one call. The velocity
   * component is turned back towards the arena and the ball is placed `margin`
   * units inside the wall it crossed.
   *
   * @returns true if the ball hit at least one wall
   */
  static resolveWallCollision(ball: Ball, arena: Arena, margin: number = PhysicsConfig.WALL_MARGIN): boolean {
    const { radius } = ball;
    let { x: px, y: py } = ball.position;
    let { x: vx, y: vy } = ball.velocity;
    let hit = false;

    // Horizontal
    if (px - radius < 0) {
      vx = Math.abs(vx);
      px = radius + margin;
      hit = true;
    } else if (px + radius > arena.width) {
      vx = -Math.abs(vx);
      px = arena.width - radius - margin;
      hit = true;
    }

    // Vertical
    if (py - radius < 0) {
      vy = Math.abs(vy);
      py = radius + margin;
      hit = true;
    } else if (py + radius > arena.height) {
      vy = -Math.abs(vy);
      py = arena.height - radius - margin;
      hit = true;
    }

    if (hit) {
      ball.position = ball.position.withX(px).withY(py);
      ball.velocity = ball.velocity.withX(vx).withY(vy);
    }
    return hit;
  }
}
