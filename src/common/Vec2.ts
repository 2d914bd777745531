/**
 * Immutable 2D vector used for ball positions and velocities.
 * Every operation returns a new instance.
 */
export class Vec2 {
  constructor(public readonly x: number = 0, public readonly y: number = 0) {}

  static from(x: number, y: number): Vec2 {
    return new Vec2(x, y);
  }

  add(other: Vec2): Vec2 {
    return new Vec2(this.x + other.x, this.y + other.y);
  }

  sub(other: Vec2): Vec2 {
    return new Vec2(this.x - other.x, this.y - other.y);
  }

  mul(scalar: number): Vec2 {
    return new Vec2(this.x * scalar, this.y * scalar);
  }

  div(scalar: number): Vec2 {
    return new Vec2(this.x / scalar, this.y / scalar);
  }

  dot(other: Vec2): number {
    return this.x * other.x + this.y * other.y;
  }

  length(): number {
    return Math.sqrt(this.x * this.x + this.y * this.y);
  }

  lengthSq(): number {
    return this.x * this.x + this.y * this.y;
  }

  /**
   * Unit vector in the same direction, or null for the zero vector
   */
  normalize(): Vec2 | null {
    const len = this.length();
    if (len === 0) return null;
    return this.div(len);
  }

  distanceTo(other: Vec2): number {
    return this.sub(other).length();
  }

  withX(x: number): Vec2 {
    return new Vec2(x, this.y);
  }

  withY(y: number): Vec2 {
    return new Vec2(this.x, y);
  }

  toString(): string {
    return `Vec2(${this.x.toFixed(3)}, ${this.y.toFixed(3)})`;
  }
}
