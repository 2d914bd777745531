import { Vec2 } from '../common/Vec2.js';
import { ConfigurationError } from './Errors.js';
import type { Arena, Ball, CellId } from './Types.js';

export interface CellDimensions {
  cellWidth: number;
  cellHeight: number;
}

/**
 * Uniform grid tiling the arena, used as the collision broad phase.
 *
 * Cells are sized so each is expected to hold only a few balls. A ball belongs
 * to every cell touched by a corner of its bounding square, so two balls can
 * only overlap if their memberships intersect.
 */
export class SpatialGrid {
  readonly columns: number;
  readonly rows: number;

  private constructor(
    readonly arena: Arena,
    readonly cellWidth: number,
    readonly cellHeight: number
  ) {
    this.columns = Math.round(arena.width / cellWidth);
    this.rows = Math.round(arena.height / cellHeight);
  }

  /**
   * Build the grid for an arena and a population of equally sized balls
   */
  static create(arena: Arena, targetBallsPerCell: number, ballDiameter: number): SpatialGrid {
    const { cellWidth, cellHeight } = SpatialGrid.computeCellDimensions(arena, targetBallsPerCell, ballDiameter);
    return new SpatialGrid(arena, cellWidth, cellHeight);
  }

  /**
   * Cell size per axis: starts at ballDiameter * targetBallsPerCell (rounded up)
   * and grows by one unit until it divides the arena exactly. An axis that
   * cannot be divided becomes a single cell spanning the whole arena.
   */
  static computeCellDimensions(arena: Arena, targetBallsPerCell: number, ballDiameter: number): CellDimensions {
    requirePositive('arena width', arena.width);
    requirePositive('arena height', arena.height);
    requirePositive('target balls per cell', targetBallsPerCell);
    requirePositive('ball diameter', ballDiameter);

    const start = Math.ceil(ballDiameter * targetBallsPerCell);
    return {
      cellWidth: fitCellSize(arena.width, start),
      cellHeight: fitCellSize(arena.height, start),
    };
  }

  get cellCount(): number {
    return this.columns * this.rows;
  }

  /**
   * Cell containing a point. Points outside the arena clamp to the nearest edge cell.
   */
  cellIdAt(point: Vec2): CellId {
    const column = clampIndex(Math.floor(point.x / this.cellWidth), this.columns);
    const row = clampIndex(Math.floor(point.y / this.cellHeight), this.rows);
    return column + row * this.columns;
  }

  /**
   * Cells touched by the ball's bounding square, in corner order
   * top-left, top-right, bottom-left, bottom-right, with duplicates collapsed
   */
  membershipOf(ball: Pick<Ball, 'position' | 'radius'>): Set<CellId> {
    const { position, radius } = ball;
    const left = position.x - radius;
    const right = position.x + radius;
    const top = position.y - radius;
    const bottom = position.y + radius;

    return new Set([
      this.cellIdAt(Vec2.from(left, top)),
      this.cellIdAt(Vec2.from(right, top)),
      this.cellIdAt(Vec2.from(left, bottom)),
      this.cellIdAt(Vec2.from(right, bottom)),
    ]);
  }

  updateMembership(ball: Ball): void {
    ball.cellMemberships = this.membershipOf(ball);
  }

  /**
   * Group balls under each cell they belong to. Keys ascend by cell id and
   * every bucket keeps the order of the input population. Cells come from
   * each ball's current position, never from its stored cellMemberships.
   */
  buildBuckets(balls: readonly Ball[]): Map<CellId, Ball[]> {
    const buckets = new Map<CellId, Ball[]>();

    for (const ball of balls) {
      for (const cell of this.membershipOf(ball)) {
        const bucket = buckets.get(cell);
        if (bucket) {
          bucket.push(ball);
        } else {
          buckets.set(cell, [ball]);
        }
      }
    }

    return new Map([...buckets.entries()].sort(([x], [y]) => x - y));
  }

  toString(): string {
    return `SpatialGrid(${this.columns}x${this.rows} cells of ${this.cellWidth}x${this.cellHeight})`;
  }
}

function requirePositive(field: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigurationError(field, `expected a positive number, got ${value}`);
  }
}

function fitCellSize(arenaSize: number, start: number): number {
  let cellSize = start;
  while (cellSize < arenaSize && arenaSize % cellSize !== 0) {
    cellSize++;
  }
  return Math.min(cellSize, arenaSize);
}

function clampIndex(index: number, count: number): number {
  if (index < 0) return 0;
  if (index >= count) return count - 1;
  return index;
}
