import type { SpatialGrid } from './SpatialGrid.js';
import type { Ball, CollisionPair } from './Types.js';

export interface DetectionResult {
  pairs: CollisionPair[];
  candidatePairs: number;
}

type Circle = Pick<Ball, 'position' | 'radius'>;

/**
 * Ball-ball overlap detection.
 *
 * Broad phase: balls sharing a grid cell are candidates. Narrow phase: exact
 * circle test on each distinct candidate.
 */
export class CollisionDetector {
  /**
   * Circles overlap when their centres are closer than the sum of the radii.
   * Touching exactly is not an overlap.
   */
  static overlaps(a: Circle, b: Circle): boolean {
    return a.position.distanceTo(b.position) < a.radius + b.radius;
  }

  static findOverlappingPairs(balls: readonly Ball[], grid: SpatialGrid): CollisionPair[] {
    return this.detect(balls, grid).pairs;
  }

  /**
   * Overlapping pairs in candidate order: cells by ascending id, then pairs
   * within a bucket in population order. A pair met again in a later cell is skipped.
   */
  static detect(balls: readonly Ball[], grid: SpatialGrid): DetectionResult {
    const seen = new Set<string>();
    const pairs: CollisionPair[] = [];

    for (const bucket of grid.buildBuckets(balls).values()) {
      for (let i = 0; i < bucket.length; i++) {
        for (let j = i + 1; j < bucket.length; j++) {
          const pair = orderedPair(bucket[i], bucket[j]);
          const key = pairKey(pair);
          if (seen.has(key)) continue;
          seen.add(key);

          if (this.overlaps(bucket[i], bucket[j])) {
            pairs.push(pair);
          }
        }
      }
    }

    return { pairs, candidatePairs: seen.size };
  }

  /**
   * Every ball against every other, O(n²). Reference for the grid path.
   */
  static findOverlappingPairsBruteForce(balls: readonly Ball[]): CollisionPair[] {
    const pairs: CollisionPair[] = [];

    for (let i = 0; i < balls.length; i++) {
      for (let j = i + 1; j < balls.length; j++) {
        if (this.overlaps(balls[i], balls[j])) {
          pairs.push(orderedPair(balls[i], balls[j]));
        }
      }
    }

    return pairs;
  }
}

function orderedPair(first: Ball, second: Ball): CollisionPair {
  return first.id < second.id ? { a: first.id, b: second.id } : { a: second.id, b: first.id };
}

function pairKey(pair: CollisionPair): string {
  return `${pair.a}:${pair.b}`;
}
