/**
 * Output sanitization
 *
 * Candidate output is untrusted: anything that is not an in-bounds, non-wall
 * [row, col] pair is dropped before it reaches a consumer.
 */

import { CellKind, type Grid, type Point } from '@pathforge/shared-types';

export function isSafePoint(value: unknown, grid: Grid): value is Point {
  if (!Array.isArray(value) || value.length !== 2) return false;
  const [row, col]: unknown[] = value;
  if (typeof row !== 'number' || typeof col !== 'number') return false;
  if (!Number.isInteger(row) || !Number.isInteger(col)) return false;
  if (row < 0 || row >= grid.length) return false;
  const cells = grid[row];
  if (col < 0 || col >= cells.length) return false;
  return cells[col] !== CellKind.WALL;
}

/**
 * Keep the safe points in their original order. Applying it twice changes nothing.
 */
export function sanitizePoints(points: readonly unknown[], grid: Grid): Point[] {
  const safe: Point[] = [];
  for (const value of points) {
    if (isSafePoint(value, grid)) {
      safe.push([value[0], value[1]]);
    }
  }
  return safe;
}

export function samePoint(a: Point, b: Point): boolean {
  return a[0] === b[0] && a[1] === b[1];
}
