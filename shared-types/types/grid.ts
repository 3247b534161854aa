/**
 * Grid types shared by the executor, the sanitizer and the UI layer
 */

/**
 * Numeric cell kinds as stored in a grid snapshot
 */
export enum CellKind {
  EMPTY = 0,
  WALL = 1,
  START = 2,
  END = 3,
}

/** Immutable grid snapshot, indexed as grid[row][col] */
export type Grid = ReadonlyArray<ReadonlyArray<CellKind>>;

/** A coordinate as a [row, col] pair */
export type Point = readonly [row: number, col: number];
