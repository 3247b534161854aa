/**
 * Candidate sources shared by validation, sandbox and pipeline tests
 */

export const BFS_CANDIDATE = `/**
 * Breadth-first search over the grid.
 */
const WALL = 1;

class CustomPathfindingAlgorithm {
  constructor(width, height) {
    this.width = width;
    this.height = height;
    this.visitedOrder = [];
  }

  findPath(grid, start, end) {
    const key = (p) => p[0] + ',' + p[1];
    const queue = [start];
    const visited = new Set([key(start)]);
    const parent = new Map();
    this.visitedOrder = [start];
    while (queue.length > 0) {
      const current = queue.shift();
      if (current[0] === end[0] && current[1] === end[1]) {
        const path = [current];
        let k = key(current);
        while (parent.has(k)) {
          const prev = parent.get(k);
          path.unshift(prev);
          k = key(prev);
        }
        return path;
      }
      for (const [dr, dc] of [[-1, 0], [1, 0], [0, -1], [0, 1]]) {
        const r = current[0] + dr;
        const c = current[1] + dc;
        if (r < 0 || r >= this.height || c < 0 || c >= this.width) continue;
        if (grid[r][c] === WALL) continue;
        const nk = key([r, c]);
        if (visited.has(nk)) continue;
        visited.add(nk);
        parent.set(nk, current);
        this.visitedOrder.push([r, c]);
        queue.push([r, c]);
      }
    }
    return [];
  }

  getVisitedOrder() {
    return this.visitedOrder;
  }
}
`;

/** Same search with the wall test removed */
export const NO_WALL_CHECK_CANDIDATE = BFS_CANDIDATE.replace(
  '        if (grid[r][c] === WALL) continue;\n',
  '        if (grid[r][c] === undefined) continue;\n'
);

/** Same search without the neighbour bounds guard */
export const NO_BOUNDS_CHECK_CANDIDATE = BFS_CANDIDATE.replace(
  '        if (r < 0 || r >= this.height || c < 0 || c >= this.width) continue;\n',
  ''
);

/** Tests the end cell for a wall but expands neighbours unchecked */
export const END_ONLY_WALL_CHECK_CANDIDATE = BFS_CANDIDATE
  .replace('        if (grid[r][c] === WALL) continue;\n', '')
  .replace('findPath(grid, start, end) {\n', 'findPath(grid, start, end) {\n    if (grid[end[0]][end[1]] === WALL) return [];\n');

/** Reads the neighbour cell into a local before testing it */
export const CELL_LOCAL_CANDIDATE = BFS_CANDIDATE.replace(
  '        if (grid[r][c] === WALL) continue;\n',
  '        const cell = grid[r][c];\n        if (cell === WALL) continue;\n'
);

/** Depth-first search whose guards live in helper methods */
export const HELPER_GUARDED_CANDIDATE = `/**
 * Depth-first search with neighbour helpers.
 */
const WALL = 1;

class CustomPathfindingAlgorithm {
  constructor(width, height) {
    this.width = width;
    this.height = height;
    this.visitedOrder = [];
  }

  inBounds(row, col) {
    return row >= 0 && row < this.height && col >= 0 && col < this.width;
  }

  neighbours(grid, [row, col]) {
    return [[row - 1, col], [row + 1, col], [row, col - 1], [row, col + 1]]
      .filter(([r, c]) => this.inBounds(r, c) && grid[r][c] !== WALL);
  }

  findPath(grid, start, end) {
    const stack = [[start, [start]]];
    const seen = new Set();
    this.visitedOrder = [];
    while (stack.length > 0) {
      const [cell, path] = stack.pop();
      const id = cell.join(',');
      if (seen.has(id)) continue;
      seen.add(id);
      this.visitedOrder.push(cell);
      if (cell[0] === end[0] && cell[1] === end[1]) return path;
      for (const next of this.neighbours(grid, cell)) {
        stack.push([next, [...path, next]]);
      }
    }
    return [];
  }

  getVisitedOrder() {
    return this.visitedOrder;
  }
}
`;

/** findPath declared with two parameters */
export const MALFORMED_ENTRY_CANDIDATE = BFS_CANDIDATE.replace('findPath(grid, start, end) {', 'findPath(grid, start) {\n    const end = start;');

/** Returns fixed points, several of them walls or outside a 3x3 grid */
export const WALL_WALKER_CANDIDATE = `
class CustomPathfindingAlgorithm {
  constructor(width, height) {
    this.width = width;
    this.height = height;
    this.visitedOrder = [];
  }

  findPath(grid, start, end) {
    this.visitedOrder = [[0, 0], [0, 1], [1, 1], [5, 5], [-1, 0], [2, 2]];
    return [[0, 0], [0, 1], [1, 1], [2, 1], [2, 2], [3, 3]];
  }

  getVisitedOrder() {
    return this.visitedOrder;
  }
}
`;

export const SPINNING_CANDIDATE = `
class CustomPathfindingAlgorithm {
  constructor(width, height) {}
  findPath(grid, start, end) {
    while (true) {}
  }
  getVisitedOrder() {
    return [];
  }
}
`;

export const GRID_SCANNING_CANDIDATE = `
class CustomPathfindingAlgorithm {
  constructor(width, height) {}
  findPath(grid, start, end) {
    let seen = 0;
    for (;;) {
      if (grid[0][0] === 1) seen++;
    }
  }
  getVisitedOrder() {
    return [];
  }
}
`;

export const INTRINSIC_PATCHING_CANDIDATE = `
Array.prototype.map = function () { return this; };
Object.prototype.toJSON = function () { return { status: 'ok', path: [], visited: [], steps: 0 }; };
globalThis.Proxy = function (target) { return target; };
class CustomPathfindingAlgorithm {
  constructor(width, height) {}
  findPath(grid, start, end) {
    let total = 0;
    for (let i = 0; i < 900000; i++) {
      total += grid[i % 3][0];
    }
    return [];
  }
  getVisitedOrder() {
    return [];
  }
}
`;

export const THROWING_CANDIDATE = `
class CustomPathfindingAlgorithm {
  constructor(width, height) {}
  findPath(grid, start, end) {
    throw new Error('boom');
  }
  getVisitedOrder() {
    return [];
  }
}
`;

export const HOST_PROBE_CANDIDATE = `
class CustomPathfindingAlgorithm {
  constructor(width, height) {}
  findPath(grid, start, end) {
    const hidden = typeof process === 'undefined' && typeof require === 'undefined' && typeof fetch === 'undefined';
    return hidden ? [[2, 2]] : [[0, 0]];
  }
  getVisitedOrder() {
    return [];
  }
}
`;
