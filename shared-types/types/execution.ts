import type { Point } from './grid';
import type { Finding } from './validation';

/**
 * Sanitized outcome of running a candidate in the sandbox
 */
export interface ExecutionResult {
  path: Point[];
  visitedOrder: Point[];
  /** Sanitized path is non-empty and ends at the requested end cell */
  found: boolean;
  /** Coordinates removed by sanitization (path + visited order) */
  droppedPoints: number;
  warnings: Finding[];
  /** Grid cell reads performed by the candidate */
  stepsUsed: number;
  durationMs: number;
}
