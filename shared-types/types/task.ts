import type { FixIteration, FixSummary, OptimizationResult, ValidationReport } from './validation';
import type { ExecutionResult } from './execution';

/**
 * Kinds of long-running work
 */
export type TaskKind = 'GENERATION' | 'FIXING' | 'VALIDATION' | 'GENERATE_AND_FIX';

export type TaskState = 'pending' | 'running' | 'paused' | 'completed' | 'failed' | 'cancelled';

export const TERMINAL_TASK_STATES: ReadonlySet<TaskState> = new Set<TaskState>([
  'completed',
  'failed',
  'cancelled',
]);

/**
 * Failure detail attached to a failed task
 */
export interface TaskFailure {
  /** Stable error code, e.g. STAGNATION or EXTERNAL_SERVICE */
  code: string;
  message: string;
  /** Whether resubmitting the same request may succeed */
  recoverable: boolean;
  /** Last validation report seen by a fix loop */
  lastReport?: ValidationReport;
}

/**
 * Payload of a completed generation / fix / validation task
 */
export interface TaskResult {
  code: string;
  report: ValidationReport;
  /** Repair iterations performed before acceptance */
  iterations: number;
  /** Sandboxed preview run, when a grid was supplied */
  preview?: ExecutionResult;
  /** Present for fix and generate-and-fix tasks */
  summary?: FixSummary;
  /** Present when an optimization pass was requested */
  optimization?: OptimizationResult;
}

/**
 * Point-in-time snapshot of a task, as returned to pollers
 */
export interface TaskSnapshot {
  id: string;
  kind: TaskKind;
  title: string;
  state: TaskState;
  progress: number;
  currentStep: string;
  elapsedMs: number;
  /** Null until at least one fix iteration has completed */
  estimatedRemainingMs: number | null;
  iterationCap: number | null;
  iterationsDone: number;
  cancelRequested: boolean;
  result?: TaskResult;
  error?: TaskFailure;
  fixHistory: FixIteration[];
  createdAt: string;
  startedAt?: string;
  finishedAt?: string;
}
