/**
 * Pipeline error taxonomy
 *
 * Every error carries a stable `code` for transport mapping and a `recoverable`
 * hint telling the caller whether resubmitting can help.
 */

import type { ValidationReport } from '@pathforge/shared-types';

export abstract class PipelineError extends Error {
  abstract readonly code: string;
  readonly recoverable: boolean;

  constructor(message: string, recoverable: boolean) {
    super(message);
    this.recoverable = recoverable;
  }
}

/**
 * A candidate carries ERROR-level findings and cannot be accepted or saved
 */
export class ValidationError extends PipelineError {
  readonly code = 'VALIDATION_FAILED';

  constructor(
    message: string,
    readonly report?: ValidationReport
  ) {
    super(message, true);
    this.name = 'ValidationError';
  }
}

export type ExecutionLimitReason = 'TIMEOUT' | 'STEP_LIMIT' | 'MEMORY';

/**
 * The sandbox exceeded its wall-clock, step or memory budget
 */
export class ExecutionTimeoutError extends PipelineError {
  readonly code = 'EXECUTION_TIMEOUT';

  constructor(
    readonly reason: ExecutionLimitReason,
    message: string
  ) {
    super(message, true);
    this.name = 'ExecutionTimeoutError';
  }
}

/**
 * The candidate threw, or returned something that is not a path
 */
export class CandidateExecutionError extends PipelineError {
  readonly code = 'EXECUTION_FAILED';

  constructor(message: string) {
    super(message, true);
    this.name = 'CandidateExecutionError';
  }
}

/**
 * The generator service failed (network, auth, provider error)
 */
export class ExternalServiceError extends PipelineError {
  readonly code = 'EXTERNAL_SERVICE';

  constructor(
    message: string,
    recoverable: boolean,
    readonly statusCode?: number
  ) {
    super(message, recoverable);
    this.name = 'ExternalServiceError';
  }
}

/**
 * The fix loop stopped improving
 */
export class StagnationError extends PipelineError {
  readonly code = 'STAGNATION';

  constructor(
    message: string,
    readonly lastReport: ValidationReport
  ) {
    super(message, true);
    this.name = 'StagnationError';
  }
}

/**
 * The fix loop used its whole iteration budget without producing valid code
 */
export class FixLoopExhaustedError extends PipelineError {
  readonly code = 'FIX_LOOP_EXHAUSTED';

  constructor(
    message: string,
    readonly lastReport: ValidationReport
  ) {
    super(message, true);
    this.name = 'FixLoopExhaustedError';
  }
}

export class NotFoundError extends PipelineError {
  readonly code = 'NOT_FOUND';

  constructor(message: string) {
    super(message, false);
    this.name = 'NotFoundError';
  }
}

/**
 * A lifecycle operation was requested on a task in the wrong state
 */
export class InvalidStateError extends PipelineError {
  readonly code = 'INVALID_STATE';

  constructor(message: string) {
    super(message, false);
    this.name = 'InvalidStateError';
  }
}

/**
 * A registry write collided with an existing name
 */
export class ConflictError extends PipelineError {
  readonly code = 'CONFLICT';

  constructor(message: string) {
    super(message, false);
    this.name = 'ConflictError';
  }
}

/**
 * Raised from a task checkpoint once cancellation has been requested
 */
export class TaskCancelledError extends PipelineError {
  readonly code = 'CANCELLED';

  constructor(taskId: string) {
    super(`Task ${taskId} was cancelled`, false);
    this.name = 'TaskCancelledError';
  }
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

/**
 * Last validation report carried by a fix-loop failure, if any
 */
export function lastReportOf(error: unknown): ValidationReport | undefined {
  if (error instanceof StagnationError || error instanceof FixLoopExhaustedError) {
    return error.lastReport;
  }
  if (error instanceof ValidationError) {
    return error.report;
  }
  return undefined;
}
