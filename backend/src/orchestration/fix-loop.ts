/**
 * Fix-loop orchestration
 *
 * validate → (repair → validate)* until the candidate is valid, the iteration
 * cap is reached, or the score stops improving. Invalid code is never
 * returned as a success.
 */

import type { FixIteration, FixSummary, OptimizationResult, ValidationReport } from '@pathforge/shared-types';
import { FixLoopExhaustedError, StagnationError, TaskCancelledError } from '../errors';
import { optimizationStrategy, type CodeGenerator, type GenerationConstraints } from '../generation';
import { createLogger } from '../logging/log';
import { CodeValidator } from '../validation/code-validator';

const log = createLogger('fix-loop');

/** Progress band the loop reports into; the caller owns the rest */
const PROGRESS_START = 5;
const PROGRESS_END = 95;

export type Checkpoint = () => Promise<void>;
export type ProgressReporter = (percent: number, step: string) => void;

export interface FixLoopInput {
  description: string;
  code: string;
  generator: CodeGenerator;
  maxIterations: number;
  /** Consecutive non-improving iterations tolerated; 0 disables */
  stagnationLimit: number;
  checkpoint?: Checkpoint;
  onProgress?: ProgressReporter;
  onIteration?: (iteration: FixIteration) => void;
  abortSignal?: AbortSignal;
  /** Report already computed for `code`, skips the initial validation */
  initialReport?: ValidationReport;
}

export interface FixLoopOutcome {
  code: string;
  report: ValidationReport;
  history: FixIteration[];
  summary: FixSummary;
}

export type FixLoopDecision = 'accept' | 'continue' | 'stagnated' | 'exhausted';

export interface FixLoopDecisionInput {
  report: ValidationReport;
  iteration: number;
  maxIterations: number;
  nonImprovingStreak: number;
  stagnationLimit: number;
}

/**
 * What to do after an iteration has been validated
 */
export function decideAfterIteration(input: FixLoopDecisionInput): FixLoopDecision {
  if (input.report.isValid) return 'accept';
  if (input.stagnationLimit > 0 && input.nonImprovingStreak >= input.stagnationLimit) return 'stagnated';
  if (input.iteration >= input.maxIterations) return 'exhausted';
  return 'continue';
}

export function summarizeIteration(
  index: number,
  before: ValidationReport,
  after: ValidationReport,
  code: string,
  durationMs: number
): FixIteration {
  return {
    index,
    before,
    after,
    errorsFixed: before.errorCount - after.errorCount,
    warningsFixed: before.warningCount - after.warningCount,
    scoreDelta: after.score - before.score,
    durationMs,
    code,
  };
}

/**
 * Compare the report a fix run started from with the one it ended on
 */
export function summarizeFix(initial: ValidationReport, final: ValidationReport, iterations: number): FixSummary {
  const resolved = initial.errorCount - final.errorCount;
  return {
    iterations,
    initialErrors: initial.errorCount,
    finalErrors: final.errorCount,
    initialWarnings: initial.warningCount,
    finalWarnings: final.warningCount,
    initialScore: initial.score,
    finalScore: final.score,
    success: final.isValid,
    fixRate: initial.errorCount === 0 ? 1 : Math.min(1, Math.max(0, resolved / initial.errorCount)),
  };
}

const noCheckpoint: Checkpoint = async () => {};
const noProgress: ProgressReporter = () => {};

export async function runFixLoop(input: FixLoopInput): Promise<FixLoopOutcome> {
  const checkpoint = input.checkpoint ?? noCheckpoint;
  const onProgress = input.onProgress ?? noProgress;
  const maxIterations = Math.max(1, Math.floor(input.maxIterations));
  const span = PROGRESS_END - PROGRESS_START;

  onProgress(PROGRESS_START, 'Validating candidate');
  let code = input.code;
  let report = input.initialReport ?? CodeValidator.validate(code);
  const initialReport = report;
  const history: FixIteration[] = [];

  if (report.isValid) {
    log.info('Candidate already valid, no repair needed', { score: report.score });
    return { code, report, history, summary: summarizeFix(initialReport, report, 0) };
  }

  let nonImprovingStreak = 0;
  for (let index = 1; index <= maxIterations; index++) {
    await checkpoint();
    onProgress(PROGRESS_START + (span * (index - 1)) / maxIterations, `Repair iteration ${index}/${maxIterations}`);

    const startedAt = Date.now();
    const repaired = await input.generator.repair(input.description, code, report.findings, {
      iteration: index,
      abortSignal: input.abortSignal,
    });

    await checkpoint();
    const after = CodeValidator.validate(repaired);
    const iteration = summarizeIteration(index, report, after, repaired, Date.now() - startedAt);
    history.push(iteration);
    input.onIteration?.(iteration);
    onProgress(PROGRESS_START + (span * index) / maxIterations, `Validated iteration ${index}/${maxIterations}`);

    log.info('Fix iteration finished', {
      index,
      score: after.score,
      scoreDelta: iteration.scoreDelta,
      errors: after.errorCount,
    });

    code = repaired;
    report = after;
    nonImprovingStreak = iteration.scoreDelta > 0 ? 0 : nonImprovingStreak + 1;

    const decision = decideAfterIteration({
      report,
      iteration: index,
      maxIterations,
      nonImprovingStreak,
      stagnationLimit: input.stagnationLimit,
    });
    switch (decision) {
      case 'accept':
        return { code, report, history, summary: summarizeFix(initialReport, report, history.length) };
      case 'stagnated':
        throw new StagnationError(
          `Score did not improve for ${nonImprovingStreak} consecutive iterations (last score ${report.score})`,
          report
        );
      case 'exhausted':
        throw new FixLoopExhaustedError(
          `Candidate still has ${report.errorCount} error(s) after ${maxIterations} iterations`,
          report
        );
      case 'continue':
        break;
    }
  }

  // unreachable: the last iteration always decides accept, stagnated or exhausted
  throw new FixLoopExhaustedError(`Candidate still invalid after ${maxIterations} iterations`, report);
}

export interface GenerationInput {
  description: string;
  constraints?: GenerationConstraints;
  generator: CodeGenerator;
  checkpoint?: Checkpoint;
  onProgress?: ProgressReporter;
  abortSignal?: AbortSignal;
}

/**
 * Generate a first candidate and validate it
 */
export async function runGeneration(input: GenerationInput): Promise<{ code: string; report: ValidationReport }> {
  const checkpoint = input.checkpoint ?? noCheckpoint;
  const onProgress = input.onProgress ?? noProgress;

  await checkpoint();
  onProgress(10, 'Generating candidate');
  const code = await input.generator.generate(input.description, input.constraints, {
    abortSignal: input.abortSignal,
  });

  await checkpoint();
  onProgress(80, 'Validating candidate');
  const report = CodeValidator.validate(code);
  log.info('Generated candidate validated', { score: report.score, isValid: report.isValid });
  return { code, report };
}

// ============================================================================
// Optimization pass
// ============================================================================

export interface OptimizationInput {
  description: string;
  /** Accepted code and its report */
  code: string;
  report: ValidationReport;
  history: readonly FixIteration[];
  generator: CodeGenerator;
  checkpoint?: Checkpoint;
  abortSignal?: AbortSignal;
}

export interface OptimizationOutcome {
  code: string;
  report: ValidationReport;
  result: OptimizationResult;
}

/**
 * Ask the generator for a cleaner version of accepted code. The rewrite is
 * kept only if it still validates; otherwise, or when the generator fails,
 * the accepted code stands.
 */
export async function runOptimization(input: OptimizationInput): Promise<OptimizationOutcome> {
  const checkpoint = input.checkpoint ?? noCheckpoint;
  const strategy = optimizationStrategy(input.history);
  const scoreBefore = input.report.score;

  await checkpoint();
  let optimized: string;
  try {
    optimized = await input.generator.optimize(input.description, input.code, strategy, {
      abortSignal: input.abortSignal,
    });
  } catch (error) {
    if (error instanceof TaskCancelledError || input.abortSignal?.aborted) throw error;
    const message = error instanceof Error ? error.message : String(error);
    log.warn('Optimization failed, keeping accepted code', { message });
    return {
      code: input.code,
      report: input.report,
      result: { verdict: 'generator-failed', strategy, scoreBefore, message },
    };
  }

  await checkpoint();
  const report = CodeValidator.validate(optimized);
  if (!report.isValid) {
    log.warn('Optimized candidate failed validation, keeping accepted code', {
      errors: report.errorCount,
      score: report.score,
    });
    return {
      code: input.code,
      report: input.report,
      result: { verdict: 'invalid', strategy, scoreBefore, scoreAfter: report.score },
    };
  }

  log.info('Optimized candidate accepted', { scoreBefore, scoreAfter: report.score });
  return { code: optimized, report, result: { verdict: 'applied', strategy, scoreBefore, scoreAfter: report.score } };
}
