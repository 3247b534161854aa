/**
 * Pathfinding Service
 *
 * The application's stable contract: submits long-running work as tasks,
 * validates synchronously, executes saved algorithms in the sandbox and
 * fronts the algorithm registry.
 */

import {
  FIX_LOOP_DEFAULTS,
  TASK_DEFAULTS,
  type AlgorithmSummary,
  type CustomAlgorithm,
  type ExecutionResult,
  type GeneratorConnectionCheck,
  type Grid,
  type Point,
  type SaveAlgorithmInput,
  type TaskResult,
  type TaskSnapshot,
  type TaskState,
  type ValidationReport,
} from '@pathforge/shared-types';
import type { Config } from '../config';
import { LlmCodeGenerator, type CodeGenerator, type GenerationConstraints } from '../generation';
import { createLogger } from '../logging/log';
import { runFixLoop, runGeneration, runOptimization, type FixLoopOutcome, type ProgressReporter } from '../orchestration/fix-loop';
import { AlgorithmRegistry } from '../registry';
import { SandboxExecutor } from '../sandbox';
import { TaskManager, type TaskContext } from '../tasks';
import { CodeValidator } from '../validation/code-validator';

const log = createLogger('pathfinding-service');

export interface GridRun {
  grid: Grid;
  start: Point;
  end: Point;
}

export interface GenerationRequest {
  description: string;
  constraints?: GenerationConstraints;
}

export interface FixRequest {
  description: string;
  code: string;
  maxIterations?: number;
  /** Run an optimization pass over the accepted code */
  optimize?: boolean;
}

export interface GenerateAndFixRequest extends GenerationRequest {
  maxIterations?: number;
  optimize?: boolean;
  /** When given, the accepted code is run once against this grid */
  preview?: GridRun;
}

export interface PathfindingServiceDeps {
  generator: CodeGenerator;
  tasks?: TaskManager;
  registry?: AlgorithmRegistry;
  executor?: SandboxExecutor;
  fixLoop?: { maxIterations: number; stagnationLimit: number };
  completedTaskTtlMs?: number;
}

/**
 * Maps a child operation's 0-100 progress into [from, to] of the task
 */
function progressBand(context: TaskContext, from: number, to: number): ProgressReporter {
  return (percent, step) => context.reportProgress(from + ((to - from) * percent) / 100, step);
}

function titleFrom(description: string): string {
  const line = description.trim().split('\n')[0] ?? '';
  return line.length > 60 ? `${line.slice(0, 57)}...` : line;
}

export class PathfindingService {
  readonly tasks: TaskManager;
  readonly registry: AlgorithmRegistry;
  private readonly generator: CodeGenerator;
  private readonly executor: SandboxExecutor;
  private readonly fixLoop: { maxIterations: number; stagnationLimit: number };
  private readonly completedTaskTtlMs: number;
  private maintenanceTimer: NodeJS.Timeout | null = null;

  constructor(deps: PathfindingServiceDeps) {
    this.generator = deps.generator;
    this.tasks = deps.tasks ?? new TaskManager();
    this.registry = deps.registry ?? new AlgorithmRegistry();
    this.executor = deps.executor ?? new SandboxExecutor();
    this.fixLoop = deps.fixLoop ?? {
      maxIterations: FIX_LOOP_DEFAULTS.MAX_ITERATIONS,
      stagnationLimit: FIX_LOOP_DEFAULTS.STAGNATION_LIMIT,
    };
    this.completedTaskTtlMs = deps.completedTaskTtlMs ?? TASK_DEFAULTS.COMPLETED_TTL_MS;
  }

  static fromConfig(config: Config): PathfindingService {
    return new PathfindingService({
      generator: new LlmCodeGenerator(config.llm),
      tasks: new TaskManager({ maxConcurrent: config.tasks.maxConcurrent }),
      executor: new SandboxExecutor(config.sandbox),
      fixLoop: config.fixLoop,
      completedTaskTtlMs: config.tasks.completedTtlMs,
    });
  }

  // ==========================================================================
  // Task submission
  // ==========================================================================

  submitGeneration(request: GenerationRequest): string {
    return this.tasks.submit('GENERATION', `Generate: ${titleFrom(request.description)}`, async (context) => {
      const { code, report } = await runGeneration({
        description: request.description,
        constraints: request.constraints,
        generator: this.generator,
        checkpoint: context.checkpoint,
        onProgress: context.reportProgress,
        abortSignal: context.signal,
      });
      return { code, report, iterations: 0 };
    });
  }

  submitFix(request: FixRequest): string {
    const maxIterations = request.maxIterations ?? this.fixLoop.maxIterations;
    return this.tasks.submit('FIXING', `Fix: ${titleFrom(request.description)}`, async (context) => {
      context.setIterationCap(maxIterations);
      const outcome = await runFixLoop({
        description: request.description,
        code: request.code,
        generator: this.generator,
        maxIterations,
        stagnationLimit: this.fixLoop.stagnationLimit,
        checkpoint: context.checkpoint,
        onProgress: request.optimize ? progressBand(context, 0, 85) : context.reportProgress,
        onIteration: context.recordIteration,
        abortSignal: context.signal,
      });
      return this.finishFix(request.description, outcome, context, request.optimize === true);
    });
  }

  submitGenerateAndFix(request: GenerateAndFixRequest): string {
    const maxIterations = request.maxIterations ?? this.fixLoop.maxIterations;
    return this.tasks.submit('GENERATE_AND_FIX', `Generate and fix: ${titleFrom(request.description)}`, async (context) => {
      context.setIterationCap(maxIterations);
      const generated = await runGeneration({
        description: request.description,
        constraints: request.constraints,
        generator: this.generator,
        checkpoint: context.checkpoint,
        onProgress: progressBand(context, 0, 30),
        abortSignal: context.signal,
      });

      const outcome = await runFixLoop({
        description: request.description,
        code: generated.code,
        initialReport: generated.report,
        generator: this.generator,
        maxIterations,
        stagnationLimit: this.fixLoop.stagnationLimit,
        checkpoint: context.checkpoint,
        onProgress: progressBand(context, 30, request.optimize || request.preview ? 80 : 100),
        onIteration: context.recordIteration,
        abortSignal: context.signal,
      });

      const result = await this.finishFix(request.description, outcome, context, request.optimize === true);
      if (request.preview) {
        await context.checkpoint();
        context.reportProgress(90, 'Running preview');
        const { grid, start, end } = request.preview;
        result.preview = await this.executor.execute(outcome.code, grid, start, end);
      }
      return result;
    });
  }

  /**
   * Task result for an accepted fix run, optimized when requested
   */
  private async finishFix(
    description: string,
    outcome: FixLoopOutcome,
    context: TaskContext,
    optimize: boolean
  ): Promise<TaskResult> {
    const result: TaskResult = {
      code: outcome.code,
      report: outcome.report,
      iterations: outcome.history.length,
      summary: outcome.summary,
    };
    if (!optimize) return result;

    context.reportProgress(85, 'Optimizing accepted code');
    const optimized = await runOptimization({
      description,
      code: outcome.code,
      report: outcome.report,
      history: outcome.history,
      generator: this.generator,
      checkpoint: context.checkpoint,
      abortSignal: context.signal,
    });
    return { ...result, code: optimized.code, report: optimized.report, optimization: optimized.result };
  }

  submitValidation(request: { code: string }): string {
    return this.tasks.submit('VALIDATION', 'Validate candidate', async (context) => {
      await context.checkpoint();
      context.reportProgress(50, 'Validating candidate');
      const report = CodeValidator.validate(request.code);
      return { code: request.code, report, iterations: 0 };
    });
  }

  // ==========================================================================
  // Task lifecycle
  // ==========================================================================

  getTask(id: string): TaskSnapshot {
    return this.tasks.getStatus(id);
  }

  listTasks(state?: TaskState): TaskSnapshot[] {
    return this.tasks.list(state ? { state } : {});
  }

  pauseTask(id: string): TaskSnapshot {
    return this.tasks.pause(id);
  }

  resumeTask(id: string): TaskSnapshot {
    return this.tasks.resume(id);
  }

  cancelTask(id: string): TaskSnapshot {
    return this.tasks.cancel(id);
  }

  removeTask(id: string): void {
    this.tasks.remove(id);
  }

  clearFinished(): number {
    return this.tasks.clearFinished();
  }

  /**
   * Periodically drop terminal tasks older than the configured TTL
   */
  startMaintenance(intervalMs = Math.min(this.completedTaskTtlMs, 60_000)): void {
    if (this.maintenanceTimer) return;
    this.maintenanceTimer = setInterval(() => {
      this.tasks.pruneExpired(this.completedTaskTtlMs);
    }, intervalMs);
    this.maintenanceTimer.unref();
  }

  stopMaintenance(): void {
    if (this.maintenanceTimer) {
      clearInterval(this.maintenanceTimer);
      this.maintenanceTimer = null;
    }
  }

  // ==========================================================================
  // Generator
  // ==========================================================================

  testGeneratorConnection(): Promise<GeneratorConnectionCheck> {
    return this.generator.testConnection();
  }

  // ==========================================================================
  // Validation and execution
  // ==========================================================================

  validate(code: string): ValidationReport {
    return CodeValidator.validate(code);
  }

  async executeAlgorithm(name: string, grid: Grid, start: Point, end: Point): Promise<ExecutionResult> {
    const code = this.registry.getSource(name);
    log.info('Executing saved algorithm', { name, rows: grid.length });
    return this.executor.execute(code, grid, start, end);
  }

  // ==========================================================================
  // Registry
  // ==========================================================================

  listAlgorithms(): AlgorithmSummary[] {
    return this.registry.list();
  }

  getAlgorithm(name: string): CustomAlgorithm {
    return this.registry.get(name);
  }

  saveAlgorithm(input: SaveAlgorithmInput): Promise<CustomAlgorithm> {
    return this.registry.save(input);
  }

  deleteAlgorithm(name: string): Promise<void> {
    return this.registry.delete(name);
  }
}
