/**
 * Sandboxed Executor
 *
 * Each run gets its own worker thread (separate heap, bounded by
 * resourceLimits) and, inside it, a fresh vm context. The vm timeout bounds
 * synchronous candidate work; the wall-clock timer terminates the worker when
 * anything else hangs. Results cross back as JSON and are sanitized here.
 */

import { Worker } from 'worker_threads';
import { z } from 'zod';
import {
  SANDBOX_DEFAULTS,
  type ExecutionResult,
  type Finding,
  type Grid,
  type Point,
} from '@pathforge/shared-types';
import { CandidateExecutionError, ExecutionTimeoutError } from '../errors';
import { createLogger } from '../logging/log';
import { samePoint, sanitizePoints } from './sanitizer';
import { SANDBOX_WORKER_SOURCE } from './worker-source';

const log = createLogger('sandbox');

/** Extra wall-clock allowance for worker start-up on top of the vm timeout */
const WORKER_STARTUP_GRACE_MS = 1000;

export interface SandboxOptions {
  timeoutMs: number;
  maxSteps: number;
  maxHeapMb: number;
  maxDroppedFraction: number;
}

const workerReplySchema = z.discriminatedUnion('status', [
  z.object({
    status: z.literal('ok'),
    path: z.unknown(),
    visited: z.unknown(),
    steps: z.number(),
  }),
  z.object({ status: z.literal('error'), message: z.string() }),
  z.object({ status: z.literal('step-limit'), steps: z.number() }),
  z.object({ status: z.literal('timeout') }),
]);

type WorkerReply = z.infer<typeof workerReplySchema>;

export class SandboxExecutor {
  private readonly options: SandboxOptions;

  constructor(options: Partial<SandboxOptions> = {}) {
    this.options = {
      timeoutMs: options.timeoutMs ?? SANDBOX_DEFAULTS.TIMEOUT_MS,
      maxSteps: options.maxSteps ?? SANDBOX_DEFAULTS.MAX_STEPS,
      maxHeapMb: options.maxHeapMb ?? SANDBOX_DEFAULTS.MAX_HEAP_MB,
      maxDroppedFraction: options.maxDroppedFraction ?? SANDBOX_DEFAULTS.MAX_DROPPED_FRACTION,
    };
  }

  /**
   * Run a candidate against a grid. Throws ExecutionTimeoutError when a budget
   * is exceeded and CandidateExecutionError when the candidate fails.
   */
  async execute(candidateSource: string, grid: Grid, start: Point, end: Point): Promise<ExecutionResult> {
    const startedAt = Date.now();
    const reply = await this.runWorker(candidateSource, grid, start, end);
    const durationMs = Date.now() - startedAt;

    switch (reply.status) {
      case 'timeout':
        throw new ExecutionTimeoutError('TIMEOUT', `Candidate exceeded the ${this.options.timeoutMs}ms time limit`);
      case 'step-limit':
        throw new ExecutionTimeoutError('STEP_LIMIT', `Candidate exceeded the ${this.options.maxSteps} step budget`);
      case 'error':
        throw new CandidateExecutionError(`Candidate failed: ${reply.message}`);
      case 'ok':
        return this.buildResult(reply.path, reply.visited, reply.steps, grid, end, durationMs);
    }
  }

  private buildResult(
    rawPath: unknown,
    rawVisited: unknown,
    stepsUsed: number,
    grid: Grid,
    end: Point,
    durationMs: number
  ): ExecutionResult {
    if (!Array.isArray(rawPath)) {
      throw new CandidateExecutionError('findPath must return an array of [row, col] points');
    }
    if (!Array.isArray(rawVisited)) {
      throw new CandidateExecutionError('getVisitedOrder must return an array of [row, col] points');
    }

    const path = sanitizePoints(rawPath, grid);
    const visitedOrder = sanitizePoints(rawVisited, grid);
    const total = rawPath.length + rawVisited.length;
    const droppedPoints = total - path.length - visitedOrder.length;

    const warnings: Finding[] = [];
    if (total > 0 && droppedPoints / total > this.options.maxDroppedFraction) {
      warnings.push({
        level: 'WARNING',
        rule: 'sanitization',
        message: `Dropped ${droppedPoints} of ${total} returned points (malformed, out of range or wall)`,
        suggestion: 'Only emit in-bounds, non-wall [row, col] pairs',
      });
      log.warn('Sanitization dropped a large share of candidate output', { droppedPoints, total });
    }

    const last = path[path.length - 1];
    return {
      path,
      visitedOrder,
      found: last !== undefined && samePoint(last, end),
      droppedPoints,
      warnings,
      stepsUsed,
      durationMs,
    };
  }

  private runWorker(source: string, grid: Grid, start: Point, end: Point): Promise<WorkerReply> {
    const { timeoutMs, maxSteps, maxHeapMb } = this.options;
    const input = JSON.stringify({ grid, start, end, maxSteps });

    return new Promise<WorkerReply>((resolve, reject) => {
      const worker = new Worker(SANDBOX_WORKER_SOURCE, {
        eval: true,
        workerData: { source, input, timeoutMs },
        resourceLimits: {
          maxOldGenerationSizeMb: maxHeapMb,
          maxYoungGenerationSizeMb: Math.max(4, Math.floor(maxHeapMb / 4)),
        },
      });

      let settled = false;
      const settle = (outcome: () => void) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        outcome();
        worker.terminate().catch((error: unknown) => {
          log.warn('Failed to terminate sandbox worker', error);
        });
      };

      const timer = setTimeout(() => {
        log.warn('Sandbox worker exceeded wall-clock ceiling, terminating');
        settle(() => resolve({ status: 'timeout' }));
      }, timeoutMs + WORKER_STARTUP_GRACE_MS);

      worker.on('message', (message: unknown) => {
        const parsed = workerReplySchema.safeParse(message);
        settle(() => {
          if (parsed.success) {
            resolve(parsed.data);
          } else {
            reject(new CandidateExecutionError('Sandbox returned a malformed reply'));
          }
        });
      });

      worker.on('error', (error: NodeJS.ErrnoException) => {
        settle(() => {
          if (error.code === 'ERR_WORKER_OUT_OF_MEMORY') {
            reject(new ExecutionTimeoutError('MEMORY', `Candidate exceeded the ${maxHeapMb}MB memory limit`));
          } else {
            reject(new CandidateExecutionError(`Sandbox worker failed: ${error.message}`));
          }
        });
      });

      worker.on('exit', (code) => {
        settle(() => reject(new CandidateExecutionError(`Sandbox worker exited with code ${code} before replying`)));
      });
    });
  }
}
