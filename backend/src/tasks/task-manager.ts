/**
 * Task Lifecycle Manager
 *
 * Runs long operations as tasks with a strict state machine:
 *
 *   pending → running ⇄ paused
 *   pending → cancelled
 *   running/paused → completed | failed | cancelled
 *
 * Pause and cancel are cooperative: a handler observes them at its next
 * checkpoint(). Pollers only ever see deep-copied snapshots.
 */

import { v4 as uuidv4 } from 'uuid';
import {
  TASK_DEFAULTS,
  TERMINAL_TASK_STATES,
  type FixIteration,
  type TaskFailure,
  type TaskKind,
  type TaskResult,
  type TaskSnapshot,
  type TaskState,
} from '@pathforge/shared-types';
import { InvalidStateError, NotFoundError, TaskCancelledError, isPipelineError, lastReportOf } from '../errors';
import { createLogger, type Log } from '../logging/log';
import { PauseGate } from './pause-gate';

const log = createLogger('tasks');

// ============================================================================
// Public types
// ============================================================================

export interface TaskContext {
  readonly taskId: string;
  /** Aborted once cancellation is requested */
  readonly signal: AbortSignal;
  readonly logger: Log;
  /** Waits while paused; throws TaskCancelledError once cancel was requested */
  checkpoint(): Promise<void>;
  reportProgress(percent: number, step: string): void;
  setIterationCap(cap: number): void;
  recordIteration(iteration: FixIteration): void;
}

export type TaskHandler = (context: TaskContext) => Promise<TaskResult>;

export type TaskListener = (snapshot: TaskSnapshot) => void;

export interface TaskManagerOptions {
  maxConcurrent?: number;
}

type Settlement = { kind: 'resolved'; result: TaskResult } | { kind: 'rejected'; error: unknown };

interface TaskRecord {
  id: string;
  kind: TaskKind;
  title: string;
  state: TaskState;
  progress: number;
  currentStep: string;
  iterationCap: number | null;
  fixHistory: FixIteration[];
  estimatedRemainingMs: number | null;
  cancelRequested: boolean;
  result?: TaskResult;
  error?: TaskFailure;
  createdAt: number;
  startedAt?: number;
  finishedAt?: number;
  handler: TaskHandler;
  abort: AbortController;
  gate: PauseGate | null;
  /** Progress reported while paused, applied on resume */
  deferredProgress: { percent: number; step: string } | null;
  /** Handler outcome that arrived while paused */
  deferredSettlement: Settlement | null;
}

// ============================================================================
// TaskManager
// ============================================================================

export class TaskManager {
  private readonly tasks = new Map<string, TaskRecord>();
  private readonly queue: string[] = [];
  private readonly listeners = new Set<TaskListener>();
  private readonly maxConcurrent: number;
  private activeSlots = 0;
  private drainScheduled = false;

  constructor(options: TaskManagerOptions = {}) {
    this.maxConcurrent = Math.max(1, options.maxConcurrent ?? TASK_DEFAULTS.MAX_CONCURRENT);
  }

  /**
   * Register a task and return its id. The task starts pending; a worker slot
   * claims it asynchronously.
   */
  submit(kind: TaskKind, title: string, handler: TaskHandler): string {
    const id = uuidv4();
    const record: TaskRecord = {
      id,
      kind,
      title,
      state: 'pending',
      progress: 0,
      currentStep: 'Queued',
      iterationCap: null,
      fixHistory: [],
      estimatedRemainingMs: null,
      cancelRequested: false,
      createdAt: Date.now(),
      handler,
      abort: new AbortController(),
      gate: null,
      deferredProgress: null,
      deferredSettlement: null,
    };
    this.tasks.set(id, record);
    this.queue.push(id);
    log.info('Task submitted', { id, kind, title });
    this.emit(record);
    this.scheduleDrain();
    return id;
  }

  getStatus(id: string): TaskSnapshot {
    return this.snapshot(this.require(id));
  }

  list(filter: { state?: TaskState; kind?: TaskKind } = {}): TaskSnapshot[] {
    return [...this.tasks.values()]
      .filter((record) => (filter.state === undefined || record.state === filter.state) && (filter.kind === undefined || record.kind === filter.kind))
      .sort((a, b) => a.createdAt - b.createdAt)
      .map((record) => this.snapshot(record));
  }

  pause(id: string): TaskSnapshot {
    const record = this.require(id);
    if (record.state === 'paused') {
      return this.snapshot(record);
    }
    if (record.state !== 'running') {
      throw new InvalidStateError(`Cannot pause task ${id} in state ${record.state}`);
    }
    if (record.cancelRequested) {
      throw new InvalidStateError(`Cannot pause task ${id}: cancellation already requested`);
    }
    record.state = 'paused';
    record.gate = new PauseGate();
    log.info('Task paused', { id });
    this.emit(record);
    return this.snapshot(record);
  }

  resume(id: string): TaskSnapshot {
    const record = this.require(id);
    if (record.state === 'running') {
      return this.snapshot(record);
    }
    if (record.state !== 'paused') {
      throw new InvalidStateError(`Cannot resume task ${id} in state ${record.state}`);
    }
    record.state = 'running';
    if (record.deferredProgress) {
      this.applyProgress(record, record.deferredProgress.percent, record.deferredProgress.step);
      record.deferredProgress = null;
    }
    this.openGate(record);
    log.info('Task resumed', { id });

    const settlement = record.deferredSettlement;
    if (settlement) {
      record.deferredSettlement = null;
      this.finish(record, settlement);
    } else {
      this.emit(record);
    }
    return this.snapshot(record);
  }

  /**
   * Cancel a task. Pending tasks are cancelled at once; running and paused
   * ones at their next checkpoint, or when their handler settles.
   */
  cancel(id: string): TaskSnapshot {
    const record = this.require(id);
    if (TERMINAL_TASK_STATES.has(record.state)) {
      throw new InvalidStateError(`Cannot cancel task ${id} in state ${record.state}`);
    }

    if (record.state === 'pending') {
      const position = this.queue.indexOf(id);
      if (position >= 0) this.queue.splice(position, 1);
      record.cancelRequested = true;
      this.terminate(record, 'cancelled');
      return this.snapshot(record);
    }

    if (!record.cancelRequested) {
      record.cancelRequested = true;
      record.abort.abort(new TaskCancelledError(id));
      log.info('Task cancellation requested', { id, state: record.state });
    }

    const settlement = record.deferredSettlement;
    if (settlement) {
      // the handler already returned while paused
      record.deferredSettlement = null;
      this.finish(record, settlement);
    } else {
      this.openGate(record);
      this.emit(record);
    }
    return this.snapshot(record);
  }

  /**
   * Drop a terminal task
   */
  remove(id: string): void {
    const record = this.require(id);
    if (!TERMINAL_TASK_STATES.has(record.state)) {
      throw new InvalidStateError(`Cannot remove task ${id} in state ${record.state}`);
    }
    this.tasks.delete(id);
  }

  /**
   * Remove every terminal task; returns how many were removed
   */
  clearFinished(): number {
    let removed = 0;
    for (const [id, record] of this.tasks) {
      if (TERMINAL_TASK_STATES.has(record.state)) {
        this.tasks.delete(id);
        removed++;
      }
    }
    return removed;
  }

  /**
   * Remove terminal tasks that finished more than ttlMs ago
   */
  pruneExpired(ttlMs: number = TASK_DEFAULTS.COMPLETED_TTL_MS, now: number = Date.now()): number {
    let removed = 0;
    for (const [id, record] of this.tasks) {
      if (TERMINAL_TASK_STATES.has(record.state) && record.finishedAt !== undefined && now - record.finishedAt > ttlMs) {
        this.tasks.delete(id);
        removed++;
      }
    }
    if (removed > 0) log.debug('Pruned expired tasks', { removed });
    return removed;
  }

  onUpdate(listener: TaskListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Resolve with the terminal snapshot of a task
   */
  waitFor(id: string): Promise<TaskSnapshot> {
    const current = this.getStatus(id);
    if (TERMINAL_TASK_STATES.has(current.state)) {
      return Promise.resolve(current);
    }
    return new Promise<TaskSnapshot>((resolve) => {
      const unsubscribe = this.onUpdate((snapshot) => {
        if (snapshot.id === id && TERMINAL_TASK_STATES.has(snapshot.state)) {
          unsubscribe();
          resolve(snapshot);
        }
      });
    });
  }

  // --------------------------------------------------------------------------
  // Scheduling
  // --------------------------------------------------------------------------

  private scheduleDrain(): void {
    if (this.drainScheduled) return;
    this.drainScheduled = true;
    setImmediate(() => {
      this.drainScheduled = false;
      this.drain();
    });
  }

  private drain(): void {
    while (this.activeSlots < this.maxConcurrent && this.queue.length > 0) {
      const id = this.queue.shift();
      const record = id === undefined ? undefined : this.tasks.get(id);
      if (!record || record.state !== 'pending') continue;
      this.start(record);
    }
  }

  private start(record: TaskRecord): void {
    this.activeSlots++;
    record.state = 'running';
    record.startedAt = Date.now();
    record.currentStep = 'Starting';
    log.info('Task started', { id: record.id, kind: record.kind });
    this.emit(record);

    let outcome: Promise<TaskResult>;
    try {
      outcome = record.handler(this.createContext(record));
    } catch (error) {
      outcome = Promise.reject(error);
    }

    void outcome.then(
      (result) => this.settle(record, { kind: 'resolved', result }),
      (error: unknown) => this.settle(record, { kind: 'rejected', error })
    );
  }

  private settle(record: TaskRecord, settlement: Settlement): void {
    this.activeSlots--;
    this.scheduleDrain();

    if (record.state === 'paused' && !record.cancelRequested) {
      record.deferredSettlement = settlement;
      return;
    }
    this.finish(record, settlement);
  }

  private finish(record: TaskRecord, settlement: Settlement): void {
    if (TERMINAL_TASK_STATES.has(record.state)) return;
    record.gate = null;
    record.deferredProgress = null;

    if (record.cancelRequested || (settlement.kind === 'rejected' && settlement.error instanceof TaskCancelledError)) {
      this.terminate(record, 'cancelled');
      return;
    }

    if (settlement.kind === 'resolved') {
      record.result = settlement.result;
      record.progress = 100;
      record.currentStep = 'Completed';
      record.estimatedRemainingMs = 0;
      this.terminate(record, 'completed');
      return;
    }

    record.error = toTaskFailure(settlement.error);
    record.currentStep = 'Failed';
    log.warn('Task failed', { id: record.id, code: record.error.code, message: record.error.message });
    this.terminate(record, 'failed');
  }

  private terminate(record: TaskRecord, state: 'completed' | 'failed' | 'cancelled'): void {
    record.state = state;
    record.finishedAt = Date.now();
    if (state === 'cancelled') {
      record.currentStep = 'Cancelled';
    }
    log.info('Task finished', { id: record.id, state });
    this.emit(record);
  }

  // --------------------------------------------------------------------------
  // Handler context
  // --------------------------------------------------------------------------

  private createContext(record: TaskRecord): TaskContext {
    return {
      taskId: record.id,
      signal: record.abort.signal,
      logger: createLogger(`task:${record.kind.toLowerCase()}`),
      checkpoint: async () => {
        for (;;) {
          if (record.cancelRequested) {
            throw new TaskCancelledError(record.id);
          }
          const gate = record.gate;
          if (record.state !== 'paused' || !gate) return;
          await gate.wait();
        }
      },
      reportProgress: (percent, step) => {
        if (TERMINAL_TASK_STATES.has(record.state)) return;
        if (record.state === 'paused') {
          const previous = record.deferredProgress?.percent ?? 0;
          record.deferredProgress = { percent: Math.max(previous, clampPercent(percent)), step };
          return;
        }
        this.applyProgress(record, percent, step);
        this.emit(record);
      },
      setIterationCap: (cap) => {
        record.iterationCap = Math.max(0, Math.floor(cap));
        record.estimatedRemainingMs = estimateRemaining(record);
        this.emit(record);
      },
      recordIteration: (iteration) => {
        if (TERMINAL_TASK_STATES.has(record.state)) return;
        record.fixHistory.push(structuredClone(iteration));
        record.estimatedRemainingMs = estimateRemaining(record);
        this.emit(record);
      },
    };
  }

  private applyProgress(record: TaskRecord, percent: number, step: string): void {
    record.progress = Math.max(record.progress, clampPercent(percent));
    record.currentStep = step;
  }

  private openGate(record: TaskRecord): void {
    const gate = record.gate;
    record.gate = null;
    gate?.open();
  }

  // --------------------------------------------------------------------------
  // Snapshots
  // --------------------------------------------------------------------------

  private require(id: string): TaskRecord {
    const record = this.tasks.get(id);
    if (!record) {
      throw new NotFoundError(`Task ${id} not found`);
    }
    return record;
  }

  private snapshot(record: TaskRecord): TaskSnapshot {
    const end = record.finishedAt ?? Date.now();
    const snapshot: TaskSnapshot = {
      id: record.id,
      kind: record.kind,
      title: record.title,
      state: record.state,
      progress: record.progress,
      currentStep: record.currentStep,
      elapsedMs: record.startedAt === undefined ? 0 : end - record.startedAt,
      estimatedRemainingMs: record.estimatedRemainingMs,
      iterationCap: record.iterationCap,
      iterationsDone: record.fixHistory.length,
      cancelRequested: record.cancelRequested,
      fixHistory: record.fixHistory,
      createdAt: new Date(record.createdAt).toISOString(),
    };
    if (record.result) snapshot.result = record.result;
    if (record.error) snapshot.error = record.error;
    if (record.startedAt !== undefined) snapshot.startedAt = new Date(record.startedAt).toISOString();
    if (record.finishedAt !== undefined) snapshot.finishedAt = new Date(record.finishedAt).toISOString();
    return structuredClone(snapshot);
  }

  private emit(record: TaskRecord): void {
    if (this.listeners.size === 0) return;
    const snapshot = this.snapshot(record);
    for (const listener of [...this.listeners]) {
      try {
        listener(snapshot);
      } catch (error) {
        log.warn('Task listener threw', error);
      }
    }
  }
}

// ============================================================================
// Helpers
// ============================================================================

function clampPercent(percent: number): number {
  if (Number.isNaN(percent)) return 0;
  return Math.min(100, Math.max(0, percent));
}

/**
 * avg(iteration duration) × iterations left; null before the first iteration
 */
export function estimateRemaining(record: { iterationCap: number | null; fixHistory: readonly FixIteration[] }): number | null {
  const done = record.fixHistory.length;
  if (record.iterationCap === null || done === 0) return null;
  const average = record.fixHistory.reduce((sum, iteration) => sum + iteration.durationMs, 0) / done;
  return Math.max(0, average * (record.iterationCap - done));
}

export function toTaskFailure(error: unknown): TaskFailure {
  const lastReport = lastReportOf(error);
  if (isPipelineError(error)) {
    return {
      code: error.code,
      message: error.message,
      recoverable: error.recoverable,
      ...(lastReport ? { lastReport } : {}),
    };
  }
  return {
    code: 'INTERNAL',
    message: error instanceof Error ? error.message : String(error),
    recoverable: false,
  };
}
