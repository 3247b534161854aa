import { describe, expect, it, vi } from 'vitest';
import type { FixIteration, TaskResult, ValidationReport } from '@pathforge/shared-types';
import { TaskManager, estimateRemaining } from './task-manager';
import { InvalidStateError, NotFoundError, StagnationError } from '../errors';

const report: ValidationReport = {
  score: 100,
  isValid: true,
  findings: [],
  errorCount: 0,
  warningCount: 0,
  suggestionCount: 0,
};

const result: TaskResult = { code: 'class A {}', report, iterations: 0 };

function iteration(index: number, durationMs: number): FixIteration {
  return { index, before: report, after: report, errorsFixed: 0, warningsFixed: 0, scoreDelta: 0, durationMs, code: '' };
}

function deferred(): { promise: Promise<void>; release: () => void } {
  let release: () => void = () => {};
  const promise = new Promise<void>((resolve) => {
    release = resolve;
  });
  return { promise, release };
}

const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

async function waitForState(manager: TaskManager, id: string, state: string): Promise<void> {
  await vi.waitFor(() => {
    expect(manager.getStatus(id).state).toBe(state);
  });
}

describe('TaskManager', () => {
  it('returns a pending id immediately and completes the task', async () => {
    const manager = new TaskManager();
    const id = manager.submit('VALIDATION', 'validate', async () => result);

    expect(manager.getStatus(id).state).toBe('pending');

    const done = await manager.waitFor(id);
    expect(done.state).toBe('completed');
    expect(done.progress).toBe(100);
    expect(done.result).toEqual(result);
    expect(done.finishedAt).toBeDefined();
  });

  it('keeps progress monotonic and clamped', async () => {
    const manager = new TaskManager();
    const gate = deferred();
    const id = manager.submit('GENERATION', 'gen', async (ctx) => {
      ctx.reportProgress(30, 'a');
      ctx.reportProgress(20, 'b');
      ctx.reportProgress(250, 'c');
      await gate.promise;
      return result;
    });

    await waitForState(manager, id, 'running');
    await vi.waitFor(() => expect(manager.getStatus(id).currentStep).toBe('c'));
    expect(manager.getStatus(id).progress).toBe(100);

    gate.release();
    await manager.waitFor(id);
  });

  it('never lowers progress across updates', async () => {
    const manager = new TaskManager();
    const seen: number[] = [];
    manager.onUpdate((snapshot) => seen.push(snapshot.progress));

    const id = manager.submit('GENERATION', 'gen', async (ctx) => {
      ctx.reportProgress(30, 'a');
      ctx.reportProgress(10, 'b');
      ctx.reportProgress(60, 'c');
      return result;
    });
    await manager.waitFor(id);

    expect(seen).toEqual([0, 0, 30, 30, 60, 100]);
  });

  it('holds progress while paused and continues after resume', async () => {
    const manager = new TaskManager();
    const gate = deferred();
    let passedCheckpoint = false;
    const id = manager.submit('FIXING', 'fix', async (ctx) => {
      ctx.reportProgress(40, 'first');
      await gate.promise;
      ctx.reportProgress(60, 'second');
      await ctx.checkpoint();
      passedCheckpoint = true;
      return result;
    });

    await vi.waitFor(() => expect(manager.getStatus(id).progress).toBe(40));
    const paused = manager.pause(id);
    expect(paused.state).toBe('paused');
    expect(paused.progress).toBe(40);

    gate.release();
    await flush();
    await flush();
    expect(manager.getStatus(id)).toMatchObject({ state: 'paused', progress: 40, currentStep: 'first' });
    expect(passedCheckpoint).toBe(false);

    const resumed = manager.resume(id);
    expect(resumed).toMatchObject({ state: 'running', progress: 60, currentStep: 'second' });

    const done = await manager.waitFor(id);
    expect(done.state).toBe('completed');
    expect(passedCheckpoint).toBe(true);
  });

  it('cancels a running task at its next checkpoint', async () => {
    const manager = new TaskManager();
    let checkpoints = 0;
    const id = manager.submit('FIXING', 'fix', async (ctx) => {
      for (;;) {
        await ctx.checkpoint();
        checkpoints++;
        await new Promise((resolve) => setTimeout(resolve, 5));
      }
    });

    await vi.waitFor(() => expect(checkpoints).toBeGreaterThan(0));
    const requested = manager.cancel(id);
    expect(requested.cancelRequested).toBe(true);

    const done = await manager.waitFor(id);
    expect(done.state).toBe('cancelled');
    expect(done.result).toBeUndefined();
  });

  it('cancels a paused task', async () => {
    const manager = new TaskManager();
    const id = manager.submit('FIXING', 'fix', async (ctx) => {
      for (;;) {
        await ctx.checkpoint();
        await new Promise((resolve) => setTimeout(resolve, 5));
      }
    });

    await waitForState(manager, id, 'running');
    manager.pause(id);
    manager.cancel(id);

    expect((await manager.waitFor(id)).state).toBe('cancelled');
  });

  it('cancels a pending task immediately and rejects later lifecycle calls', async () => {
    const manager = new TaskManager({ maxConcurrent: 1 });
    const gate = deferred();
    const first = manager.submit('GENERATION', 'first', async () => {
      await gate.promise;
      return result;
    });
    const second = manager.submit('GENERATION', 'second', async () => result);

    await waitForState(manager, first, 'running');
    expect(manager.getStatus(second).state).toBe('pending');
    expect(() => manager.pause(second)).toThrow(InvalidStateError);

    expect(manager.cancel(second).state).toBe('cancelled');
    expect(() => manager.cancel(second)).toThrow(InvalidStateError);
    expect(() => manager.resume(second)).toThrow(InvalidStateError);

    gate.release();
    await manager.waitFor(first);
    expect(manager.getStatus(second).state).toBe('cancelled');
  });

  it('limits concurrently running tasks', async () => {
    const manager = new TaskManager({ maxConcurrent: 1 });
    const gate = deferred();
    const first = manager.submit('GENERATION', 'first', async () => {
      await gate.promise;
      return result;
    });
    const second = manager.submit('GENERATION', 'second', async () => result);

    await waitForState(manager, first, 'running');
    await flush();
    expect(manager.getStatus(second).state).toBe('pending');

    gate.release();
    expect((await manager.waitFor(second)).state).toBe('completed');
  });

  it('maps handler errors to a failure with the last report', async () => {
    const manager = new TaskManager();
    const invalid: ValidationReport = { ...report, score: 90, isValid: false, errorCount: 1 };
    const id = manager.submit('FIXING', 'fix', async () => {
      throw new StagnationError('no progress', invalid);
    });

    const done = await manager.waitFor(id);
    expect(done.state).toBe('failed');
    expect(done.error).toEqual({ code: 'STAGNATION', message: 'no progress', recoverable: true, lastReport: invalid });
  });

  it('maps unknown errors to a non-recoverable internal failure', async () => {
    const manager = new TaskManager();
    const id = manager.submit('FIXING', 'fix', async () => {
      throw new Error('kaput');
    });

    expect((await manager.waitFor(id)).error).toEqual({ code: 'INTERNAL', message: 'kaput', recoverable: false });
  });

  it('estimates remaining time from recorded iterations', async () => {
    const manager = new TaskManager();
    const gate = deferred();
    const id = manager.submit('FIXING', 'fix', async (ctx) => {
      ctx.setIterationCap(4);
      ctx.recordIteration(iteration(1, 100));
      ctx.recordIteration(iteration(2, 300));
      await gate.promise;
      return result;
    });

    await vi.waitFor(() => expect(manager.getStatus(id).iterationsDone).toBe(2));
    expect(manager.getStatus(id)).toMatchObject({ iterationCap: 4, estimatedRemainingMs: 400 });

    gate.release();
    await manager.waitFor(id);
  });

  it('removes only terminal tasks', async () => {
    const manager = new TaskManager();
    const gate = deferred();
    const id = manager.submit('GENERATION', 'gen', async () => {
      await gate.promise;
      return result;
    });

    await waitForState(manager, id, 'running');
    expect(() => manager.remove(id)).toThrow(InvalidStateError);

    gate.release();
    await manager.waitFor(id);
    manager.remove(id);
    expect(() => manager.getStatus(id)).toThrow(NotFoundError);
    expect(() => manager.cancel('missing')).toThrow(NotFoundError);
  });

  it('prunes tasks finished longer than the ttl ago', async () => {
    const manager = new TaskManager();
    const id = manager.submit('VALIDATION', 'validate', async () => result);
    await manager.waitFor(id);

    expect(manager.pruneExpired(60_000)).toBe(0);
    expect(manager.pruneExpired(60_000, Date.now() + 120_000)).toBe(1);
    expect(manager.list()).toEqual([]);
  });

  it('hands out snapshots that do not alias internal state', async () => {
    const manager = new TaskManager();
    const id = manager.submit('FIXING', 'fix', async (ctx) => {
      ctx.setIterationCap(2);
      ctx.recordIteration(iteration(1, 10));
      return result;
    });

    const done = await manager.waitFor(id);
    done.fixHistory.pop();
    expect(manager.getStatus(id).fixHistory).toHaveLength(1);
  });
});

describe('estimateRemaining', () => {
  it('is null before the first iteration and never negative', () => {
    expect(estimateRemaining({ iterationCap: 3, fixHistory: [] })).toBeNull();
    expect(estimateRemaining({ iterationCap: null, fixHistory: [iteration(1, 10)] })).toBeNull();
    expect(estimateRemaining({ iterationCap: 1, fixHistory: [iteration(1, 10), iteration(2, 10)] })).toBe(0);
  });
});
