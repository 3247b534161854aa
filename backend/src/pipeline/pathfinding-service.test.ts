import { describe, expect, it } from 'vitest';
import type { ExecutionResult, Grid } from '@pathforge/shared-types';
import { PathfindingService } from './pathfinding-service';
import { ScriptedGenerator } from '../__fixtures__/scripted-generator';
import {
  BFS_CANDIDATE,
  CELL_LOCAL_CANDIDATE,
  MALFORMED_ENTRY_CANDIDATE,
  NO_WALL_CHECK_CANDIDATE,
} from '../__fixtures__/candidates';
import { ExternalServiceError, NotFoundError } from '../errors';
import { SandboxExecutor } from '../sandbox';

const grid: Grid = [
  [0, 1, 0],
  [0, 1, 0],
  [0, 0, 0],
];

function makeService(generator: ScriptedGenerator, executor = new SandboxExecutor({ timeoutMs: 2000 })): PathfindingService {
  return new PathfindingService({
    generator,
    executor,
    fixLoop: { maxIterations: 3, stagnationLimit: 2 },
  });
}

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

/** Holds every repair until the test releases it */
class GatedRepairGenerator extends ScriptedGenerator {
  readonly repairStarted = deferred();
  readonly releaseRepair = deferred();

  async repair(...args: Parameters<ScriptedGenerator['repair']>): Promise<string> {
    this.repairStarted.resolve();
    await this.releaseRepair.promise;
    return super.repair(...args);
  }
}

/** Exposes each sandbox run so a test can await it independently of the task */
class ObservedExecutor extends SandboxExecutor {
  readonly runStarted = deferred();
  readonly runs: Array<Promise<ExecutionResult>> = [];

  execute(...args: Parameters<SandboxExecutor['execute']>): Promise<ExecutionResult> {
    const run = super.execute(...args);
    this.runs.push(run);
    this.runStarted.resolve();
    return run;
  }
}

describe('PathfindingService', () => {
  it('fixes a candidate as a task and records the iteration', async () => {
    const service = makeService(new ScriptedGenerator(BFS_CANDIDATE, [BFS_CANDIDATE]));

    const id = service.submitFix({ description: 'bfs', code: MALFORMED_ENTRY_CANDIDATE });
    const done = await service.tasks.waitFor(id);

    expect(done.state).toBe('completed');
    expect(done.kind).toBe('FIXING');
    expect(done.result).toMatchObject({ code: BFS_CANDIDATE, iterations: 1, report: { isValid: true } });
    expect(done.fixHistory).toHaveLength(1);
    expect(done.iterationCap).toBe(3);
    expect(done.estimatedRemainingMs).toBe(0);
  });

  it('fails a stagnating fix with the last report', async () => {
    const service = makeService(new ScriptedGenerator(BFS_CANDIDATE, [NO_WALL_CHECK_CANDIDATE]));

    const id = service.submitFix({ description: 'bfs', code: NO_WALL_CHECK_CANDIDATE });
    const done = await service.tasks.waitFor(id);

    expect(done.state).toBe('failed');
    expect(done.error).toMatchObject({ code: 'STAGNATION', recoverable: true, lastReport: { errorCount: 1 } });
    expect(done.fixHistory).toHaveLength(2);
  });

  it('generates, fixes and previews in one task', async () => {
    const generator = new ScriptedGenerator(MALFORMED_ENTRY_CANDIDATE, [BFS_CANDIDATE]);
    const service = makeService(generator);

    const id = service.submitGenerateAndFix({
      description: 'bfs',
      preview: { grid, start: [0, 0], end: [2, 2] },
    });
    const done = await service.tasks.waitFor(id);

    expect(done.state).toBe('completed');
    expect(generator.generateCalls).toBe(1);
    expect(done.result?.iterations).toBe(1);
    expect(done.result?.preview).toMatchObject({
      found: true,
      path: [[0, 0], [1, 0], [2, 0], [2, 1], [2, 2]],
    });
  });

  it('summarizes the fix and keeps a valid optimization', async () => {
    const generator = new ScriptedGenerator(BFS_CANDIDATE, [BFS_CANDIDATE], CELL_LOCAL_CANDIDATE);
    const service = makeService(generator);

    const id = service.submitFix({ description: 'bfs', code: MALFORMED_ENTRY_CANDIDATE, optimize: true });
    const done = await service.tasks.waitFor(id);

    expect(done.state).toBe('completed');
    expect(done.result?.code).toBe(CELL_LOCAL_CANDIDATE);
    expect(done.result?.summary).toMatchObject({ iterations: 1, initialErrors: 1, finalErrors: 0, fixRate: 1 });
    expect(done.result?.optimization).toMatchObject({ verdict: 'applied', scoreBefore: 100, scoreAfter: 100 });
    expect(generator.optimizeCalls[0].sourceText).toBe(BFS_CANDIDATE);
  });

  it('keeps the accepted code when the optimization is invalid', async () => {
    const service = makeService(new ScriptedGenerator(MALFORMED_ENTRY_CANDIDATE, [BFS_CANDIDATE], NO_WALL_CHECK_CANDIDATE));

    const id = service.submitGenerateAndFix({ description: 'bfs', optimize: true });
    const done = await service.tasks.waitFor(id);

    expect(done.state).toBe('completed');
    expect(done.result?.code).toBe(BFS_CANDIDATE);
    expect(done.result?.report.isValid).toBe(true);
    expect(done.result?.optimization).toMatchObject({ verdict: 'invalid', scoreAfter: 90 });
  });

  it('does not optimize unless asked', async () => {
    const generator = new ScriptedGenerator(BFS_CANDIDATE, [BFS_CANDIDATE], CELL_LOCAL_CANDIDATE);
    const service = makeService(generator);

    const done = await service.tasks.waitFor(service.submitFix({ description: 'bfs', code: MALFORMED_ENTRY_CANDIDATE }));

    expect(done.result?.optimization).toBeUndefined();
    expect(generator.optimizeCalls).toEqual([]);
  });

  it('cancels a generate-and-fix task at the boundary after an in-flight repair', async () => {
    const generator = new GatedRepairGenerator(MALFORMED_ENTRY_CANDIDATE, [BFS_CANDIDATE]);
    const service = makeService(generator);

    const id = service.submitGenerateAndFix({ description: 'bfs', preview: { grid, start: [0, 0], end: [2, 2] } });
    await generator.repairStarted.promise;
    expect(service.cancelTask(id)).toMatchObject({ state: 'running', cancelRequested: true });

    generator.releaseRepair.resolve();
    const done = await service.tasks.waitFor(id);

    expect(done.state).toBe('cancelled');
    expect(done.result).toBeUndefined();
    expect(done.fixHistory).toEqual([]);
    expect(generator.repairCalls).toHaveLength(1);
  });

  it('lets a preview run finish on its own when its task is cancelled', async () => {
    const executor = new ObservedExecutor({ timeoutMs: 2000 });
    const service = makeService(new ScriptedGenerator(MALFORMED_ENTRY_CANDIDATE, [BFS_CANDIDATE]), executor);

    const id = service.submitGenerateAndFix({ description: 'bfs', preview: { grid, start: [0, 0], end: [2, 2] } });
    await executor.runStarted.promise;
    service.cancelTask(id);

    const done = await service.tasks.waitFor(id);
    expect(done.state).toBe('cancelled');
    expect(done.result).toBeUndefined();
    await expect(executor.runs[0]).resolves.toMatchObject({ found: true });
  });

  it('surfaces generator failures on the task', async () => {
    const service = makeService(new ScriptedGenerator(new ExternalServiceError('provider down', true, 503)));

    const id = service.submitGeneration({ description: 'bfs' });
    const done = await service.tasks.waitFor(id);

    expect(done.state).toBe('failed');
    expect(done.error).toEqual({ code: 'EXTERNAL_SERVICE', message: 'provider down', recoverable: true });
  });

  it('completes a generation task even when the candidate is invalid', async () => {
    const service = makeService(new ScriptedGenerator(NO_WALL_CHECK_CANDIDATE));

    const id = service.submitGeneration({ description: 'bfs' });
    const done = await service.tasks.waitFor(id);

    expect(done.state).toBe('completed');
    expect(done.result?.report.isValid).toBe(false);
  });

  it('validates as a task and synchronously', async () => {
    const service = makeService(new ScriptedGenerator(BFS_CANDIDATE));

    const id = service.submitValidation({ code: BFS_CANDIDATE });
    const done = await service.tasks.waitFor(id);

    expect(done.result?.report).toEqual(service.validate(BFS_CANDIDATE));
    expect(service.validate(NO_WALL_CHECK_CANDIDATE).isValid).toBe(false);
  });

  it('executes saved algorithms by name', async () => {
    const service = makeService(new ScriptedGenerator(BFS_CANDIDATE));
    await service.saveAlgorithm({
      name: 'bfs',
      description: 'breadth first',
      code: BFS_CANDIDATE,
      acceptance: { kind: 'validated', report: service.validate(BFS_CANDIDATE) },
    });

    const result = await service.executeAlgorithm('bfs', grid, [0, 0], [2, 2]);

    expect(result.found).toBe(true);
    await expect(service.executeAlgorithm('missing', grid, [0, 0], [2, 2])).rejects.toBeInstanceOf(NotFoundError);
  });
});
