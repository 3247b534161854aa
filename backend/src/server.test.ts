import { describe, expect, it } from 'vitest';
import request from 'supertest';
import { createApp } from './server';
import { PathfindingService } from './pipeline';
import { SandboxExecutor } from './sandbox';
import { ScriptedGenerator } from './__fixtures__/scripted-generator';
import { BFS_CANDIDATE, MALFORMED_ENTRY_CANDIDATE, NO_WALL_CHECK_CANDIDATE } from './__fixtures__/candidates';

function setup() {
  const generator = new ScriptedGenerator(BFS_CANDIDATE, [BFS_CANDIDATE]);
  const service = new PathfindingService({
    generator,
    executor: new SandboxExecutor({ timeoutMs: 2000 }),
    fixLoop: { maxIterations: 3, stagnationLimit: 2 },
  });
  return { service, generator, app: createApp(service) };
}

const grid = [
  [0, 1, 0],
  [0, 1, 0],
  [0, 0, 0],
];

describe('REST API', () => {
  it('reports health', async () => {
    const { app } = setup();
    const res = await request(app).get('/health');
    expect(res.status).toBe(200);
    expect(res.body.status).toBe('ok');
  });

  it('validates code synchronously', async () => {
    const { app } = setup();
    const res = await request(app).post('/api/validate').send({ code: BFS_CANDIDATE });

    expect(res.status).toBe(200);
    expect(res.body.success).toBe(true);
    expect(res.body.data).toMatchObject({ isValid: true, score: 100, errorCount: 0 });
  });

  it('rejects malformed bodies with 400', async () => {
    const { app } = setup();
    const res = await request(app).post('/api/validate').send({});

    expect(res.status).toBe(400);
    expect(res.body.success).toBe(false);
    expect(res.body.code).toBe('BAD_REQUEST');
    expect(res.body.error.startsWith('Invalid request: code: ')).toBe(true);
  });

  it('rejects unparseable JSON with 400', async () => {
    const { app } = setup();
    const res = await request(app).post('/api/validate').set('Content-Type', 'application/json').send('{"code":');

    expect(res.status).toBe(400);
    expect(res.body.error).toBe('Malformed JSON body');
  });

  it('runs a fix task and exposes its snapshot', async () => {
    const { app, service } = setup();
    const submitted = await request(app)
      .post('/api/tasks/fix')
      .send({ description: 'bfs', code: MALFORMED_ENTRY_CANDIDATE });

    expect(submitted.status).toBe(202);
    const taskId: string = submitted.body.data.taskId;
    await service.tasks.waitFor(taskId);

    const res = await request(app).get(`/api/tasks/${taskId}`);
    expect(res.status).toBe(200);
    expect(res.body.data).toMatchObject({ id: taskId, kind: 'FIXING', state: 'completed', progress: 100, iterationsDone: 1 });

    const listed = await request(app).get('/api/tasks').query({ state: 'completed' });
    expect(listed.body.data).toHaveLength(1);

    const resumed = await request(app).post(`/api/tasks/${taskId}/resume`);
    expect(resumed.status).toBe(409);
    expect(resumed.body.code).toBe('INVALID_STATE');

    const removed = await request(app).delete(`/api/tasks/${taskId}`);
    expect(removed.status).toBe(204);
  });

  it('clears finished tasks only when asked explicitly', async () => {
    const { app, service } = setup();
    const taskId = service.submitValidation({ code: BFS_CANDIDATE });
    await service.tasks.waitFor(taskId);

    const unqualified = await request(app).delete('/api/tasks');
    expect(unqualified.status).toBe(400);
    expect(service.listTasks()).toHaveLength(1);

    const cleared = await request(app).delete('/api/tasks').query({ finished: 'true' });
    expect(cleared.status).toBe(200);
    expect(cleared.body.data).toEqual({ removed: 1 });

    const listed = await request(app).get('/api/tasks');
    expect(listed.body.data).toEqual([]);
  });

  it('reports the generator connection check', async () => {
    const { app, generator } = setup();

    const connected = await request(app).post('/api/generator/test');
    expect(connected.status).toBe(200);
    expect(connected.body.data).toEqual({ connected: true, model: 'scripted', latencyMs: 0 });

    generator.connection = { connected: false, model: 'scripted', latencyMs: 3, error: 'bad key', statusCode: 401 };
    const refused = await request(app).post('/api/generator/test');
    expect(refused.status).toBe(200);
    expect(refused.body.data).toMatchObject({ connected: false, error: 'bad key', statusCode: 401 });
  });

  it('returns 404 for unknown tasks and routes', async () => {
    const { app } = setup();

    const task = await request(app).get('/api/tasks/does-not-exist');
    expect(task.status).toBe(404);
    expect(task.body.code).toBe('NOT_FOUND');

    const missing = await request(app).get('/api/nowhere');
    expect(missing.status).toBe(404);
    expect(missing.body.error).toBe('Route not found');
  });

  it('rejects an unknown task state filter', async () => {
    const { app } = setup();
    const res = await request(app).get('/api/tasks').query({ state: 'sleeping' });
    expect(res.status).toBe(400);
  });

  it('manages and executes saved algorithms', async () => {
    const { app } = setup();

    const rejected = await request(app)
      .post('/api/algorithms')
      .send({ name: 'loose', code: NO_WALL_CHECK_CANDIDATE });
    expect(rejected.status).toBe(422);
    expect(rejected.body.code).toBe('VALIDATION_FAILED');

    const overridden = await request(app)
      .post('/api/algorithms')
      .send({ name: 'loose', code: NO_WALL_CHECK_CANDIDATE, override: true });
    expect(overridden.status).toBe(201);
    expect(overridden.body.data.acceptedBy).toBe('override');

    const created = await request(app)
      .post('/api/algorithms')
      .send({ name: 'bfs', description: 'breadth first', code: BFS_CANDIDATE });
    expect(created.status).toBe(201);
    expect(created.body.data.acceptedBy).toBe('validation');

    const duplicate = await request(app).post('/api/algorithms').send({ name: 'bfs', code: BFS_CANDIDATE });
    expect(duplicate.status).toBe(409);

    const executed = await request(app)
      .post('/api/algorithms/bfs/execute')
      .send({ grid, start: [0, 0], end: [2, 2] });
    expect(executed.status).toBe(200);
    expect(executed.body.data.found).toBe(true);
    expect(executed.body.data.path).toEqual([[0, 0], [1, 0], [2, 0], [2, 1], [2, 2]]);

    const list = await request(app).get('/api/algorithms');
    expect(list.body.data.map((entry: { name: string }) => entry.name).sort()).toEqual(['bfs', 'loose']);

    const deleted = await request(app).delete('/api/algorithms/loose');
    expect(deleted.status).toBe(204);
    const gone = await request(app).get('/api/algorithms/loose');
    expect(gone.status).toBe(404);
  });

  it('rejects grids with unknown cell values', async () => {
    const { app } = setup();
    const res = await request(app)
      .post('/api/algorithms/bfs/execute')
      .send({ grid: [[0, 7]], start: [0, 0], end: [0, 1] });
    expect(res.status).toBe(400);
  });
});
