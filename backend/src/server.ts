/**
 * Backend Server - REST API
 *
 * Thin HTTP adapter over PathfindingService:
 * - task submission and lifecycle control
 * - generator connection check
 * - synchronous validation
 * - algorithm registry CRUD and sandboxed execution
 */

import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import { z } from 'zod';
import { CellKind, type ApiResponse, type SaveAcceptance } from '@pathforge/shared-types';
import {
  CandidateExecutionError,
  ConflictError,
  ExecutionTimeoutError,
  ExternalServiceError,
  InvalidStateError,
  NotFoundError,
  ValidationError,
  isPipelineError,
} from './errors';
import { createLogger } from './logging/log';
import type { PathfindingService } from './pipeline';

const log = createLogger('server');

// ============================================================================
// Request schemas
// ============================================================================

const pointSchema = z.tuple([z.number().int(), z.number().int()]);

const gridSchema = z.array(z.array(z.enum(CellKind))).min(1);

const gridRunSchema = z.object({
  grid: gridSchema,
  start: pointSchema,
  end: pointSchema,
});

const constraintsSchema = z
  .object({
    gridWidth: z.number().int().positive(),
    gridHeight: z.number().int().positive(),
    start: pointSchema,
    end: pointSchema,
    allowDiagonal: z.boolean(),
  })
  .partial();

const maxIterationsSchema = z.number().int().min(1).max(50).optional();

const generateSchema = z.object({
  description: z.string().trim().min(1),
  constraints: constraintsSchema.optional(),
});

const fixSchema = z.object({
  description: z.string().trim().min(1),
  code: z.string().min(1),
  maxIterations: maxIterationsSchema,
  optimize: z.boolean().optional(),
});

const generateAndFixSchema = generateSchema.extend({
  maxIterations: maxIterationsSchema,
  optimize: z.boolean().optional(),
  preview: gridRunSchema.optional(),
});

const codeSchema = z.object({
  code: z.string().min(1),
});

const saveAlgorithmSchema = z.object({
  name: z.string().trim().min(1),
  description: z.string().default(''),
  code: z.string().min(1),
  /** Save despite ERROR findings */
  override: z.boolean().default(false),
});

const taskStateSchema = z.enum(['pending', 'running', 'paused', 'completed', 'failed', 'cancelled']);

/** Bulk removal is limited to terminal tasks and must be asked for explicitly */
const clearTasksQuerySchema = z.object({
  finished: z.literal('true'),
});

// ============================================================================
// Helpers
// ============================================================================

type Handler = (req: Request, res: Response) => Promise<void> | void;

/**
 * Forward sync throws and async rejections to the error middleware
 */
function route(handler: Handler) {
  return (req: Request, res: Response, next: NextFunction): void => {
    try {
      void Promise.resolve(handler(req, res)).catch(next);
    } catch (error) {
      next(error);
    }
  };
}

function ok<T>(res: Response, data: T, status = 200): void {
  const body: ApiResponse<T> = { success: true, data };
  res.status(status).json(body);
}

export function statusForError(error: unknown): number {
  if (error instanceof z.ZodError || error instanceof SyntaxError) return 400;
  if (error instanceof NotFoundError) return 404;
  if (error instanceof InvalidStateError || error instanceof ConflictError) return 409;
  if (error instanceof ValidationError || error instanceof CandidateExecutionError) return 422;
  if (error instanceof ExternalServiceError) return 502;
  if (error instanceof ExecutionTimeoutError) return 504;
  return 500;
}

function errorBody(error: unknown): ApiResponse<never> {
  if (error instanceof z.ZodError) {
    const details = error.issues
      .map(issue => `${issue.path.map(String).join('.') || 'body'}: ${issue.message}`)
      .join('; ');
    return { success: false, error: `Invalid request: ${details}`, code: 'BAD_REQUEST' };
  }
  if (error instanceof SyntaxError) {
    return { success: false, error: 'Malformed JSON body', code: 'BAD_REQUEST' };
  }
  if (isPipelineError(error)) {
    return { success: false, error: error.message, code: error.code };
  }
  return { success: false, error: 'Internal server error', code: 'INTERNAL' };
}

// ============================================================================
// App
// ============================================================================

export function createApp(service: PathfindingService): express.Express {
  const app = express();

  app.use(express.json({ limit: '1mb' }));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: Date.now() });
  });

  const api = express.Router();

  // --------------------------------------------------------------------------
  // Tasks
  // --------------------------------------------------------------------------

  api.post('/tasks/generate', route((req, res) => {
    const taskId = service.submitGeneration(generateSchema.parse(req.body));
    ok(res, { taskId }, 202);
  }));

  api.post('/tasks/fix', route((req, res) => {
    const taskId = service.submitFix(fixSchema.parse(req.body));
    ok(res, { taskId }, 202);
  }));

  api.post('/tasks/generate-and-fix', route((req, res) => {
    const taskId = service.submitGenerateAndFix(generateAndFixSchema.parse(req.body));
    ok(res, { taskId }, 202);
  }));

  api.post('/tasks/validate', route((req, res) => {
    const taskId = service.submitValidation(codeSchema.parse(req.body));
    ok(res, { taskId }, 202);
  }));

  api.get('/tasks', route((req, res) => {
    const state = req.query.state === undefined ? undefined : taskStateSchema.parse(req.query.state);
    ok(res, service.listTasks(state));
  }));

  api.delete('/tasks', route((req, res) => {
    clearTasksQuerySchema.parse(req.query);
    ok(res, { removed: service.clearFinished() });
  }));

  api.get('/tasks/:id', route((req, res) => {
    ok(res, service.getTask(req.params.id));
  }));

  api.post('/tasks/:id/pause', route((req, res) => {
    ok(res, service.pauseTask(req.params.id));
  }));

  api.post('/tasks/:id/resume', route((req, res) => {
    ok(res, service.resumeTask(req.params.id));
  }));

  api.post('/tasks/:id/cancel', route((req, res) => {
    ok(res, service.cancelTask(req.params.id));
  }));

  api.delete('/tasks/:id', route((req, res) => {
    service.removeTask(req.params.id);
    res.status(204).end();
  }));

  // --------------------------------------------------------------------------
  // Generator
  // --------------------------------------------------------------------------

  api.post('/generator/test', route(async (_req, res) => {
    ok(res, await service.testGeneratorConnection());
  }));

  // --------------------------------------------------------------------------
  // Validation
  // --------------------------------------------------------------------------

  api.post('/validate', route((req, res) => {
    const { code } = codeSchema.parse(req.body);
    ok(res, service.validate(code));
  }));

  // --------------------------------------------------------------------------
  // Algorithms
  // --------------------------------------------------------------------------

  api.get('/algorithms', route((_req, res) => {
    ok(res, service.listAlgorithms());
  }));

  api.get('/algorithms/:name', route((req, res) => {
    ok(res, service.getAlgorithm(req.params.name));
  }));

  api.post('/algorithms', route(async (req, res) => {
    const body = saveAlgorithmSchema.parse(req.body);
    const saved = await service.saveAlgorithm({
      name: body.name,
      description: body.description,
      code: body.code,
      acceptance: acceptanceFor(service, body.code, body.override),
    });
    ok(res, saved, 201);
  }));

  api.put('/algorithms/:name', route(async (req, res) => {
    const body = saveAlgorithmSchema.parse(req.body);
    const saved = await service.saveAlgorithm({
      name: body.name,
      description: body.description,
      code: body.code,
      acceptance: acceptanceFor(service, body.code, body.override),
      previousName: req.params.name,
    });
    ok(res, saved);
  }));

  api.delete('/algorithms/:name', route(async (req, res) => {
    await service.deleteAlgorithm(req.params.name);
    res.status(204).end();
  }));

  api.post('/algorithms/:name/execute', route(async (req, res) => {
    const { grid, start, end } = gridRunSchema.parse(req.body);
    ok(res, await service.executeAlgorithm(req.params.name, grid, start, end));
  }));

  app.use('/api', api);

  app.use((_req, res) => {
    const body: ApiResponse<never> = { success: false, error: 'Route not found', code: 'NOT_FOUND' };
    res.status(404).json(body);
  });

  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    const status = statusForError(error);
    if (status >= 500 && !(error instanceof ExternalServiceError || error instanceof ExecutionTimeoutError)) {
      log.error('Unhandled request error', { method: req.method, path: req.path, error: String(error) });
    } else {
      log.debug('Request rejected', { method: req.method, path: req.path, status });
    }
    res.status(status).json(errorBody(error));
  });

  return app;
}

function acceptanceFor(service: PathfindingService, code: string, override: boolean): SaveAcceptance {
  return override ? { kind: 'override' } : { kind: 'validated', report: service.validate(code) };
}
