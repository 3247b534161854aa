/**
 * Retries of generator requests: which failures are retried, how long the
 * engine waits between attempts, and how a cancelled task stops them.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { LLMClient } from '../client';
import { OpenAIAdapter } from '../adapters/openai';
import type { ProviderAdapter } from '../adapters/types';
import { RetryEngine, classifyFailure, type Sleeper } from '../retry';
import { ProviderError, type ProviderID } from '../types';
import { LlmCodeGenerator } from '../../generation';
import { ExternalServiceError, TaskCancelledError } from '../../errors';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function completion(content: string): Response {
  return new Response(JSON.stringify({ choices: [{ message: { content }, finish_reason: 'stop' }] }), {
    status: 200,
    headers: { 'Content-Type': 'application/json' },
  });
}

function failure(status: number, message: string): Response {
  return new Response(JSON.stringify({ error: { message } }), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function recordingSleeper(delays: number[]): Sleeper {
  return async (ms) => {
    delays.push(ms);
  };
}

function makeGenerator(sleep: Sleeper, maxRetries = 2): LlmCodeGenerator {
  const adapters = new Map<ProviderID, ProviderAdapter>([
    ['openai', new OpenAIAdapter({ baseUrl: 'http://llm.test', apiKey: 'test-secret' })],
  ]);
  const engine = new RetryEngine({ maxRetries, baseDelayMs: 100, maxDelayMs: 300, maxJitterMs: 0 }, sleep);
  return new LlmCodeGenerator(
    { baseURL: 'http://llm.test', apiKey: 'test-secret', model: 'test-model', temperature: 0.3, maxTokens: 100, maxRetries },
    new LLMClient(adapters, engine),
  );
}

afterEach(() => {
  vi.unstubAllGlobals();
});

// ---------------------------------------------------------------------------
// Generator requests
// ---------------------------------------------------------------------------

describe('generator request retries', () => {
  it('retries rate limits and overloads with doubling delays', async () => {
    const delays: number[] = [];
    const fetchMock = vi
      .fn()
      .mockResolvedValueOnce(failure(429, 'slow down'))
      .mockResolvedValueOnce(failure(503, 'overloaded'))
      .mockResolvedValueOnce(completion('class CustomPathfindingAlgorithm {}'));
    vi.stubGlobal('fetch', fetchMock);

    const code = await makeGenerator(recordingSleeper(delays)).generate('breadth-first search');

    expect(code).toBe('class CustomPathfindingAlgorithm {}\n');
    expect(fetchMock).toHaveBeenCalledTimes(3);
    expect(delays).toEqual([100, 200]);
  });

  it('caps the delay between attempts', async () => {
    const delays: number[] = [];
    const fetchMock = vi
      .fn()
      .mockResolvedValueOnce(failure(500, 'down'))
      .mockResolvedValueOnce(failure(500, 'down'))
      .mockResolvedValueOnce(failure(500, 'down'))
      .mockResolvedValueOnce(completion('class CustomPathfindingAlgorithm {}'));
    vi.stubGlobal('fetch', fetchMock);

    await makeGenerator(recordingSleeper(delays), 3).generate('bfs');

    expect(delays).toEqual([100, 200, 300]);
  });

  it('reports a recoverable failure once the retries are used up', async () => {
    const delays: number[] = [];
    const fetchMock = vi.fn().mockImplementation(() => Promise.resolve(failure(503, 'overloaded')));
    vi.stubGlobal('fetch', fetchMock);

    const error = await makeGenerator(recordingSleeper(delays)).generate('bfs').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ExternalServiceError);
    expect(error).toMatchObject({ message: 'Generator request failed: overloaded', recoverable: true, statusCode: 503 });
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it('does not retry a request the provider rejected', async () => {
    const delays: number[] = [];
    const fetchMock = vi.fn().mockResolvedValue(failure(400, 'bad request'));
    vi.stubGlobal('fetch', fetchMock);

    const error = await makeGenerator(recordingSleeper(delays)).generate('bfs').catch((e: unknown) => e);

    expect(error).toMatchObject({ recoverable: false, statusCode: 400 });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(delays).toEqual([]);
  });

  it('retries when no response arrives at all', async () => {
    const fetchMock = vi
      .fn()
      .mockRejectedValueOnce(new TypeError('fetch failed'))
      .mockResolvedValueOnce(completion('class CustomPathfindingAlgorithm {}'));
    vi.stubGlobal('fetch', fetchMock);

    const code = await makeGenerator(recordingSleeper([])).generate('bfs');

    expect(code).toBe('class CustomPathfindingAlgorithm {}\n');
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('stops retrying once the owning task is cancelled', async () => {
    const controller = new AbortController();
    const cancelDuringBackoff: Sleeper = async () => {
      controller.abort(new TaskCancelledError('task-1'));
    };
    const fetchMock = vi.fn().mockImplementation(() => Promise.resolve(failure(503, 'overloaded')));
    vi.stubGlobal('fetch', fetchMock);

    const error = await makeGenerator(cancelDuringBackoff)
      .generate('bfs', undefined, { abortSignal: controller.signal })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TaskCancelledError);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('sends nothing for a task that is already cancelled', async () => {
    const controller = new AbortController();
    controller.abort(new TaskCancelledError('task-2'));
    const fetchMock = vi.fn();
    vi.stubGlobal('fetch', fetchMock);

    await expect(
      makeGenerator(recordingSleeper([])).repair('bfs', 'broken();', [], { abortSignal: controller.signal }),
    ).rejects.toThrow('Task task-2 was cancelled');
    expect(fetchMock).not.toHaveBeenCalled();
  });
});

// ---------------------------------------------------------------------------
// classifyFailure
// ---------------------------------------------------------------------------

describe('classifyFailure', () => {
  it('follows the provider and pipeline retry hints', () => {
    expect(classifyFailure(new ProviderError('busy', 'openai', 503, true))).toBe('retry');
    expect(classifyFailure(new ProviderError('bad key', 'openai', 401, false))).toBe('fail');
    expect(classifyFailure(new ExternalServiceError('flaky', true))).toBe('retry');
    expect(classifyFailure(new ExternalServiceError('misconfigured', false))).toBe('fail');
  });

  it('retries timeouts and failures before any response', () => {
    expect(classifyFailure(new DOMException('timed out', 'TimeoutError'))).toBe('retry');
    expect(classifyFailure(new TypeError('fetch failed'))).toBe('retry');
    expect(classifyFailure(new Error('boom'))).toBe('fail');
  });

  it('treats anything after cancellation as cancelled', () => {
    const controller = new AbortController();
    controller.abort(new TaskCancelledError('task-3'));

    expect(classifyFailure(new TaskCancelledError('task-3'))).toBe('cancelled');
    expect(classifyFailure(new ProviderError('busy', 'openai', 503, true), controller.signal)).toBe('cancelled');
  });
});
