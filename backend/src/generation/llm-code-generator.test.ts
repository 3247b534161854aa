import { afterEach, describe, expect, it, vi } from 'vitest';
import type { Finding } from '@pathforge/shared-types';
import { LlmCodeGenerator } from './llm-code-generator';
import { buildRepairPrompt, extractCode } from './prompts';
import { ExternalServiceError } from '../errors';

const options = {
  baseURL: 'http://llm.test',
  apiKey: 'test-secret',
  model: 'test-model',
  temperature: 0.3,
  maxTokens: 100,
  maxRetries: 0,
};

function completion(content: string): Response {
  return new Response(JSON.stringify({ choices: [{ message: { content }, finish_reason: 'stop' }] }), {
    status: 200,
    headers: { 'Content-Type': 'application/json' },
  });
}

const wallFinding: Finding = {
  level: 'ERROR',
  rule: 'wall-check',
  message: 'No explicit wall check on grid cells',
  line: 4,
  suggestion: 'Skip cells where grid[row][col] === WALL before expanding them',
};

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('extractCode', () => {
  it('takes the first fenced block', () => {
    expect(extractCode('Here you go:\n```js\nconst a = 1;\n```\nThanks')).toBe('const a = 1;\n');
  });

  it('returns unfenced replies as they are', () => {
    expect(extractCode('class A {}')).toBe('class A {}\n');
  });

  it('drops an unterminated fence line', () => {
    expect(extractCode('```javascript\nclass A {}')).toBe('class A {}\n');
  });
});

describe('buildRepairPrompt', () => {
  it('lists errors with their line and fix', () => {
    const prompt = buildRepairPrompt('bfs', 'class A {}', [wallFinding], 2);

    expect(prompt).toContain('Repair round 2. Focus on logic errors');
    expect(prompt).toContain(
      '- [ERROR/wall-check] No explicit wall check on grid cells (line 4)\n  Fix: Skip cells where grid[row][col] === WALL before expanding them'
    );
    expect(prompt).toContain('## Warnings (should fix)\nNone');
  });
});

describe('LlmCodeGenerator', () => {
  it('returns the code from a fenced completion', async () => {
    const fetchMock = vi.fn().mockResolvedValue(completion('```javascript\nclass CustomPathfindingAlgorithm {}\n```'));
    vi.stubGlobal('fetch', fetchMock);

    const code = await new LlmCodeGenerator(options).generate('breadth-first search', { gridWidth: 3, gridHeight: 3 });

    expect(code).toBe('class CustomPathfindingAlgorithm {}\n');
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('sends the findings when repairing', async () => {
    const fetchMock = vi.fn().mockResolvedValue(completion('fixed();'));
    vi.stubGlobal('fetch', fetchMock);

    await new LlmCodeGenerator(options).repair('bfs', 'broken();', [wallFinding], { iteration: 1 });

    const init: unknown = fetchMock.mock.calls[0][1];
    const body = init !== null && typeof init === 'object' && 'body' in init && typeof init.body === 'string' ? init.body : '';
    expect(body).toContain('No explicit wall check on grid cells');
    expect(body).toContain('broken();');
  });

  it('maps provider failures to non-recoverable errors when they cannot be retried', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn().mockResolvedValue(new Response(JSON.stringify({ error: { message: 'bad key' } }), { status: 401 }))
    );

    const failure = await new LlmCodeGenerator(options).generate('bfs').catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(ExternalServiceError);
    expect(failure).toMatchObject({
      message: 'Generator request failed: bad key',
      recoverable: false,
      statusCode: 401,
    });
  });

  it('treats network failures as recoverable', async () => {
    vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new TypeError('fetch failed')));

    await expect(new LlmCodeGenerator(options).generate('bfs')).rejects.toMatchObject({
      code: 'EXTERNAL_SERVICE',
      recoverable: true,
    });
  });

  it('sends the strategy and accepted code when optimizing', async () => {
    const fetchMock = vi.fn().mockResolvedValue(completion('tidy();'));
    vi.stubGlobal('fetch', fetchMock);

    const code = await new LlmCodeGenerator(options).optimize('bfs', 'accepted();', 'Name the cell constants.');

    expect(code).toBe('tidy();\n');
    const init: unknown = fetchMock.mock.calls[0][1];
    const body = init !== null && typeof init === 'object' && 'body' in init && typeof init.body === 'string' ? init.body : '';
    expect(body).toContain('Name the cell constants.');
    expect(body).toContain('accepted();');
  });

  it('reports a working connection', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(completion('OK')));

    const check = await new LlmCodeGenerator(options).testConnection();

    expect(check).toMatchObject({ connected: true, model: 'test-model' });
    expect(check.error).toBeUndefined();
  });

  it('reports a refused connection without throwing', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn().mockResolvedValue(new Response(JSON.stringify({ error: { message: 'bad key' } }), { status: 401 }))
    );

    const check = await new LlmCodeGenerator(options).testConnection();

    expect(check).toMatchObject({ connected: false, model: 'test-model', error: 'bad key', statusCode: 401 });
  });

  it('rejects an empty reply', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(completion('   ')));

    await expect(new LlmCodeGenerator(options).generate('bfs')).rejects.toThrow('Model returned no code');
  });
});
