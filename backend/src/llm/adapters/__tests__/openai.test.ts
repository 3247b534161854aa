import { describe, it, expect } from 'vitest';
import { OpenAIAdapter } from '../openai';
import { ProviderError } from '../../types';

const adapter = new OpenAIAdapter({ baseUrl: 'http://llm.test/', apiKey: 'test-secret' });

describe('OpenAIAdapter', () => {
  it('builds a chat-completions request with the system prompt first', () => {
    const request = adapter.buildRequest({
      provider: 'openai',
      model: 'test-model',
      systemPrompt: 'system text',
      messages: [{ role: 'user', content: 'describe' }],
      temperature: 0.3,
      maxOutputTokens: 100,
    });

    expect(request).toEqual({
      url: 'http://llm.test/v1/chat/completions',
      headers: { 'Content-Type': 'application/json', Authorization: 'Bearer test-secret' },
      body: {
        model: 'test-model',
        messages: [
          { role: 'system', content: 'system text' },
          { role: 'user', content: 'describe' },
        ],
        max_tokens: 100,
        temperature: 0.3,
      },
    });
  });

  it('maps length-truncated completions to max_tokens', () => {
    const response = adapter.parseResponse({
      choices: [{ message: { content: 'partial' }, finish_reason: 'length' }],
    });

    expect(response).toEqual({
      text: 'partial',
      finishReason: 'max_tokens',
      usage: { inputTokens: 0, outputTokens: 0, totalTokens: 0 },
    });
  });

  it('rejects a body that is not a chat completion', () => {
    expect(() => adapter.parseResponse({ choices: 'nope' })).toThrow(ProviderError);
  });

  it('marks rate limits retryable', () => {
    const error = adapter.convertError(429, { error: { message: 'slow down' } });

    expect(error).toMatchObject({ message: 'slow down', statusCode: 429, retryable: true });
  });

  it('falls back to a generic message', () => {
    expect(adapter.convertError(500, 'oops').message).toBe('OpenAI API error (HTTP 500)');
  });
});
