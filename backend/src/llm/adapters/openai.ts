/**
 * OpenAI-compatible Provider Adapter
 *
 * Speaks the Chat Completions API (`/v1/chat/completions`), which DeepSeek,
 * OpenAI and most self-hosted gateways accept.
 */

import { z } from 'zod';
import { ProviderError, type ProviderID, type LLMRequestParams, type LLMResponse, type LLMError, type FinishReason } from '../types';
import type { ProviderAdapter, AdapterRequest } from './types';

const RETRYABLE_STATUSES = [429, 500, 502, 503, 504];

// ---------------------------------------------------------------------------
// Chat Completions wire types (internal)
// ---------------------------------------------------------------------------

const chatCompletionSchema = z.object({
  id: z.string().optional(),
  choices: z
    .array(
      z.object({
        index: z.number().optional(),
        message: z.object({
          role: z.string().optional(),
          content: z.string().nullable().optional(),
        }),
        finish_reason: z.string().nullable().optional(),
      }),
    )
    .optional(),
  usage: z
    .object({
      prompt_tokens: z.number().optional(),
      completion_tokens: z.number().optional(),
      total_tokens: z.number().optional(),
    })
    .optional(),
});

const errorBodySchema = z.object({
  error: z.object({ message: z.string().optional() }).optional(),
});

// ---------------------------------------------------------------------------
// Adapter
// ---------------------------------------------------------------------------

export class OpenAIAdapter implements ProviderAdapter {
  readonly id: ProviderID = 'openai';

  private baseUrl: string;
  private apiKey: string;

  constructor(opts: { baseUrl?: string; apiKey: string }) {
    this.baseUrl = (opts.baseUrl ?? 'https://api.openai.com').replace(/\/+$/, '');
    this.apiKey = opts.apiKey;
  }

  // ---- buildRequest -------------------------------------------------------

  buildRequest(params: LLMRequestParams): AdapterRequest {
    const messages: Array<{ role: string; content: string }> = [];
    if (params.systemPrompt) {
      messages.push({ role: 'system', content: params.systemPrompt });
    }
    for (const message of params.messages) {
      messages.push({ role: message.role, content: message.content });
    }

    const body: Record<string, unknown> = {
      model: params.model,
      messages,
    };
    if (params.maxOutputTokens !== undefined) body.max_tokens = params.maxOutputTokens;
    if (params.temperature !== undefined) body.temperature = params.temperature;

    return {
      url: `${this.baseUrl}/v1/chat/completions`,
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${this.apiKey}`,
      },
      body,
    };
  }

  // ---- parseResponse ------------------------------------------------------

  parseResponse(raw: unknown): LLMResponse {
    const parsed = chatCompletionSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ProviderError('Malformed chat completion response', 'openai', 0, false, raw);
    }

    const choice = parsed.data.choices?.[0];
    const usage = parsed.data.usage;
    const inputTokens = usage?.prompt_tokens ?? 0;
    const outputTokens = usage?.completion_tokens ?? 0;

    return {
      text: choice?.message.content ?? '',
      finishReason: this.mapFinishReason(choice?.finish_reason ?? null),
      usage: {
        inputTokens,
        outputTokens,
        totalTokens: usage?.total_tokens ?? inputTokens + outputTokens,
      },
    };
  }

  // ---- convertError -------------------------------------------------------

  convertError(status: number, body: unknown): LLMError {
    const parsed = errorBodySchema.safeParse(body);
    const message = (parsed.success ? parsed.data.error?.message : undefined) ?? `OpenAI API error (HTTP ${status})`;
    return new ProviderError(message, 'openai', status, RETRYABLE_STATUSES.includes(status), body);
  }

  private mapFinishReason(reason: string | null): FinishReason {
    switch (reason) {
      case 'length':
        return 'max_tokens';
      case 'stop':
      case null:
        return 'stop';
      default:
        return reason === 'content_filter' ? 'error' : 'stop';
    }
  }
}
