/**
 * LLM client core types
 *
 * Provider-neutral request/response shapes used by the generator. Only the
 * OpenAI-compatible chat-completions protocol is wired up.
 */

// ============================================================================
// Provider & Request
// ============================================================================

export type ProviderID = 'openai';

export interface LLMRequestParams {
  provider: ProviderID;
  model: string;
  systemPrompt: string;
  messages: LLMMessage[];
  temperature?: number;
  maxOutputTokens?: number;
  abortSignal?: AbortSignal;
}

export interface LLMMessage {
  role: 'user' | 'assistant';
  content: string;
}

// ============================================================================
// Response
// ============================================================================

export interface LLMResponse {
  text: string;
  finishReason: FinishReason;
  usage: TokenUsage;
}

export type FinishReason = 'stop' | 'max_tokens' | 'error';

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

// ============================================================================
// Error
// ============================================================================

export interface LLMError extends Error {
  provider: ProviderID;
  statusCode: number;
  retryable: boolean;
  raw?: unknown;
}

/**
 * Concrete LLMError raised by adapters and the retry engine
 */
export class ProviderError extends Error implements LLMError {
  constructor(
    message: string,
    readonly provider: ProviderID,
    readonly statusCode: number,
    readonly retryable: boolean,
    readonly raw?: unknown,
  ) {
    super(message);
    this.name = 'ProviderError';
  }
}
