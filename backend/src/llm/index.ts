export { LLMClient, type LLMClientOptions } from './client';
export { RetryEngine, asLLMError, type RetryConfig } from './retry';
export { OpenAIAdapter } from './adapters/openai';
export type { ProviderAdapter, AdapterRequest } from './adapters/types';
export { ProviderError } from './types';
export type { ProviderID, LLMRequestParams, LLMMessage, LLMResponse, LLMError, TokenUsage, FinishReason } from './types';
