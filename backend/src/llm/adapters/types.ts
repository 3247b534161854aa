/**
 * Provider Adapter Interface
 *
 * Adapters translate between the unified LLM types and a provider's HTTP API.
 */

import type { ProviderID, LLMRequestParams, LLMResponse, LLMError } from '../types';

/** HTTP request structure built by an adapter */
export interface AdapterRequest {
  url: string;
  headers: Record<string, string>;
  body: unknown;
}

export interface ProviderAdapter {
  readonly id: ProviderID;

  /** Build the HTTP request (url, headers, body) from unified params */
  buildRequest(params: LLMRequestParams): AdapterRequest;

  /** Parse a JSON response body into a unified LLMResponse */
  parseResponse(raw: unknown): LLMResponse;

  /** Convert an HTTP error response into a unified LLMError */
  convertError(status: number, body: unknown): LLMError;
}
