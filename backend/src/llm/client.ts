/**
 * LLMClient - unified LLM client
 *
 * Provider differences live in ProviderAdapter implementations; the client
 * owns transport, retries (RetryEngine) and cancellation.
 */

import { ProviderError, type ProviderID, type LLMRequestParams, type LLMResponse } from './types';
import type { ProviderAdapter } from './adapters/types';
import { RetryEngine } from './retry';

const DEFAULT_REQUEST_TIMEOUT_MS = 120_000;

export interface LLMClientOptions {
  /** Per-attempt request timeout */
  requestTimeoutMs?: number;
}

export class LLMClient {
  private requestTimeoutMs: number;

  constructor(
    private adapters: Map<ProviderID, ProviderAdapter>,
    private retryEngine: RetryEngine,
    options: LLMClientOptions = {},
  ) {
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
  }

  /**
   * Non-streaming completion.
   *
   * 1. adapter.buildRequest(params) → { url, headers, body }
   * 2. retryEngine.execute() wraps the fetch
   * 3. non-ok response → adapter.convertError(status, body) → throw
   * 4. JSON → adapter.parseResponse(json)
   */
  async complete(params: LLMRequestParams): Promise<LLMResponse> {
    const adapter = this.adapters.get(params.provider);
    if (!adapter) {
      throw new ProviderError(`No adapter registered for provider: ${params.provider}`, params.provider, 0, false);
    }

    const { url, headers, body } = adapter.buildRequest(params);

    return this.retryEngine.execute(async (signal: AbortSignal) => {
      const response = await fetch(url, {
        method: 'POST',
        headers,
        body: JSON.stringify(body),
        signal: AbortSignal.any([signal, AbortSignal.timeout(this.requestTimeoutMs)]),
      });

      if (!response.ok) {
        const errorBody = await response.text().catch(() => '');
        let parsedBody: unknown;
        try {
          parsedBody = JSON.parse(errorBody);
        } catch {
          parsedBody = errorBody;
        }
        throw adapter.convertError(response.status, parsedBody);
      }

      const json: unknown = await response.json();
      return adapter.parseResponse(json);
    }, params.abortSignal);
  }
}
