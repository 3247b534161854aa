/**
 * RetryEngine - backoff for generator requests
 *
 * An attempt is retried when the failure says a later attempt may succeed:
 * a provider error flagged retryable, a request that got no HTTP response at
 * all, or a pipeline error marked recoverable. Once the caller's signal has
 * fired (the owning task was cancelled) nothing is retried and the signal's
 * reason is rethrown unchanged.
 */

import { TaskCancelledError, isPipelineError } from '../errors';
import { createLogger } from '../logging/log';
import { ProviderError, type LLMError } from './types';

const log = createLogger('llm-retry');

// ============================================================================
// Policy
// ============================================================================

export interface RetryConfig {
  /** Retries after the first attempt */
  maxRetries: number;
  baseDelayMs: number;
  /** Ceiling for the exponential part of the delay */
  maxDelayMs: number;
  maxJitterMs: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 15_000,
  maxJitterMs: 250,
};

export type RetryVerdict = 'retry' | 'fail' | 'cancelled';

function errorName(error: unknown): string | undefined {
  return error instanceof Error || error instanceof DOMException ? error.name : undefined;
}

/**
 * Decide what a failed attempt means for the request as a whole
 */
export function classifyFailure(error: unknown, signal?: AbortSignal): RetryVerdict {
  if (signal?.aborted || error instanceof TaskCancelledError || errorName(error) === 'AbortError') {
    return 'cancelled';
  }
  if (isPipelineError(error)) return error.recoverable ? 'retry' : 'fail';
  if (error instanceof ProviderError) return error.retryable ? 'retry' : 'fail';
  // per-attempt timeout, or fetch failing before any response arrived
  if (errorName(error) === 'TimeoutError' || error instanceof TypeError) return 'retry';
  return 'fail';
}

/**
 * Delay before retry number `attempt` (0-based):
 * min(maxDelayMs, baseDelayMs * 2^attempt) + random(0, maxJitterMs)
 */
export function backoffDelay(config: RetryConfig, attempt: number, random: () => number = Math.random): number {
  const exponential = Math.min(config.maxDelayMs, config.baseDelayMs * 2 ** attempt);
  return exponential + random() * config.maxJitterMs;
}

/**
 * The failure as an LLMError; anything that never reached the provider gets
 * statusCode 0 and keeps its retry verdict.
 */
export function asLLMError(error: unknown): LLMError {
  if (error instanceof ProviderError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new ProviderError(message, 'openai', 0, classifyFailure(error) === 'retry', error);
}

// ============================================================================
// RetryEngine
// ============================================================================

export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;

function abortReason(signal: AbortSignal): unknown {
  return signal.reason ?? new DOMException('Aborted', 'AbortError');
}

const abortableSleep: Sleeper = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      if (signal) reject(abortReason(signal));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });

export class RetryEngine {
  private config: RetryConfig;

  constructor(
    config?: Partial<RetryConfig>,
    private readonly sleep: Sleeper = abortableSleep,
  ) {
    this.config = { ...DEFAULT_RETRY_CONFIG, ...config };
  }

  /**
   * Run fn once plus at most maxRetries retries. Each attempt gets a signal
   * that follows the caller's.
   */
  async execute<T>(fn: (signal: AbortSignal) => Promise<T>, abortSignal?: AbortSignal): Promise<T> {
    const attemptSignal = abortSignal ?? new AbortController().signal;

    for (let attempt = 0; ; attempt++) {
      if (abortSignal?.aborted) {
        throw abortReason(abortSignal);
      }
      try {
        return await fn(attemptSignal);
      } catch (error: unknown) {
        const verdict = classifyFailure(error, abortSignal);
        if (verdict === 'cancelled') {
          throw abortSignal?.aborted ? abortReason(abortSignal) : error;
        }
        if (verdict === 'fail' || attempt >= this.config.maxRetries) {
          throw asLLMError(error);
        }

        const delayMs = backoffDelay(this.config, attempt);
        log.warn('Generator request failed, retrying', {
          attempt: attempt + 1,
          delayMs: Math.round(delayMs),
          error: error instanceof Error ? error.message : String(error),
        });
        await this.sleep(delayMs, abortSignal);
      }
    }
  }
}
