/**
 * LLM-backed CodeGenerator
 */

import type { Finding, GeneratorConnectionCheck } from '@pathforge/shared-types';
import { ExternalServiceError, isPipelineError } from '../errors';
import { LLMClient, OpenAIAdapter, RetryEngine, asLLMError, type ProviderAdapter, type ProviderID } from '../llm';
import { createLogger } from '../logging/log';
import {
  GENERATION_SYSTEM_PROMPT,
  OPTIMIZATION_SYSTEM_PROMPT,
  REPAIR_SYSTEM_PROMPT,
  buildGenerationPrompt,
  buildOptimizationPrompt,
  buildRepairPrompt,
  extractCode,
} from './prompts';
import type { CodeGenerator, GenerationConstraints, GeneratorCallOptions, RepairCallOptions } from './types';

const log = createLogger('generator');

export interface LlmCodeGeneratorOptions {
  baseURL: string;
  apiKey: string;
  model: string;
  temperature: number;
  maxTokens: number;
  maxRetries: number;
}

export class LlmCodeGenerator implements CodeGenerator {
  private client: LLMClient;

  constructor(
    private options: LlmCodeGeneratorOptions,
    client?: LLMClient,
  ) {
    this.client =
      client ??
      new LLMClient(
        new Map<ProviderID, ProviderAdapter>([
          ['openai', new OpenAIAdapter({ baseUrl: options.baseURL, apiKey: options.apiKey })],
        ]),
        new RetryEngine({ maxRetries: options.maxRetries }),
      );
  }

  async generate(
    description: string,
    constraints?: GenerationConstraints,
    callOptions: GeneratorCallOptions = {},
  ): Promise<string> {
    log.info('Generating candidate', { model: this.options.model });
    return this.ask(GENERATION_SYSTEM_PROMPT, buildGenerationPrompt(description, constraints), callOptions.abortSignal);
  }

  async repair(
    description: string,
    sourceText: string,
    findings: readonly Finding[],
    callOptions: RepairCallOptions = {},
  ): Promise<string> {
    const iteration = callOptions.iteration ?? 1;
    log.info('Repairing candidate', { iteration, findings: findings.length });
    return this.ask(
      REPAIR_SYSTEM_PROMPT,
      buildRepairPrompt(description, sourceText, findings, iteration),
      callOptions.abortSignal,
    );
  }

  async optimize(
    description: string,
    sourceText: string,
    strategy: string,
    callOptions: GeneratorCallOptions = {},
  ): Promise<string> {
    log.info('Optimizing accepted candidate', { model: this.options.model });
    return this.ask(
      OPTIMIZATION_SYSTEM_PROMPT,
      buildOptimizationPrompt(description, sourceText, strategy),
      callOptions.abortSignal,
    );
  }

  async testConnection(callOptions: GeneratorCallOptions = {}): Promise<GeneratorConnectionCheck> {
    const startedAt = Date.now();
    const model = this.options.model;
    try {
      await this.client.complete({
        provider: 'openai',
        model,
        systemPrompt: 'Reply with the single word OK.',
        messages: [{ role: 'user', content: 'Connection check' }],
        maxOutputTokens: 5,
        abortSignal: callOptions.abortSignal,
      });
      return { connected: true, model, latencyMs: Date.now() - startedAt };
    } catch (error) {
      if (isPipelineError(error) || callOptions.abortSignal?.aborted) throw error;
      const failure = asLLMError(error);
      log.warn('Generator connection check failed', { statusCode: failure.statusCode, message: failure.message });
      return {
        connected: false,
        model,
        latencyMs: Date.now() - startedAt,
        error: failure.message,
        statusCode: failure.statusCode || undefined,
      };
    }
  }

  private async ask(systemPrompt: string, userPrompt: string, abortSignal?: AbortSignal): Promise<string> {
    try {
      const response = await this.client.complete({
        provider: 'openai',
        model: this.options.model,
        systemPrompt,
        messages: [{ role: 'user', content: userPrompt }],
        temperature: this.options.temperature,
        maxOutputTokens: this.options.maxTokens,
        abortSignal,
      });
      const code = extractCode(response.text);
      if (code.trim().length === 0) {
        throw new ExternalServiceError('Model returned no code', true);
      }
      return code;
    } catch (error) {
      // cancellation and our own failures pass through untouched
      if (isPipelineError(error) || abortSignal?.aborted) throw error;
      const failure = asLLMError(error);
      log.error('Generator request failed', { statusCode: failure.statusCode, message: failure.message });
      throw new ExternalServiceError(
        `Generator request failed: ${failure.message}`,
        failure.retryable,
        failure.statusCode || undefined,
      );
    }
  }
}
