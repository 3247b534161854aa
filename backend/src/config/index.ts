/**
 * Configuration Management Module
 *
 * Centralized configuration management with environment variable support
 * and validation
 */

import * as dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import {
  FIX_LOOP_DEFAULTS,
  SANDBOX_DEFAULTS,
  TASK_DEFAULTS,
} from '@pathforge/shared-types';

const localEnvPath = path.resolve(process.cwd(), '.env');
if (fs.existsSync(localEnvPath)) {
  dotenv.config({ path: localEnvPath });
}

const configSchema = z.object({
  server: z.object({
    port: z.coerce.number().int().min(0).max(65535),
    host: z.string().min(1),
    env: z.string().min(1),
  }),

  /** OpenAI-compatible chat-completions provider used for generation and repair */
  llm: z.object({
    baseURL: z.string(),
    apiKey: z.string(),
    model: z.string().min(1),
    temperature: z.coerce.number().min(0).max(2),
    maxTokens: z.coerce.number().int().positive(),
    maxRetries: z.coerce.number().int().min(0).max(10),
  }),

  fixLoop: z.object({
    maxIterations: z.coerce.number().int().min(1).max(50),
    /** Consecutive non-improving iterations before giving up; 0 disables */
    stagnationLimit: z.coerce.number().int().min(0),
  }),

  sandbox: z.object({
    timeoutMs: z.coerce.number().int().positive(),
    maxSteps: z.coerce.number().int().positive(),
    maxHeapMb: z.coerce.number().int().min(8),
    maxDroppedFraction: z.coerce.number().min(0).max(1),
  }),

  tasks: z.object({
    maxConcurrent: z.coerce.number().int().positive(),
    completedTtlMs: z.coerce.number().int().positive(),
  }),

  logging: z.object({
    filePath: z.string().optional(),
  }),
});

/**
 * Application Configuration
 */
export type Config = z.infer<typeof configSchema>;

/**
 * Get environment variable or fall back to a default
 */
function getEnvVar(env: NodeJS.ProcessEnv, key: string, defaultValue: string | number): string | number {
  const value = env[key];
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }
  return value.trim();
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const raw = {
    server: {
      port: getEnvVar(env, 'PORT', 3001),
      host: getEnvVar(env, 'HOST', '127.0.0.1'),
      env: getEnvVar(env, 'NODE_ENV', 'development'),
    },

    llm: {
      baseURL: getEnvVar(env, 'LLM_BASE_URL', 'https://api.deepseek.com'),
      apiKey: env.LLM_API_KEY?.trim() ?? '',
      model: getEnvVar(env, 'LLM_MODEL', 'deepseek-chat'),
      temperature: getEnvVar(env, 'LLM_TEMPERATURE', 0.3),
      maxTokens: getEnvVar(env, 'LLM_MAX_TOKENS', 3000),
      maxRetries: getEnvVar(env, 'LLM_MAX_RETRIES', 3),
    },

    fixLoop: {
      maxIterations: getEnvVar(env, 'FIX_MAX_ITERATIONS', FIX_LOOP_DEFAULTS.MAX_ITERATIONS),
      stagnationLimit: getEnvVar(env, 'FIX_STAGNATION_LIMIT', FIX_LOOP_DEFAULTS.STAGNATION_LIMIT),
    },

    sandbox: {
      timeoutMs: getEnvVar(env, 'SANDBOX_TIMEOUT_MS', SANDBOX_DEFAULTS.TIMEOUT_MS),
      maxSteps: getEnvVar(env, 'SANDBOX_MAX_STEPS', SANDBOX_DEFAULTS.MAX_STEPS),
      maxHeapMb: getEnvVar(env, 'SANDBOX_MAX_HEAP_MB', SANDBOX_DEFAULTS.MAX_HEAP_MB),
      maxDroppedFraction: getEnvVar(
        env,
        'SANDBOX_MAX_DROPPED_FRACTION',
        SANDBOX_DEFAULTS.MAX_DROPPED_FRACTION
      ),
    },

    tasks: {
      maxConcurrent: getEnvVar(env, 'TASK_MAX_CONCURRENT', TASK_DEFAULTS.MAX_CONCURRENT),
      completedTtlMs: getEnvVar(env, 'TASK_COMPLETED_TTL_MS', TASK_DEFAULTS.COMPLETED_TTL_MS),
    },

    logging: {
      filePath: env.LOG_FILE_PATH?.trim() || undefined,
    },
  };

  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => `${issue.path.map(String).join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }
  return parsed.data;
}

/**
 * Global configuration instance
 */
export const config: Config = loadConfig();

/**
 * Validate configuration
 */
export function validateConfig(target: Config = config): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (!target.llm.apiKey) {
    errors.push('Missing LLM API key (LLM_API_KEY)');
  }

  if (!target.llm.baseURL) {
    errors.push('Missing LLM base URL. Please set LLM_BASE_URL in .env file.');
  } else if (!/^https?:\/\//i.test(target.llm.baseURL)) {
    errors.push(`LLM_BASE_URL must be an http(s) URL, got: ${target.llm.baseURL}`);
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Print configuration (for debugging)
 */
export function printConfig(target: Config = config): void {
  console.log('\n=== Pathforge Configuration ===\n');

  console.log('Server:');
  console.log(`  Address: ${target.server.host}:${target.server.port}`);
  console.log(`  Environment: ${target.server.env}\n`);

  console.log('LLM:');
  console.log(`  Base URL: ${target.llm.baseURL}`);
  console.log(`  Model: ${target.llm.model}`);
  console.log(`  API Key: ${target.llm.apiKey ? '[OK] Configured' : '[MISSING] Not configured'}\n`);

  console.log('Fix Loop:');
  console.log(`  Max Iterations: ${target.fixLoop.maxIterations}`);
  console.log(`  Stagnation Limit: ${target.fixLoop.stagnationLimit}\n`);

  console.log('Sandbox:');
  console.log(`  Timeout: ${target.sandbox.timeoutMs}ms`);
  console.log(`  Step Budget: ${target.sandbox.maxSteps}`);
  console.log(`  Heap Limit: ${target.sandbox.maxHeapMb}MB\n`);

  console.log('Tasks:');
  console.log(`  Max Concurrent: ${target.tasks.maxConcurrent}`);
  console.log(`  Completed TTL: ${target.tasks.completedTtlMs}ms`);

  console.log('\n===============================\n');
}

export default config;
