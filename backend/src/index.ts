/**
 * Backend Module - Unified Export Point
 */

// Application service
export { PathfindingService } from './pipeline';
export type {
  GenerationRequest,
  FixRequest,
  GenerateAndFixRequest,
  GridRun,
  PathfindingServiceDeps,
} from './pipeline';

// Pipeline stages
export { CodeValidator } from './validation';
export { SandboxExecutor, sanitizePoints, isSafePoint, type SandboxOptions } from './sandbox';
export { runFixLoop, runGeneration, runOptimization, decideAfterIteration } from './orchestration/fix-loop';
export type { FixLoopInput, FixLoopOutcome, FixLoopDecision, OptimizationInput, OptimizationOutcome } from './orchestration/fix-loop';
export { LlmCodeGenerator, extractCode } from './generation';
export type { CodeGenerator, GenerationConstraints } from './generation';

// Lifecycle and storage
export { TaskManager } from './tasks';
export type { TaskContext, TaskHandler } from './tasks';
export { AlgorithmRegistry } from './registry';

// LLM layer
export { LLMClient, RetryEngine, OpenAIAdapter } from './llm';

// Transport
export { createApp } from './server';

// Errors
export * from './errors';

// Configuration
export { loadConfig, validateConfig, type Config } from './config';
