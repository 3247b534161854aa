export { LlmCodeGenerator, type LlmCodeGeneratorOptions } from './llm-code-generator';
export { extractCode, buildGenerationPrompt, buildRepairPrompt, optimizationStrategy } from './prompts';
export type { CodeGenerator, GenerationConstraints, GeneratorCallOptions, RepairCallOptions } from './types';
