import type { Finding, GeneratorConnectionCheck, Point } from '@pathforge/shared-types';

/**
 * Hints passed to the model alongside the natural-language description
 */
export interface GenerationConstraints {
  gridWidth?: number;
  gridHeight?: number;
  start?: Point;
  end?: Point;
  allowDiagonal?: boolean;
}

export interface GeneratorCallOptions {
  abortSignal?: AbortSignal;
}

export interface RepairCallOptions extends GeneratorCallOptions {
  /** 1-based fix iteration; later iterations get a different repair focus */
  iteration?: number;
}

/**
 * Source of candidate code. Implementations throw ExternalServiceError on
 * transport or provider failure.
 */
export interface CodeGenerator {
  generate(description: string, constraints?: GenerationConstraints, options?: GeneratorCallOptions): Promise<string>;
  repair(description: string, sourceText: string, findings: readonly Finding[], options?: RepairCallOptions): Promise<string>;
  /** Rewrite accepted code for quality without changing behaviour */
  optimize(description: string, sourceText: string, strategy: string, options?: GeneratorCallOptions): Promise<string>;
  /** Round trip to the backing service; reports failures instead of throwing them */
  testConnection(options?: GeneratorCallOptions): Promise<GeneratorConnectionCheck>;
}
