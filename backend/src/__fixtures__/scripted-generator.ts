import type { Finding, GeneratorConnectionCheck } from '@pathforge/shared-types';
import type { CodeGenerator, RepairCallOptions } from '../generation';

/**
 * In-process CodeGenerator: returns a fixed candidate from generate(),
 * replays scripted repairs (repeating the last one) and answers optimize()
 * with a fixed rewrite.
 */
export class ScriptedGenerator implements CodeGenerator {
  readonly repairCalls: Array<{ sourceText: string; findings: readonly Finding[]; iteration?: number }> = [];
  readonly optimizeCalls: Array<{ sourceText: string; strategy: string }> = [];
  generateCalls = 0;
  connection: GeneratorConnectionCheck = { connected: true, model: 'scripted', latencyMs: 0 };

  constructor(
    private readonly generated: string | Error,
    private readonly repairs: string[] = [],
    private readonly optimized?: string | Error
  ) {}

  async generate(): Promise<string> {
    this.generateCalls++;
    if (this.generated instanceof Error) throw this.generated;
    return this.generated;
  }

  async repair(_description: string, sourceText: string, findings: readonly Finding[], options?: RepairCallOptions): Promise<string> {
    this.repairCalls.push({ sourceText, findings, iteration: options?.iteration });
    const next = this.repairs[Math.min(this.repairCalls.length, this.repairs.length) - 1];
    if (next === undefined) {
      throw new Error('No scripted repair left');
    }
    return next;
  }

  async optimize(_description: string, sourceText: string, strategy: string): Promise<string> {
    this.optimizeCalls.push({ sourceText, strategy });
    if (this.optimized === undefined) throw new Error('No scripted optimization');
    if (this.optimized instanceof Error) throw this.optimized;
    return this.optimized;
  }

  async testConnection(): Promise<GeneratorConnectionCheck> {
    return this.connection;
  }
}
