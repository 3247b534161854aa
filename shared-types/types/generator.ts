/**
 * Result of a round trip to the configured code generator
 */
export interface GeneratorConnectionCheck {
  connected: boolean;
  model: string;
  latencyMs: number;
  /** Provider error when not connected */
  error?: string;
  /** HTTP status of the failed request, when one came back */
  statusCode?: number;
}
