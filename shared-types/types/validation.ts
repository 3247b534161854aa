/**
 * Validation types for candidate pathfinding source
 */

/**
 * Finding severity. Only ERROR blocks acceptance.
 */
export type FindingLevel = 'ERROR' | 'WARNING' | 'SUGGESTION';

/**
 * Which check produced a finding
 */
export type FindingRule =
  | 'syntax'
  | 'structure'
  | 'grid-usage'
  | 'wall-check'
  | 'bounds-check'
  | 'host-access'
  | 'resource'
  | 'style'
  | 'sanitization';

/**
 * A single validation observation
 */
export interface Finding {
  level: FindingLevel;
  rule: FindingRule;
  message: string;
  /** 1-based source line, when the finding points at a node */
  line?: number;
  /** Remediation hint, forwarded to the repair call */
  suggestion: string;
}

/**
 * Scored, itemized static-analysis result for one source text
 */
export interface ValidationReport {
  /** Weighted composite in [0, 100] */
  score: number;
  /** True iff there are zero ERROR findings */
  isValid: boolean;
  findings: Finding[];
  errorCount: number;
  warningCount: number;
  suggestionCount: number;
}

/**
 * One repair cycle's before/after snapshot
 */
export interface FixIteration {
  /** 1-based, strictly increasing within a task */
  index: number;
  before: ValidationReport;
  after: ValidationReport;
  errorsFixed: number;
  warningsFixed: number;
  scoreDelta: number;
  durationMs: number;
  /** Candidate produced by this repair */
  code: string;
}

/**
 * Before/after view of a whole fix run
 */
export interface FixSummary {
  iterations: number;
  initialErrors: number;
  finalErrors: number;
  initialWarnings: number;
  finalWarnings: number;
  initialScore: number;
  finalScore: number;
  /** Whether the final candidate is valid */
  success: boolean;
  /** Share of the initial ERROR findings no longer present, in [0, 1] */
  fixRate: number;
}

export type OptimizationVerdict = 'applied' | 'invalid' | 'generator-failed';

/**
 * What became of the optional optimization pass over accepted code
 */
export interface OptimizationResult {
  verdict: OptimizationVerdict;
  /** Focus handed to the generator, derived from the fix history */
  strategy: string;
  scoreBefore: number;
  /** Score of the optimized candidate, when one was produced */
  scoreAfter?: number;
  /** Generator failure message */
  message?: string;
}
