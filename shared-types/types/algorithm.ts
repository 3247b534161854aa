import type { ValidationReport } from './validation';

/**
 * A named, persisted candidate accepted by the user
 */
export interface CustomAlgorithm {
  name: string;
  description: string;
  code: string;
  createdAt: string;
  updatedAt: string;
  acceptedBy: 'validation' | 'override';
}

/**
 * Why a candidate may be saved: a passing report, or an explicit user override
 */
export type SaveAcceptance =
  | { kind: 'validated'; report: ValidationReport }
  | { kind: 'override' };

export interface SaveAlgorithmInput {
  name: string;
  description: string;
  code: string;
  acceptance: SaveAcceptance;
  /** Present when editing: the name the entry currently has */
  previousName?: string;
}

export interface AlgorithmSummary {
  name: string;
  description: string;
  createdAt: string;
}
