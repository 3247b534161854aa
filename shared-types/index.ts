/**
 * Pathforge - shared contract types
 *
 * Types exchanged between the pipeline and whatever transport or UI sits on top of it
 */

export * from './types/grid';
export * from './types/validation';
export * from './types/execution';
export * from './types/task';
export * from './types/algorithm';
export * from './types/generator';
export * from './constants';

// ============================================================================
// API envelope
// ============================================================================

/**
 * Uniform API response
 */
export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  /** Stable error code for programmatic handling */
  code?: string;
}
