/**
 * Global Constants
 *
 * Centralized configuration values to avoid magic numbers
 */

// ============================================================================
// Validation
// ============================================================================

export const VALIDATION_PENALTIES = {
  ERROR: 10 as const,
  WARNING: 3 as const,
  SUGGESTION: 1 as const,
} as const;

export const CANDIDATE_CONTRACT = {
  CLASS_NAME: 'CustomPathfindingAlgorithm' as const,
  FIND_PATH: 'findPath' as const,
  VISITED_ORDER: 'getVisitedOrder' as const,
} as const;

// ============================================================================
// Fix loop
// ============================================================================

export const FIX_LOOP_DEFAULTS = {
  MAX_ITERATIONS: 5 as const,
  STAGNATION_LIMIT: 2 as const,
} as const;

// ============================================================================
// Sandbox
// ============================================================================

export const SANDBOX_DEFAULTS = {
  TIMEOUT_MS: 5000 as const,
  MAX_STEPS: 1_000_000 as const,
  MAX_HEAP_MB: 64 as const,
  MAX_DROPPED_FRACTION: 0.1,
} as const;

// ============================================================================
// Tasks
// ============================================================================

export const TASK_DEFAULTS = {
  MAX_CONCURRENT: 4 as const,
  COMPLETED_TTL_MS: 3_600_000 as const, // 1 hour
} as const;
