/**
 * Prompt templates for candidate generation and repair
 */

import { CANDIDATE_CONTRACT, type Finding, type FindingRule, type FixIteration } from '@pathforge/shared-types';
import type { GenerationConstraints } from './types';

const CONTRACT = `class ${CANDIDATE_CONTRACT.CLASS_NAME} {
  constructor(width, height) { /* grid size */ }
  findPath(grid, start, end) { /* returns [[row, col], ...] from start to end, or [] */ }
  getVisitedOrder() { /* returns [[row, col], ...] in exploration order */ }
}`;

export const GENERATION_SYSTEM_PROMPT = `You are an expert in search algorithms writing plain JavaScript.
Write a single script (no import, no export, no require) that defines:

${CONTRACT}

Grid cells are numbers: 0 = empty, 1 = wall, 2 = start, 3 = end. Coordinates are [row, col].
Rules:
- Never step onto a wall: compare grid[row][col] against a WALL = 1 constant before expanding a cell.
- Check bounds against width and height before reading a cell.
- Track visited cells in a Set so every loop terminates.
- Record every explored cell for getVisitedOrder().
- Return [] when no path exists.
Return only the code, without explanations.`;

export const REPAIR_SYSTEM_PROMPT = `You repair JavaScript pathfinding code so that it passes a static validator.
Keep the algorithm's intent (BFS, DFS, A*, Dijkstra, ...) and the contract:

${CONTRACT}

Return the complete corrected script only. If the code is already correct, return it unchanged.`;

const REPAIR_FOCUS = [
  'Focus on syntax and structural errors first so the class and its methods are well-formed.',
  'Focus on logic errors: wall checks, bounds checks and visited-order recording.',
  'Fix the remaining warnings and make every loop provably terminate.',
];
const FINAL_REPAIR_FOCUS = 'Resolve whatever remains and maximise the validation score without changing the algorithm.';

export function buildGenerationPrompt(description: string, constraints: GenerationConstraints = {}): string {
  const lines = [`Algorithm description: ${description.trim()}`];
  if (constraints.gridWidth !== undefined && constraints.gridHeight !== undefined) {
    lines.push(`Grid size: ${constraints.gridWidth}x${constraints.gridHeight} (width x height)`);
  }
  if (constraints.start) lines.push(`Start: [${constraints.start.join(', ')}]`);
  if (constraints.end) lines.push(`End: [${constraints.end.join(', ')}]`);
  if (constraints.allowDiagonal !== undefined) {
    lines.push(constraints.allowDiagonal ? 'Diagonal moves are allowed.' : 'Only the four orthogonal moves are allowed.');
  }
  return lines.join('\n');
}

function formatFinding(finding: Finding): string {
  const where = finding.line !== undefined ? ` (line ${finding.line})` : '';
  return `- [${finding.level}/${finding.rule}] ${finding.message}${where}\n  Fix: ${finding.suggestion}`;
}

export function buildRepairPrompt(
  description: string,
  sourceText: string,
  findings: readonly Finding[],
  iteration = 1,
): string {
  const errors = findings.filter((f) => f.level === 'ERROR');
  const warnings = findings.filter((f) => f.level === 'WARNING');
  const focus = REPAIR_FOCUS[iteration - 1] ?? FINAL_REPAIR_FOCUS;

  return [
    `Algorithm description: ${description.trim()}`,
    '',
    `Repair round ${iteration}. ${focus}`,
    '',
    '## Current code',
    '```javascript',
    sourceText,
    '```',
    '',
    '## Errors (must fix)',
    errors.length > 0 ? errors.map(formatFinding).join('\n') : 'None',
    '',
    '## Warnings (should fix)',
    warnings.length > 0 ? warnings.map(formatFinding).join('\n') : 'None',
  ].join('\n');
}

// ============================================================================
// Optimization
// ============================================================================

export const OPTIMIZATION_SYSTEM_PROMPT = `You improve JavaScript pathfinding code that already passes a static validator.
Behaviour must stay identical: the same path and the same visited order for every grid.
Keep the contract:

${CONTRACT}

Keep every wall check, bounds check and visited-set guard. Return the complete script only.`;

const STRUCTURAL_RULES: ReadonlySet<FindingRule> = new Set<FindingRule>(['syntax', 'structure']);

/**
 * Optimization focus derived from what the fix loop had to repair
 */
export function optimizationStrategy(history: readonly FixIteration[]): string {
  if (history.length === 0) {
    return 'The code was accepted as generated. Focus on documentation, naming and consistent style.';
  }

  let structural = 0;
  let logic = 0;
  for (const iteration of history) {
    for (const finding of iteration.before.findings) {
      if (finding.level !== 'ERROR') continue;
      if (STRUCTURAL_RULES.has(finding.rule)) structural++;
      else logic++;
    }
  }

  const lines = [
    `The code needed ${history.length} repair round(s): ${structural} structural and ${logic} logic error(s) along the way.`,
  ];
  lines.push(
    history.length >= 3
      ? 'The structure is settled. Tighten the data structures, drop redundant work and document the search.'
      : 'Consolidate: make the structure obvious, name the cell constants and document each method.',
  );
  return lines.join('\n');
}

export function buildOptimizationPrompt(description: string, sourceText: string, strategy: string): string {
  return [
    `Algorithm description: ${description.trim()}`,
    '',
    '## Strategy',
    strategy,
    '',
    '## Accepted code',
    '```javascript',
    sourceText,
    '```',
  ].join('\n');
}

/**
 * Pull the code out of a model reply: the first fenced block when there is
 * one, otherwise the whole reply with stray fence lines removed.
 */
export function extractCode(reply: string): string {
  const fenced = /```[\w-]*[ \t]*\r?\n([\s\S]*?)```/.exec(reply);
  const body = fenced ? fenced[1] : reply.replace(/^```[\w-]*[ \t]*$/gm, '');
  return body.replace(/^\s*\n/, '').trimEnd() + '\n';
}
