/**
 * AST helpers for candidate source
 *
 * oxc-parser produces an ESTree-shaped program; these helpers walk it without
 * depending on the parser's exported node types.
 */

import { parseSync } from 'oxc-parser';

export interface AstNode {
  type: string;
  start: number;
  end: number;
  [key: string]: unknown;
}

export interface ParseFailure {
  message: string;
  offset?: number;
}

export interface ParsedCandidate {
  program: AstNode | null;
  errors: ParseFailure[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

export function isAstNode(value: unknown): value is AstNode {
  return (
    isRecord(value) &&
    typeof value.type === 'string' &&
    typeof value.start === 'number' &&
    typeof value.end === 'number'
  );
}

export function isNodeOfType(value: unknown, type: string): value is AstNode {
  return isAstNode(value) && value.type === type;
}

export function childNode(node: AstNode, key: string): AstNode | null {
  const value = node[key];
  return isAstNode(value) ? value : null;
}

export function childNodes(node: AstNode, key: string): AstNode[] {
  const value = node[key];
  return Array.isArray(value) ? value.filter(isAstNode) : [];
}

export function identifierName(node: unknown): string | undefined {
  if (isNodeOfType(node, 'Identifier') && typeof node.name === 'string' && node.name.length > 0) {
    return node.name;
  }
  return undefined;
}

function toParseFailure(error: unknown): ParseFailure {
  if (!isRecord(error)) {
    return { message: String(error) };
  }
  const message = typeof error.message === 'string' ? error.message : JSON.stringify(error);
  const labels = Array.isArray(error.labels) ? error.labels : [];
  const firstLabel: unknown = labels[0];
  const offset = isRecord(firstLabel) && typeof firstLabel.start === 'number' ? firstLabel.start : undefined;
  return { message, offset };
}

export function parseCandidate(sourceText: string): ParsedCandidate {
  try {
    const result = parseSync('candidate.js', sourceText, {
      sourceType: 'unambiguous',
      astType: 'js',
    });
    if (result.errors.length > 0) {
      return { program: null, errors: result.errors.map(toParseFailure) };
    }
    const program: unknown = result.program;
    if (!isAstNode(program)) {
      return { program: null, errors: [{ message: 'Parser returned no program' }] };
    }
    return { program, errors: [] };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return { program: null, errors: [{ message }] };
  }
}

/**
 * Depth-first walk. Returning false from the visitor skips the node's children.
 */
export function walk(
  root: AstNode,
  visit: (node: AstNode, parent: AstNode | null) => boolean | void
): void {
  const stack: Array<{ node: AstNode; parent: AstNode | null }> = [{ node: root, parent: null }];
  while (stack.length > 0) {
    const next = stack.pop();
    if (!next) break;
    const { node, parent } = next;
    if (visit(node, parent) === false) continue;

    const children: AstNode[] = [];
    for (const key of Object.keys(node)) {
      if (key === 'type' || key === 'start' || key === 'end') continue;
      const value = node[key];
      if (Array.isArray(value)) {
        for (const item of value) {
          if (isAstNode(item)) children.push(item);
        }
      } else if (isAstNode(value)) {
        children.push(value);
      }
    }
    // push in reverse so siblings are visited in source order
    for (let i = children.length - 1; i >= 0; i--) {
      stack.push({ node: children[i], parent: node });
    }
  }
}

export function findAll(root: AstNode, predicate: (node: AstNode, parent: AstNode | null) => boolean): AstNode[] {
  const found: AstNode[] = [];
  walk(root, (node, parent) => {
    if (predicate(node, parent)) found.push(node);
  });
  return found;
}

/**
 * 1-based line of a source offset
 */
export function lineAt(sourceText: string, offset: number): number {
  let line = 1;
  const limit = Math.min(offset, sourceText.length);
  for (let i = 0; i < limit; i++) {
    if (sourceText.charCodeAt(i) === 10) line++;
  }
  return line;
}
