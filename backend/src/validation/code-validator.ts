/**
 * Code Validator - static analysis of generated pathfinding candidates
 *
 * Parses the candidate with oxc-parser and inspects the AST. The candidate is
 * never executed here, and malformed input becomes findings rather than
 * exceptions.
 */

import {
  CANDIDATE_CONTRACT,
  VALIDATION_PENALTIES,
  type Finding,
  type FindingLevel,
  type FindingRule,
  type ValidationReport,
} from '@pathforge/shared-types';
import {
  childNode,
  childNodes,
  findAll,
  identifierName,
  isAstNode,
  isNodeOfType,
  lineAt,
  parseCandidate,
  walk,
  type AstNode,
} from './ast';
import { analyzeExpansion, paramNames } from './expansion';

const MODULE_DECLARATIONS = new Set([
  'ImportDeclaration',
  'ExportNamedDeclaration',
  'ExportDefaultDeclaration',
  'ExportAllDeclaration',
]);

const HOST_GLOBALS = new Set(['require', 'process', 'globalThis', 'eval', 'Function', 'module', 'global']);

const EQUALITY_OPERATORS = new Set(['===', '!==', '==', '!=']);

const VISITED_NAME = /^(visited|seen|closed|explored)(set|map|nodes|cells)?$/i;
const ITERATION_CAP_NAME = /^(max[_a-z]+|iterations?|steps?|limit|budget)$/i;

const LEVEL_ORDER: Record<FindingLevel, number> = { ERROR: 0, WARNING: 1, SUGGESTION: 2 };

interface ClassShape {
  node: AstNode;
  body: AstNode;
  methods: Map<string, AstNode>;
}

export namespace CodeValidator {
  /**
   * Validate candidate source and produce a scored report
   */
  export function validate(sourceText: string): ValidationReport {
    const findings: Finding[] = [];
    const report = (level: FindingLevel, rule: FindingRule, message: string, suggestion: string, node?: AstNode | number) => {
      const offset = typeof node === 'number' ? node : node?.start;
      findings.push({
        level,
        rule,
        message,
        suggestion,
        line: offset === undefined ? undefined : lineAt(sourceText, offset),
      });
    };

    const parsed = parseCandidate(sourceText);
    if (!parsed.program) {
      for (const failure of parsed.errors) {
        report('ERROR', 'syntax', `Syntax error: ${failure.message}`, 'Fix the syntax so the source parses as a script', failure.offset);
      }
      return buildReport(findings);
    }

    const program = parsed.program;

    for (const statement of childNodes(program, 'body')) {
      if (MODULE_DECLARATIONS.has(statement.type)) {
        report('ERROR', 'structure', 'Module import/export syntax is not allowed', 'Define the class as a plain script without import or export', statement);
      }
    }

    const shape = findCandidateClass(program);
    if (!shape) {
      report(
        'ERROR',
        'structure',
        `Class ${CANDIDATE_CONTRACT.CLASS_NAME} is not defined`,
        `Define "class ${CANDIDATE_CONTRACT.CLASS_NAME} { constructor(width, height) {...} findPath(grid, start, end) {...} getVisitedOrder() {...} }"`
      );
    } else {
      checkStructure(shape, report);
      checkLogic(shape, report);
      checkResources(shape, report);
    }

    checkHostAccess(program, report);
    checkStyle(sourceText, program, report);

    return buildReport(findings);
  }

  // ============================================================================
  // Scoring
  // ============================================================================

  export function score(findings: readonly Finding[]): number {
    const penalty = findings.reduce((sum, finding) => sum + VALIDATION_PENALTIES[finding.level], 0);
    return Math.max(0, 100 - penalty);
  }

  function buildReport(findings: Finding[]): ValidationReport {
    const ordered = findings
      .map((finding, position) => ({ finding, position }))
      .sort((a, b) => LEVEL_ORDER[a.finding.level] - LEVEL_ORDER[b.finding.level] || a.position - b.position)
      .map(({ finding }) => finding);

    const errorCount = ordered.filter((f) => f.level === 'ERROR').length;
    return {
      score: score(ordered),
      isValid: errorCount === 0,
      findings: ordered,
      errorCount,
      warningCount: ordered.filter((f) => f.level === 'WARNING').length,
      suggestionCount: ordered.filter((f) => f.level === 'SUGGESTION').length,
    };
  }
}

type Reporter = (level: FindingLevel, rule: FindingRule, message: string, suggestion: string, node?: AstNode | number) => void;

// ============================================================================
// Structure
// ============================================================================

function findCandidateClass(program: AstNode): ClassShape | null {
  const classNode = findAll(program, (node) => {
    if (node.type === 'ClassDeclaration' || node.type === 'ClassExpression') {
      return identifierName(node.id) === CANDIDATE_CONTRACT.CLASS_NAME;
    }
    return false;
  })[0] ?? findAll(program, (node) =>
    node.type === 'VariableDeclarator' &&
    identifierName(node.id) === CANDIDATE_CONTRACT.CLASS_NAME &&
    isNodeOfType(node.init, 'ClassExpression')
  ).map((declarator) => childNode(declarator, 'init'))[0];

  if (!classNode) return null;
  const body = childNode(classNode, 'body');
  if (!body) return null;

  const methods = new Map<string, AstNode>();
  for (const member of childNodes(body, 'body')) {
    if (member.type !== 'MethodDefinition' || member.computed === true) continue;
    const name = member.kind === 'constructor' ? 'constructor' : identifierName(member.key);
    const fn = childNode(member, 'value');
    if (name && fn && !methods.has(name)) {
      methods.set(name, fn);
    }
  }
  return { node: classNode, body, methods };
}

function hasValueReturn(fn: AstNode): boolean {
  const body = childNode(fn, 'body');
  if (!body) return false;
  // arrow functions with an expression body return it
  if (fn.type === 'ArrowFunctionExpression' && body.type !== 'BlockStatement') return true;
  return findAll(body, (node) => node.type === 'ReturnStatement' && isAstNode(node.argument)).length > 0;
}

function checkStructure(shape: ClassShape, report: Reporter): void {
  const findPath = shape.methods.get(CANDIDATE_CONTRACT.FIND_PATH);
  if (!findPath) {
    report('ERROR', 'structure', `Method ${CANDIDATE_CONTRACT.FIND_PATH} is missing`, 'Add findPath(grid, start, end) returning an array of [row, col] points', shape.node);
  } else {
    const params = paramNames(findPath);
    if (params.length !== 3 || params.some((name) => name === undefined)) {
      report(
        'ERROR',
        'structure',
        `${CANDIDATE_CONTRACT.FIND_PATH} must take exactly (grid, start, end), found ${params.length} parameter(s)`,
        'Declare findPath(grid, start, end)',
        findPath
      );
    }
  }

  const visitedOrder = shape.methods.get(CANDIDATE_CONTRACT.VISITED_ORDER);
  if (!visitedOrder) {
    report('ERROR', 'structure', `Method ${CANDIDATE_CONTRACT.VISITED_ORDER} is missing`, 'Add getVisitedOrder() returning the cells in the order they were explored', shape.node);
  } else {
    if (childNodes(visitedOrder, 'params').length > 0) {
      report('ERROR', 'structure', `${CANDIDATE_CONTRACT.VISITED_ORDER} must not take parameters`, 'Declare getVisitedOrder() with no parameters', visitedOrder);
    }
    if (!hasValueReturn(visitedOrder)) {
      report('ERROR', 'structure', `${CANDIDATE_CONTRACT.VISITED_ORDER} does not return a value`, 'Return the array of visited [row, col] points', visitedOrder);
    }
  }

  const ctor = shape.methods.get('constructor');
  if (ctor && childNodes(ctor, 'params').length > 2) {
    report('ERROR', 'structure', 'Constructor takes more than (width, height)', 'Declare constructor(width, height)', ctor);
  }
}

// ============================================================================
// Logic and safety
// ============================================================================

function isCellAccess(node: unknown): boolean {
  return isNodeOfType(node, 'MemberExpression') && node.computed === true && isNodeOfType(node.object, 'MemberExpression') && node.object.computed === true;
}

function isNumericLiteral(node: unknown): boolean {
  return isNodeOfType(node, 'Literal') && typeof node.value === 'number';
}

function checkLogic(shape: ClassShape, report: Reporter): void {
  const findPath = shape.methods.get(CANDIDATE_CONTRACT.FIND_PATH);
  if (!findPath) return;

  const gridName = paramNames(findPath)[0];
  const body = childNode(findPath, 'body');
  const usesGrid =
    gridName !== undefined &&
    body !== null &&
    findAll(body, (node) => identifierName(node) === gridName).length > 0;
  if (!usesGrid) {
    report('ERROR', 'grid-usage', 'findPath never reads its grid parameter', 'Consult the grid to decide which cells are walkable', findPath);
  }

  // guards only count when they protect the cells findPath expands
  const guards = analyzeExpansion(shape.methods, findPath);
  if (!guards.wall) {
    report(
      'ERROR',
      'wall-check',
      'No wall check on neighbour cells before they are expanded',
      'Skip a neighbour when grid[row][col] === WALL before adding it to the frontier',
      findPath
    );
  }
  if (!guards.bounds) {
    report(
      'ERROR',
      'bounds-check',
      'No boundary check on neighbour coordinates against the grid dimensions',
      'Skip a neighbour unless 0 <= row < height and 0 <= col < width',
      findPath
    );
  }
}

function checkHostAccess(program: AstNode, report: Reporter): void {
  const seen = new Set<string>();
  walk(program, (node, parent) => {
    if (node.type === 'ImportExpression') {
      if (!seen.has('import()')) {
        seen.add('import()');
        report('ERROR', 'host-access', 'Dynamic import() is not allowed', 'Remove the dynamic import; candidates cannot load modules', node);
      }
      return undefined;
    }
    const name = identifierName(node);
    if (!name || !HOST_GLOBALS.has(name) || seen.has(name)) return undefined;
    if (parent && isPropertyKey(node, parent)) return undefined;
    seen.add(name);
    report('ERROR', 'host-access', `Reference to host global "${name}" is not allowed`, `Remove the use of ${name}; candidates run without host access`, node);
    return undefined;
  });
}

function isPropertyKey(node: AstNode, parent: AstNode): boolean {
  if (parent.type === 'MemberExpression') {
    return parent.property === node && parent.computed !== true;
  }
  if (parent.type === 'Property' || parent.type === 'MethodDefinition' || parent.type === 'PropertyDefinition') {
    return parent.key === node && parent.computed !== true;
  }
  return false;
}

// ============================================================================
// Resource discipline
// ============================================================================

function isConstantTrue(node: unknown): boolean {
  if (!isAstNode(node)) return true;
  return isNodeOfType(node, 'Literal') && (node.value === true || node.value === 1);
}

function hasExit(loop: AstNode): boolean {
  const body = childNode(loop, 'body');
  if (!body) return false;
  return findAll(body, (node) => node.type === 'BreakStatement' || node.type === 'ReturnStatement' || node.type === 'ThrowStatement').length > 0;
}

function checkResources(shape: ClassShape, report: Reporter): void {
  const loops = findAll(shape.body, (node) =>
    node.type === 'WhileStatement' || node.type === 'DoWhileStatement' || node.type === 'ForStatement'
  );
  const unbounded = loops.filter((loop) => loop.type !== 'ForStatement' || isConstantTrue(loop.test));

  if (unbounded.length > 0) {
    const names = findAll(shape.body, (node) => identifierName(node) !== undefined).map((node) => identifierName(node) ?? '');
    const keepsVisited =
      names.some((name) => VISITED_NAME.test(name)) ||
      findAll(shape.body, (node) => node.type === 'NewExpression' && ['Set', 'Map'].includes(identifierName(node.callee) ?? '')).length > 0;
    const capsIterations = names.some((name) => ITERATION_CAP_NAME.test(name));

    if (!keepsVisited && !capsIterations) {
      report(
        'WARNING',
        'resource',
        'Search loop has neither a visited set nor an iteration cap',
        'Track visited cells in a Set or bound the loop with a maximum iteration count',
        unbounded[0]
      );
    }
  }

  for (const loop of loops) {
    if (isConstantTrue(loop.test) && !hasExit(loop)) {
      report('WARNING', 'resource', 'Loop never terminates: constant condition without break or return', 'Add a termination condition or a break', loop);
    }
  }

  const findPath = shape.methods.get(CANDIDATE_CONTRACT.FIND_PATH);
  const body = findPath ? childNode(findPath, 'body') : null;
  if (findPath && body) {
    const returnsEmpty = findAll(body, (node) => {
      if (node.type !== 'ReturnStatement') return false;
      const argument = node.argument;
      return (isNodeOfType(argument, 'ArrayExpression') && childNodes(argument, 'elements').length === 0) ||
        (isNodeOfType(argument, 'Literal') && argument.value === null);
    });
    if (returnsEmpty.length === 0) {
      report('WARNING', 'resource', 'findPath has no explicit "no path" return', 'Return [] when the end cell is unreachable', findPath);
    }
  }
}

// ============================================================================
// Style
// ============================================================================

function checkStyle(sourceText: string, program: AstNode, report: Reporter): void {
  if (!/\/\*\*[\s\S]*?\*\//.test(sourceText)) {
    report('SUGGESTION', 'style', 'No JSDoc comments', 'Document the class and its methods with /** ... */ blocks');
  }

  const magic = findAll(program, (node) => {
    if (node.type !== 'BinaryExpression' || typeof node.operator !== 'string' || !EQUALITY_OPERATORS.has(node.operator)) {
      return false;
    }
    return (isCellAccess(node.left) && isNumericLiteral(node.right)) || (isCellAccess(node.right) && isNumericLiteral(node.left));
  });
  if (magic.length > 0) {
    report('SUGGESTION', 'style', 'Grid cells compared against bare numbers', 'Name the cell kinds, e.g. const WALL = 1', magic[0]);
  }

  const varDeclarations = findAll(program, (node) => node.type === 'VariableDeclaration' && node.kind === 'var');
  if (varDeclarations.length > 0) {
    report('SUGGESTION', 'style', '"var" declarations', 'Use const or let', varDeclarations[0]);
  }

  const consoleCalls = findAll(program, (node) => node.type === 'MemberExpression' && identifierName(node.object) === 'console');
  if (consoleCalls.length > 0) {
    report('SUGGESTION', 'style', 'console output left in the candidate', 'Remove console calls; output is discarded in the sandbox', consoleCalls[0]);
  }
}
