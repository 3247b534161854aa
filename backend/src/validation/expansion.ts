/**
 * Neighbour-expansion analysis
 *
 * Finds the guards a search applies to the cells it is about to expand: a
 * non-wall test on the neighbour cell and a comparison of the neighbour's
 * coordinates against the grid dimensions. A guard only counts when it sits
 * in a loop of findPath (or of a method or local function findPath calls)
 * and either skips the neighbour or admits it into the frontier.
 */

import {
  childNode,
  childNodes,
  findAll,
  identifierName,
  isAstNode,
  isNodeOfType,
  walk,
  type AstNode,
} from './ast';

const LOOP_TYPES = new Set(['ForStatement', 'ForOfStatement', 'ForInStatement', 'WhileStatement', 'DoWhileStatement']);
const FUNCTION_TYPES = new Set(['FunctionDeclaration', 'FunctionExpression', 'ArrowFunctionExpression']);
const ITERATING_CALLBACKS = new Set(['forEach', 'filter', 'map', 'flatMap', 'some', 'every', 'find', 'reduce']);
const FILTERING_CALLBACKS = new Set(['filter', 'some', 'every', 'find']);
const INSERT_METHODS = new Set(['push', 'unshift', 'add', 'enqueue', 'insert', 'set', 'splice']);
const SKIP_STATEMENTS = new Set(['ContinueStatement', 'BreakStatement', 'ReturnStatement']);

const EQUALITY_OPERATORS = new Set(['===', '!==', '==', '!=']);
const RELATIONAL_OPERATORS = new Set(['<', '<=', '>', '>=']);
const OFFSET_OPERATORS = new Set(['+', '-']);

const WALL_NAME = /^(wall|obstacle)$/i;
const DIMENSION_NAME = /^(width|height|rows|cols|columns|num_?rows|num_?cols|row_?count|col_?count)$/i;

export interface ExpansionGuards {
  /** A neighbour cell is compared against the wall marker */
  wall: boolean;
  /** A neighbour coordinate is compared against a grid dimension */
  bounds: boolean;
}

type GuardKind = keyof ExpansionGuards;

function isWallMarker(node: unknown): boolean {
  if (isNodeOfType(node, 'Literal')) {
    return node.value === 1 || (typeof node.value === 'string' && WALL_NAME.test(node.value));
  }
  const name = identifierName(node);
  if (name) return WALL_NAME.test(name);
  if (isNodeOfType(node, 'MemberExpression') && node.computed !== true) {
    const property = identifierName(node.property);
    return property !== undefined && WALL_NAME.test(property);
  }
  return false;
}

export function paramNames(fn: AstNode): Array<string | undefined> {
  return childNodes(fn, 'params').map((param) =>
    param.type === 'AssignmentPattern' ? identifierName(param.left) : identifierName(param)
  );
}

/**
 * Names bound by a declaration target, including destructuring patterns
 */
function patternNames(pattern: unknown): string[] {
  const name = identifierName(pattern);
  if (name) return [name];
  if (!isAstNode(pattern)) return [];
  switch (pattern.type) {
    case 'ArrayPattern':
      return childNodes(pattern, 'elements').flatMap(patternNames);
    case 'ObjectPattern':
      return childNodes(pattern, 'properties').flatMap((property) =>
        property.type === 'RestElement' ? patternNames(property.argument) : patternNames(property.value)
      );
    case 'AssignmentPattern':
      return patternNames(pattern.left);
    case 'RestElement':
      return patternNames(pattern.argument);
    default:
      return [];
  }
}

function isFunction(node: unknown): node is AstNode {
  return isAstNode(node) && FUNCTION_TYPES.has(node.type);
}

function unwrap(node: unknown): unknown {
  let current = node;
  while (isNodeOfType(current, 'ChainExpression') || isNodeOfType(current, 'ParenthesizedExpression')) {
    current = current.expression;
  }
  return current;
}

function calleeMethodName(call: AstNode): string | undefined {
  const callee = unwrap(call.callee);
  if (isNodeOfType(callee, 'MemberExpression') && callee.computed !== true) {
    return identifierName(callee.property);
  }
  return undefined;
}

function isThisMember(node: unknown): node is AstNode {
  return isNodeOfType(node, 'MemberExpression') && node.computed !== true && isNodeOfType(node.object, 'ThisExpression');
}

function containsOffset(node: AstNode): boolean {
  return findAll(node, (child) =>
    child.type === 'BinaryExpression' && typeof child.operator === 'string' && OFFSET_OPERATORS.has(child.operator)
  ).length > 0;
}

function referencesAny(node: AstNode, names: ReadonlySet<string>): boolean {
  return findAll(node, (child) => {
    const name = identifierName(child);
    return name !== undefined && names.has(name);
  }).length > 0;
}

/**
 * Expressions a function hands back: an arrow's expression body or its return arguments
 */
function returnedExpressions(fn: AstNode): AstNode[] {
  const body = childNode(fn, 'body');
  if (!body) return [];
  if (body.type !== 'BlockStatement') return [body];
  return findAll(body, (node) => node.type === 'ReturnStatement')
    .map((statement) => childNode(statement, 'argument'))
    .filter((argument): argument is AstNode => argument !== null);
}

// ============================================================================
// Analysis
// ============================================================================

class ExpansionAnalysis {
  private readonly searchFunctions: AstNode[];
  private readonly gridNames = new Set<string>(['grid']);
  private readonly dimensionAliases = new Set<string>();
  private readonly coordinates = new Set<string>();
  private readonly cellAliases = new Set<string>();
  private readonly localFunctions = new Map<string, AstNode>();
  private readonly predicates: Record<GuardKind, Set<AstNode>> = { wall: new Set(), bounds: new Set() };

  constructor(
    private readonly methods: ReadonlyMap<string, AstNode>,
    findPath: AstNode
  ) {
    const gridParam = paramNames(findPath)[0];
    if (gridParam) this.gridNames.add(gridParam);
    this.searchFunctions = this.reachableMethods(findPath);

    this.collectDimensionAliases();
    this.collectLocalFunctions();
    this.collectCoordinates();
    this.collectCellAliases();
    this.collectPredicates('wall');
    this.collectPredicates('bounds');
  }

  run(): ExpansionGuards {
    const guards = this.searchFunctions.flatMap((fn) => this.guardExpressions(fn));
    return {
      wall: guards.some((expression) => this.hasAtom('wall', expression, this.coordinates)),
      bounds: guards.some((expression) => this.hasAtom('bounds', expression, this.coordinates)),
    };
  }

  // --------------------------------------------------------------------------
  // Scope
  // --------------------------------------------------------------------------

  /**
   * findPath plus every method it reaches through this.method(...) calls
   */
  private reachableMethods(findPath: AstNode): AstNode[] {
    const reached: AstNode[] = [findPath];
    for (let index = 0; index < reached.length; index++) {
      const calls = findAll(reached[index], (node) => node.type === 'CallExpression' && isThisMember(unwrap(node.callee)));
      for (const call of calls) {
        const name = calleeMethodName(call);
        const method = name === undefined ? undefined : this.methods.get(name);
        if (method && !reached.includes(method)) reached.push(method);
      }
    }
    return reached;
  }

  private collectLocalFunctions(): void {
    for (const fn of this.searchFunctions) {
      walk(fn, (node) => {
        if (node.type === 'FunctionDeclaration') {
          const name = identifierName(node.id);
          if (name) this.localFunctions.set(name, node);
        } else if (node.type === 'VariableDeclarator' && isFunction(node.init)) {
          const name = identifierName(node.id);
          if (name) this.localFunctions.set(name, node.init);
        }
      });
    }
  }

  private resolveCallee(call: AstNode): AstNode | undefined {
    const callee = unwrap(call.callee);
    const local = identifierName(callee);
    if (local) return this.localFunctions.get(local);
    if (isThisMember(callee)) {
      const name = identifierName(callee.property);
      return name === undefined ? undefined : this.methods.get(name);
    }
    return undefined;
  }

  // --------------------------------------------------------------------------
  // Names
  // --------------------------------------------------------------------------

  private isGridExpression(node: unknown): boolean {
    const target = unwrap(node);
    const name = identifierName(target);
    if (name) return this.gridNames.has(name);
    if (isThisMember(target)) {
      const property = identifierName(target.property);
      return property !== undefined && this.gridNames.has(property);
    }
    // grid[row] for grid[row].length
    return isNodeOfType(target, 'MemberExpression') && target.computed === true && this.isGridExpression(target.object);
  }

  private isDimension(node: AstNode): boolean {
    let matched = false;
    walk(node, (child) => {
      if (matched) return false;
      if (child.type === 'MemberExpression' && child.computed !== true) {
        if (identifierName(child.property) === 'length') {
          matched = this.isGridExpression(child.object);
          return false;
        }
      }
      const name = identifierName(child);
      if (name && (DIMENSION_NAME.test(name) || this.dimensionAliases.has(name))) {
        matched = true;
      }
      return undefined;
    });
    return matched;
  }

  /**
   * Locals and fields holding a grid dimension, e.g. `const n = grid.length`
   */
  private collectDimensionAliases(): void {
    const scopes = [...this.methods.values()];
    for (let pass = 0; pass < 2; pass++) {
      for (const fn of scopes) {
        walk(fn, (node) => {
          if (node.type === 'VariableDeclarator' && isAstNode(node.init) && this.isDimension(node.init)) {
            for (const name of patternNames(node.id)) this.dimensionAliases.add(name);
          } else if (node.type === 'AssignmentExpression' && isAstNode(node.right) && this.isDimension(node.right)) {
            const target = isThisMember(node.left) ? identifierName(node.left.property) : identifierName(node.left);
            if (target) this.dimensionAliases.add(target);
          }
        });
      }
    }
  }

  private isCoordinateExpression(node: AstNode, coordinates: ReadonlySet<string>): boolean {
    return referencesAny(node, coordinates) || containsOffset(node);
  }

  /**
   * Names that hold a neighbour coordinate: values computed with an offset,
   * loop and callback variables, and copies of either
   */
  private collectCoordinates(): void {
    const add = (names: string[]): boolean => {
      let grew = false;
      for (const name of names) {
        if (!this.coordinates.has(name)) {
          this.coordinates.add(name);
          grew = true;
        }
      }
      return grew;
    };

    let grew = true;
    while (grew) {
      grew = false;
      for (const fn of this.searchFunctions) {
        walk(fn, (node, parent) => {
          if (node.type === 'VariableDeclarator') {
            const init = unwrap(node.init);
            if (isAstNode(init) && !isFunction(init) && !this.isDimension(init) && this.isCoordinateExpression(init, this.coordinates)) {
              grew = add(patternNames(node.id)) || grew;
            }
          } else if (node.type === 'AssignmentExpression' && isAstNode(node.right)) {
            const operatorOffsets = node.operator === '+=' || node.operator === '-=';
            if (operatorOffsets || (!this.isDimension(node.right) && this.isCoordinateExpression(node.right, this.coordinates))) {
              grew = add(patternNames(node.left)) || grew;
            }
          } else if (node.type === 'ForOfStatement' || node.type === 'ForInStatement') {
            const left = childNode(node, 'left');
            if (left?.type === 'VariableDeclaration') {
              grew = add(childNodes(left, 'declarations').flatMap((declarator) => patternNames(declarator.id))) || grew;
            } else {
              grew = add(patternNames(left)) || grew;
            }
          } else if (isFunction(node) && parent && this.isIteratingCallback(node, parent)) {
            grew = add(childNodes(node, 'params').flatMap(patternNames)) || grew;
          }
        });
      }
    }
  }

  /**
   * Locals holding a neighbour cell value, e.g. `const cell = grid[r][c]`
   */
  private collectCellAliases(): void {
    for (const fn of this.searchFunctions) {
      walk(fn, (node) => {
        if (node.type === 'VariableDeclarator' && this.isCellRead(node.init, this.coordinates)) {
          for (const name of patternNames(node.id)) this.cellAliases.add(name);
        }
      });
    }
  }

  // --------------------------------------------------------------------------
  // Atoms
  // --------------------------------------------------------------------------

  /**
   * x[row][col] indexed by a neighbour coordinate, or a local holding one
   */
  private isCellRead(node: unknown, coordinates: ReadonlySet<string>): boolean {
    const target = unwrap(node);
    const name = identifierName(target);
    if (name) return this.cellAliases.has(name);
    if (!isNodeOfType(target, 'MemberExpression') || target.computed !== true) return false;
    const row = unwrap(target.object);
    if (!isNodeOfType(row, 'MemberExpression') || row.computed !== true) return false;
    return [target.property, row.property].some(
      (index) => isAstNode(index) && this.isCoordinateExpression(index, coordinates)
    );
  }

  private isWallComparison(node: AstNode, coordinates: ReadonlySet<string>): boolean {
    if (node.type !== 'BinaryExpression' || typeof node.operator !== 'string' || !EQUALITY_OPERATORS.has(node.operator)) {
      return false;
    }
    return (this.isCellRead(node.left, coordinates) && isWallMarker(unwrap(node.right))) ||
      (this.isCellRead(node.right, coordinates) && isWallMarker(unwrap(node.left)));
  }

  private isBoundsComparison(node: AstNode, coordinates: ReadonlySet<string>): boolean {
    if (node.type !== 'BinaryExpression' || typeof node.operator !== 'string' || !RELATIONAL_OPERATORS.has(node.operator)) {
      return false;
    }
    const { left, right } = node;
    if (!isAstNode(left) || !isAstNode(right)) return false;
    return (this.isCoordinateExpression(left, coordinates) && !this.isDimension(left) && this.isDimension(right)) ||
      (this.isCoordinateExpression(right, coordinates) && !this.isDimension(right) && this.isDimension(left));
  }

  private isPredicateCall(kind: GuardKind, node: AstNode, coordinates: ReadonlySet<string>): boolean {
    if (node.type !== 'CallExpression') return false;
    const target = this.resolveCallee(node);
    if (!target || !this.predicates[kind].has(target)) return false;
    return childNodes(node, 'arguments').some((argument) => this.isCoordinateExpression(argument, coordinates));
  }

  private hasAtom(kind: GuardKind, expression: AstNode, coordinates: ReadonlySet<string>): boolean {
    const comparison = kind === 'wall'
      ? (node: AstNode) => this.isWallComparison(node, coordinates)
      : (node: AstNode) => this.isBoundsComparison(node, coordinates);
    return findAll(expression, (node) => comparison(node) || this.isPredicateCall(kind, node, coordinates)).length > 0;
  }

  /**
   * Helpers such as inBounds(r, c) or isOpen(r, c) whose result is a guard on their parameters
   */
  private collectPredicates(kind: GuardKind): void {
    const candidates = [...this.searchFunctions, ...this.localFunctions.values()];
    let grew = true;
    while (grew) {
      grew = false;
      for (const fn of candidates) {
        if (this.predicates[kind].has(fn)) continue;
        const coordinates = new Set([...this.coordinates, ...childNodes(fn, 'params').flatMap(patternNames)]);
        if (returnedExpressions(fn).some((expression) => this.hasAtom(kind, expression, coordinates))) {
          this.predicates[kind].add(fn);
          grew = true;
        }
      }
    }
  }

  // --------------------------------------------------------------------------
  // Guards
  // --------------------------------------------------------------------------

  private isIteratingCallback(fn: AstNode, parent: AstNode): boolean {
    if (parent.type !== 'CallExpression') return false;
    const method = calleeMethodName(parent);
    return method !== undefined && ITERATING_CALLBACKS.has(method) && childNodes(parent, 'arguments').includes(fn);
  }

  private guardsExpansion(statement: AstNode): boolean {
    const consequent = childNode(statement, 'consequent');
    const alternate = childNode(statement, 'alternate');
    if (consequent && findAll(consequent, (node) => SKIP_STATEMENTS.has(node.type)).length > 0) {
      return true;
    }
    return [consequent, alternate].some((branch) =>
      branch !== null &&
      findAll(branch, (node) => {
        if (node.type !== 'CallExpression') return false;
        const method = calleeMethodName(node);
        return method !== undefined && INSERT_METHODS.has(method);
      }).length > 0
    );
  }

  /**
   * Tests of if-statements inside a loop that skip or admit a neighbour, and
   * the returned conditions of filter-style callbacks
   */
  private guardExpressions(fn: AstNode): AstNode[] {
    const parents = new Map<AstNode, AstNode | null>();
    walk(fn, (node, parent) => {
      parents.set(node, parent);
    });

    const insideLoop = (node: AstNode): boolean => {
      let current = parents.get(node) ?? null;
      while (current) {
        if (LOOP_TYPES.has(current.type)) return true;
        if (isFunction(current)) {
          const owner = parents.get(current) ?? null;
          return owner !== null && this.isIteratingCallback(current, owner);
        }
        current = parents.get(current) ?? null;
      }
      return false;
    };

    const guards: AstNode[] = [];
    walk(fn, (node) => {
      if (node.type === 'IfStatement' && insideLoop(node) && this.guardsExpansion(node)) {
        const test = childNode(node, 'test');
        if (test) guards.push(test);
      } else if (node.type === 'CallExpression') {
        const method = calleeMethodName(node);
        const callback = childNodes(node, 'arguments')[0];
        if (method !== undefined && FILTERING_CALLBACKS.has(method) && isFunction(callback)) {
          guards.push(...returnedExpressions(callback));
        }
      }
    });
    return guards;
  }
}

export function analyzeExpansion(methods: ReadonlyMap<string, AstNode>, findPath: AstNode): ExpansionGuards {
  return new ExpansionAnalysis(methods, findPath).run();
}
