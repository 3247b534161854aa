/**
 * Validation module exports
 */

export { CodeValidator } from './code-validator';
export {
  parseCandidate,
  walk,
  findAll,
  lineAt,
  isAstNode,
  isNodeOfType,
  childNode,
  childNodes,
  identifierName,
  type AstNode,
  type ParsedCandidate,
  type ParseFailure,
} from './ast';
