/**
 * Filter DSL
 *
 * Public API for tokenizing, parsing, rendering and matching task filters.
 * No I/O - shared by the CLI commands and bulk operations.
 */

// Types
export type {
  AndExpression,
  ComparisonExpression,
  ComparisonOperator,
  FieldKind,
  FilterExpression,
  FilterField,
  FilterRecord,
  ListComparison,
  NotExpression,
  NullComparison,
  NullOperator,
  OrExpression,
  ParseResult,
  ParserOptions,
  RecordStatus,
  Token,
  TokenType,
  ValueComparison,
  ValueOperator,
} from './types.js';

// Errors
export type { FilterErrorCode } from './errors.js';
export {
  EmptyExpressionError,
  FilterError,
  LexError,
  ParseError,
  SemanticError,
  isFilterError,
} from './errors.js';

// Field definitions (for help output and suggestions)
export type { FieldDefinition } from './fields.js';
export {
  FILTER_FIELDS,
  OPERATORS_BY_KIND,
  isIsoDate,
  isOperatorAllowed,
  normalizeStatus,
  resolveField,
  suggestFields,
} from './fields.js';

// Lexer / parser
export { tokenize } from './tokenizer.js';
export { compileFilter, parseFilter } from './parser.js';

// AST
export { and, or, not, comparison, collectFields, countClauses } from './ast.js';
export { formatFilter, quoteLiteral } from './format.js';

// Matcher
export { filterRecords, likeMatch, matches } from './matcher.js';
