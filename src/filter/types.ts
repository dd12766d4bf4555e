/**
 * Filter DSL Types
 *
 * Boolean query over task records:
 *   `status = open AND (tags CONTAINS 'jira' OR area LIKE '%Work%')`
 *
 * Precedence: NOT > AND > OR. Parentheses group.
 */

import type { FilterError } from './errors.js';

// ============================================================
// Tokens
// ============================================================

/** Keyword token types (matched case-insensitively) */
export type KeywordTokenType =
  | 'and'
  | 'or'
  | 'not'
  | 'in'
  | 'is'
  | 'null'
  | 'like'
  | 'contains';

export type TokenType =
  | 'identifier'
  | 'string'
  | KeywordTokenType
  | 'eq'
  | 'neq'
  | 'lparen'
  | 'rparen'
  | 'comma'
  | 'eof';

export interface Token {
  type: TokenType;
  /** Identifier text as written, or the unescaped content of a string literal */
  text: string;
  /** 0-based offset of the first character in the input */
  position: number;
}

// ============================================================
// Fields
// ============================================================

/** Supported field names (after alias resolution) */
export type FilterField = 'name' | 'notes' | 'status' | 'tags' | 'project' | 'area' | 'due';

/**
 * Field kind - decides which operators a field accepts
 * and how its value is compared.
 */
export type FieldKind = 'text' | 'enum-text' | 'text-list' | 'optional-text' | 'optional-date';

// ============================================================
// AST
// ============================================================

/** Operators taking a single string literal */
export type ValueOperator = '=' | '!=' | 'LIKE' | 'CONTAINS';

/** Operators taking no literal */
export type NullOperator = 'IS NULL' | 'IS NOT NULL';

export type ComparisonOperator = ValueOperator | 'IN' | NullOperator;

export interface ValueComparison {
  readonly type: 'comparison';
  readonly field: FilterField;
  readonly operator: ValueOperator;
  readonly value: string;
}

export interface ListComparison {
  readonly type: 'comparison';
  readonly field: FilterField;
  readonly operator: 'IN';
  readonly value: readonly string[];
}

export interface NullComparison {
  readonly type: 'comparison';
  readonly field: FilterField;
  readonly operator: NullOperator;
}

export type ComparisonExpression = ValueComparison | ListComparison | NullComparison;

export interface AndExpression {
  readonly type: 'and';
  readonly left: FilterExpression;
  readonly right: FilterExpression;
}

export interface OrExpression {
  readonly type: 'or';
  readonly left: FilterExpression;
  readonly right: FilterExpression;
}

export interface NotExpression {
  readonly type: 'not';
  readonly operand: FilterExpression;
}

export type FilterExpression = AndExpression | OrExpression | NotExpression | ComparisonExpression;

// ============================================================
// Records
// ============================================================

export type RecordStatus = 'open' | 'completed' | 'canceled';

/**
 * The data a filter is evaluated against.
 * All values must already be resolved in memory.
 */
export interface FilterRecord {
  readonly name: string;
  readonly notes: string | null;
  readonly status: RecordStatus;
  readonly tags: readonly string[];
  readonly project: string | null;
  readonly area: string | null;
  /** ISO date (YYYY-MM-DD) */
  readonly dueDate: string | null;
}

// ============================================================
// Parser
// ============================================================

/** Parser result with success/error status */
export type ParseResult =
  | { ok: true; ast: FilterExpression }
  | { ok: false; error: FilterError };

export interface ParserOptions {
  /** Maximum nesting of parentheses and NOT (default: 64) */
  maxDepth?: number;
}
