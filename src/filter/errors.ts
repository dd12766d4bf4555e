/**
 * Filter DSL errors
 *
 * Every failure of the tokenizer, parser or matcher is a FilterError
 * subclass with a stable `code`. Positions are 0-based offsets; messages
 * report them 1-based ("at char N").
 */

import type { ComparisonOperator, FieldKind, FilterField, Token } from './types.js';

export type FilterErrorCode = 'LEX_ERROR' | 'PARSE_ERROR' | 'EMPTY_EXPRESSION' | 'SEMANTIC_ERROR';

export abstract class FilterError extends Error {
  abstract readonly code: FilterErrorCode;
  readonly position?: number;

  constructor(message: string, position?: number) {
    super(message);
    this.position = position;
  }
}

/** Malformed token stream (unterminated literal, bad escape, illegal character) */
export class LexError extends FilterError {
  readonly code = 'LEX_ERROR';

  constructor(message: string, position: number) {
    super(`${message} at char ${position + 1}`, position);
    this.name = 'LexError';
  }
}

/** Grammar violation */
export class ParseError extends FilterError {
  readonly code = 'PARSE_ERROR';
  readonly token: Token;
  readonly expected: string;

  constructor(token: Token, expected: string, detail?: string) {
    const found = describeToken(token);
    const message = detail
      ? `${detail} at char ${token.position + 1}`
      : `Expected ${expected} but found ${found} at char ${token.position + 1}`;
    super(message, token.position);
    this.name = 'ParseError';
    this.token = token;
    this.expected = expected;
  }
}

/** Blank or whitespace-only input */
export class EmptyExpressionError extends FilterError {
  readonly code = 'EMPTY_EXPRESSION';

  constructor() {
    super('Empty filter expression');
    this.name = 'EmptyExpressionError';
  }
}

/** Operator not accepted by the field's kind */
export class SemanticError extends FilterError {
  readonly code = 'SEMANTIC_ERROR';
  readonly field: FilterField;
  readonly operator: ComparisonOperator;
  readonly kind: FieldKind;

  constructor(field: FilterField, operator: ComparisonOperator, kind: FieldKind, position?: number) {
    const where = position === undefined ? '' : ` at char ${position + 1}`;
    super(`Operator ${operator} cannot be applied to field '${field}' (${kind})${where}`, position);
    this.name = 'SemanticError';
    this.field = field;
    this.operator = operator;
    this.kind = kind;
  }
}

export function isFilterError(error: unknown): error is FilterError {
  return error instanceof FilterError;
}

/**
 * Human-readable description of a token for error messages
 */
export function describeToken(token: Token): string {
  switch (token.type) {
    case 'eof':
      return 'end of input';
    case 'identifier':
      return `'${token.text}'`;
    case 'string':
      return `string '${token.text}'`;
    case 'eq':
      return "'='";
    case 'neq':
      return "'!='";
    case 'lparen':
      return "'('";
    case 'rparen':
      return "')'";
    case 'comma':
      return "','";
    default:
      return token.type.toUpperCase();
  }
}
