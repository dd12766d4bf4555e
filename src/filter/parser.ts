/**
 * Filter DSL Parser
 *
 * Grammar:
 *   expr       = orExpr
 *   orExpr     = andExpr ( OR andExpr )*
 *   andExpr    = notExpr ( AND notExpr )*
 *   notExpr    = NOT notExpr | primary
 *   primary    = '(' expr ')' | comparison
 *   comparison = field ( '=' | '!=' | LIKE | CONTAINS ) value
 *              | field IN '(' value ( ',' value )* ')'
 *              | field IS [ NOT ] NULL
 *   value      = string_literal | identifier
 *
 * Equal-precedence chains fold to the left: `a OR b OR c` is `(a OR b) OR c`.
 * Every fold, NOT and parenthesis adds a level; maxDepth bounds the
 * depth of the resulting tree.
 * Operator/field-kind mismatches are rejected here, so a parsed tree
 * never fails in the matcher.
 */

import { and, comparison, not, or } from './ast.js';
import {
  EmptyExpressionError,
  FilterError,
  ParseError,
  SemanticError,
} from './errors.js';
import {
  STATUS_VALUES,
  isIsoDate,
  isOperatorAllowed,
  normalizeStatus,
  resolveField,
  type FieldDefinition,
} from './fields.js';
import { tokenize } from './tokenizer.js';
import type {
  ComparisonExpression,
  ComparisonOperator,
  FilterExpression,
  ParseResult,
  ParserOptions,
  Token,
  TokenType,
  ValueOperator,
} from './types.js';

export const DEFAULT_MAX_DEPTH = 64;

/**
 * Parse a filter expression into an AST
 * @returns ParseResult with AST or the typed error
 */
export function parseFilter(input: string, options: ParserOptions = {}): ParseResult {
  try {
    return { ok: true, ast: compileFilter(input, options) };
  } catch (error) {
    if (error instanceof FilterError) {
      return { ok: false, error };
    }
    throw error;
  }
}

/**
 * Parse a filter expression into an AST
 * @throws {FilterError} LexError, ParseError, EmptyExpressionError or SemanticError
 */
export function compileFilter(input: string, options: ParserOptions = {}): FilterExpression {
  if (!input.trim()) {
    throw new EmptyExpressionError();
  }
  const parser = new FilterParser(tokenize(input), options.maxDepth ?? DEFAULT_MAX_DEPTH);
  return parser.parse();
}

class FilterParser {
  private pos = 0;
  private depth = 0;

  constructor(
    private readonly tokens: Token[],
    private readonly maxDepth: number
  ) {}

  parse(): FilterExpression {
    const expr = this.parseOr();
    const next = this.peek();
    if (next.type !== 'eof') {
      throw new ParseError(next, 'AND, OR or end of input');
    }
    return expr;
  }

  private parseOr(): FilterExpression {
    const base = this.depth;
    try {
      let left = this.parseAnd();
      for (let token = this.peek(); this.match('or'); token = this.peek()) {
        this.descend(token);
        left = or(left, this.parseAnd());
      }
      return left;
    } finally {
      this.depth = base;
    }
  }

  private parseAnd(): FilterExpression {
    const base = this.depth;
    try {
      let left = this.parseNot();
      for (let token = this.peek(); this.match('and'); token = this.peek()) {
        this.descend(token);
        left = and(left, this.parseNot());
      }
      return left;
    } finally {
      this.depth = base;
    }
  }

  private parseNot(): FilterExpression {
    const token = this.peek();
    if (this.match('not')) {
      return this.nested(token, () => not(this.parseNot()));
    }
    return this.parsePrimary();
  }

  private parsePrimary(): FilterExpression {
    const token = this.peek();
    if (this.match('lparen')) {
      const inner = this.nested(token, () => this.parseOr());
      this.expect('rparen', "')'");
      return inner;
    }
    return this.parseComparison();
  }

  private parseComparison(): ComparisonExpression {
    const fieldToken = this.peek();
    if (fieldToken.type !== 'identifier') {
      throw new ParseError(fieldToken, 'field name');
    }
    this.advance();

    const field = resolveField(fieldToken.text);
    if (!field) {
      throw new ParseError(fieldToken, 'field name', `Unknown field '${fieldToken.text}'`);
    }

    const opToken = this.advance();
    switch (opToken.type) {
      case 'eq':
        return this.valueComparison(field, '=', opToken);
      case 'neq':
        return this.valueComparison(field, '!=', opToken);
      case 'like':
        return this.valueComparison(field, 'LIKE', opToken);
      case 'contains':
        return this.valueComparison(field, 'CONTAINS', opToken);
      case 'in': {
        this.checkOperator(field, 'IN', opToken);
        this.expect('lparen', "'('");
        const values = [this.readValue(field, 'IN')];
        while (this.match('comma')) {
          values.push(this.readValue(field, 'IN'));
        }
        this.expect('rparen', "',' or ')'");
        return comparison(field.name, 'IN', values);
      }
      case 'is': {
        const operator = this.match('not') ? 'IS NOT NULL' : 'IS NULL';
        this.checkOperator(field, operator, opToken);
        this.expect('null', 'NULL');
        return comparison(field.name, operator);
      }
      default:
        throw new ParseError(opToken, 'comparison operator (=, !=, LIKE, CONTAINS, IN, IS)');
    }
  }

  private valueComparison(field: FieldDefinition, operator: ValueOperator, opToken: Token): ComparisonExpression {
    this.checkOperator(field, operator, opToken);
    return comparison(field.name, operator, this.readValue(field, operator));
  }

  private checkOperator(field: FieldDefinition, operator: ComparisonOperator, opToken: Token): void {
    if (!isOperatorAllowed(field.kind, operator)) {
      throw new SemanticError(field.name, operator, field.kind, opToken.position);
    }
  }

  /**
   * Read a literal and validate it for the field.
   * Status literals are stored in canonical form.
   */
  private readValue(field: FieldDefinition, operator: ComparisonOperator): string {
    const token = this.peek();
    if (token.type !== 'string' && token.type !== 'identifier') {
      throw new ParseError(token, 'value');
    }
    this.advance();

    const exact = operator === '=' || operator === '!=' || operator === 'IN';
    if (exact && field.kind === 'enum-text') {
      const status = normalizeStatus(token.text);
      if (!status) {
        throw new ParseError(
          token,
          `status (${STATUS_VALUES.join(', ')})`,
          `Unknown status '${token.text}'`
        );
      }
      return status;
    }

    if (exact && field.kind === 'optional-date' && !isIsoDate(token.text)) {
      throw new ParseError(token, 'date (YYYY-MM-DD)', `Invalid date '${token.text}'`);
    }

    return token.text;
  }

  /** One more level of tree depth, opened at `token` */
  private descend(token: Token): void {
    if (this.depth >= this.maxDepth) {
      throw new ParseError(token, 'a shallower expression', `Expression nested deeper than ${this.maxDepth} levels`);
    }
    this.depth++;
  }

  private nested<T>(token: Token, parse: () => T): T {
    this.descend(token);
    try {
      return parse();
    } finally {
      this.depth--;
    }
  }

  private peek(): Token {
    return this.tokens[this.pos];
  }

  /** Consume the current token (never moves past eof) */
  private advance(): Token {
    const token = this.tokens[this.pos];
    if (token.type !== 'eof') {
      this.pos++;
    }
    return token;
  }

  private match(type: TokenType): boolean {
    if (this.peek().type === type) {
      this.advance();
      return true;
    }
    return false;
  }

  private expect(type: TokenType, expected: string): Token {
    const token = this.peek();
    if (token.type !== type) {
      throw new ParseError(token, expected);
    }
    return this.advance();
  }
}
