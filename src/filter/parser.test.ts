/**
 * Filter DSL Parser Tests
 */

import { describe, it, expect } from 'vitest';
import { compileFilter, parseFilter } from './parser.js';
import { and, comparison, not, or } from './ast.js';
import { EmptyExpressionError, ParseError, SemanticError } from './errors.js';
import { FILTER_FIELDS } from './fields.js';
import { formatFilter } from './format.js';
import { matches } from './matcher.js';
import type { FilterRecord } from './types.js';

const a = comparison('name', '=', 'a');
const b = comparison('name', '=', 'b');
const c = comparison('name', '=', 'c');

function record(overrides: Partial<FilterRecord> = {}): FilterRecord {
  return {
    name: '',
    notes: null,
    status: 'open',
    tags: [],
    project: null,
    area: null,
    dueDate: null,
    ...overrides,
  };
}

function errorOf(input: string, maxDepth?: number) {
  const result = parseFilter(input, { maxDepth });
  if (result.ok) {
    throw new Error(`expected "${input}" to fail`);
  }
  return result.error;
}

describe('parseFilter', () => {
  describe('empty input', () => {
    it('rejects an empty string', () => {
      const error = errorOf('');
      expect(error).toBeInstanceOf(EmptyExpressionError);
      expect(error.code).toBe('EMPTY_EXPRESSION');
      expect(error.message).toBe('Empty filter expression');
    });

    it('rejects whitespace only', () => {
      expect(errorOf(' \t ')).toBeInstanceOf(EmptyExpressionError);
    });
  });

  describe('comparisons', () => {
    it('parses equality with a bare value', () => {
      const result = parseFilter('status = open');
      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.ast).toEqual({ type: 'comparison', field: 'status', operator: '=', value: 'open' });
      }
    });

    it('parses every operator form', () => {
      expect(compileFilter("name != 'x'")).toEqual(comparison('name', '!=', 'x'));
      expect(compileFilter("area LIKE '%Work%'")).toEqual(comparison('area', 'LIKE', '%Work%'));
      expect(compileFilter("tags CONTAINS 'jira'")).toEqual(comparison('tags', 'CONTAINS', 'jira'));
      expect(compileFilter("status IN ('open', 'canceled')")).toEqual(
        comparison('status', 'IN', ['open', 'canceled'])
      );
      expect(compileFilter('project IS NULL')).toEqual(comparison('project', 'IS NULL'));
      expect(compileFilter('project is not null')).toEqual(comparison('project', 'IS NOT NULL'));
    });

    it('resolves field names case-insensitively', () => {
      expect(compileFilter("Name = 'x'")).toEqual(comparison('name', '=', 'x'));
    });

    it('resolves deadline to due', () => {
      expect(compileFilter("deadline = '2024-12-15'")).toEqual(comparison('due', '=', '2024-12-15'));
    });

    it('canonicalizes status literals', () => {
      expect(compileFilter('Status = OPEN')).toEqual(comparison('status', '=', 'open'));
      expect(compileFilter("status = 'cancelled'")).toEqual(comparison('status', '=', 'canceled'));
      expect(compileFilter("status IN ('Completed', 'cancelled')")).toEqual(
        comparison('status', 'IN', ['completed', 'canceled'])
      );
    });

    it('keeps LIKE patterns on status as written', () => {
      expect(compileFilter("status LIKE 'OP%'")).toEqual(comparison('status', 'LIKE', 'OP%'));
    });
  });

  describe('precedence', () => {
    it('binds AND tighter than OR', () => {
      expect(compileFilter("name = 'a' OR name = 'b' AND name = 'c'")).toEqual(or(a, and(b, c)));
    });

    it('folds equal-precedence chains to the left', () => {
      expect(compileFilter("name = 'a' OR name = 'b' OR name = 'c'")).toEqual(or(or(a, b), c));
      expect(compileFilter("name = 'a' AND name = 'b' AND name = 'c'")).toEqual(and(and(a, b), c));
    });

    it('lets parentheses override precedence', () => {
      expect(compileFilter("(name = 'a' OR name = 'b') AND name = 'c'")).toEqual(and(or(a, b), c));
    });

    it('applies NOT to a whole group', () => {
      expect(compileFilter("NOT (name = 'a' OR name = 'b')")).toEqual(not(or(a, b)));
    });

    it('binds NOT tighter than AND', () => {
      expect(compileFilter("NOT name = 'a' AND name = 'b'")).toEqual(and(not(a), b));
    });

    it('allows stacked NOT', () => {
      expect(compileFilter("not not name = 'a'")).toEqual(not(not(a)));
    });
  });

  describe('syntax errors', () => {
    it('rejects unknown fields', () => {
      const error = errorOf("priority = 'high'");
      expect(error).toBeInstanceOf(ParseError);
      expect(error.message).toBe("Unknown field 'priority' at char 1");
    });

    it('rejects a missing closing parenthesis', () => {
      const error = errorOf('(status = open');
      expect(error.message).toBe("Expected ')' but found end of input at char 15");
      if (error instanceof ParseError) {
        expect(error.token.type).toBe('eof');
        expect(error.expected).toBe("')'");
      }
    });

    it('rejects premature end of input', () => {
      expect(errorOf('status =').message).toBe('Expected value but found end of input at char 9');
    });

    it('rejects a missing operator', () => {
      expect(errorOf('status open').message).toBe(
        "Expected comparison operator (=, !=, LIKE, CONTAINS, IN, IS) but found 'open' at char 8"
      );
    });

    it('rejects trailing tokens', () => {
      expect(errorOf("status = open name = 'x'").message).toBe(
        "Expected AND, OR or end of input but found 'name' at char 15"
      );
    });

    it('rejects a keyword as a value', () => {
      expect(errorOf('status = null').message).toBe('Expected value but found NULL at char 10');
    });

    it('rejects an empty IN list', () => {
      expect(errorOf('status IN ()').message).toBe("Expected value but found ')' at char 12");
    });

    it('rejects IN items without a comma', () => {
      expect(errorOf("status IN ('open' 'closed')").message).toBe(
        "Expected ',' or ')' but found string 'closed' at char 19"
      );
    });

    it('rejects IS without NULL', () => {
      expect(errorOf("project IS 'x'").message).toBe("Expected NULL but found string 'x' at char 12");
    });

    it('rejects unknown status values', () => {
      expect(errorOf("status = 'done'").message).toBe("Unknown status 'done' at char 10");
    });

    it('rejects malformed due dates', () => {
      expect(errorOf("due = '2024-02-30'").message).toBe("Invalid date '2024-02-30' at char 7");
      expect(errorOf("due IN ('2024-01-01', 'soon')").message).toBe("Invalid date 'soon' at char 23");
    });

    it('passes lexer errors through', () => {
      expect(errorOf("name = 'open").code).toBe('LEX_ERROR');
    });
  });

  describe('operator checks', () => {
    it('rejects LIKE on a date', () => {
      const error = errorOf("due LIKE '2024%'");
      expect(error).toBeInstanceOf(SemanticError);
      expect(error.message).toBe("Operator LIKE cannot be applied to field 'due' (optional-date) at char 5");
    });

    it('rejects equality on tags', () => {
      expect(errorOf("tags = 'x'")).toBeInstanceOf(SemanticError);
    });

    it('rejects CONTAINS on scalar fields', () => {
      expect(errorOf("status CONTAINS 'open'")).toBeInstanceOf(SemanticError);
      expect(errorOf("name CONTAINS 'x'")).toBeInstanceOf(SemanticError);
    });

    it('rejects IS NULL on non-optional fields', () => {
      const error = errorOf('name IS NULL');
      expect(error.code).toBe('SEMANTIC_ERROR');
      if (error instanceof SemanticError) {
        expect(error.field).toBe('name');
        expect(error.operator).toBe('IS NULL');
        expect(error.kind).toBe('text');
      }
    });
  });

  describe('nesting limit', () => {
    it('rejects expressions nested past maxDepth', () => {
      expect(errorOf('NOT NOT NOT status = open', 2).message).toBe(
        'Expression nested deeper than 2 levels at char 9'
      );
    });

    it('accepts expressions at the limit', () => {
      expect(parseFilter('NOT NOT NOT status = open', { maxDepth: 3 }).ok).toBe(true);
    });

    it('counts parentheses toward the limit', () => {
      expect(parseFilter('((status = open))', { maxDepth: 1 }).ok).toBe(false);
      expect(parseFilter('((status = open))', { maxDepth: 2 }).ok).toBe(true);
    });

    it('counts each OR fold toward the limit', () => {
      const input = "name = 'a' OR name = 'b' OR name = 'c' OR name = 'd'";
      expect(parseFilter(input, { maxDepth: 3 }).ok).toBe(true);
      const error = errorOf(input, 2);
      expect(error.message).toBe('Expression nested deeper than 2 levels at char 40');
      expect(error.position).toBe(39);
    });

    it('counts each AND fold toward the limit', () => {
      expect(parseFilter('status = open AND notes IS NULL AND due IS NULL', { maxDepth: 1 }).ok).toBe(false);
      expect(parseFilter('status = open AND notes IS NULL AND due IS NULL', { maxDepth: 2 }).ok).toBe(true);
    });

    it('rejects a very long chain instead of building a deep tree', () => {
      const chain = Array.from({ length: 20000 }, () => "name = 'y'").join(' OR ');
      const result = parseFilter(`${chain} OR name = 'x'`);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe('PARSE_ERROR');
        expect(result.error.message).toMatch(/^Expression nested deeper than 64 levels at char \d+$/);
      }
    });

    it('keeps chains within the default limit usable', () => {
      const names = Array.from({ length: 65 }, (_, i) => `name = 't${i}'`);
      const ast = compileFilter(names.join(' OR '));
      expect(formatFilter(ast)).toBe(names.join(' OR '));
      expect(matches(ast, record({ name: 't64' }))).toBe(true);
      expect(matches(ast, record({ name: 'other' }))).toBe(false);
    });
  });

  it('returns a frozen tree', () => {
    const ast = compileFilter("status = open AND tags IN ('a')");
    expect(Object.isFrozen(ast)).toBe(true);
    if (ast.type === 'and' && ast.right.type === 'comparison' && ast.right.operator === 'IN') {
      expect(Object.isFrozen(ast.right.value)).toBe(true);
    } else {
      expect.unreachable('unexpected tree shape');
    }
  });
});

describe('field examples', () => {
  it('all parse', () => {
    const examples = FILTER_FIELDS.flatMap((f) => f.examples ?? []);
    for (const example of examples) {
      expect(parseFilter(example).ok).toBe(true);
    }
  });
});

describe('compileFilter', () => {
  it('throws the typed error', () => {
    expect(() => compileFilter('')).toThrow(EmptyExpressionError);
    expect(() => compileFilter('status')).toThrow(ParseError);
  });
});
