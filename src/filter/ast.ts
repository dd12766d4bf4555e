/**
 * AST node constructors
 *
 * Nodes are frozen on construction; a tree is never mutated after it is built.
 */

import type {
  AndExpression,
  ComparisonExpression,
  ComparisonOperator,
  FilterExpression,
  FilterField,
  ListComparison,
  NotExpression,
  NullComparison,
  NullOperator,
  OrExpression,
  ValueComparison,
  ValueOperator,
} from './types.js';

export function and(left: FilterExpression, right: FilterExpression): AndExpression {
  const node: AndExpression = { type: 'and', left, right };
  return Object.freeze(node);
}

export function or(left: FilterExpression, right: FilterExpression): OrExpression {
  const node: OrExpression = { type: 'or', left, right };
  return Object.freeze(node);
}

export function not(operand: FilterExpression): NotExpression {
  const node: NotExpression = { type: 'not', operand };
  return Object.freeze(node);
}

export function comparison(field: FilterField, operator: ValueOperator, value: string): ValueComparison;
export function comparison(field: FilterField, operator: 'IN', value: readonly string[]): ListComparison;
export function comparison(field: FilterField, operator: NullOperator): NullComparison;
export function comparison(
  field: FilterField,
  operator: ComparisonOperator,
  value?: string | readonly string[]
): ComparisonExpression {
  if (operator === 'IS NULL' || operator === 'IS NOT NULL') {
    const node: NullComparison = { type: 'comparison', field, operator };
    return Object.freeze(node);
  }

  if (operator === 'IN') {
    if (value === undefined || typeof value === 'string') {
      throw new TypeError('IN requires a list of values');
    }
    const node: ListComparison = { type: 'comparison', field, operator, value: Object.freeze([...value]) };
    return Object.freeze(node);
  }

  if (typeof value !== 'string') {
    throw new TypeError(`${operator} requires a single value`);
  }
  const node: ValueComparison = { type: 'comparison', field, operator, value };
  return Object.freeze(node);
}

/**
 * Collect the distinct fields a filter refers to, in order of first use
 */
export function collectFields(expr: FilterExpression): FilterField[] {
  const fields = new Set<FilterField>();
  const visit = (node: FilterExpression): void => {
    switch (node.type) {
      case 'comparison':
        fields.add(node.field);
        return;
      case 'not':
        visit(node.operand);
        return;
      case 'and':
      case 'or':
        visit(node.left);
        visit(node.right);
        return;
    }
  };
  visit(expr);
  return [...fields];
}

/**
 * Count comparison clauses in a filter
 */
export function countClauses(expr: FilterExpression): number {
  switch (expr.type) {
    case 'comparison':
      return 1;
    case 'not':
      return countClauses(expr.operand);
    case 'and':
    case 'or':
      return countClauses(expr.left) + countClauses(expr.right);
  }
}
