/**
 * Render a FilterExpression back to DSL text
 *
 * Output re-parses to an equal tree: parentheses are added only where
 * precedence or left-folding would otherwise change the shape.
 */

import type { ComparisonExpression, FilterExpression } from './types.js';

const PRECEDENCE: Record<FilterExpression['type'], number> = {
  or: 1,
  and: 2,
  not: 3,
  comparison: 4,
};

export function formatFilter(expr: FilterExpression): string {
  switch (expr.type) {
    case 'comparison':
      return formatComparison(expr);
    case 'not': {
      const operand = formatFilter(expr.operand);
      return expr.operand.type === 'and' || expr.operand.type === 'or'
        ? `NOT (${operand})`
        : `NOT ${operand}`;
    }
    case 'and':
    case 'or': {
      const keyword = expr.type === 'and' ? 'AND' : 'OR';
      const own = PRECEDENCE[expr.type];
      const left = wrap(expr.left, PRECEDENCE[expr.left.type] < own);
      const right = wrap(expr.right, PRECEDENCE[expr.right.type] <= own);
      return `${left} ${keyword} ${right}`;
    }
  }
}

/**
 * Quote a literal, escaping backslashes and single quotes
 */
export function quoteLiteral(value: string): string {
  return `'${value.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`;
}

function wrap(expr: FilterExpression, parenthesize: boolean): string {
  const text = formatFilter(expr);
  return parenthesize ? `(${text})` : text;
}

function formatComparison(expr: ComparisonExpression): string {
  switch (expr.operator) {
    case 'IS NULL':
    case 'IS NOT NULL':
      return `${expr.field} ${expr.operator}`;
    case 'IN':
      return `${expr.field} IN (${expr.value.map(quoteLiteral).join(', ')})`;
    default:
      return `${expr.field} ${expr.operator} ${quoteLiteral(expr.value)}`;
  }
}
