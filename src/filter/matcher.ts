/**
 * Filter DSL Matcher
 *
 * Evaluates a parsed FilterExpression against one FilterRecord.
 * Pure: no I/O, no ambient state, the record is never mutated.
 *
 * Each field resolves to a value tagged with its kind; operators are
 * checked against the kind before comparison, so an invalid pair raises
 * SemanticError instead of evaluating to false.
 */

import { SemanticError } from './errors.js';
import { isOperatorAllowed, normalizeStatus } from './fields.js';
import type {
  ComparisonExpression,
  FilterExpression,
  FilterField,
  FilterRecord,
  RecordStatus,
} from './types.js';

type FieldValue =
  | { kind: 'text'; value: string }
  | { kind: 'enum-text'; value: RecordStatus }
  | { kind: 'text-list'; value: readonly string[] }
  | { kind: 'optional-text'; value: string | null }
  | { kind: 'optional-date'; value: string | null };

/**
 * Evaluate a filter expression against a record
 * @throws {SemanticError} for an operator the field's kind does not accept
 *   (only reachable with hand-built trees; the parser rejects these)
 */
export function matches(expr: FilterExpression, record: FilterRecord): boolean {
  switch (expr.type) {
    case 'and':
      return matches(expr.left, record) && matches(expr.right, record);
    case 'or':
      return matches(expr.left, record) || matches(expr.right, record);
    case 'not':
      return !matches(expr.operand, record);
    case 'comparison':
      return matchComparison(expr, record);
  }
}

/**
 * Keep the records an expression matches, preserving order
 */
export function filterRecords<T extends FilterRecord>(records: readonly T[], expr: FilterExpression): T[] {
  return records.filter((record) => matches(expr, record));
}

/**
 * SQL-style LIKE with `%` as the only wildcard, case-insensitive.
 * A pattern without `%` is an exact (case-insensitive) match.
 */
export function likeMatch(value: string, pattern: string): boolean {
  const text = value.toLowerCase();
  const parts = pattern.toLowerCase().split('%');

  if (parts.length === 1) {
    return text === parts[0];
  }

  const head = parts[0];
  const tail = parts[parts.length - 1];
  if (!text.startsWith(head)) {
    return false;
  }

  let cursor = head.length;
  for (const part of parts.slice(1, -1)) {
    if (!part) continue;
    const index = text.indexOf(part, cursor);
    if (index < 0) {
      return false;
    }
    cursor = index + part.length;
  }

  return text.length - tail.length >= cursor && text.endsWith(tail);
}

function matchComparison(node: ComparisonExpression, record: FilterRecord): boolean {
  const resolved = resolveValue(record, node.field);
  if (!isOperatorAllowed(resolved.kind, node.operator)) {
    throw new SemanticError(node.field, node.operator, resolved.kind);
  }

  switch (node.operator) {
    case 'IS NULL':
      return isAbsent(resolved);
    case 'IS NOT NULL':
      return !isAbsent(resolved);
    case 'IN':
      return node.value.some((literal) => equals(resolved, literal));
    case '=':
      return equals(resolved, node.value);
    case '!=':
      return !equals(resolved, node.value);
    case 'LIKE': {
      const text = scalarText(resolved);
      return text !== null && likeMatch(text, node.value);
    }
    case 'CONTAINS': {
      const wanted = node.value.toLowerCase();
      return resolved.kind === 'text-list' && resolved.value.some((tag) => tag.toLowerCase() === wanted);
    }
  }
}

function resolveValue(record: FilterRecord, field: FilterField): FieldValue {
  switch (field) {
    case 'name':
      return { kind: 'text', value: record.name };
    case 'notes':
      // empty notes are treated as absent
      return { kind: 'optional-text', value: record.notes ? record.notes : null };
    case 'status':
      return { kind: 'enum-text', value: record.status };
    case 'tags':
      return { kind: 'text-list', value: record.tags };
    case 'project':
      return { kind: 'optional-text', value: record.project };
    case 'area':
      return { kind: 'optional-text', value: record.area };
    case 'due':
      return { kind: 'optional-date', value: record.dueDate };
  }
}

function equals(resolved: FieldValue, literal: string): boolean {
  switch (resolved.kind) {
    case 'text':
      return resolved.value === literal;
    case 'enum-text':
      return resolved.value === normalizeStatus(literal);
    case 'text-list': {
      const wanted = literal.toLowerCase();
      return resolved.value.some((tag) => tag.toLowerCase() === wanted);
    }
    case 'optional-text':
    case 'optional-date':
      return resolved.value !== null && resolved.value === literal;
  }
}

function isAbsent(resolved: FieldValue): boolean {
  switch (resolved.kind) {
    case 'optional-text':
    case 'optional-date':
      return resolved.value === null;
    default:
      return false;
  }
}

function scalarText(resolved: FieldValue): string | null {
  switch (resolved.kind) {
    case 'text-list':
      return null;
    default:
      return resolved.value;
  }
}
