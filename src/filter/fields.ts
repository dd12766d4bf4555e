/**
 * Filter Field Definitions
 *
 * The closed set of queryable fields, their kinds, and the operators
 * each kind accepts. Used for validation, `filter fields` and suggestions.
 */

import type {
  ComparisonOperator,
  FieldKind,
  FilterField,
  RecordStatus,
} from './types.js';

/** Field definition for validation and help output */
export interface FieldDefinition {
  name: FilterField;
  kind: FieldKind;
  description: string;
  aliases?: string[];
  examples?: string[];
}

/** All supported filter fields with metadata */
export const FILTER_FIELDS: readonly FieldDefinition[] = [
  {
    name: 'name',
    kind: 'text',
    description: 'Task title',
    examples: ["name LIKE 'Review%'"],
  },
  {
    name: 'notes',
    kind: 'optional-text',
    description: 'Task notes (empty notes count as NULL)',
    examples: ["notes LIKE '%http%'", 'notes IS NULL'],
  },
  {
    name: 'status',
    kind: 'enum-text',
    description: 'Task status',
    examples: ['status = open', "status IN ('open', 'canceled')"],
  },
  {
    name: 'tags',
    kind: 'text-list',
    description: 'Tag names',
    examples: ["tags CONTAINS 'jira'"],
  },
  {
    name: 'project',
    kind: 'optional-text',
    description: 'Project name',
    examples: ["project = 'Mobile App'", 'project IS NULL'],
  },
  {
    name: 'area',
    kind: 'optional-text',
    description: 'Area name',
    examples: ["area LIKE '%Work%'"],
  },
  {
    name: 'due',
    kind: 'optional-date',
    description: 'Due date (YYYY-MM-DD)',
    aliases: ['deadline'],
    examples: ["due = '2024-12-15'", 'deadline IS NOT NULL'],
  },
];

/** Operators accepted by each field kind */
export const OPERATORS_BY_KIND: Record<FieldKind, readonly ComparisonOperator[]> = {
  'text': ['=', '!=', 'LIKE', 'IN'],
  'enum-text': ['=', '!=', 'LIKE', 'IN'],
  'text-list': ['CONTAINS', 'IN'],
  'optional-text': ['=', '!=', 'LIKE', 'IN', 'IS NULL', 'IS NOT NULL'],
  'optional-date': ['=', '!=', 'IN', 'IS NULL', 'IS NOT NULL'],
};

/** Canonical status values */
export const STATUS_VALUES: readonly RecordStatus[] = ['open', 'completed', 'canceled'];

/** Accepted spellings that normalize to a canonical status */
export const STATUS_SYNONYMS: ReadonlyMap<string, RecordStatus> = new Map<string, RecordStatus>([
  ['cancelled', 'canceled'],
]);

const FIELDS_BY_NAME: ReadonlyMap<string, FieldDefinition> = new Map(
  FILTER_FIELDS.flatMap((f) => [f.name, ...(f.aliases ?? [])].map((n) => [n, f] as const))
);

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Resolve a field name as written in a query (case-insensitive, aliases allowed)
 * @returns The field definition, or null when unknown
 */
export function resolveField(name: string): FieldDefinition | null {
  return FIELDS_BY_NAME.get(name.toLowerCase()) ?? null;
}

/**
 * Check if an operator may be applied to a field kind
 */
export function isOperatorAllowed(kind: FieldKind, operator: ComparisonOperator): boolean {
  return OPERATORS_BY_KIND[kind].includes(operator);
}

/**
 * Suggest fields matching a prefix (case-insensitive)
 */
export function suggestFields(prefix: string): FieldDefinition[] {
  const lower = prefix.toLowerCase();
  return FILTER_FIELDS.filter(
    (f) => f.name.startsWith(lower) || (f.aliases ?? []).some((a) => a.startsWith(lower))
  );
}

/**
 * Normalize a status literal to its canonical form
 * @returns The canonical status, or null when the text names no status
 */
export function normalizeStatus(text: string): RecordStatus | null {
  const lower = text.toLowerCase();
  return STATUS_SYNONYMS.get(lower) ?? STATUS_VALUES.find((s) => s === lower) ?? null;
}

/**
 * Check that a date literal is a real calendar date in YYYY-MM-DD form
 */
export function isIsoDate(text: string): boolean {
  const match = ISO_DATE.exec(text);
  if (!match) {
    return false;
  }
  const [, y, m, d] = match;
  const date = new Date(Date.UTC(Number(y), Number(m) - 1, Number(d)));
  return (
    date.getUTCFullYear() === Number(y) &&
    date.getUTCMonth() === Number(m) - 1 &&
    date.getUTCDate() === Number(d)
  );
}
