/**
 * Task types
 */

import type { FilterRecord } from '../filter/index.js';

/** Built-in lists of the task manager */
export type ListView = 'inbox' | 'today' | 'upcoming' | 'anytime' | 'someday' | 'logbook' | 'trash';

export const LIST_VIEWS: readonly ListView[] = [
  'inbox',
  'today',
  'upcoming',
  'anytime',
  'someday',
  'logbook',
  'trash',
];

export function isListView(value: string): value is ListView {
  return LIST_VIEWS.some((view) => view === value);
}

/**
 * A to-do as read from the task database.
 * Timestamps are ISO 8601 (UTC) or null.
 */
export interface Task extends FilterRecord {
  readonly id: string;
  readonly createdAt: string | null;
  readonly modifiedAt: string | null;
  readonly completedAt: string | null;
}

/** Record counts for `status` */
export interface StoreSummary {
  openTasks: number;
  projects: number;
  areas: number;
  tags: number;
}

/** An open project */
export interface Project {
  readonly id: string;
  readonly name: string;
  readonly notes: string | null;
  readonly area: string | null;
  /** YYYY-MM-DD */
  readonly dueDate: string | null;
  /** Open, untrashed to-dos in the project */
  readonly openTasks: number;
}

export interface Area {
  readonly id: string;
  readonly name: string;
}

export interface Tag {
  readonly id: string;
  readonly name: string;
}
