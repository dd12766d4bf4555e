/**
 * Task store - read-only queries over the task database
 *
 * Tables used: TMTask (type 0 = to-do, 1 = project), TMArea, TMTag,
 * and the TMTaskTag junction table.
 */

import type Database from 'better-sqlite3';
import type { Area, ListView, Project, StoreSummary, Tag, Task } from '../types/index.js';
import type { RecordStatus } from '../filter/index.js';
import { dayNumberToIsoDate, isoDateToDayNumber, localToday, timestampToIso } from '../utils/time.js';
import { openTaskDatabase, TaskStoreError } from './connection.js';

/** Row shape of TASK_COLUMNS */
interface TaskRow {
  uuid: string;
  title: string | null;
  notes: string | null;
  status: number;
  stopDate: number | null;
  deadline: number | null;
  creationDate: number | null;
  userModificationDate: number | null;
  projectTitle: string | null;
  areaTitle: string | null;
}

interface ProjectRow {
  uuid: string;
  title: string | null;
  notes: string | null;
  deadline: number | null;
  areaTitle: string | null;
  openTasks: number;
}

const TASK_COLUMNS = `
  t.uuid, t.title, t.notes, t.status, t.stopDate, t.deadline,
  t.creationDate, t.userModificationDate,
  p.title AS projectTitle, a.title AS areaTitle
`;

const TASK_FROM = `
  FROM TMTask AS t
  LEFT JOIN TMTask AS p ON t.project = p.uuid
  LEFT JOIN TMArea AS a ON t.area = a.uuid
`;

const OPEN_TODO = 't.status = 0 AND t.trashed = 0 AND t.type = 0';
const LIST_ORDER = 'ORDER BY t.todayIndex, t."index"';

export const LOGBOOK_LIMIT = 500;
export const SEARCH_LIMIT = 100;

/** Integer status codes: 0 open, 2 canceled, 3 completed */
export function statusFromCode(code: number): RecordStatus {
  switch (code) {
    case 2:
      return 'canceled';
    case 3:
      return 'completed';
    default:
      return 'open';
  }
}

export class TaskStore {
  private readonly tagsStmt: Database.Statement<[string], { title: string }>;

  constructor(private readonly db: Database.Database) {
    this.tagsStmt = db.prepare<[string], { title: string }>(`
      SELECT tag.title
      FROM TMTaskTag AS tt
      JOIN TMTag AS tag ON tt.tags = tag.uuid
      WHERE tt.tasks = ?
    `);
  }

  /**
   * Open the database at `dbPath` read-only
   */
  static open(dbPath: string): TaskStore {
    const db = openTaskDatabase(dbPath);
    try {
      return new TaskStore(db);
    } catch (err) {
      db.close();
      throw wrapQueryError(err);
    }
  }

  close(): void {
    this.db.close();
  }

  /**
   * To-dos shown in a built-in list
   * @param today - local date (YYYY-MM-DD) used for start date rules
   */
  fetchList(view: ListView, today: string = localToday()): Task[] {
    const day = isoDateToDayNumber(today);

    switch (view) {
      case 'inbox':
        return this.select(`WHERE ${OPEN_TODO} AND t.start = 0 AND t.project IS NULL AND t.startDate IS NULL ${LIST_ORDER}`);
      case 'today':
        return this.select(`WHERE ${OPEN_TODO} AND (t.start = 1 OR t.startDate = ?) ${LIST_ORDER}`, day);
      case 'upcoming':
        return this.select(`WHERE ${OPEN_TODO} AND t.startDate > ? ${LIST_ORDER}`, day);
      case 'anytime':
        return this.select(
          `WHERE ${OPEN_TODO} AND t.start = 1 AND (t.startDate IS NULL OR t.startDate <= ?) ${LIST_ORDER}`,
          day
        );
      case 'someday':
        return this.select(`WHERE ${OPEN_TODO} AND t.start = 2 ${LIST_ORDER}`);
      case 'logbook':
        return this.select(
          `WHERE t.status = 3 AND t.trashed = 0 AND t.type = 0 ORDER BY t.stopDate DESC LIMIT ${LOGBOOK_LIMIT}`
        );
      case 'trash':
        return this.select(`WHERE t.trashed = 1 AND t.type = 0 ${LIST_ORDER}`);
    }
  }

  /**
   * Every open, untrashed to-do
   */
  fetchAll(): Task[] {
    return this.select(`WHERE ${OPEN_TODO} ${LIST_ORDER}`);
  }

  fetchTask(id: string): Task | null {
    const [task] = this.select('WHERE t.uuid = ? AND t.type = 0', id);
    return task ?? null;
  }

  /**
   * Substring search over title and notes (ASCII case-insensitive).
   * `%` and `_` in `text` match themselves. Without `limit` every match is returned.
   */
  search(text: string, limit?: number): Task[] {
    const pattern = `%${escapeLike(text)}%`;
    const clause = `WHERE t.type = 0 AND t.trashed = 0 AND (t.title LIKE ? ESCAPE '\\' OR t.notes LIKE ? ESCAPE '\\') ${LIST_ORDER}`;
    if (limit === undefined) {
      return this.select(clause, pattern, pattern);
    }
    return this.select(`${clause} LIMIT ?`, pattern, pattern, limit);
  }

  /**
   * Open projects in sidebar order, with their open to-do counts
   */
  fetchProjects(): Project[] {
    const rows = this.all<ProjectRow>(`
      SELECT p.uuid, p.title, p.notes, p.deadline, a.title AS areaTitle,
        (SELECT COUNT(*) FROM TMTask AS t WHERE t.project = p.uuid AND ${OPEN_TODO}) AS openTasks
      FROM TMTask AS p
      LEFT JOIN TMArea AS a ON p.area = a.uuid
      WHERE p.type = 1 AND p.trashed = 0 AND p.status = 0
      ORDER BY p."index"
    `);
    return rows.map((row) => ({
      id: row.uuid,
      name: row.title ?? '',
      notes: row.notes ? row.notes : null,
      area: row.areaTitle,
      dueDate: dayNumberToIsoDate(row.deadline),
      openTasks: row.openTasks,
    }));
  }

  fetchAreas(): Area[] {
    return this.all<{ uuid: string; title: string | null }>('SELECT uuid, title FROM TMArea ORDER BY "index"').map(
      (row) => ({ id: row.uuid, name: row.title ?? '' })
    );
  }

  /**
   * Tags by name
   */
  fetchTags(): Tag[] {
    return this.all<{ uuid: string; title: string | null }>('SELECT uuid, title FROM TMTag ORDER BY title').map(
      (row) => ({ id: row.uuid, name: row.title ?? '' })
    );
  }

  countSummary(): StoreSummary {
    return {
      openTasks: this.count(`SELECT COUNT(*) AS n FROM TMTask AS t WHERE ${OPEN_TODO}`),
      projects: this.count('SELECT COUNT(*) AS n FROM TMTask WHERE type = 1 AND trashed = 0 AND status = 0'),
      areas: this.count('SELECT COUNT(*) AS n FROM TMArea'),
      tags: this.count('SELECT COUNT(*) AS n FROM TMTag'),
    };
  }

  private select(clause: string, ...params: Array<string | number>): Task[] {
    try {
      const rows = this.db
        .prepare<Array<string | number>, TaskRow>(`SELECT ${TASK_COLUMNS} ${TASK_FROM} ${clause}`)
        .all(...params);
      return rows.map((row) => this.toTask(row));
    } catch (err) {
      throw wrapQueryError(err);
    }
  }

  private all<Row>(sql: string): Row[] {
    try {
      return this.db.prepare<[], Row>(sql).all();
    } catch (err) {
      throw wrapQueryError(err);
    }
  }

  private count(sql: string): number {
    try {
      const row = this.db.prepare<[], { n: number }>(sql).get();
      return row?.n ?? 0;
    } catch (err) {
      throw wrapQueryError(err);
    }
  }

  private toTask(row: TaskRow): Task {
    return {
      id: row.uuid,
      name: row.title ?? '',
      notes: row.notes ? row.notes : null,
      status: statusFromCode(row.status),
      tags: this.tagsStmt.all(row.uuid).map((t) => t.title),
      project: row.projectTitle,
      area: row.areaTitle,
      dueDate: dayNumberToIsoDate(row.deadline),
      createdAt: timestampToIso(row.creationDate),
      modifiedAt: timestampToIso(row.userModificationDate),
      completedAt: timestampToIso(row.stopDate),
    };
  }
}

/** Escape LIKE wildcards and the escape character itself */
export function escapeLike(text: string): string {
  return text.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

function wrapQueryError(err: unknown): TaskStoreError {
  if (err instanceof TaskStoreError) {
    return err;
  }
  const reason = err instanceof Error ? err.message : String(err);
  return new TaskStoreError(`Query failed: ${reason}`, 'QUERY_FAILED', undefined, { cause: err });
}
