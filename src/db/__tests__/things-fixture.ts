/**
 * Builds a small task database with the tables TaskStore reads
 */

import Database from 'better-sqlite3';
import { isoDateToDayNumber } from '../../utils/time.js';

export const FIXTURE_TODAY = '2024-06-10';

const SCHEMA = `
  CREATE TABLE TMArea (uuid TEXT PRIMARY KEY, title TEXT, "index" INTEGER);
  CREATE TABLE TMTag (uuid TEXT PRIMARY KEY, title TEXT);
  CREATE TABLE TMTask (
    uuid TEXT PRIMARY KEY,
    title TEXT,
    notes TEXT,
    status INTEGER DEFAULT 0,
    type INTEGER DEFAULT 0,
    trashed INTEGER DEFAULT 0,
    start INTEGER DEFAULT 0,
    startDate INTEGER,
    deadline INTEGER,
    stopDate REAL,
    creationDate REAL,
    userModificationDate REAL,
    project TEXT,
    area TEXT,
    todayIndex INTEGER DEFAULT 0,
    "index" INTEGER DEFAULT 0
  );
  CREATE TABLE TMTaskTag (tasks TEXT, tags TEXT);
`;

export interface FixtureTask {
  uuid: string;
  title: string;
  notes?: string | null;
  status?: number;
  type?: number;
  trashed?: number;
  start?: number;
  startDate?: string | null;
  deadline?: string | null;
  stopDate?: number | null;
  creationDate?: number | null;
  project?: string | null;
  area?: string | null;
  order?: number;
  tags?: string[];
}

const day = (iso: string | null | undefined) => (iso ? isoDateToDayNumber(iso) : null);

/**
 * Default data set
 *
 * T1 inbox, T2/T3 today and anytime, T4 someday, T5 upcoming,
 * T6/T7 logbook, T8 trash, T9 canceled. P1/P2 are projects.
 */
export const FIXTURE_TASKS: FixtureTask[] = [
  { uuid: 'P1', title: 'Mobile App', type: 1, start: 1, area: 'A1' },
  { uuid: 'P2', title: 'Old Project', type: 1, status: 3 },
  { uuid: 'T1', title: 'Inbox item', notes: '', order: 0 },
  {
    uuid: 'T2',
    title: 'Fix login bug',
    notes: 'Crash on iOS',
    start: 1,
    project: 'P1',
    deadline: '2024-06-15',
    creationDate: 86400,
    order: 1,
    tags: ['jira', 'review'],
  },
  { uuid: 'T3', title: 'Buy milk', start: 1, startDate: FIXTURE_TODAY, area: 'A2', order: 2, tags: ['errand'] },
  { uuid: 'T4', title: 'Plan trip', start: 2, area: 'A1', order: 3 },
  { uuid: 'T5', title: 'Dentist', startDate: '2024-06-15', project: 'P1', order: 4 },
  { uuid: 'T6', title: 'Shipped feature', status: 3, start: 1, stopDate: 700000000 },
  { uuid: 'T7', title: 'Old logged', status: 3, start: 1, stopDate: 600000000 },
  { uuid: 'T8', title: 'Deleted thing', trashed: 1, start: 1 },
  { uuid: 'T9', title: 'Canceled errand', status: 2, start: 1 },
];

export function createThingsFixture(dbPath: string, tasks: FixtureTask[] = FIXTURE_TASKS): void {
  const db = new Database(dbPath);
  try {
    db.exec(SCHEMA);

    db.prepare('INSERT INTO TMArea (uuid, title, "index") VALUES (?, ?, ?)').run('A1', '🖥️ Work', 0);
    db.prepare('INSERT INTO TMArea (uuid, title, "index") VALUES (?, ?, ?)').run('A2', 'Home', 1);

    const tagIds = new Map<string, string>();
    for (const title of ['jira', 'review', 'errand']) {
      const id = `G-${title}`;
      tagIds.set(title, id);
      db.prepare('INSERT INTO TMTag (uuid, title) VALUES (?, ?)').run(id, title);
    }

    const insertTask = db.prepare(`
      INSERT INTO TMTask (uuid, title, notes, status, type, trashed, start, startDate, deadline,
        stopDate, creationDate, project, area, todayIndex, "index")
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);
    const insertTag = db.prepare('INSERT INTO TMTaskTag (tasks, tags) VALUES (?, ?)');

    for (const task of tasks) {
      insertTask.run(
        task.uuid,
        task.title,
        task.notes ?? null,
        task.status ?? 0,
        task.type ?? 0,
        task.trashed ?? 0,
        task.start ?? 0,
        day(task.startDate),
        day(task.deadline),
        task.stopDate ?? null,
        task.creationDate ?? null,
        task.project ?? null,
        task.area ?? null,
        task.order ?? 0,
        task.order ?? 0
      );
      for (const tag of task.tags ?? []) {
        insertTag.run(task.uuid, tagIds.get(tag) ?? tag);
      }
    }
  } finally {
    db.close();
  }
}
