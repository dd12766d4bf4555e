/**
 * Offline task source: a JSON array of tasks, e.g. saved from
 * `tsift list --json`.
 */

import { readFile } from 'fs/promises';
import { isIsoDate, normalizeStatus } from '../filter/index.js';
import type { Task } from '../types/index.js';
import type { ValidationError } from '../config/schema.js';
import { formatValidationErrors } from '../config/schema.js';

export class JsonSourceError extends Error {
  constructor(
    message: string,
    readonly path: string,
    readonly errors: ValidationError[] = []
  ) {
    super(message);
    this.name = 'JsonSourceError';
  }
}

type JsonObject = Record<string, unknown>;

function isRecord(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(
  entry: JsonObject,
  key: string,
  at: string,
  errors: ValidationError[]
): string | null {
  const value = entry[key];
  if (value === undefined || value === null) {
    return null;
  }
  if (typeof value !== 'string') {
    errors.push({ path: `${at}.${key}`, message: `${key} must be a string or null` });
    return null;
  }
  return value;
}

/**
 * Validate one entry; problems are appended to `errors`
 */
export function readTaskEntry(value: unknown, index: number, errors: ValidationError[]): Task | null {
  const at = `[${index}]`;
  if (!isRecord(value)) {
    errors.push({ path: at, message: 'task must be an object' });
    return null;
  }

  const before = errors.length;

  const id = value.id;
  if (typeof id !== 'string' || !id) {
    errors.push({ path: `${at}.id`, message: 'id must be a non-empty string' });
  }

  const name = value.name;
  if (typeof name !== 'string') {
    errors.push({ path: `${at}.name`, message: 'name must be a string' });
  }

  const rawStatus = value.status ?? 'open';
  const status = typeof rawStatus === 'string' ? normalizeStatus(rawStatus) : null;
  if (!status) {
    errors.push({ path: `${at}.status`, message: 'status must be one of: open, completed, canceled' });
  }

  const tags: string[] = [];
  const rawTags = value.tags ?? [];
  if (!Array.isArray(rawTags)) {
    errors.push({ path: `${at}.tags`, message: 'tags must be an array of strings' });
  } else {
    rawTags.forEach((tag: unknown, i) => {
      if (typeof tag === 'string') {
        tags.push(tag);
      } else {
        errors.push({ path: `${at}.tags[${i}]`, message: 'tag must be a string' });
      }
    });
  }

  const notes = optionalString(value, 'notes', at, errors);
  const project = optionalString(value, 'project', at, errors);
  const area = optionalString(value, 'area', at, errors);
  const createdAt = optionalString(value, 'createdAt', at, errors);
  const modifiedAt = optionalString(value, 'modifiedAt', at, errors);
  const completedAt = optionalString(value, 'completedAt', at, errors);

  const dueDate = optionalString(value, 'dueDate', at, errors);
  if (dueDate !== null && !isIsoDate(dueDate)) {
    errors.push({ path: `${at}.dueDate`, message: 'dueDate must be a YYYY-MM-DD date' });
  }

  if (errors.length > before || typeof id !== 'string' || typeof name !== 'string' || !status) {
    return null;
  }

  return {
    id,
    name,
    notes: notes ? notes : null,
    status,
    tags,
    project,
    area,
    dueDate,
    createdAt,
    modifiedAt,
    completedAt,
  };
}

/**
 * Parse a JSON task array
 * @throws {JsonSourceError} listing every invalid entry
 */
export function parseTasksJson(content: string, sourcePath: string = '<input>'): Task[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (e) {
    throw new JsonSourceError(
      `Invalid JSON in ${sourcePath}: ${e instanceof Error ? e.message : 'parse error'}`,
      sourcePath
    );
  }

  if (!Array.isArray(parsed)) {
    throw new JsonSourceError(`Expected a JSON array of tasks in ${sourcePath}`, sourcePath);
  }

  const errors: ValidationError[] = [];
  const tasks: Task[] = [];
  parsed.forEach((entry: unknown, index) => {
    const task = readTaskEntry(entry, index, errors);
    if (task) {
      tasks.push(task);
    }
  });

  if (errors.length > 0) {
    throw new JsonSourceError(`Invalid tasks in ${sourcePath}: ${formatValidationErrors(errors)}`, sourcePath, errors);
  }
  return tasks;
}

export async function loadTasksFromJson(path: string): Promise<Task[]> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (e) {
    throw new JsonSourceError(
      `Cannot read ${path}: ${e instanceof Error ? e.message : String(e)}`,
      path
    );
  }
  return parseTasksJson(content, path);
}
