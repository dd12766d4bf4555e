/**
 * tags / projects / areas commands - what filter values exist
 *
 * Handy for writing `--where` clauses: the names printed here are the
 * values `tags CONTAINS`, `project =` and `area =` compare against.
 */

import { Command } from 'commander';
import type { TaskStore } from '../db/task-store.js';
import { getOutputOptions, output } from '../utils/output.js';
import { dim, formatTable } from '../utils/formatters.js';
import { exitWithError, loadConfig, withStore, type CliContext } from './shared.js';

interface Collection<T> {
  name: string;
  description: string;
  fetch: (store: TaskStore) => T[];
  headers: string[];
  row: (item: T) => string[];
  empty: string;
}

function createCollectionCommand<T>(ctx: CliContext, collection: Collection<T>): Command {
  return new Command(collection.name).description(collection.description).action(async () => {
    try {
      const config = await loadConfig(ctx);
      const items = withStore(ctx, config, collection.fetch);

      if (getOutputOptions().json) {
        output(items);
      } else if (items.length === 0) {
        console.log(dim(collection.empty));
      } else {
        console.log(formatTable(collection.headers, items.map(collection.row)));
      }
    } catch (error) {
      exitWithError(collection.name, error);
    }
  });
}

export function createTagsCommand(ctx: CliContext): Command {
  return createCollectionCommand(ctx, {
    name: 'tags',
    description: 'List tag names',
    fetch: (store) => store.fetchTags(),
    headers: ['Tag'],
    row: (tag) => [tag.name],
    empty: 'No tags.',
  });
}

export function createProjectsCommand(ctx: CliContext): Command {
  return createCollectionCommand(ctx, {
    name: 'projects',
    description: 'List open projects',
    fetch: (store) => store.fetchProjects(),
    headers: ['Project', 'Area', 'Open', 'Due'],
    row: (project) => [project.name, project.area ?? '', String(project.openTasks), project.dueDate ?? ''],
    empty: 'No open projects.',
  });
}

export function createAreasCommand(ctx: CliContext): Command {
  return createCollectionCommand(ctx, {
    name: 'areas',
    description: 'List areas',
    fetch: (store) => store.fetchAreas(),
    headers: ['Area'],
    row: (area) => [area.name],
    empty: 'No areas.',
  });
}
