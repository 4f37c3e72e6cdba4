/**
 * Projects and tasks referenced by a set of entries
 *
 * Tick lists open and closed projects (and tasks) on separate endpoints.
 * The open list is fetched first; the closed list only when an id is
 * still missing.
 */

import type { TickClient } from '../tick/client.js';
import type { Entry, Project, Task } from '../tick/types.js';

export interface EntryCatalog {
  projects: Project[];
  tasks: Task[];
}

export interface CatalogOptions {
  /** Fetch the task of every entry, not only of entries without a project id */
  taskNames?: boolean;
}

async function openThenClosed<T extends { id: number }>(
  ids: Set<number>,
  listOpen: () => Promise<T[]>,
  listClosed: () => Promise<T[]>
): Promise<T[]> {
  if (ids.size === 0) return [];

  const open = await listOpen();
  const known = new Set(open.map((item) => item.id));
  if ([...ids].every((id) => known.has(id))) {
    return open;
  }
  return [...open, ...(await listClosed())];
}

export async function loadEntryCatalog(
  client: TickClient,
  entries: Entry[],
  options: CatalogOptions = {}
): Promise<EntryCatalog> {
  const taskIds = new Set(
    entries
      .filter((entry) => options.taskNames || entry.project_id === undefined)
      .map((entry) => entry.task_id)
  );
  const tasks = await openThenClosed(
    taskIds,
    () => client.listAllTasks(),
    () => client.listAllClosedTasks()
  );

  const parents = new Map(tasks.map((t) => [t.id, t.project_id]));
  const projectIds = new Set<number>();
  for (const entry of entries) {
    const id = entry.project_id ?? parents.get(entry.task_id);
    if (id !== undefined) projectIds.add(id);
  }
  const projects = await openThenClosed(
    projectIds,
    () => client.listAllProjects(),
    () => client.listAllClosedProjects()
  );

  return { projects, tasks };
}
