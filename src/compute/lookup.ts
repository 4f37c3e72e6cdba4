/**
 * Id-to-name lookups shared by the reporting tools
 */

import type { Client, Entry, Project, Task, User } from '../tick/types.js';

export interface EntryProject {
  id: number | null;
  name: string;
}

/**
 * Entries name their task; the project comes from the entry when the API
 * includes it, otherwise from the task's parent.
 */
export function buildProjectLookup(projects: Project[], tasks: Task[]): (entry: Entry) => EntryProject {
  const projectNames = new Map(projects.map((p) => [p.id, p.name]));
  const taskProjects = new Map(tasks.map((t) => [t.id, t.project_id]));

  return (entry) => {
    const id = entry.project_id ?? taskProjects.get(entry.task_id) ?? null;
    if (id === null) {
      return { id: null, name: 'Unknown project' };
    }
    return { id, name: projectNames.get(id) ?? `Project ${id}` };
  };
}

export function userDisplayName(user: Pick<User, 'first_name' | 'last_name'>): string {
  return `${user.first_name ?? ''} ${user.last_name ?? ''}`.trim();
}

export function buildUserLookup(users: User[]): (userId: number) => string {
  const names = new Map(users.map((u) => [u.id, userDisplayName(u)]));
  return (userId) => names.get(userId) || `User ${userId}`;
}

export function buildTaskLookup(tasks: Task[]): (taskId: number) => string {
  const names = new Map(tasks.map((t) => [t.id, t.name]));
  return (taskId) => names.get(taskId) ?? `Task ${taskId}`;
}

/** Client name of a project; empty when the project has none */
export function buildClientLookup(projects: Project[], clients: Client[]): (projectId: number | null) => string {
  const clientNames = new Map(clients.map((c) => [c.id, c.name]));
  const projectClients = new Map(projects.map((p) => [p.id, p.client_id]));

  return (projectId) => {
    const clientId = projectId === null ? null : projectClients.get(projectId) ?? null;
    if (clientId === null) return '';
    return clientNames.get(clientId) ?? `Client ${clientId}`;
  };
}

/**
 * Round to 2 decimal places
 */
export function round(num: number): number {
  return Math.round(num * 100) / 100;
}
