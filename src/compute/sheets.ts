/**
 * Spreadsheet-friendly export of time entries
 */

import type { Entry } from '../tick/types.js';
import type { EntryProject } from './lookup.js';
import type { SheetCell, SheetExport } from './types.js';

export const SHEET_HEADERS = ['Date', 'Project', 'Task', 'User', 'Hours', 'Notes', 'Client'];

export interface SheetLookups {
  projectOf: (entry: Entry) => EntryProject;
  taskName: (taskId: number) => string;
  userName: (userId: number) => string;
  clientOf: (projectId: number | null) => string;
}

export function toSheetRows(entries: Entry[], lookups: SheetLookups): SheetExport {
  const rows: SheetCell[][] = [SHEET_HEADERS];

  for (const entry of entries) {
    const project = lookups.projectOf(entry);
    rows.push([
      entry.date,
      project.name,
      lookups.taskName(entry.task_id),
      lookups.userName(entry.user_id),
      entry.hours ?? 0,
      entry.notes ?? '',
      lookups.clientOf(project.id),
    ]);
  }

  return {
    headers: SHEET_HEADERS,
    rows,
    total_rows: rows.length,
  };
}
