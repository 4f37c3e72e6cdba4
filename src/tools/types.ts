/**
 * Tool argument and result shapes
 */

import type { ResolvedEntity } from '../entities/index.js';
import type { SheetCell } from '../compute/index.js';
import type { Entry } from '../tick/types.js';

// ============================================
// ARGUMENTS
// ============================================

/** Identifiers and hours may arrive as numbers or numeric strings */
export type NumericArg = number | string;

export interface TimeEntriesArgs {
  project?: string;
  start_date?: string;
  end_date?: string;
}

export interface SheetExportArgs extends TimeEntriesArgs {
  /** When false, the plain get_time_entries result is returned */
  format_for_sheets?: boolean;
}

export interface CreateTimeEntryArgs {
  project: string;
  task: string;
  hours: NumericArg;
  date: string;
  notes?: string;
}

export interface UpdateTimeEntryArgs {
  entry_id: NumericArg;
  hours?: NumericArg;
  notes?: string;
}

export interface DeleteTimeEntryArgs {
  entry_id: NumericArg;
}

export interface ProjectTasksArgs {
  project: string;
}

export interface TimeSummaryArgs {
  period?: string;
  start_date?: string;
}

// ============================================
// RESULTS
// ============================================

export interface TimeEntriesResult {
  project: string;
  project_id: number | null;
  date_range: string;
  total_entries: number;
  total_hours: number;
  /** Keyed by user display name */
  hours_by_user: Record<string, number>;
  entries: Entry[];
}

export interface CreateTimeEntryResult {
  success: true;
  message: string;
  project: ResolvedEntity;
  task: ResolvedEntity;
  entry: Entry;
}

export interface UpdateTimeEntryResult {
  success: true;
  message: string;
  entry: Entry;
}

export interface DeleteTimeEntryResult {
  success: true;
  message: string;
}

export interface ProjectSummary {
  id: number;
  name: string;
  client_id: number | null;
  client: string;
  owner_id: number;
  owner: string;
  budget: number;
  hours_used: number;
  budget_remaining: number;
  billable: boolean;
  is_active: boolean;
}

export interface ProjectListResult {
  total_projects: number;
  total_budget: number;
  total_hours_logged: number;
  projects: ProjectSummary[];
}

export interface TaskSummary {
  id: number;
  name: string;
  budget: number;
  hours_used: number;
  billable: boolean;
  is_active: boolean;
}

export interface ProjectTasksResult {
  project: string;
  project_id: number;
  total_tasks: number;
  tasks: TaskSummary[];
}

export interface ClientSummary {
  id: number;
  name: string;
  archived: boolean;
  project_count: number;
  total_budget: number;
  total_hours_logged: number;
  projects: string[];
}

export interface ClientListResult {
  total_clients: number;
  clients: ClientSummary[];
}

export interface SheetExportResult {
  success: true;
  sheet_data: SheetCell[][];
  headers: string[];
  total_rows: number;
  summary: {
    project: string;
    date_range: string;
    total_entries: number;
    total_hours: number;
  };
}
