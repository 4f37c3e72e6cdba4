/**
 * Tick API v2 type definitions
 */

// Project
export interface Project {
  id: number;
  name: string;
  budget: number | null;
  date_closed: string | null;
  notifications: boolean;
  billable: boolean;
  recurring: boolean;
  client_id: number | null;
  owner_id: number;
  url: string;
  created_at: string;
  updated_at: string;
  /** Present on most Tick responses; treated as 0 when missing */
  total_hours?: number;
}

// Task
export interface Task {
  id: number;
  name: string;
  budget: number | null;
  position: number;
  project_id: number;
  date_closed: string | null;
  billable: boolean;
  url: string;
  created_at: string;
  updated_at: string;
  total_hours?: number;
}

// Time entry
export interface Entry {
  id: number;
  date: string; // YYYY-MM-DD
  hours: number;
  notes: string | null;
  task_id: number;
  user_id: number;
  /** Included when the entry was listed through a project filter */
  project_id?: number;
  url: string;
  created_at: string;
  updated_at: string;
}

export interface EntryFilterParams {
  start_date?: string;
  end_date?: string;
  project_id?: number;
  task_id?: number;
  user_id?: number;
}

export interface CreateEntryParams {
  [key: string]: unknown;
  project_id: number;
  task_id: number;
  hours: number;
  date: string;
  notes?: string;
}

export interface UpdateEntryParams {
  [key: string]: unknown;
  hours?: number;
  notes?: string;
}

// Client
export interface Client {
  id: number;
  name: string;
  archive: boolean;
  url: string;
  updated_at: string;
}

// User
export interface User {
  id: number;
  first_name: string;
  last_name: string;
  email: string;
  timezone: string;
  created_at: string;
  updated_at: string;
}

export type QueryParams = Record<string, string | number | boolean | undefined>;
