/**
 * Types for reporting tools (period summary, team overview, sheet export)
 */

export type Period = 'day' | 'week' | 'month';

export interface DateRange {
  from: string;  // YYYY-MM-DD
  to: string;    // YYYY-MM-DD
}

export interface ReportingPolicy {
  /** First day of the summary week (0 = Sunday) */
  weekStartsOn: 0 | 1 | 2 | 3 | 4 | 5 | 6;
  /** Length of the trailing team overview window, today included */
  teamWindowDays: number;
  /** Current instant; injectable for tests */
  now: () => Date;
}

// ============================================
// PERIOD SUMMARY
// ============================================

export interface ProjectHours {
  project_id: number | null;
  name: string;
  hours: number;
  entries: number;
}

export interface PeriodSummary {
  period: Period;
  date_range: DateRange;
  total_hours: number;
  total_entries: number;
  /** Total hours divided by the number of dates that have entries */
  average_hours_per_logged_day: number;
  /** Sorted by hours descending */
  hours_by_project: ProjectHours[];
  /** Every date in the window, zero when nothing was logged */
  hours_by_date: Record<string, number>;
}

// ============================================
// TEAM OVERVIEW
// ============================================

export interface TeamMemberActivity {
  user_id: number;
  name: string;
  email: string;
  timezone: string;
  hours: number;
  entries: number;
  /** Logged more than zero hours in the window */
  is_active: boolean;
}

export interface TeamOverview {
  date_range: DateRange;
  total_users: number;
  active_users: number;
  total_hours: number;
  average_hours_per_active_user: number;
  /** Sorted by hours descending, then name */
  members: TeamMemberActivity[];
}

// ============================================
// SHEET EXPORT
// ============================================

export type SheetCell = string | number;

export interface SheetExport {
  headers: string[];
  /** Header row first, then one row per entry */
  rows: SheetCell[][];
  total_rows: number;
}
