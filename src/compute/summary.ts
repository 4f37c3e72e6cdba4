/**
 * Period Summary Calculator
 *
 * Totals the entries of one day, week or month, by project and by date.
 */

import type { TickClient } from '../tick/client.js';
import type { Entry } from '../tick/types.js';
import { loadEntryCatalog } from './catalog.js';
import { eachDate, isWithin, periodWindow } from './dates.js';
import { buildProjectLookup, round, type EntryProject } from './lookup.js';
import type {
  DateRange,
  Period,
  PeriodSummary,
  ProjectHours,
  ReportingPolicy,
} from './types.js';

/**
 * Aggregate entries over a window. Entries dated outside the window are ignored.
 */
export function summarizeEntries(
  period: Period,
  window: DateRange,
  entries: Entry[],
  projectOf: (entry: Entry) => EntryProject
): PeriodSummary {
  const hoursByDate: Record<string, number> = {};
  for (const date of eachDate(window)) {
    hoursByDate[date] = 0;
  }

  const projects = new Map<string, ProjectHours>();
  const loggedDates = new Set<string>();
  let totalHours = 0;
  let totalEntries = 0;

  for (const entry of entries) {
    if (!isWithin(entry.date, window)) continue;

    const hours = entry.hours ?? 0;
    totalHours += hours;
    totalEntries++;
    loggedDates.add(entry.date);
    hoursByDate[entry.date] = (hoursByDate[entry.date] ?? 0) + hours;

    const project = projectOf(entry);
    const key = project.id === null ? 'unknown' : String(project.id);
    const group = projects.get(key) ?? { project_id: project.id, name: project.name, hours: 0, entries: 0 };
    group.hours += hours;
    group.entries++;
    projects.set(key, group);
  }

  for (const date of Object.keys(hoursByDate)) {
    hoursByDate[date] = round(hoursByDate[date]);
  }

  const hoursByProject = [...projects.values()]
    .map((group) => ({ ...group, hours: round(group.hours) }))
    .sort((a, b) => b.hours - a.hours);

  return {
    period,
    date_range: window,
    total_hours: round(totalHours),
    total_entries: totalEntries,
    average_hours_per_logged_day: round(totalHours / Math.max(1, loggedDates.size)),
    hours_by_project: hoursByProject,
    hours_by_date: hoursByDate,
  };
}

export class TimeSummaryCalculator {
  private client: TickClient;
  private policy: ReportingPolicy;

  constructor(client: TickClient, policy: ReportingPolicy) {
    this.client = client;
    this.policy = policy;
  }

  /**
   * Summarize the period containing the anchor date (default: today)
   */
  async summarize(period: Period, anchor?: Date): Promise<PeriodSummary> {
    const window = periodWindow(period, anchor ?? this.policy.now(), this.policy.weekStartsOn);

    const entries = await this.client.listAllEntries({ start_date: window.from, end_date: window.to });
    const { projects, tasks } = await loadEntryCatalog(this.client, entries);

    return summarizeEntries(period, window, entries, buildProjectLookup(projects, tasks));
  }
}
