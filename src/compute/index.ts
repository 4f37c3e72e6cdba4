/**
 * Compute Module
 *
 * Date windows and the aggregations behind the reporting tools.
 */

export { TimeSummaryCalculator, summarizeEntries } from './summary.js';
export { TeamOverviewCalculator, buildTeamOverview } from './team.js';
export { toSheetRows, SHEET_HEADERS } from './sheets.js';
export { buildProjectLookup, buildUserLookup, buildTaskLookup, buildClientLookup, userDisplayName, round } from './lookup.js';
export { loadEntryCatalog } from './catalog.js';
export {
  parseIsoDate,
  isIsoDate,
  formatIsoDate,
  periodWindow,
  trailingWindow,
  eachDate,
  isWithin,
} from './dates.js';
export type { EntryProject } from './lookup.js';
export type { SheetLookups } from './sheets.js';
export type { EntryCatalog, CatalogOptions } from './catalog.js';
export type {
  Period,
  DateRange,
  ReportingPolicy,
  ProjectHours,
  PeriodSummary,
  TeamMemberActivity,
  TeamOverview,
  SheetCell,
  SheetExport,
} from './types.js';
