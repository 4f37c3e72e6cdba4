/**
 * Tool handlers
 *
 * One method per tool. Each validates its arguments, resolves names,
 * calls Tick and returns a plain result object. Failures are thrown as the
 * typed errors from ../errors.js; converting them is the caller's job.
 */

import type { TickClient } from '../tick/client.js';
import type { Entry, UpdateEntryParams, CreateEntryParams, User } from '../tick/types.js';
import { NameResolver, type ResolvedEntity } from '../entities/index.js';
import { ValidationError } from '../errors.js';
import {
  TimeSummaryCalculator,
  TeamOverviewCalculator,
  buildClientLookup,
  buildProjectLookup,
  buildTaskLookup,
  buildUserLookup,
  isWithin,
  loadEntryCatalog,
  parseIsoDate,
  round,
  toSheetRows,
  type Period,
  type PeriodSummary,
  type ReportingPolicy,
  type SheetExport,
  type TeamOverview,
} from '../compute/index.js';
import {
  optionalDate,
  optionalText,
  parseHours,
  parseId,
  requireDate,
  requireDateOrder,
  requireText,
} from './validation.js';
import type {
  TimeEntriesArgs,
  SheetExportArgs,
  CreateTimeEntryArgs,
  UpdateTimeEntryArgs,
  DeleteTimeEntryArgs,
  ProjectTasksArgs,
  TimeSummaryArgs,
  TimeEntriesResult,
  CreateTimeEntryResult,
  UpdateTimeEntryResult,
  DeleteTimeEntryResult,
  ProjectListResult,
  ProjectTasksResult,
  ClientListResult,
  SheetExportResult,
} from './types.js';

const PERIODS: readonly Period[] = ['day', 'week', 'month'];

export class TickToolHandlers {
  private client: TickClient;
  private resolver: NameResolver;
  private policy: ReportingPolicy;

  constructor(client: TickClient, policy: ReportingPolicy) {
    this.client = client;
    this.policy = policy;
    this.resolver = new NameResolver(client);
  }

  // ============================================
  // TIME ENTRIES
  // ============================================

  async getTimeEntries(args: TimeEntriesArgs): Promise<TimeEntriesResult> {
    const { result } = await this.collectEntries(args);
    return result;
  }

  /**
   * Entries in range plus the user list behind `hours_by_user`; users are
   * only fetched when there is at least one entry
   */
  private async collectEntries(args: TimeEntriesArgs): Promise<{ result: TimeEntriesResult; users: User[] }> {
    const startDate = optionalDate(args.start_date, 'start_date');
    const endDate = optionalDate(args.end_date, 'end_date');
    requireDateOrder(startDate, endDate);
    const projectName = optionalText(args.project);

    let project: ResolvedEntity | null = null;
    if (projectName) {
      project = await this.resolver.resolveOrFail('project', projectName);
    }

    const fetched = await this.client.listAllEntries({
      start_date: startDate,
      end_date: endDate,
      project_id: project?.id,
    });
    const entries = fetched.filter((entry) => isWithin(entry.date, { from: startDate, to: endDate }));

    const users = entries.length > 0 ? await this.client.listUsers() : [];
    const userName = buildUserLookup(users);
    const hoursByUser: Record<string, number> = {};
    for (const entry of entries) {
      const name = userName(entry.user_id);
      hoursByUser[name] = round((hoursByUser[name] ?? 0) + (entry.hours ?? 0));
    }

    return {
      result: {
        project: project?.name ?? 'All projects',
        project_id: project?.id ?? null,
        date_range: `${startDate ?? 'beginning'} to ${endDate ?? 'now'}`,
        total_entries: entries.length,
        total_hours: round(entries.reduce((sum, entry) => sum + (entry.hours ?? 0), 0)),
        hours_by_user: hoursByUser,
        entries,
      },
      users,
    };
  }

  async createTimeEntry(args: CreateTimeEntryArgs): Promise<CreateTimeEntryResult> {
    // Every local check happens before the first request
    const projectName = requireText(args.project, 'project');
    const taskName = requireText(args.task, 'task');
    const hours = parseHours(args.hours);
    const date = requireDate(args.date, 'date');
    const notes = optionalText(args.notes);

    const project = await this.resolver.resolveOrFail('project', projectName);
    const task = await this.resolver.resolveOrFail('task', taskName, { projectId: project.id });

    const payload: CreateEntryParams = {
      project_id: project.id,
      task_id: task.id,
      hours,
      date,
    };
    if (notes !== undefined) {
      payload.notes = notes;
    }

    const created = await this.client.createEntry(payload);

    return {
      success: true,
      message: `Created ${hours} hour entry for ${project.name} - ${task.name} on ${date}`,
      project,
      task,
      entry: {
        ...created,
        project_id: created.project_id ?? project.id,
        task_id: created.task_id ?? task.id,
        hours: created.hours ?? hours,
        date: created.date ?? date,
        notes: created.notes ?? notes ?? null,
      },
    };
  }

  async updateTimeEntry(args: UpdateTimeEntryArgs): Promise<UpdateTimeEntryResult> {
    const entryId = parseId(args.entry_id, 'entry_id');
    if (args.hours === undefined && args.notes === undefined) {
      throw new ValidationError('Provide hours or notes to update', 'hours');
    }

    const changes: UpdateEntryParams = {};
    if (args.hours !== undefined) {
      changes.hours = parseHours(args.hours);
    }
    if (args.notes !== undefined) {
      changes.notes = args.notes;
    }

    const entry: Entry = await this.client.updateEntry(entryId, changes);

    return {
      success: true,
      message: `Updated time entry ${entryId}`,
      entry,
    };
  }

  async deleteTimeEntry(args: DeleteTimeEntryArgs): Promise<DeleteTimeEntryResult> {
    const entryId = parseId(args.entry_id, 'entry_id');
    await this.client.deleteEntry(entryId);

    return {
      success: true,
      message: `Deleted time entry ${entryId}`,
    };
  }

  // ============================================
  // PROJECTS, TASKS & CLIENTS
  // ============================================

  /**
   * Open and closed projects, with client and owner names
   */
  async listProjects(): Promise<ProjectListResult> {
    const open = await this.client.listAllProjects();
    const closed = await this.client.listAllClosedProjects();
    const projects = [...open, ...closed];
    const clients = await this.client.listAllClients();
    const users = await this.client.listUsers();
    const clientNames = new Map(clients.map((c) => [c.id, c.name]));
    const ownerName = buildUserLookup(users);

    const rows = projects.map((p) => {
      const budget = p.budget ?? 0;
      const hoursUsed = p.total_hours ?? 0;
      return {
        id: p.id,
        name: p.name,
        client_id: p.client_id,
        client: p.client_id === null ? 'No client' : clientNames.get(p.client_id) ?? `Client ${p.client_id}`,
        owner_id: p.owner_id,
        owner: ownerName(p.owner_id),
        budget,
        hours_used: round(hoursUsed),
        budget_remaining: round(budget - hoursUsed),
        billable: p.billable,
        is_active: !p.date_closed,
      };
    });

    return {
      total_projects: rows.length,
      total_budget: round(rows.reduce((sum, p) => sum + p.budget, 0)),
      total_hours_logged: round(rows.reduce((sum, p) => sum + p.hours_used, 0)),
      projects: rows,
    };
  }

  async getProjectTasks(args: ProjectTasksArgs): Promise<ProjectTasksResult> {
    const project = await this.resolver.resolveOrFail('project', requireText(args.project, 'project'));
    const tasks = await this.client.listProjectTasks(project.id);

    return {
      project: project.name,
      project_id: project.id,
      total_tasks: tasks.length,
      tasks: tasks.map((t) => ({
        id: t.id,
        name: t.name,
        budget: t.budget ?? 0,
        hours_used: round(t.total_hours ?? 0),
        billable: t.billable,
        is_active: !t.date_closed,
      })),
    };
  }

  async listClients(): Promise<ClientListResult> {
    const clients = await this.client.listAllClients();
    const projects = await this.client.listAllProjects();

    return {
      total_clients: clients.length,
      clients: clients.map((client) => {
        const owned = projects.filter((p) => p.client_id === client.id);
        return {
          id: client.id,
          name: client.name,
          archived: client.archive ?? false,
          project_count: owned.length,
          total_budget: round(owned.reduce((sum, p) => sum + (p.budget ?? 0), 0)),
          total_hours_logged: round(owned.reduce((sum, p) => sum + (p.total_hours ?? 0), 0)),
          projects: owned.map((p) => p.name),
        };
      }),
    };
  }

  // ============================================
  // REPORTING
  // ============================================

  async getTimeSummaryByPeriod(args: TimeSummaryArgs): Promise<PeriodSummary> {
    const period = (args.period ?? 'week').trim().toLowerCase();
    const match = PERIODS.find((p) => p === period);
    if (!match) {
      throw new ValidationError(`period must be one of ${PERIODS.join(', ')}, got '${args.period}'`, 'period');
    }

    const startDate = optionalDate(args.start_date, 'start_date');
    const anchor = startDate ? parseIsoDate(startDate) ?? undefined : undefined;

    return new TimeSummaryCalculator(this.client, this.policy).summarize(match, anchor);
  }

  async getTeamOverview(): Promise<TeamOverview> {
    return new TeamOverviewCalculator(this.client, this.policy).overview();
  }

  async getTimeEntriesForSheets(args: SheetExportArgs): Promise<SheetExportResult | TimeEntriesResult> {
    const { result, users } = await this.collectEntries(args);
    if (args.format_for_sheets === false) {
      return result;
    }

    const { projects, tasks } = await loadEntryCatalog(this.client, result.entries, { taskNames: true });
    const clients = projects.some((p) => p.client_id !== null)
      ? await this.client.listAllClients()
      : [];

    const sheet: SheetExport = toSheetRows(result.entries, {
      projectOf: buildProjectLookup(projects, tasks),
      taskName: buildTaskLookup(tasks),
      userName: buildUserLookup(users),
      clientOf: buildClientLookup(projects, clients),
    });

    return {
      success: true,
      sheet_data: sheet.rows,
      headers: sheet.headers,
      total_rows: sheet.total_rows,
      summary: {
        project: result.project,
        date_range: result.date_range,
        total_entries: result.total_entries,
        total_hours: result.total_hours,
      },
    };
  }
}
