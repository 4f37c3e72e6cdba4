/**
 * MCP Tool Registration
 *
 * Registers the Tick tools with the MCP server
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import * as z from 'zod';
import type { Logger } from '../logger.js';
import type { TickToolHandlers } from './handlers.js';
import { runTool } from './result.js';

export { TickToolHandlers } from './handlers.js';
export { describeError, runTool, toToolResult } from './result.js';

const numeric = () => z.union([z.number(), z.string()]);

export const TOOL_NAMES = [
  'get_time_entries',
  'create_time_entry',
  'update_time_entry',
  'delete_time_entry',
  'list_projects',
  'get_project_tasks',
  'get_time_summary_by_period',
  'list_clients',
  'get_team_overview',
  'get_time_entries_for_sheets',
] as const;

export function registerTools(server: McpServer, handlers: TickToolHandlers, logger: Logger): void {
  // ============================================
  // TIME ENTRY TOOLS
  // ============================================

  const entryFilters = {
    project: z.string().optional().describe('Project name (partial match, case insensitive)'),
    start_date: z.string().optional().describe('Start date (YYYY-MM-DD), inclusive'),
    end_date: z.string().optional().describe('End date (YYYY-MM-DD), inclusive'),
  };

  server.tool(
    'get_time_entries',
    'Get time entries, optionally filtered by project name and an inclusive date range. Fetches every page.',
    entryFilters,
    async (params) => runTool('get_time_entries', logger, () => handlers.getTimeEntries(params))
  );

  server.tool(
    'create_time_entry',
    'Create a time entry. Project and task are matched by partial, case-insensitive name; the task is looked up within the project.',
    {
      project: z.string().describe('Project name (partial match, case insensitive)'),
      task: z.string().describe('Task name within the project (partial match, case insensitive)'),
      hours: numeric().describe('Hours to log, decimal allowed (e.g. 2.5)'),
      date: z.string().describe('Date (YYYY-MM-DD)'),
      notes: z.string().optional().describe('Notes/description'),
    },
    async (params) => runTool('create_time_entry', logger, () => handlers.createTimeEntry(params))
  );

  server.tool(
    'update_time_entry',
    'Update the hours and/or notes of an existing time entry',
    {
      entry_id: numeric().describe('Time entry ID'),
      hours: numeric().optional().describe('New number of hours'),
      notes: z.string().optional().describe('New notes'),
    },
    async (params) => runTool('update_time_entry', logger, () => handlers.updateTimeEntry(params))
  );

  server.tool(
    'delete_time_entry',
    'Delete a time entry. Use this to remove erroneous or unwanted time entries.',
    {
      entry_id: numeric().describe('Time entry ID to delete'),
    },
    async (params) => runTool('delete_time_entry', logger, () => handlers.deleteTimeEntry(params))
  );

  // ============================================
  // PROJECT & CLIENT TOOLS
  // ============================================

  server.tool(
    'list_projects',
    'List all projects with client, budget, hours used and remaining budget',
    {},
    async () => runTool('list_projects', logger, () => handlers.listProjects())
  );

  server.tool(
    'get_project_tasks',
    'List the tasks of a project (project matched by partial, case-insensitive name)',
    {
      project: z.string().describe('Project name (partial match, case insensitive)'),
    },
    async (params) => runTool('get_project_tasks', logger, () => handlers.getProjectTasks(params))
  );

  server.tool(
    'list_clients',
    'List all clients with their project counts, budgets and logged hours',
    {},
    async () => runTool('list_clients', logger, () => handlers.listClients())
  );

  // ============================================
  // REPORTING TOOLS
  // ============================================

  server.tool(
    'get_time_summary_by_period',
    'Summarize logged time for a day, week or month: total hours, hours by project and hours for every date in the period.',
    {
      period: z.string().optional().describe('Period type: day, week or month (default: week)'),
      start_date: z.string().optional()
        .describe('Any date inside the period (YYYY-MM-DD, default: today)'),
    },
    async (params) => runTool('get_time_summary_by_period', logger, () => handlers.getTimeSummaryByPeriod(params))
  );

  server.tool(
    'get_team_overview',
    'Show each team member\'s hours and entry count over the recent window (default: last 7 days), busiest first',
    {},
    async () => runTool('get_team_overview', logger, () => handlers.getTeamOverview())
  );

  server.tool(
    'get_time_entries_for_sheets',
    'Get time entries as rows ready to paste into a spreadsheet (header row first)',
    {
      ...entryFilters,
      format_for_sheets: z.boolean().optional()
        .describe('Return spreadsheet rows (default: true); false returns the plain entry list'),
    },
    async (params) => runTool('get_time_entries_for_sheets', logger, () => handlers.getTimeEntriesForSheets(params))
  );
}
