/**
 * MCP server factory
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { Config } from './config.js';
import { createLogger, type Logger } from './logger.js';
import { TickClient, type FetchLike } from './tick/client.js';
import { registerTools, TickToolHandlers } from './tools/index.js';
import type { ReportingPolicy } from './compute/index.js';

export const SERVER_NAME = 'tick-mcp';
export const SERVER_VERSION = '0.1.0';

export interface ServerDependencies {
  fetch?: FetchLike;
  logger?: Logger;
  /** Clock used for default periods and the team window */
  now?: () => Date;
}

export function createHandlers(config: Config, deps: ServerDependencies = {}): TickToolHandlers {
  const client = new TickClient(config.tick, { fetch: deps.fetch });
  const policy: ReportingPolicy = {
    weekStartsOn: config.reporting.weekStartsOn,
    teamWindowDays: config.reporting.teamWindowDays,
    now: deps.now ?? (() => new Date()),
  };
  return new TickToolHandlers(client, policy);
}

/**
 * Create an MCP server with every Tick tool registered
 */
export function createMcpServer(config: Config, deps: ServerDependencies = {}): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  const logger = deps.logger ?? createLogger(config.logging.level);
  registerTools(server, createHandlers(config, deps), logger);

  return server;
}
