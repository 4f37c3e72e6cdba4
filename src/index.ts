#!/usr/bin/env node
/**
 * Tick MCP Server - Entry Point
 *
 * Exposes the Tick time tracking API as MCP tools. Serves over stdio by
 * default, or Streamable HTTP when MCP_TRANSPORT=http.
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import { loadConfig, type Config } from './config.js';
import { ConfigurationError } from './errors.js';
import { createLogger } from './logger.js';
import { createMcpServer } from './server.js';
import { createHttpApp } from './http/app.js';

function readConfig(): Config {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(`Configuration error: ${error.message}`);
      process.exit(1);
    }
    throw error;
  }
}

async function main(): Promise<void> {
  const config = readConfig();
  const logger = createLogger(config.logging.level);

  if (config.server.transport === 'http') {
    const app = createHttpApp(config, () => createMcpServer(config, { logger }), logger);
    const { port, host } = config.server;

    app.listen(port, host, () => {
      logger.info(`Tick MCP Server running at http://${host}:${port}`);
      logger.info(`MCP endpoint: http://${host}:${port}/mcp`);
    });
    return;
  }

  const server = createMcpServer(config, { logger });
  await server.connect(new StdioServerTransport());
  logger.info(`Tick MCP Server running on stdio for ${config.tick.subdomain}.tickspot.com`);
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
