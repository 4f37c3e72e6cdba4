/**
 * Streamable HTTP transport
 *
 * Express app serving MCP sessions on /mcp, for hosts that connect over
 * HTTP instead of spawning the process. Each initialize request opens a
 * session with its own McpServer; later requests name it through the
 * mcp-session-id header.
 */

import express from 'express';
import cors from 'cors';
import rateLimit from 'express-rate-limit';
import { randomUUID } from 'node:crypto';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { isInitializeRequest } from '@modelcontextprotocol/sdk/types.js';

import type { Config } from '../config.js';
import type { Logger } from '../logger.js';
import { SERVER_VERSION } from '../server.js';

const SESSION_HEADER = 'mcp-session-id';

function rpcError(res: express.Response, status: number, code: number, message: string): void {
  res.status(status).json({ jsonrpc: '2.0', error: { code, message }, id: null });
}

export function createHttpApp(
  config: Config,
  createServer: () => McpServer,
  logger: Logger
): express.Express {
  const sessions = new Map<string, StreamableHTTPServerTransport>();
  const { allowedOrigins } = config.security;
  const originAllowed = (origin: string): boolean =>
    allowedOrigins.includes('*') || allowedOrigins.includes(origin);

  const app = express();

  app.use((req, res, next) => {
    const started = Date.now();
    res.on('finish', () => {
      const line = `${req.method} ${req.path} ${res.statusCode} ${Date.now() - started}ms`;
      if (res.statusCode >= 400) logger.warn(line);
      else logger.debug(line);
    });
    next();
  });

  // Browser clients outside the allow-list are refused outright; requests
  // without an Origin (CLI clients, same-origin) pass
  app.use((req, res, next) => {
    const origin = req.headers.origin;
    if (origin && !originAllowed(origin)) {
      rpcError(res, 403, -32000, `Origin ${origin} is not allowed`);
      return;
    }
    next();
  });

  app.use(cors({
    origin: true,
    methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', SESSION_HEADER, 'Authorization'],
    exposedHeaders: [SESSION_HEADER],
    maxAge: 86400,
  }));

  app.use(rateLimit({
    windowMs: config.rateLimit.windowMs,
    limit: config.rateLimit.maxRequests,
    standardHeaders: true,
    legacyHeaders: false,
    skip: (req) => req.path === '/health',
    handler: (_req, res) => rpcError(res, 429, -32000, 'Too many requests, please try again later'),
  }));

  app.use(express.json());

  const sessionOf = (req: express.Request): StreamableHTTPServerTransport | undefined => {
    const id = req.headers[SESSION_HEADER];
    return typeof id === 'string' ? sessions.get(id) : undefined;
  };

  // Express 4 drops rejected handler promises; answer them here
  const guarded = (
    handler: (req: express.Request, res: express.Response) => Promise<void>
  ): express.RequestHandler => (req, res) => {
    handler(req, res).catch((error: unknown) => {
      logger.error(`${req.method} ${req.path} failed:`, error);
      if (!res.headersSent) {
        rpcError(res, 500, -32603, 'Internal server error');
      }
    });
  };

  const openSession = async (): Promise<StreamableHTTPServerTransport> => {
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
      onsessioninitialized: (id) => {
        sessions.set(id, transport);
        logger.info(`Session opened: ${id}`);
      },
    });
    transport.onclose = () => {
      const id = transport.sessionId;
      if (id && sessions.delete(id)) {
        logger.info(`Session closed: ${id}`);
      }
    };
    await createServer().connect(transport);
    return transport;
  };

  app.post('/mcp', guarded(async (req, res) => {
    let transport = sessionOf(req);
    if (!transport) {
      if (req.headers[SESSION_HEADER] !== undefined || !isInitializeRequest(req.body)) {
        rpcError(res, 400, -32000, 'Invalid session or missing mcp-session-id header');
        return;
      }
      transport = await openSession();
    }
    await transport.handleRequest(req, res, req.body);
  }));

  // GET streams server messages, DELETE ends the session
  const existingSession = guarded(async (req, res) => {
    const transport = sessionOf(req);
    if (!transport) {
      rpcError(res, 400, -32000, 'Invalid session or missing mcp-session-id header');
      return;
    }
    await transport.handleRequest(req, res);
  });
  app.get('/mcp', existingSession);
  app.delete('/mcp', existingSession);

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', version: SERVER_VERSION, activeSessions: sessions.size });
  });

  return app;
}
