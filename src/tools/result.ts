/**
 * Conversion of handler outcomes into MCP tool results
 */

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import {
  NotFoundError,
  RemoteError,
  ResolutionError,
  ValidationError,
} from '../errors.js';
import type { Logger } from '../logger.js';

const MAX_LISTED_CANDIDATES = 50;

export function toToolResult(data: unknown): CallToolResult {
  return {
    content: [{ type: 'text', text: JSON.stringify(data, null, 2) }],
  };
}

function errorResult(text: string): CallToolResult {
  return {
    content: [{ type: 'text', text }],
    isError: true,
  };
}

/**
 * Map an error to the text the assistant sees
 */
export function describeError(error: unknown): string {
  if (error instanceof ValidationError) {
    return `Invalid arguments: ${error.message}`;
  }

  if (error instanceof ResolutionError) {
    if (error.available.length === 0) {
      return error.message;
    }
    const listed = error.available.slice(0, MAX_LISTED_CANDIDATES).join(', ');
    const more = error.available.length > MAX_LISTED_CANDIDATES
      ? ` (and ${error.available.length - MAX_LISTED_CANDIDATES} more)`
      : '';
    return `${error.message}\n\nAvailable ${error.category}s: ${listed}${more}`;
  }

  if (error instanceof NotFoundError) {
    return `Not found: ${error.message}`;
  }

  if (error instanceof RemoteError) {
    if (error.isUnauthorized) {
      return `${error.message}. Check TICK_API_TOKEN and TICK_SUBDOMAIN.`;
    }
    if (error.isRateLimited) {
      return `${error.message}. Tick is rate limiting requests, try again shortly.`;
    }
    return error.message;
  }

  const message = error instanceof Error ? error.message : String(error);
  return `Unexpected error: ${message}`;
}

/**
 * Run a tool action; every failure comes back as an error result
 */
export async function runTool<T>(
  name: string,
  logger: Logger,
  action: () => Promise<T>
): Promise<CallToolResult> {
  const start = Date.now();
  try {
    const data = await action();
    logger.debug(`${name} ok ${Date.now() - start}ms`);
    return toToolResult(data);
  } catch (error) {
    const text = describeError(error);
    if (
      error instanceof ValidationError ||
      error instanceof ResolutionError ||
      error instanceof NotFoundError ||
      error instanceof RemoteError
    ) {
      logger.warn(`${name} failed: ${text.split('\n')[0]}`);
    } else {
      logger.error(`${name} failed unexpectedly:`, error);
    }
    return errorResult(text);
  }
}
