/**
 * Error taxonomy for the Tick MCP Server
 *
 * Each class maps to one kind of tool failure. The tool layer converts
 * them into MCP error results; only ConfigurationError is fatal.
 */

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class ValidationError extends Error {
  constructor(
    message: string,
    public field?: string
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

export type ResolvableCategory = 'project' | 'task' | 'client';

/** Tool that lists the candidates for each category */
const LISTING_TOOLS: Record<ResolvableCategory, string> = {
  project: 'list_projects',
  task: 'get_project_tasks',
  client: 'list_clients',
};

export class ResolutionError extends Error {
  constructor(
    public category: ResolvableCategory,
    public fragment: string,
    public available: string[] = []
  ) {
    super(
      `No ${category} matching '${fragment}' was found. ` +
      `Run ${LISTING_TOOLS[category]} to see the available ${category}s.`
    );
    this.name = 'ResolutionError';
  }
}

export class RemoteError extends Error {
  constructor(
    message: string,
    public statusCode?: number,
    public errorBody?: string
  ) {
    super(message);
    this.name = 'RemoteError';
  }

  get isRateLimited(): boolean {
    return this.statusCode === 429;
  }

  get isUnauthorized(): boolean {
    return this.statusCode === 401;
  }

  get isNotFound(): boolean {
    return this.statusCode === 404;
  }
}

export class NotFoundError extends Error {
  constructor(
    public resource: string,
    public id: number
  ) {
    super(`${resource} ${id} does not exist`);
    this.name = 'NotFoundError';
  }
}
