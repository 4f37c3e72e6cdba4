import { loadConfig, type Config } from '../../config.js';
import type { FetchLike } from '../../tick/client.js';
import type { Client, Entry, Project, Task, User } from '../../tick/types.js';

export interface RecordedCall {
  method: string;
  path: string;
  query: Record<string, string>;
  headers: Record<string, string>;
  body: unknown;
}

export interface FakeReply {
  status?: number;
  body?: unknown;
}

type Route = (call: RecordedCall) => FakeReply;

const API_PREFIX = '/api/v2';

/**
 * In-process stand-in for the Tick API. Routes are keyed by "METHOD /path.json";
 * every request is recorded in order.
 */
export class FakeTick {
  readonly calls: RecordedCall[] = [];
  private routes = new Map<string, Route>();

  on(method: string, path: string, reply: FakeReply | Route): this {
    this.routes.set(`${method} ${path}`, typeof reply === 'function' ? reply : () => reply);
    return this;
  }

  /** Serve `pages[n - 1]` for `?page=n`, an empty list past the end */
  onPages(path: string, pages: unknown[][]): this {
    return this.on('GET', path, (call) => {
      const page = Number(call.query.page ?? '1');
      return { body: pages[page - 1] ?? [] };
    });
  }

  callsTo(method: string, path: string): RecordedCall[] {
    return this.calls.filter((call) => call.method === method && call.path === path);
  }

  readonly fetch: FetchLike = async (input, init) => {
    const url = new URL(input);
    const headers: Record<string, string> = {};
    new Headers(init.headers).forEach((value, key) => {
      headers[key] = value;
    });

    const call: RecordedCall = {
      method: init.method ?? 'GET',
      path: url.pathname.startsWith(API_PREFIX) ? url.pathname.slice(API_PREFIX.length) : url.pathname,
      query: Object.fromEntries(url.searchParams.entries()),
      headers,
      body: typeof init.body === 'string' ? JSON.parse(init.body) : undefined,
    };
    this.calls.push(call);

    const route = this.routes.get(`${call.method} ${call.path}`);
    if (!route) {
      return new Response(`No fake route for ${call.method} ${call.path}`, { status: 500 });
    }

    const { status = 200, body } = route(call);
    if (body === undefined || status === 204) {
      return new Response(null, { status });
    }
    return new Response(typeof body === 'string' ? body : JSON.stringify(body), { status });
  };
}

/**
 * Await a promise that must reject with the given error class
 */
export async function rejectionOf<T extends Error>(
  promise: Promise<unknown>,
  type: new (...args: never[]) => T
): Promise<T> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof type) return error;
    throw error;
  }
  throw new Error(`Expected a ${type.name} rejection`);
}

export function testConfig(overrides: Record<string, string> = {}): Config {
  return loadConfig({
    TICK_API_TOKEN: 'test-token',
    TICK_SUBDOMAIN: 'acme',
    ...overrides,
  });
}

// ============================================
// FIXTURE BUILDERS
// ============================================

export function project(id: number, name: string, extra: Partial<Project> = {}): Project {
  return {
    id,
    name,
    budget: null,
    date_closed: null,
    notifications: false,
    billable: true,
    recurring: false,
    client_id: null,
    owner_id: 1,
    url: `https://acme.tickspot.com/api/v2/projects/${id}.json`,
    created_at: '2024-01-01T00:00:00.000-05:00',
    updated_at: '2024-01-01T00:00:00.000-05:00',
    ...extra,
  };
}

export function task(id: number, name: string, projectId: number, extra: Partial<Task> = {}): Task {
  return {
    id,
    name,
    budget: null,
    position: 1,
    project_id: projectId,
    date_closed: null,
    billable: true,
    url: `https://acme.tickspot.com/api/v2/tasks/${id}.json`,
    created_at: '2024-01-01T00:00:00.000-05:00',
    updated_at: '2024-01-01T00:00:00.000-05:00',
    ...extra,
  };
}

export function entry(id: number, date: string, hours: number, extra: Partial<Entry> = {}): Entry {
  return {
    id,
    date,
    hours,
    notes: null,
    task_id: 10,
    user_id: 1,
    url: `https://acme.tickspot.com/api/v2/entries/${id}.json`,
    created_at: '2024-01-01T00:00:00.000-05:00',
    updated_at: '2024-01-01T00:00:00.000-05:00',
    ...extra,
  };
}

export function client(id: number, name: string): Client {
  return {
    id,
    name,
    archive: false,
    url: `https://acme.tickspot.com/api/v2/clients/${id}.json`,
    updated_at: '2024-01-01T00:00:00.000-05:00',
  };
}

export function user(id: number, firstName: string, lastName: string): User {
  return {
    id,
    first_name: firstName,
    last_name: lastName,
    email: `${firstName.toLowerCase()}@example.com`,
    timezone: 'Eastern Time (US & Canada)',
    created_at: '2024-01-01T00:00:00.000-05:00',
    updated_at: '2024-01-01T00:00:00.000-05:00',
  };
}
