/**
 * Tick API v2 client
 *
 * Features:
 * - Immutable configuration passed at construction
 * - Injectable fetch implementation (tests use an in-process fake)
 * - Per-request timeout, surfaced as RemoteError
 * - Page accumulation for list endpoints
 *
 * Holds no state between calls: no cache and no retry.
 */

import type {
  Project,
  Task,
  Entry,
  EntryFilterParams,
  CreateEntryParams,
  UpdateEntryParams,
  Client,
  User,
  QueryParams,
} from './types.js';
import type { Config } from '../config.js';
import { NotFoundError, RemoteError } from '../errors.js';

export type TickClientConfig = Readonly<Config['tick']>;

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface TickClientOptions {
  /** fetch implementation (default: global fetch) */
  fetch?: FetchLike;
}

function errorName(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'name' in error && typeof error.name === 'string') {
    return error.name;
  }
  return undefined;
}

export class TickClient {
  private readonly config: TickClientConfig;
  private readonly fetchImpl: FetchLike;

  constructor(config: TickClientConfig, options: TickClientOptions = {}) {
    this.config = Object.freeze({ ...config });
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  /**
   * Request pages 1, 2, ... until a page shorter than the page size comes back.
   * A failing page rejects the whole collection.
   */
  async collectPages<T>(fetchPage: (page: number) => Promise<T[]>): Promise<T[]> {
    const allItems: T[] = [];
    let page = 1;

    while (true) {
      const items = await fetchPage(page);
      allItems.push(...items);

      if (items.length < this.config.pageSize) {
        break;
      }

      page++;
    }

    return allItems;
  }

  private async request<T>(
    method: string,
    path: string,
    body?: Record<string, unknown>,
    params?: QueryParams
  ): Promise<T | undefined> {
    // Build URL
    const url = new URL(`${this.config.apiBaseUrl}${path}`);
    if (params) {
      Object.entries(params).forEach(([key, value]) => {
        if (value !== undefined) {
          url.searchParams.set(key, String(value));
        }
      });
    }

    const headers: Record<string, string> = {
      'Authorization': `Token token=${this.config.apiToken}`,
      'User-Agent': this.config.userAgent,
      'Accept': 'application/json',
    };

    const init: RequestInit = {
      method,
      headers,
      signal: AbortSignal.timeout(this.config.requestTimeoutMs),
    };

    if (body) {
      headers['Content-Type'] = 'application/json';
      init.body = JSON.stringify(body);
    }

    let response: Response;
    try {
      response = await this.fetchImpl(url.toString(), init);
    } catch (error) {
      const name = errorName(error);
      if (name === 'TimeoutError' || name === 'AbortError') {
        throw new RemoteError(
          `Tick API request timed out after ${this.config.requestTimeoutMs}ms: ${method} ${path}`
        );
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new RemoteError(`Tick API request failed: ${method} ${path}: ${reason}`);
    }

    if (!response.ok) {
      const errorBody = await response.text();
      throw new RemoteError(
        `Tick API error: ${response.status} ${response.statusText}`.trim(),
        response.status,
        errorBody
      );
    }

    // Handle 204 No Content
    if (response.status === 204) {
      return undefined;
    }

    const text = await response.text();
    if (!text) {
      return undefined;
    }

    try {
      return JSON.parse(text) as T;
    } catch {
      throw new RemoteError(`Tick API returned invalid JSON for ${method} ${path}`, response.status, text);
    }
  }

  /**
   * GET a JSON array; an empty body counts as an empty list
   */
  private async getList<T>(path: string, params?: QueryParams): Promise<T[]> {
    const data = await this.request<T[]>('GET', path, undefined, params);
    if (data === undefined) return [];
    if (!Array.isArray(data)) {
      throw new RemoteError(`Tick API returned a non-list response for GET ${path}`);
    }
    return data;
  }

  private async send<T>(method: 'POST' | 'PUT', path: string, body: Record<string, unknown>): Promise<T> {
    const data = await this.request<T>(method, path, body);
    if (data === undefined) {
      throw new RemoteError(`Tick API returned an empty response for ${method} ${path}`);
    }
    return data;
  }

  // ============================================
  // Projects & Tasks
  // ============================================

  async listProjects(page = 1): Promise<Project[]> {
    return this.getList<Project>('/projects.json', { page });
  }

  async listAllProjects(): Promise<Project[]> {
    return this.collectPages((page) => this.listProjects(page));
  }

  /** Closed projects are listed separately from open ones */
  async listClosedProjects(page = 1): Promise<Project[]> {
    return this.getList<Project>('/projects/closed.json', { page });
  }

  async listAllClosedProjects(): Promise<Project[]> {
    return this.collectPages((page) => this.listClosedProjects(page));
  }

  async listProjectTasks(projectId: number): Promise<Task[]> {
    return this.getList<Task>(`/projects/${projectId}/tasks.json`);
  }

  /** Open tasks across every project */
  async listTasks(page = 1): Promise<Task[]> {
    return this.getList<Task>('/tasks.json', { page });
  }

  async listAllTasks(): Promise<Task[]> {
    return this.collectPages((page) => this.listTasks(page));
  }

  async listClosedTasks(page = 1): Promise<Task[]> {
    return this.getList<Task>('/tasks/closed.json', { page });
  }

  async listAllClosedTasks(): Promise<Task[]> {
    return this.collectPages((page) => this.listClosedTasks(page));
  }

  // ============================================
  // Clients & Users
  // ============================================

  async listClients(page = 1): Promise<Client[]> {
    return this.getList<Client>('/clients.json', { page });
  }

  async listAllClients(): Promise<Client[]> {
    return this.collectPages((page) => this.listClients(page));
  }

  async listUsers(): Promise<User[]> {
    return this.getList<User>('/users.json');
  }

  // ============================================
  // Time Entries
  // ============================================

  async listEntries(params: EntryFilterParams = {}, page = 1): Promise<Entry[]> {
    return this.getList<Entry>('/entries.json', { ...params, page });
  }

  async listAllEntries(params: EntryFilterParams = {}): Promise<Entry[]> {
    return this.collectPages((page) => this.listEntries(params, page));
  }

  async createEntry(data: CreateEntryParams): Promise<Entry> {
    return this.send<Entry>('POST', '/entries.json', data);
  }

  async updateEntry(id: number, data: UpdateEntryParams): Promise<Entry> {
    try {
      return await this.send<Entry>('PUT', `/entries/${id}.json`, data);
    } catch (error) {
      if (error instanceof RemoteError && error.isNotFound) {
        throw new NotFoundError('Time entry', id);
      }
      throw error;
    }
  }

  async deleteEntry(id: number): Promise<void> {
    try {
      await this.request<void>('DELETE', `/entries/${id}.json`);
    } catch (error) {
      if (error instanceof RemoteError && error.isNotFound) {
        throw new NotFoundError('Time entry', id);
      }
      throw error;
    }
  }
}
