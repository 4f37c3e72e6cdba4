/**
 * Name Resolution Service
 *
 * Turns a free-text fragment into a Tick identifier by case-insensitive
 * substring match. The first entity in list order wins; there is no ranking
 * and no caching, so every call fetches the list again.
 */

import type { TickClient } from '../tick/client.js';
import { ResolutionError, ValidationError } from '../errors.js';
import type {
  EntityType,
  ResolvedEntity,
  ResolveOptions,
  NameSearchResult,
} from './types.js';

interface Named {
  id: number;
  name: string;
}

export class NameResolver {
  private client: TickClient;

  constructor(client: TickClient) {
    this.client = client;
  }

  /**
   * Fetch the candidate list for a category
   */
  private async fetchCandidates(type: EntityType, options: ResolveOptions): Promise<Named[]> {
    switch (type) {
      case 'project':
        return this.client.listAllProjects();
      case 'client':
        return this.client.listAllClients();
      case 'task':
        if (options.projectId === undefined) {
          throw new ValidationError('A project is required to resolve a task', 'project');
        }
        return this.client.listProjectTasks(options.projectId);
    }
  }

  /**
   * Search a category, returning the first match and every candidate name
   */
  async search(type: EntityType, fragment: string, options: ResolveOptions = {}): Promise<NameSearchResult> {
    const needle = fragment.trim().toLowerCase();
    if (!needle) {
      throw new ValidationError(`A ${type} name is required`, type);
    }

    const candidates = await this.fetchCandidates(type, options);
    const found = candidates.find((candidate) => candidate.name.toLowerCase().includes(needle));

    return {
      match: found ? { type, id: found.id, name: found.name } : null,
      candidates: candidates.map((candidate) => candidate.name),
    };
  }

  /**
   * Resolve a fragment to an entity, or null when nothing matches.
   * A failed list fetch rejects with the underlying RemoteError.
   */
  async resolve(type: EntityType, fragment: string, options: ResolveOptions = {}): Promise<ResolvedEntity | null> {
    const { match } = await this.search(type, fragment, options);
    return match;
  }

  /**
   * Resolve a fragment or throw a ResolutionError listing the candidates
   */
  async resolveOrFail(type: EntityType, fragment: string, options: ResolveOptions = {}): Promise<ResolvedEntity> {
    const { match, candidates } = await this.search(type, fragment, options);
    if (!match) {
      throw new ResolutionError(type, fragment.trim(), candidates);
    }
    return match;
  }
}
