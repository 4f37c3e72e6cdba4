/**
 * Types for name resolution
 */

import type { ResolvableCategory } from '../errors.js';

export type EntityType = ResolvableCategory;

export interface ResolvedEntity {
  type: EntityType;
  id: number;
  name: string;
}

export interface ResolveOptions {
  /** Parent project; required when resolving a task */
  projectId?: number;
}

export interface NameSearchResult {
  match: ResolvedEntity | null;
  /** Names of every candidate that was searched, in list order */
  candidates: string[];
}
