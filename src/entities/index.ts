/**
 * Name Resolution Module
 */

export { NameResolver } from './name-resolver.js';
export type {
  EntityType,
  ResolvedEntity,
  ResolveOptions,
  NameSearchResult,
} from './types.js';
