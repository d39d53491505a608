/**
 * GitHub Service API - Public Interface
 *
 * The client and the objects it hands out while walking organizations,
 * repositories and issues.
 *
 * @module services/github
 */

export { GitHubClient, type ClientOptions } from './client';
export { Organization } from './organization';
export { Repository } from './repository';
export { Issue } from './issue';
export { Cached, type CacheState, type LoadResult } from './cached';
export { buildRelations, splitFlags } from './relations';
