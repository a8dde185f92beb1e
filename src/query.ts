import { QueryValidationError } from './errors';
import { ReleaseQueryInputSchema } from './schemas';
import type { ReleaseQuery, ReleaseQueryInput } from './types';

export const DEFAULT_CACHE_TTL = 24 * 60 * 60 * 1000; // One day

const GITHUB_API_URL = 'https://api.github.com';

/**
 * Validates the input and fills in defaults. The returned query is frozen.
 * @throws QueryValidationError listing every invalid field
 */
export function createReleaseQuery(input: ReleaseQueryInput): ReleaseQuery {
  const parsed = ReleaseQueryInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new QueryValidationError(parsed.error.issues.map(issue => issue.message));
  }

  const data = parsed.data;
  const query: ReleaseQuery = {
    identifier: data.identifier,
    currentVersion: data.currentVersion,
    releaseEndpoint: data.releaseEndpoint,
    includeMinorBumps: data.includeMinorBumps ?? true,
    includePrereleases: data.includePrereleases ?? false,
    cacheEnabled: data.cacheEnabled ?? true,
    cacheKey: data.cacheKey ?? `release-update:${data.identifier}`,
    cacheTTL: data.cacheTTL ?? DEFAULT_CACHE_TTL,
    ...(data.authToken !== undefined ? { authToken: data.authToken } : {}),
  };

  return Object.freeze(query);
}

/**
 * Builds the releases endpoint for an "owner/name" repository
 * @param options.latest When false, points at the full release list instead of /latest
 */
export function githubReleaseEndpoint(repo: string, options: { latest?: boolean } = {}): string {
  const trimmed = repo.trim().replace(/^\/+|\/+$/g, '');
  if (!/^[\w.-]+\/[\w.-]+$/.test(trimmed)) {
    throw new QueryValidationError([`repo must look like "owner/name", got "${repo}"`]);
  }

  const base = `${GITHUB_API_URL}/repos/${trimmed}/releases`;
  return options.latest === false ? base : `${base}/latest`;
}
