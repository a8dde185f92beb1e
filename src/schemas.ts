import { z } from 'zod';
import { isValidVersion } from './version';

export const GitHubAssetSchema = z.object({
  name: z.string(),
  browser_download_url: z.string(),
});

/**
 * Release metadata as served by GitHub's releases API. Only tag_name is required;
 * unknown fields pass through untouched.
 */
export const GitHubReleaseSchema = z.object({
  tag_name: z.string().min(1),
  name: z.string().nullish(),
  body: z.string().nullish(),
  html_url: z.string().optional(),
  zipball_url: z.string().nullish(),
  published_at: z.string().nullish(),
  prerelease: z.boolean().optional(),
  draft: z.boolean().optional(),
  assets: z.array(GitHubAssetSchema).optional(),
}).passthrough();

export const GitHubReleaseListSchema = z.array(GitHubReleaseSchema);

export const ReleaseQueryInputSchema = z.object({
  identifier: z.string().trim().min(1, 'identifier must not be empty'),
  currentVersion: z.string().refine(isValidVersion, 'currentVersion must be a semantic version'),
  releaseEndpoint: z.string().url('releaseEndpoint must be a URL').refine(
    value => /^https?:\/\//i.test(value),
    'releaseEndpoint must use http or https',
  ),
  authToken: z.string().min(1, 'authToken must not be empty').optional(),
  includeMinorBumps: z.boolean().optional(),
  includePrereleases: z.boolean().optional(),
  cacheEnabled: z.boolean().optional(),
  cacheKey: z.string().min(1, 'cacheKey must not be empty').optional(),
  cacheTTL: z.number().int('cacheTTL must be whole milliseconds').positive('cacheTTL must be positive').optional(),
});

export const RemoteReleaseSchema = z.object({
  tagName: z.string(),
  version: z.string().refine(isValidVersion),
  downloadURL: z.string().nullable(),
  publishedAt: z.string().nullable(),
  releaseNotes: z.string().nullable(),
  htmlURL: z.string().nullable(),
});

export const CacheEntrySchema = z.object({
  release: RemoteReleaseSchema,
  insertedAt: z.number(),
  expiresAt: z.number(),
});

export const CacheFileSchema = z.object({
  entries: z.record(z.string(), CacheEntrySchema),
});

export type CacheFileData = z.infer<typeof CacheFileSchema>;
