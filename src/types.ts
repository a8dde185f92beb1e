import type { Logger } from 'pino';
import type { UpdateCheckError } from './errors';

export interface ReleaseQuery {
  readonly identifier: string;
  readonly currentVersion: string;
  readonly releaseEndpoint: string;
  readonly authToken?: string;
  readonly includeMinorBumps: boolean;
  readonly includePrereleases: boolean;
  readonly cacheEnabled: boolean;
  readonly cacheKey: string;
  /** Milliseconds */
  readonly cacheTTL: number;
}

export interface ReleaseQueryInput {
  identifier: string;
  currentVersion: string;
  releaseEndpoint: string;
  authToken?: string;
  includeMinorBumps?: boolean;
  includePrereleases?: boolean;
  cacheEnabled?: boolean;
  cacheKey?: string;
  cacheTTL?: number;
}

export interface RemoteRelease {
  tagName: string;
  version: string;
  downloadURL: string | null;
  publishedAt: string | null;
  releaseNotes: string | null;
  htmlURL: string | null;
}

export interface CacheEntry {
  release: RemoteRelease;
  insertedAt: number;
  expiresAt: number;
}

export interface CacheStore {
  /** Resolves to undefined when the key is missing or expired */
  get(key: string): Promise<CacheEntry | undefined>;
  put(key: string, release: RemoteRelease, ttl: number): Promise<void>;
  delete(key: string): Promise<void>;
}

export interface Clock {
  now(): number;
}

export type ResultSource = 'cache' | 'network';

export interface UpdateResult {
  updateAvailable: boolean;
  currentVersion: string;
  latestVersion: string | null;
  downloadURL: string | null;
  releaseNotes: string | null;
  publishedAt: string | null;
  source: ResultSource;
  checkedAt: number;
  error?: UpdateCheckError;
}

export interface UpdateCheckerConfig {
  cache?: CacheStore;
  clock?: Clock;
  logger?: Logger;
  timeoutMs?: number;
  userAgent?: string;
}

export interface GitHubAssetResponse {
  name: string;
  browser_download_url: string;
}

export interface GitHubReleaseResponse {
  tag_name: string;
  name?: string | null;
  body?: string | null;
  html_url?: string;
  zipball_url?: string | null;
  published_at?: string | null;
  prerelease?: boolean;
  draft?: boolean;
  assets?: GitHubAssetResponse[];
}
