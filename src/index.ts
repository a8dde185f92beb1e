import { MemoryCacheStore, systemClock } from './cache';
import { NetworkError, ParseError, UpdateCheckError } from './errors';
import { createLogger } from './logger';
import type { Logger } from './logger';
import { DEFAULT_TIMEOUT_MS, DEFAULT_USER_AGENT, fetchRemoteRelease } from './release';
import type {
  CacheEntry,
  CacheStore,
  Clock,
  ReleaseQuery,
  RemoteRelease,
  ResultSource,
  UpdateCheckerConfig,
  UpdateResult,
} from './types';
import { isUpdateAvailable, isValidVersion } from './version';

export type {
  CacheEntry,
  CacheStore,
  Clock,
  GitHubAssetResponse,
  GitHubReleaseResponse,
  ReleaseQuery,
  ReleaseQueryInput,
  RemoteRelease,
  ResultSource,
  UpdateCheckerConfig,
  UpdateResult,
} from './types';
export { FileCacheStore, MemoryCacheStore, systemClock } from './cache';
export { NetworkError, ParseError, QueryValidationError, UpdateCheckError } from './errors';
export type { UpdateCheckErrorCode } from './errors';
export { createLogger } from './logger';
export type { Logger, LoggerOptions } from './logger';
export { DEFAULT_CACHE_TTL, createReleaseQuery, githubReleaseEndpoint } from './query';
export { DEFAULT_TIMEOUT_MS, fetchRemoteRelease, parseReleasePayload } from './release';
export { compareVersions, isUpdateAvailable, isValidVersion, normalizeVersion, parseVersion } from './version';

export class UpdateChecker {
  private readonly cache: CacheStore;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly timeoutMs: number;
  private readonly userAgent: string;

  constructor(config: UpdateCheckerConfig = {}) {
    this.clock = config.clock ?? systemClock;
    this.cache = config.cache ?? new MemoryCacheStore(this.clock);
    this.logger = config.logger ?? createLogger();
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.userAgent = config.userAgent ?? DEFAULT_USER_AGENT;
  }

  /**
   * Reports whether a release newer than query.currentVersion exists.
   * Reads through the cache when query.cacheEnabled is set. Never rejects:
   * failures come back in `error`, which callers must check before trusting updateAvailable.
   */
  async checkForUpdate(query: ReleaseQuery): Promise<UpdateResult> {
    const log = this.logger.child({ identifier: query.identifier, cacheKey: query.cacheKey });

    if (query.cacheEnabled) {
      const cached = await this.readCache(query.cacheKey, log);
      if (cached && !isValidVersion(cached.release.version)) {
        log.warn({ cachedVersion: cached.release.version }, 'Cached release has an invalid version, refetching');
      }
      else if (cached) {
        log.debug({ latestVersion: cached.release.tagName, insertedAt: cached.insertedAt }, 'Using cached release');
        return this.buildResult(query, cached.release, 'cache');
      }
    }

    let remote: RemoteRelease;
    try {
      log.info({ endpoint: query.releaseEndpoint }, 'Fetching latest release');
      remote = await fetchRemoteRelease(query, { timeoutMs: this.timeoutMs, userAgent: this.userAgent });
    }
    catch (error) {
      const failure = toCheckError(error);
      // Existing cache entries stay untouched so later checks can still use them
      log.warn({ err: failure }, 'Release check failed');
      return this.failedResult(query, failure, 'network');
    }

    await this.writeCache(query, remote, log);
    return this.buildResult(query, remote, 'network');
  }

  /**
   * Drops the cached release so the next check goes to the network
   */
  async clearCache(cacheKey: string): Promise<void> {
    await this.cache.delete(cacheKey);
  }

  private async readCache(cacheKey: string, log: Logger): Promise<CacheEntry | undefined> {
    try {
      return await this.cache.get(cacheKey);
    }
    catch (error) {
      log.warn({ err: error }, 'Cache read failed, treating as a miss');
      return undefined;
    }
  }

  private async writeCache(query: ReleaseQuery, remote: RemoteRelease, log: Logger): Promise<void> {
    try {
      await this.cache.put(query.cacheKey, remote, query.cacheTTL);
    }
    catch (error) {
      log.warn({ err: error }, 'Cache write failed');
    }
  }

  private buildResult(query: ReleaseQuery, remote: RemoteRelease, source: ResultSource): UpdateResult {
    if (!isValidVersion(query.currentVersion)) {
      return this.failedResult(
        query,
        new ParseError(`Current version is not a semantic version: ${query.currentVersion}`),
        source,
      );
    }

    if (!isValidVersion(remote.version)) {
      return this.failedResult(
        query,
        new ParseError(`Release version is not a semantic version: ${remote.version}`),
        source,
      );
    }

    const updateAvailable = isUpdateAvailable(query.currentVersion, remote.version, query.includeMinorBumps);

    return {
      updateAvailable,
      currentVersion: query.currentVersion,
      latestVersion: remote.tagName,
      downloadURL: updateAvailable ? remote.downloadURL : null,
      releaseNotes: remote.releaseNotes,
      publishedAt: remote.publishedAt,
      source,
      checkedAt: this.clock.now(),
    };
  }

  private failedResult(query: ReleaseQuery, error: UpdateCheckError, source: ResultSource): UpdateResult {
    return {
      updateAvailable: false,
      currentVersion: query.currentVersion,
      latestVersion: null,
      downloadURL: null,
      releaseNotes: null,
      publishedAt: null,
      source,
      checkedAt: this.clock.now(),
      error,
    };
  }
}

function toCheckError(error: unknown): UpdateCheckError {
  if (error instanceof UpdateCheckError) {
    return error;
  }
  return new NetworkError(
    `Failed to check for updates: ${error instanceof Error ? error.message : String(error)}`,
    null,
    { cause: error },
  );
}
