import { NetworkError, ParseError } from './errors';
import { GitHubReleaseListSchema, GitHubReleaseSchema } from './schemas';
import type { GitHubAssetResponse, GitHubReleaseResponse, ReleaseQuery, RemoteRelease } from './types';
import { isValidVersion, normalizeVersion } from './version';

export const DEFAULT_TIMEOUT_MS = 10_000;
export const DEFAULT_USER_AGENT = 'release-update-checker';

export interface FetchReleaseOptions {
  timeoutMs?: number;
  userAgent?: string;
}

/**
 * Fetches the release endpoint and parses the newest eligible release
 * @throws NetworkError on transport failure, timeout, a non-200 status or an empty body
 * @throws ParseError when the body is not a release payload
 */
export async function fetchRemoteRelease(
  query: Pick<ReleaseQuery, 'releaseEndpoint' | 'authToken' | 'includePrereleases'>,
  options: FetchReleaseOptions = {},
): Promise<RemoteRelease> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const headers: Record<string, string> = {
    'Accept': 'application/json',
    'User-Agent': options.userAgent ?? DEFAULT_USER_AGENT,
  };

  if (query.authToken) {
    headers['Authorization'] = `Bearer ${query.authToken}`;
  }

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  let body: string;
  try {
    const response = await fetch(query.releaseEndpoint, {
      headers,
      signal: controller.signal,
    });

    if (response.status !== 200) {
      throw new NetworkError(
        `Release endpoint returned ${response.status} ${response.statusText}`.trim(),
        response.status,
      );
    }

    body = await response.text();
  }
  catch (error) {
    if (error instanceof NetworkError) {
      throw error;
    }
    if (controller.signal.aborted) {
      throw new NetworkError(`Release endpoint timed out after ${timeoutMs}ms`, null, { cause: error });
    }
    throw new NetworkError(
      `Failed to reach release endpoint: ${error instanceof Error ? error.message : String(error)}`,
      null,
      { cause: error },
    );
  }
  finally {
    clearTimeout(timeoutId);
  }

  if (body.trim() === '') {
    throw new NetworkError('Release endpoint returned an empty body', 200);
  }

  return parseReleasePayload(body, query.includePrereleases);
}

/**
 * Turns a response body (one release object or a list of them) into a RemoteRelease
 * @throws ParseError
 */
export function parseReleasePayload(body: string, includePrereleases: boolean = false): RemoteRelease {
  let json: unknown;
  try {
    json = JSON.parse(body);
  }
  catch (error) {
    throw new ParseError('Release payload is not valid JSON', { cause: error });
  }

  let release: GitHubReleaseResponse | null;
  if (Array.isArray(json)) {
    const parsed = GitHubReleaseListSchema.safeParse(json);
    if (!parsed.success) {
      throw malformed(parsed.error.issues);
    }
    release = selectLatestRelease(parsed.data, includePrereleases);
  }
  else {
    const parsed = GitHubReleaseSchema.safeParse(json);
    if (!parsed.success) {
      throw malformed(parsed.error.issues);
    }
    release = parsed.data;
  }

  if (!release) {
    throw new ParseError('Release list holds no eligible release');
  }

  if (!isValidVersion(release.tag_name)) {
    throw new ParseError(`Release tag is not a semantic version: ${release.tag_name}`);
  }

  return toRemoteRelease(release);
}

function malformed(issues: { path: (string | number)[] }[]): ParseError {
  const fields = issues.map(issue => issue.path.join('.') || '(root)');
  return new ParseError(`Release payload is malformed at ${[...new Set(fields)].join(', ')}`);
}

/**
 * Skips drafts (and prereleases unless asked for) and picks the most recently published
 */
function selectLatestRelease(
  releases: GitHubReleaseResponse[],
  includePrereleases: boolean,
): GitHubReleaseResponse | null {
  const eligible = releases.filter(release => {
    if (release.draft) return false;
    if (!includePrereleases && release.prerelease) return false;
    return true;
  });

  eligible.sort((a, b) => publishedTime(b) - publishedTime(a));

  return eligible[0] ?? null;
}

function publishedTime(release: GitHubReleaseResponse): number {
  const time = release.published_at ? new Date(release.published_at).getTime() : Number.NaN;
  return Number.isNaN(time) ? 0 : time;
}

function selectDownloadURL(release: GitHubReleaseResponse): string | null {
  const assets: GitHubAssetResponse[] = release.assets ?? [];
  const archive = assets.find(asset => asset.name.toLowerCase().endsWith('.zip')) ?? assets[0];

  return archive?.browser_download_url ?? release.zipball_url ?? null;
}

function toRemoteRelease(release: GitHubReleaseResponse): RemoteRelease {
  return {
    tagName: release.tag_name,
    version: normalizeVersion(release.tag_name),
    downloadURL: selectDownloadURL(release),
    publishedAt: release.published_at ?? null,
    releaseNotes: release.body ?? null,
    htmlURL: release.html_url ?? null,
  };
}
