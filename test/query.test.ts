import { describe, expect, it } from 'vitest';
import { QueryValidationError } from '../src/errors';
import { DEFAULT_CACHE_TTL, createReleaseQuery, githubReleaseEndpoint } from '../src/query';

describe('createReleaseQuery', () => {
  it('should fill in defaults', () => {
    const query = createReleaseQuery({
      identifier: 'my-plugin',
      currentVersion: '1.0.0',
      releaseEndpoint: 'https://api.github.com/repos/test/my-plugin/releases/latest',
    });

    expect(query).toEqual({
      identifier: 'my-plugin',
      currentVersion: '1.0.0',
      releaseEndpoint: 'https://api.github.com/repos/test/my-plugin/releases/latest',
      includeMinorBumps: true,
      includePrereleases: false,
      cacheEnabled: true,
      cacheKey: 'release-update:my-plugin',
      cacheTTL: 86_400_000,
    });
    expect(DEFAULT_CACHE_TTL).toBe(86_400_000);
    expect(query).not.toHaveProperty('authToken');
    expect(Object.isFrozen(query)).toBe(true);
  });

  it('should keep explicit values', () => {
    const query = createReleaseQuery({
      identifier: 'my-theme',
      currentVersion: 'v2.1.0',
      releaseEndpoint: 'http://localhost:8080/releases/latest',
      authToken: 'test-token',
      includeMinorBumps: false,
      includePrereleases: true,
      cacheEnabled: false,
      cacheKey: 'theme-release',
      cacheTTL: 60_000,
    });

    expect(query).toMatchObject({
      authToken: 'test-token',
      includeMinorBumps: false,
      includePrereleases: true,
      cacheEnabled: false,
      cacheKey: 'theme-release',
      cacheTTL: 60_000,
    });
  });

  it('should report every invalid field', () => {
    let thrown: unknown;
    try {
      createReleaseQuery({
        identifier: '  ',
        currentVersion: 'dev',
        releaseEndpoint: 'ftp://example.com/releases',
        cacheTTL: -1,
      });
    }
    catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(QueryValidationError);
    expect(thrown).toMatchObject({
      code: 'INVALID_QUERY',
      issues: [
        'identifier must not be empty',
        'currentVersion must be a semantic version',
        'releaseEndpoint must use http or https',
        'cacheTTL must be positive',
      ],
    });
  });

  it('should reject an endpoint that is not a URL', () => {
    expect(() => createReleaseQuery({
      identifier: 'my-plugin',
      currentVersion: '1.0.0',
      releaseEndpoint: 'not a url',
    })).toThrow('Invalid release query: releaseEndpoint must be a URL');
  });
});

describe('githubReleaseEndpoint', () => {
  it('should build the latest release URL', () => {
    expect(githubReleaseEndpoint('test/my-plugin')).toBe('https://api.github.com/repos/test/my-plugin/releases/latest');
  });

  it('should build the release list URL', () => {
    expect(githubReleaseEndpoint('/test/my-plugin/', { latest: false }))
      .toBe('https://api.github.com/repos/test/my-plugin/releases');
  });

  it('should reject malformed repository names', () => {
    expect(() => githubReleaseEndpoint('my-plugin')).toThrow(QueryValidationError);
  });
});
