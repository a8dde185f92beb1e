import * as fc from 'fast-check';
import { describe, expect, it } from 'vitest';
import { compareVersions, isUpdateAvailable, isValidVersion, normalizeVersion, parseVersion } from '../src/version';

const coreVersion = fc.tuple(fc.nat(50), fc.nat(50), fc.nat(50));
const format = ([major, minor, patch]: [number, number, number]) => `${major}.${minor}.${patch}`;

describe('parseVersion', () => {
  it('should parse stable versions', () => {
    expect(parseVersion('1.2.3')).toEqual({ major: 1, minor: 2, patch: 3, prerelease: [] });
  });

  it('should parse prerelease identifiers and ignore build metadata', () => {
    expect(parseVersion('v2.0.0-beta.11+sha.5114f85')).toEqual({
      major: 2,
      minor: 0,
      patch: 0,
      prerelease: ['beta', '11'],
    });
  });

  it('should return null for invalid versions', () => {
    expect(parseVersion('1.2')).toBeNull();
    expect(parseVersion('latest')).toBeNull();
    expect(parseVersion('1.2.3-')).toBeNull();
    expect(parseVersion('')).toBeNull();
  });
});

describe('normalizeVersion', () => {
  it('should strip whitespace and v prefix', () => {
    expect(normalizeVersion('  v1.0.0 ')).toBe('1.0.0');
    expect(normalizeVersion('V3.1.4')).toBe('3.1.4');
  });
});

describe('isValidVersion', () => {
  it('should accept semantic versions only', () => {
    expect(isValidVersion('v0.0.1')).toBe(true);
    expect(isValidVersion('local')).toBe(false);
  });
});

describe('compareVersions', () => {
  it('should order major, minor and patch numerically', () => {
    expect(compareVersions('1.10.0', '1.9.0')).toBe(1);
    expect(compareVersions('1.0.9', '1.0.10')).toBe(-1);
    expect(compareVersions('2.0.0', '10.0.0')).toBe(-1);
  });

  it('should ignore the v prefix', () => {
    expect(compareVersions('v1.2.3', '1.2.3')).toBe(0);
  });

  it('should follow prerelease precedence', () => {
    const ordered = [
      '1.0.0-alpha',
      '1.0.0-alpha.1',
      '1.0.0-alpha.beta',
      '1.0.0-beta',
      '1.0.0-beta.2',
      '1.0.0-beta.11',
      '1.0.0-rc.1',
      '1.0.0',
    ];

    for (let index = 0; index < ordered.length - 1; index += 1) {
      expect(compareVersions(ordered[index], ordered[index + 1])).toBe(-1);
      expect(compareVersions(ordered[index + 1], ordered[index])).toBe(1);
    }
  });

  it('should order numbers beyond safe integer range exactly', () => {
    expect(compareVersions('1.0.0-9007199254740993', '1.0.0-9007199254740992')).toBe(1);
    expect(compareVersions('9007199254740993.0.0', '9007199254740992.0.0')).toBe(1);
    expect(compareVersions('1.0.0-0010', '1.0.0-9')).toBe(1);
  });

  it('should ignore build metadata', () => {
    expect(compareVersions('1.0.0+build.1', '1.0.0+build.2')).toBe(0);
  });

  it('should throw on invalid versions', () => {
    expect(() => compareVersions('nope', '1.0.0')).toThrow('Invalid version format: nope');
  });

  it('should be antisymmetric', () => {
    fc.assert(fc.property(coreVersion, coreVersion, (a, b) => {
      expect(compareVersions(format(a), format(b))).toBe(-compareVersions(format(b), format(a)) || 0);
    }));
  });
});

describe('isUpdateAvailable', () => {
  it('should be true whenever the latest version is greater', () => {
    fc.assert(fc.property(coreVersion, coreVersion, (current, latest) => {
      fc.pre(compareVersions(format(latest), format(current)) > 0);
      expect(isUpdateAvailable(format(current), format(latest))).toBe(true);
    }));
  });

  it('should be false whenever the latest version is not greater', () => {
    fc.assert(fc.property(coreVersion, coreVersion, (current, latest) => {
      fc.pre(compareVersions(format(latest), format(current)) <= 0);
      expect(isUpdateAvailable(format(current), format(latest))).toBe(false);
    }));
  });

  it('should only count major bumps when minor bumps are excluded', () => {
    expect(isUpdateAvailable('1.2.0', '1.3.0', false)).toBe(false);
    expect(isUpdateAvailable('1.2.0', '1.2.1', false)).toBe(false);
    expect(isUpdateAvailable('1.2.0', '2.0.0', false)).toBe(true);
    expect(isUpdateAvailable('2.0.0', '1.9.9', false)).toBe(false);
    expect(isUpdateAvailable('9007199254740992.0.0', '9007199254740993.0.0', false)).toBe(true);
  });

  it('should match the full comparison when minor bumps are included', () => {
    fc.assert(fc.property(coreVersion, coreVersion, (current, latest) => {
      expect(isUpdateAvailable(format(current), format(latest), true))
        .toBe(compareVersions(format(current), format(latest)) < 0);
    }));
  });
});
