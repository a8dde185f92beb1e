/**
 * Semantic version parsing and precedence
 */

export interface ParsedVersion {
  major: number;
  minor: number;
  patch: number;
  prerelease: string[];
}

const SEMVER_PATTERN =
  /^(\d+)\.(\d+)\.(\d+)(?:-([0-9A-Za-z-]+(?:\.[0-9A-Za-z-]+)*))?(?:\+[0-9A-Za-z-]+(?:\.[0-9A-Za-z-]+)*)?$/;

const NUMERIC_IDENTIFIER = /^\d+$/;

/**
 * Removes surrounding whitespace and a leading 'v'
 */
export function normalizeVersion(version: string): string {
  return version.trim().replace(/^v/i, '');
}

interface VersionParts {
  core: [string, string, string];
  prerelease: string[];
}

function splitVersion(version: string): VersionParts | null {
  const match = SEMVER_PATTERN.exec(normalizeVersion(version));
  if (!match) {
    return null;
  }

  const [, major, minor, patch, prerelease] = match;
  return {
    core: [major, minor, patch],
    prerelease: prerelease ? prerelease.split('.') : [],
  };
}

/**
 * Parses "1.2.3", "v1.2.3", "1.2.3-beta.1" or "1.2.3+build.5"
 * @returns null when the string is not a semantic version
 */
export function parseVersion(version: string): ParsedVersion | null {
  const parts = splitVersion(version);
  if (!parts) {
    return null;
  }

  const [major, minor, patch] = parts.core;
  return {
    major: Number.parseInt(major, 10),
    minor: Number.parseInt(minor, 10),
    patch: Number.parseInt(patch, 10),
    prerelease: parts.prerelease,
  };
}

export function isValidVersion(version: string): boolean {
  return splitVersion(version) !== null;
}

/**
 * Orders digit strings of any length without converting them to numbers
 */
function compareNumeric(a: string, b: string): number {
  const trimmedA = a.replace(/^0+(?=\d)/, '');
  const trimmedB = b.replace(/^0+(?=\d)/, '');

  if (trimmedA.length !== trimmedB.length) {
    return trimmedA.length < trimmedB.length ? -1 : 1;
  }
  if (trimmedA === trimmedB) return 0;
  return trimmedA < trimmedB ? -1 : 1;
}

function compareIdentifiers(a: string, b: string): number {
  const aNumeric = NUMERIC_IDENTIFIER.test(a);
  const bNumeric = NUMERIC_IDENTIFIER.test(b);

  if (aNumeric && bNumeric) {
    return compareNumeric(a, b);
  }
  // Numeric identifiers sort before alphanumeric ones
  if (aNumeric) return -1;
  if (bNumeric) return 1;

  if (a === b) return 0;
  return a < b ? -1 : 1;
}

function comparePrerelease(a: string[], b: string[]): number {
  // A release outranks any of its pre-releases
  if (a.length === 0 && b.length === 0) return 0;
  if (a.length === 0) return 1;
  if (b.length === 0) return -1;

  const length = Math.min(a.length, b.length);
  for (let index = 0; index < length; index += 1) {
    const result = compareIdentifiers(a[index], b[index]);
    if (result !== 0) return result;
  }

  return Math.sign(a.length - b.length);
}

/**
 * Compares two versions by precedence. Build metadata is ignored.
 * @returns -1 if a < b, 0 if equal, 1 if a > b
 * @throws Error when either string is not a semantic version
 */
export function compareVersions(a: string, b: string): number {
  const partsA = splitVersion(a);
  const partsB = splitVersion(b);

  if (!partsA) throw new Error(`Invalid version format: ${a}`);
  if (!partsB) throw new Error(`Invalid version format: ${b}`);

  for (let index = 0; index < 3; index += 1) {
    const result = compareNumeric(partsA.core[index], partsB.core[index]);
    if (result !== 0) return result;
  }

  return comparePrerelease(partsA.prerelease, partsB.prerelease);
}

/**
 * Whether `latest` should be offered as an update over `current`.
 * With includeMinorBumps off, only a greater version with a higher major counts.
 * @throws Error when either string is not a semantic version
 */
export function isUpdateAvailable(current: string, latest: string, includeMinorBumps: boolean = true): boolean {
  if (compareVersions(current, latest) >= 0) {
    return false;
  }
  if (includeMinorBumps) {
    return true;
  }

  const partsCurrent = splitVersion(current);
  const partsLatest = splitVersion(latest);
  return partsCurrent !== null && partsLatest !== null && compareNumeric(partsLatest.core[0], partsCurrent.core[0]) > 0;
}
