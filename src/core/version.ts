// Runtime version parsing and comparison

import { ValidationError } from './errors.js';

/**
 * A runtime version triple
 */
export interface VersionTriple {
  major: number;
  minor: number;
  patch: number;
}

const VERSION_PATTERN = /^v?(\d+)(?:\.(\d+))?(?:\.(\d+))?(?:[-+].*)?$/;

/**
 * Parse `X`, `X.Y` or `X.Y.Z` (optional leading `v`, pre-release/build suffix ignored).
 * Missing parts are 0.
 */
export function parseVersion(input: string): VersionTriple {
  const match = VERSION_PATTERN.exec(input.trim());
  if (!match) {
    throw new ValidationError(`Invalid version: "${input}"`, 'version');
  }

  return {
    major: Number(match[1]),
    minor: match[2] === undefined ? 0 : Number(match[2]),
    patch: match[3] === undefined ? 0 : Number(match[3])
  };
}

/**
 * Lexicographic (major, minor) comparison; patch is ignored.
 * Returns true when `version` is at least `minimum`.
 */
export function meetsMinimum(version: VersionTriple, minimum: Pick<VersionTriple, 'major' | 'minor'>): boolean {
  if (version.major !== minimum.major) {
    return version.major > minimum.major;
  }
  return version.minor >= minimum.minor;
}

export function formatVersion(version: VersionTriple): string {
  return `${version.major}.${version.minor}.${version.patch}`;
}

/**
 * Short `X.Y` form used in requirement text
 */
export function formatRequirement(minimum: Pick<VersionTriple, 'major' | 'minor'>): string {
  return `${minimum.major}.${minimum.minor}+`;
}
