/**
 * Version utilities
 *
 * Thin wrapper over the semver package. Release versions are plain
 * MAJOR.MINOR.PATCH triples: no "v" prefix, no prerelease, no build metadata.
 */

import semver from "semver";
import { ReleaseError } from "#/core";

export type BumpType = "patch" | "minor" | "major";

export const BUMP_TYPES: readonly BumpType[] = ["major", "minor", "patch"];

export interface SemanticVersion {
  readonly major: number;
  readonly minor: number;
  readonly patch: number;
}

/**
 * Check if a string is a plain release version.
 *
 * @example isReleaseVersion("1.4.0") → true
 * @example isReleaseVersion("v1.4.0") → false
 * @example isReleaseVersion("1.4.0-rc.1") → false
 */
export function isReleaseVersion(version: string): boolean {
  if (version.startsWith("v") || version.startsWith("V")) {
    return false;
  }
  const parsed = semver.parse(version);
  return parsed !== null && parsed.prerelease.length === 0 && parsed.build.length === 0;
}

/**
 * Parse a release version string into a frozen SemanticVersion.
 * Throws InvalidVersion for anything that is not MAJOR.MINOR.PATCH.
 */
export function parseVersion(version: string): SemanticVersion {
  const trimmed = version.trim();
  const parsed = isReleaseVersion(trimmed) ? semver.parse(trimmed) : null;
  if (!parsed) {
    throw new ReleaseError("InvalidVersion", `Invalid release version "${version}" (expected MAJOR.MINOR.PATCH)`);
  }
  return createVersion(parsed.major, parsed.minor, parsed.patch);
}

export function createVersion(major: number, minor: number, patch: number): SemanticVersion {
  for (const part of [major, minor, patch]) {
    if (!Number.isSafeInteger(part) || part < 0) {
      throw new ReleaseError("InvalidVersion", `Invalid version component ${part}`);
    }
  }
  return Object.freeze({ major, minor, patch });
}

/**
 * @example formatVersion({ major: 1, minor: 4, patch: 0 }) → "1.4.0"
 */
export function formatVersion(version: SemanticVersion): string {
  return `${version.major}.${version.minor}.${version.patch}`;
}

/**
 * Bump a version by the specified type. Pure.
 */
export function bumpVersion(current: SemanticVersion, type: BumpType): SemanticVersion {
  const next = semver.inc(formatVersion(current), type);
  if (!next) {
    throw new ReleaseError("InvalidVersion", `Failed to bump version ${formatVersion(current)} by ${type}`);
  }
  return parseVersion(next);
}

/**
 * Compare two versions.
 * Returns -1 if a < b, 0 if a === b, 1 if a > b.
 */
export function compareVersions(a: SemanticVersion, b: SemanticVersion): -1 | 0 | 1 {
  return semver.compare(formatVersion(a), formatVersion(b));
}

export function versionsEqual(a: SemanticVersion, b: SemanticVersion): boolean {
  return a.major === b.major && a.minor === b.minor && a.patch === b.patch;
}

/**
 * The (major, minor) line a version belongs to.
 *
 * @example lineOf({ major: 1, minor: 4, patch: 2 }) → "1.4"
 */
export function lineOf(version: SemanticVersion): string {
  return `${version.major}.${version.minor}`;
}

/**
 * True when `next` starts a new (major, minor) line relative to `previous`.
 */
export function isLineChange(previous: SemanticVersion, next: SemanticVersion): boolean {
  return previous.major !== next.major || previous.minor !== next.minor;
}

/**
 * Get the highest version from a list.
 * Returns null if the list is empty.
 */
export function getHighestVersion(versions: SemanticVersion[]): SemanticVersion | null {
  const sorted = [...versions].sort((a, b) => compareVersions(b, a));
  return sorted[0] ?? null;
}
