import { formatVersion, isReleaseVersion, lineOf, parseVersion, type SemanticVersion } from "#/version";
import type { BranchKind } from "./branch.types";

const RELEASE_BRANCH_REGEX = /^release-(\d+\.\d+\.\d+)$/;
const MAINTENANCE_BRANCH_REGEX = /^maintenance-(\d+)\.(\d+)$/;

/**
 * Release branch for a full version.
 *
 * @example releaseBranchName({ major: 1, minor: 4, patch: 0 }) → "release-1.4.0"
 */
export function releaseBranchName(version: SemanticVersion): string {
  return `release-${formatVersion(version)}`;
}

/**
 * Maintenance branch for a (major, minor) line. Patch is ignored.
 *
 * @example maintenanceBranchName({ major: 1, minor: 4, patch: 3 }) → "maintenance-1.4"
 */
export function maintenanceBranchName(version: SemanticVersion): string {
  return `maintenance-${lineOf(version)}`;
}

/**
 * @example tagName({ major: 1, minor: 4, patch: 0 }) → "v1.4.0"
 */
export function tagName(version: SemanticVersion): string {
  return `v${formatVersion(version)}`;
}

/**
 * Directory name a version's docs are published under. Same shape as the tag.
 *
 * @example docsDirName({ major: 1, minor: 4, patch: 0 }) → "v1.4.0"
 */
export function docsDirName(version: SemanticVersion): string {
  return `v${formatVersion(version)}`;
}

/**
 * Recover the version from a release branch name.
 *
 * @example parseReleaseBranchName("release-1.4.0") → { major: 1, minor: 4, patch: 0 }
 * @example parseReleaseBranchName("main") → null
 */
export function parseReleaseBranchName(name: string): SemanticVersion | null {
  const match = name.match(RELEASE_BRANCH_REGEX);
  return match?.[1] && isReleaseVersion(match[1]) ? parseVersion(match[1]) : null;
}

/**
 * @example parseMaintenanceBranchName("maintenance-1.4") → { major: 1, minor: 4 }
 */
export function parseMaintenanceBranchName(name: string): { major: number; minor: number } | null {
  const match = name.match(MAINTENANCE_BRANCH_REGEX);
  if (!match?.[1] || !match[2]) {
    return null;
  }
  return { major: Number(match[1]), minor: Number(match[2]) };
}

/**
 * Release and maintenance branches must follow their naming convention;
 * mainline and feature branches may be named anything.
 *
 * @example isValidBranchName("release", "release-1.4.0") → true
 * @example isValidBranchName("release", "maintenance-1.4") → false
 */
export function isValidBranchName(kind: BranchKind, name: string): boolean {
  switch (kind) {
    case "release":
      return parseReleaseBranchName(name) !== null;
    case "maintenance":
      return parseMaintenanceBranchName(name) !== null;
    case "mainline":
    case "feature":
      return name.length > 0;
  }
}
