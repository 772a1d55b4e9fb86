/**
 * Version module
 *
 * Semantic version parsing, bumping and comparison for releases.
 */

export {
  BUMP_TYPES,
  isReleaseVersion,
  parseVersion,
  createVersion,
  formatVersion,
  bumpVersion,
  compareVersions,
  versionsEqual,
  lineOf,
  isLineChange,
  getHighestVersion,
  type BumpType,
  type SemanticVersion,
} from "./version";
