/**
 * Version registry
 *
 * Reads and stamps the version across every declared location. Locations are
 * the only source of truth for a tree's version; a read that finds them
 * disagreeing is an error, never a guess. Reads go through a FileReader, so
 * the same checks apply to a working tree and to a committed ref.
 */

import { join } from "path";
import { ReleaseError, describeError, type FileSystem, type ItemFailure } from "#/core";
import type { VersionLocation } from "#/schemas";
import { formatVersion, isReleaseVersion, parseVersion, type SemanticVersion } from "#/version";
import { getStrategy } from "./strategies";
import type { FileReader, LocationReport, StampResult } from "./versioning.types";

export function workingTreeReader(fs: FileSystem, root: string): FileReader {
  return (path) => {
    const filePath = join(root, path);
    return fs.exists(filePath) ? fs.readFile(filePath) : null;
  };
}

/**
 * Read every location without judging consistency.
 */
export function inspectLocations(read: FileReader, locations: VersionLocation[]): LocationReport[] {
  return locations.map((location) => {
    try {
      const content = read(location.path);
      if (content === null) {
        return { location: location.name, version: null, error: `${location.path} not found` };
      }
      const raw = getStrategy(location).extract(content).trim();
      if (!isReleaseVersion(raw)) {
        return { location: location.name, version: null, error: `"${raw}" is not a release version` };
      }
      return { location: location.name, version: raw, error: null };
    } catch (err) {
      return { location: location.name, version: null, error: describeError(err) };
    }
  });
}

/**
 * Read the canonical version. Fails with InconsistentVersion when any
 * location is unreadable or any two locations disagree.
 */
export function readCurrent(read: FileReader, locations: VersionLocation[]): SemanticVersion {
  const reports = inspectLocations(read, locations);

  const values: Record<string, string> = {};
  const failed: ItemFailure[] = [];
  for (const report of reports) {
    if (report.version !== null) {
      values[report.location] = report.version;
    } else {
      failed.push({ item: report.location, reason: report.error ?? "unreadable" });
    }
  }

  const distinct = new Set(Object.values(values));
  const [only] = [...distinct];
  if (failed.length > 0 || distinct.size !== 1 || only === undefined) {
    const summary = failed.length > 0 ? `${failed.length} unreadable` : `${distinct.size} distinct values`;
    throw new ReleaseError("InconsistentVersion", `Version locations disagree (${summary})`, { values, failed });
  }

  return parseVersion(only);
}

/**
 * Write `version` into every location.
 *
 * No rollback: locations written before a failure stay written, and the
 * WriteError lists exactly which succeeded and which failed so a retry can
 * target the failures.
 */
export function stamp(
  fs: FileSystem,
  projectRoot: string,
  locations: VersionLocation[],
  version: SemanticVersion
): StampResult {
  const formatted = formatVersion(version);
  const written: string[] = [];
  const failed: ItemFailure[] = [];

  for (const location of locations) {
    const filePath = join(projectRoot, location.path);
    try {
      const content = fs.readFile(filePath);
      const updated = getStrategy(location).replace(content, formatted);
      if (updated !== content) {
        fs.writeFile(filePath, updated);
      }
      written.push(location.name);
    } catch (err) {
      failed.push({ item: location.name, reason: describeError(err) });
    }
  }

  if (failed.length > 0) {
    throw new ReleaseError(
      "WriteError",
      `Failed to stamp ${failed.length} of ${locations.length} locations with ${formatted}`,
      { succeeded: written, failed }
    );
  }

  return { version: formatted, written, paths: locations.map((location) => location.path) };
}
