import { join } from "path";
import { stringify } from "yaml";
import { ReleaseError, type FileSystem } from "#/core";
import { ReleaseRecordSchema, type ReleaseRecord, type SerializedReleaseRecord } from "#/schemas";
import { safeParseYaml } from "#/friendly-errors";
import { compareVersions, formatVersion, type SemanticVersion } from "#/version";

const RECORD_EXTENSION = ".yaml";

export function recordsDir(stateDir: string): string {
  return join(stateDir, "releases");
}

export function recordPath(stateDir: string, version: SemanticVersion): string {
  return join(recordsDir(stateDir), `${formatVersion(version)}${RECORD_EXTENSION}`);
}

function readRecordFile(fs: FileSystem, path: string): ReleaseRecord {
  const result = safeParseYaml(fs.readFile(path), ReleaseRecordSchema, path, "release record");
  if (!result.success) {
    throw new ReleaseError("InvalidRecord", result.error.message, {
      failed: (result.error.details ?? []).map((reason) => ({ item: path, reason })),
    });
  }
  return result.data;
}

/**
 * Load the record for `version`, or null when none was ever written.
 */
export function getRecord(fs: FileSystem, stateDir: string, version: SemanticVersion): ReleaseRecord | null {
  const path = recordPath(stateDir, version);
  return fs.exists(path) ? readRecordFile(fs, path) : null;
}

/**
 * All records, archived or not, in version order.
 */
export function listRecords(fs: FileSystem, stateDir: string): ReleaseRecord[] {
  const dir = recordsDir(stateDir);
  if (!fs.exists(dir)) {
    return [];
  }

  return fs
    .readdir(dir)
    .filter((entry) => entry.endsWith(RECORD_EXTENSION))
    .map((entry) => readRecordFile(fs, join(dir, entry)))
    .sort((a, b) => compareVersions(a.version, b.version));
}

export function serializeRecord(record: ReleaseRecord): SerializedReleaseRecord {
  return {
    ...record,
    version: formatVersion(record.version),
    previousVersion: formatVersion(record.previousVersion),
  };
}

export function saveRecord(fs: FileSystem, stateDir: string, record: ReleaseRecord): void {
  fs.mkdir(recordsDir(stateDir), { recursive: true });
  fs.writeFile(recordPath(stateDir, record.version), stringify(serializeRecord(record)));
}
