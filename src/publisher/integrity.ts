import { createHash } from "crypto";
import { basename, join, relative } from "path";
import type { FileSystem } from "#/core";

function hashContent(content: Buffer): string {
  const hash = createHash("sha256").update(content).digest("hex");
  return `sha256:${hash}`;
}

export function hashFile(fs: FileSystem, path: string): Record<string, string> {
  return { [basename(path)]: hashContent(fs.readFileBinary(path)) };
}

/**
 * Hash all files in a directory recursively
 * Returns a map of relative paths to their hashes
 */
export function hashDirectory(fs: FileSystem, dir: string): Record<string, string> {
  const hashes: Record<string, string> = {};

  function walkDir(currentDir: string): void {
    for (const entry of fs.readdir(currentDir)) {
      const fullPath = join(currentDir, entry);
      const stat = fs.stat(fullPath);

      if (stat.isDirectory) {
        walkDir(fullPath);
      } else if (stat.isFile) {
        hashes[relative(dir, fullPath)] = hashContent(fs.readFileBinary(fullPath));
      }
    }
  }

  walkDir(dir);
  return hashes;
}

/**
 * Calculate integrity hash for a whole artifact (hash of sorted file hashes)
 */
export function calculateIntegrity(fileHashes: Record<string, string>): string {
  const combined = Object.keys(fileHashes)
    .sort()
    .map((k) => `${k}:${fileHashes[k]}`)
    .join("\n");
  return hashContent(Buffer.from(combined));
}

export interface IntegrityResult {
  identical: boolean;
  missingFiles: string[];
  modifiedFiles: string[];
  extraFiles: string[];
}

/**
 * Compare a directory against expected per-file hashes.
 * Extra files count as a difference: published content must match exactly.
 */
export function compareDirectory(
  fs: FileSystem,
  dir: string,
  expectedFiles: Record<string, string>
): IntegrityResult {
  const actual = hashDirectory(fs, dir);
  const result: IntegrityResult = { identical: true, missingFiles: [], modifiedFiles: [], extraFiles: [] };

  for (const [path, expected] of Object.entries(expectedFiles)) {
    const found = actual[path];
    if (found === undefined) {
      result.missingFiles.push(path);
    } else if (found !== expected) {
      result.modifiedFiles.push(path);
    }
  }
  for (const path of Object.keys(actual)) {
    if (!(path in expectedFiles)) {
      result.extraFiles.push(path);
    }
  }

  result.identical =
    result.missingFiles.length === 0 && result.modifiedFiles.length === 0 && result.extraFiles.length === 0;
  return result;
}

/**
 * Copy a directory tree file by file.
 */
export function copyDirectory(fs: FileSystem, src: string, dest: string): void {
  fs.mkdir(dest, { recursive: true });

  for (const entry of fs.readdir(src)) {
    const from = join(src, entry);
    const to = join(dest, entry);
    if (fs.stat(from).isDirectory) {
      copyDirectory(fs, from, to);
    } else {
      fs.copyFile(from, to);
    }
  }
}
