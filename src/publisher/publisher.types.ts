/**
 * Publisher types
 *
 * Publish targets are stateless configuration. The publisher never switches
 * the project's working tree: builds run against a detached worktree of the
 * requested ref and produce an ArtifactHandle outside it.
 */

import type { Command } from "#/schemas";

export type PublishTargetKind = "docs" | "package";

export interface DocsTarget {
  kind: "docs";
  /** Absolute docs root; versions land in <destination>/vX.Y.Z */
  destination: string;
  /** Alias name under the docs root, repointed after each publish */
  alias: string;
  build: Command;
  /** Build output directory template, relative to the project root */
  output: string;
}

export interface PackageTarget {
  kind: "package";
  /** Package index identifier passed to the upload command as {index} */
  destination: string;
  build: Command;
  /** Built artifact path template, relative to the project root */
  output: string;
  upload: Command;
  exists?: Command;
}

export type PublishTarget = DocsTarget | PackageTarget;

/**
 * A built artifact, identified by content.
 */
export interface ArtifactHandle {
  kind: PublishTargetKind;
  version: string;
  sourceRef: string;
  /** Absolute path to the built directory (docs) or file (package) */
  path: string;
  /** Per-file hashes, relative to `path` (or the file's basename) */
  files: Record<string, string>;
  integrity: string;
}

export interface PublishOutcome {
  /** "unchanged" when the destination already held identical content */
  status: "published" | "unchanged";
  location: string;
}

export interface PublisherOptions {
  projectRoot: string;
  /** Scratch directory for build worktrees and staging */
  workDir: string;
}
