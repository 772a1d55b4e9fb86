/**
 * Workflow types
 */

import type { ReleaseError } from "#/core";
import type { ReleaseRecord } from "#/schemas";
import type { Stage } from "#/stages";
import type { BumpType } from "#/version";

/**
 * How to pick the version being released: bump the current one, or name it.
 */
export type VersionChoice = { bump: BumpType } | { version: string };

export type StartOptions = VersionChoice & {
  /** Branch the release is frozen from (defaults to mainline) */
  from?: string;
};

/**
 * Outcome of a workflow operation. On failure, `stage` is the stage that was
 * being attempted (null when none was) and `record` is the record as last
 * persisted.
 */
export type WorkflowResult =
  | { success: true; record: ReleaseRecord }
  | { success: false; stage: Stage | null; error: ReleaseError; record: ReleaseRecord | null };
