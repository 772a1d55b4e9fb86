/**
 * Central definition of release workflow stages.
 *
 * Single source of truth for stage order. A record's `stage` is the last
 * stage it completed; the next stage to run is the one after it.
 */

export const STAGES = [
  "Frozen",
  "VersionBumped",
  "Tagged",
  "DocsPublished",
  "PackagePublished",
  "BranchesMerged",
  "Closed",
] as const;

export type Stage = (typeof STAGES)[number];

export interface StageConfig {
  description: string;
  /** Once completed, an external side effect exists that cannot be undone */
  irreversible: boolean;
}

export const STAGE_CONFIG: Record<Stage, StageConfig> = {
  Frozen: { description: "release branch created from mainline", irreversible: false },
  VersionBumped: { description: "version stamped and committed on the release branch", irreversible: false },
  Tagged: { description: "signed tag pushed upstream", irreversible: true },
  DocsPublished: { description: "docs published and release alias updated", irreversible: true },
  PackagePublished: { description: "package uploaded to the index", irreversible: true },
  BranchesMerged: { description: "release merged into maintenance and mainline", irreversible: true },
  Closed: { description: "record archived", irreversible: true },
};

export function isValidStage(value: string): value is Stage {
  return STAGES.some((stage) => stage === value);
}

export function stageIndex(stage: Stage): number {
  return STAGES.indexOf(stage);
}

/**
 * The stage that follows `stage`, or null when `stage` is terminal.
 *
 * @example nextStage("Frozen") → "VersionBumped"
 * @example nextStage("Closed") → null
 */
export function nextStage(stage: Stage): Stage | null {
  return STAGES[stageIndex(stage) + 1] ?? null;
}

/**
 * True when `stage` has been reached or passed by a record currently at `current`.
 */
export function hasReached(current: Stage, stage: Stage): boolean {
  return stageIndex(current) >= stageIndex(stage);
}
