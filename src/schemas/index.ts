import { z } from "zod";
import { isReleaseVersion, parseVersion } from "#/version";
import { STAGES } from "#/stages";

// Release version string (MAJOR.MINOR.PATCH)
export const VersionStringSchema = z.string().refine(isReleaseVersion, {
  message: "Invalid release version. Must be MAJOR.MINOR.PATCH (e.g., 1.4.0)",
});

// Same as above, parsed into a SemanticVersion
export const VersionSchema = VersionStringSchema.transform(parseVersion);

// External command contract: argv array, first element is the executable
export const CommandSchema = z.array(z.string().min(1)).min(1, "Command must name an executable");
export type Command = z.infer<typeof CommandSchema>;

function countCaptureGroups(pattern: string): number | null {
  try {
    // Alternation with the empty string always matches, exposing every group
    const match = new RegExp(`${pattern}|`).exec("");
    return match ? match.length - 1 : null;
  } catch {
    return null;
  }
}

const locationBase = {
  name: z.string().min(1),
  path: z.string().min(1), // relative to project root
};

// Version locations: where the version is stamped
export const VersionLocationSchema = z.discriminatedUnion("strategy", [
  z.object({
    ...locationBase,
    strategy: z.literal("regex"),
    pattern: z.string().refine((p) => countCaptureGroups(p) === 1, {
      message: "Pattern must be a valid regular expression with exactly one capture group",
    }),
  }),
  z.object({
    ...locationBase,
    strategy: z.literal("json"),
    key: z.string().min(1).default("version"), // dotted key path
  }),
  z.object({
    ...locationBase,
    strategy: z.literal("yaml"),
    key: z.string().min(1).default("version"),
  }),
]);
export type VersionLocation = z.infer<typeof VersionLocationSchema>;
export type LocationStrategyKind = VersionLocation["strategy"];

// Docs target: build into `output`, publish under `root`/vX.Y.Z, alias `root`/`alias`
export const DocsTargetConfigSchema = z.object({
  root: z.string().min(1),
  alias: z.string().min(1).default("release"),
  build: CommandSchema,
  output: z.string().min(1),
});
export type DocsTargetConfig = z.infer<typeof DocsTargetConfigSchema>;

// Package target: build a distributable at `output`, upload it to `index`
export const PackageTargetConfigSchema = z.object({
  index: z.string().min(1),
  build: CommandSchema,
  output: z.string().min(1),
  upload: CommandSchema,
  exists: CommandSchema.optional(), // exits 0 when the version is already on the index
});
export type PackageTargetConfig = z.infer<typeof PackageTargetConfigSchema>;

export const IssueTrackerConfigSchema = z.object({
  close: CommandSchema, // prints the number of issues closed
});
export type IssueTrackerConfig = z.infer<typeof IssueTrackerConfigSchema>;

// Release config (release.yaml at project root)
export const ReleaseConfigSchema = z.object({
  mainline: z.string().min(1).default("main"),
  remote: z.string().min(1).default("origin"),
  signingIdentity: z.string().min(1), // every release tag is signed
  stateDir: z.string().min(1).default(".release"),
  locations: z
    .array(VersionLocationSchema)
    .min(1, "At least one version location is required")
    .refine((locations) => new Set(locations.map((l) => l.name)).size === locations.length, {
      message: "Version location names must be unique",
    }),
  targets: z.object({
    docs: DocsTargetConfigSchema,
    package: PackageTargetConfigSchema,
  }),
  issues: IssueTrackerConfigSchema.optional(),
});
export type ReleaseConfig = z.infer<typeof ReleaseConfigSchema>;

export const StageSchema = z.enum(STAGES);

export const MaintenanceActionSchema = z.enum(["create", "merge"]);
export type MaintenanceAction = z.infer<typeof MaintenanceActionSchema>;

export const StageHistoryEntrySchema = z.object({
  stage: StageSchema,
  at: z.string(), // ISO timestamp
});
export type StageHistoryEntry = z.infer<typeof StageHistoryEntrySchema>;

// Release record (<stateDir>/releases/X.Y.Z.yaml) - one per release, archived on Closed
export const ReleaseRecordSchema = z.object({
  version: VersionSchema,
  previousVersion: VersionSchema,
  stage: StageSchema,
  baseBranch: z.string(),
  baseCommit: z.string().nullable().default(null), // base branch head at freeze time
  releaseBranch: z.string(),
  maintenanceBranch: z.string().nullable().default(null),
  maintenanceAction: MaintenanceActionSchema.nullable().default(null), // decided once at VersionBumped
  bumpCommit: z.string().nullable().default(null),
  tagName: z.string().nullable().default(null),
  archived: z.boolean().default(false),
  createdAt: z.string(),
  updatedAt: z.string(),
  history: z.array(StageHistoryEntrySchema).default([]),
});
export type ReleaseRecord = z.infer<typeof ReleaseRecordSchema>;
export type SerializedReleaseRecord = z.input<typeof ReleaseRecordSchema>;
