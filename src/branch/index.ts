/**
 * Branch module
 *
 * Git branch/tag/merge operations and release naming conventions.
 */

export * from "./branch-manager";
export * from "./naming";
export type * from "./branch.types";
