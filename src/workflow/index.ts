/**
 * Workflow module
 *
 * The release state machine, its persisted records and the per-line lock.
 */

export * from "./workflow";
export * from "./lock";
export * from "./record-store";
export type * from "./workflow.types";
