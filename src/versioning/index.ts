/**
 * Versioning module
 *
 * Reading and stamping the release version across declared locations.
 */

export * from "./versioning";
export * from "./strategies";
export type * from "./versioning.types";
export { bumpVersion as bump } from "#/version";
