/**
 * Versioning module types
 */

/**
 * Reads a project-relative path, or returns null when it does not exist
 */
export type FileReader = (path: string) => string | null;

/**
 * What a single location yielded when read
 */
export interface LocationReport {
  location: string;
  version: string | null; // null when unreadable
  error: string | null;
}

/**
 * Result of a successful stamp across all locations
 */
export interface StampResult {
  version: string;
  written: string[]; // location names
  paths: string[]; // files touched, relative to project root
}
