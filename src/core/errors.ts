/**
 * Release error taxonomy.
 *
 * Every failure the engine surfaces to an operator is a ReleaseError with a
 * discriminating `kind`. Multi-item operations (stamping several locations)
 * attach which sub-items succeeded and which failed in `details`.
 */

export type ReleaseErrorKind =
  | "InconsistentVersion"
  | "InvalidVersion"
  | "WriteError"
  | "AlreadyExists"
  | "ParentNotFound"
  | "InvalidBranchName"
  | "DirtyWorkingState"
  | "NothingToCommit"
  | "Conflict"
  | "SigningFailed"
  | "TagExists"
  | "BuildFailed"
  | "UploadFailed"
  | "DestinationConflict"
  | "TargetMissing"
  | "Busy"
  | "NotFound"
  | "InvalidRecord"
  | "OutOfOrder"
  | "CommandFailed";

export interface ItemFailure {
  item: string;
  reason: string;
}

export interface ReleaseErrorDetails {
  /** Sub-items that completed before the failure */
  succeeded?: string[];
  /** Sub-items that failed, with the reason for each */
  failed?: ItemFailure[];
  /** Conflicting paths for merge / cherry-pick failures */
  paths?: string[];
  /** Observed values per item (e.g. version per location) */
  values?: Record<string, string>;
}

export class ReleaseError extends Error {
  constructor(
    public readonly kind: ReleaseErrorKind,
    message: string,
    public readonly details: ReleaseErrorDetails = {}
  ) {
    super(message);
    this.name = "ReleaseError";
  }
}

export function isReleaseError(err: unknown, kind?: ReleaseErrorKind): err is ReleaseError {
  return err instanceof ReleaseError && (kind === undefined || err.kind === kind);
}

/**
 * Extract a one-line reason from anything thrown by a collaborator.
 */
export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return err.message.trim().split("\n")[0] ?? err.message;
  }
  return String(err);
}
