/**
 * Branch module types
 */

export type BranchKind = "mainline" | "release" | "maintenance" | "feature";

export interface BranchRef {
  kind: BranchKind;
  name: string;
  /** Branch or commit this one must descend from */
  expectedParent?: string;
}

export interface TagRef {
  tag: string;
}

export type CommitId = string;

export type MergeStrategy = "fast-forward-preferred" | "explicit-merge-commit";

export interface MergeResult {
  /** "up-to-date" when the target already contained the source */
  status: "merged" | "up-to-date";
  commit: CommitId;
}

export interface TagResult {
  name: string;
  commit: CommitId;
  /** false when an identical tag already existed */
  created: boolean;
}

export interface BranchManagerOptions {
  remote: string;
  /** Working tree git runs in (`git -C`); the process cwd when absent */
  cwd?: string;
}
