/**
 * Branch manager
 *
 * Wraps git branch/tag/merge/cherry-pick primitives behind the ShellExecutor.
 * Owns no state: every answer comes from the repository itself.
 *
 * A manager is bound to one working tree: the project checkout, or a linked
 * worktree returned by `addWorktree`. Branch refs are checked against the
 * naming convention of their kind and against their expected parent before
 * anything is checked out or merged.
 *
 * Conflicts are never resolved here. A conflicting merge or cherry-pick is
 * aborted before the error is raised, so the working tree is left as it was.
 */

import { ReleaseError, describeError, type Logger, type ShellExecutor } from "#/core";
import { isValidBranchName } from "./naming";
import type {
  BranchKind,
  BranchManagerOptions,
  BranchRef,
  CommitId,
  MergeResult,
  MergeStrategy,
  TagRef,
  TagResult,
} from "./branch.types";

export class BranchManager {
  private shell: ShellExecutor;
  private logger: Logger;
  private remote: string;
  private cwd: string | null;

  constructor(shell: ShellExecutor, logger: Logger, options: BranchManagerOptions) {
    this.shell = shell;
    this.logger = logger;
    this.remote = options.remote;
    this.cwd = options.cwd ?? null;
  }

  private git(...args: string[]): string {
    return this.shell.execFile("git", this.cwd === null ? args : ["-C", this.cwd, ...args]);
  }

  /**
   * Run a git command whose non-zero exit means "no".
   */
  private gitSucceeds(...args: string[]): boolean {
    try {
      this.git(...args);
      return true;
    } catch {
      return false;
    }
  }

  // --- Queries ---

  branchExists(name: string): boolean {
    return this.gitSucceeds("rev-parse", "--verify", "--quiet", `refs/heads/${name}`);
  }

  tagExists(name: string): boolean {
    return this.gitSucceeds("rev-parse", "--verify", "--quiet", `refs/tags/${name}`);
  }

  remoteTagExists(name: string): boolean {
    const output = this.git("ls-remote", "--tags", this.remote, `refs/tags/${name}`);
    return output.trim().length > 0;
  }

  /**
   * Resolve any ref to the commit it points at, or null if it does not exist.
   */
  resolveCommit(ref: string): CommitId | null {
    try {
      return this.git("rev-parse", "--verify", "--quiet", `${ref}^{commit}`).trim() || null;
    } catch {
      return null;
    }
  }

  isAncestor(ancestor: string, descendant: string): boolean {
    return this.gitSucceeds("merge-base", "--is-ancestor", ancestor, descendant);
  }

  currentBranch(): string {
    return this.git("rev-parse", "--abbrev-ref", "HEAD").trim();
  }

  /**
   * Content of `path` as committed at `ref`, without touching any working tree.
   * Null when the path does not exist there.
   */
  showFile(ref: string, path: string): string | null {
    try {
      return this.git("show", `${ref}:${path}`);
    } catch {
      return null;
    }
  }

  headSubject(ref: string = "HEAD"): string {
    return this.git("log", "-1", "--format=%s", ref).trim();
  }

  /**
   * Tracked paths with uncommitted changes, staged or not. Untracked files
   * (build output, the state directory) never block a checkout.
   */
  changedPaths(): string[] {
    return this.git("status", "--porcelain", "--untracked-files=no")
      .split("\n")
      .filter((line) => line.trim().length > 0)
      .map((line) => line.slice(3).trim());
  }

  isClean(): boolean {
    return this.changedPaths().length === 0;
  }

  private conflictedPaths(): string[] {
    return this.git("diff", "--name-only", "--diff-filter=U")
      .split("\n")
      .map((line) => line.trim())
      .filter(Boolean);
  }

  /**
   * Reject a ref whose name breaks its kind's convention, or that no longer
   * descends from its expected parent.
   */
  verify(ref: BranchRef): void {
    if (!isValidBranchName(ref.kind, ref.name)) {
      throw new ReleaseError("InvalidBranchName", `${ref.name} is not a valid ${ref.kind} branch name`);
    }
    if (ref.expectedParent !== undefined && !this.isAncestor(ref.expectedParent, ref.name)) {
      throw new ReleaseError("ParentNotFound", `${ref.name} does not descend from ${ref.expectedParent}`);
    }
  }

  // --- Mutations ---

  createBranch(from: BranchRef, name: string, kind: BranchKind = "release"): BranchRef {
    if (!isValidBranchName(kind, name)) {
      throw new ReleaseError("InvalidBranchName", `${name} is not a valid ${kind} branch name`);
    }
    if (this.branchExists(name)) {
      throw new ReleaseError("AlreadyExists", `Branch ${name} already exists`);
    }
    if (!this.resolveCommit(from.name)) {
      throw new ReleaseError("ParentNotFound", `Cannot create ${name}: parent ${from.name} not found`);
    }

    this.git("branch", name, from.name);
    this.logger.info("branch_created", `Created ${name} from ${from.name}`, { branch: name, from: from.name });

    return { kind, name, expectedParent: from.name };
  }

  /**
   * Switch to a branch. Refuses when the working tree has uncommitted changes.
   */
  checkout(ref: BranchRef): void {
    this.verify(ref);
    if (this.currentBranch() === ref.name) {
      return;
    }

    const changed = this.changedPaths();
    if (changed.length > 0) {
      throw new ReleaseError("DirtyWorkingState", `Cannot switch to ${ref.name}: uncommitted changes`, {
        paths: changed,
      });
    }

    this.git("checkout", ref.name);
  }

  /**
   * Commit staged changes (after staging `paths`, when given).
   */
  commit(message: string, paths: string[] = []): CommitId {
    if (paths.length > 0) {
      this.git("add", "--", ...paths);
    }

    const staged = this.git("diff", "--cached", "--name-only").trim();
    if (!staged) {
      throw new ReleaseError("NothingToCommit", `Nothing to commit for "${message}"`);
    }

    this.git("commit", "-m", message);
    const commit = this.resolveCommit("HEAD");
    if (!commit) {
      throw new ReleaseError("CommandFailed", "HEAD does not resolve after commit");
    }

    this.logger.info("commit_created", message, { commit });
    return commit;
  }

  /**
   * Create a signed tag.
   *
   * Tags are immutable: an existing tag at the same commit is reported as
   * already present; any other existing tag (locally or upstream) is TagExists.
   */
  tag(name: string, commitId: CommitId, signingIdentity: string): TagResult {
    if (this.tagExists(name)) {
      const existing = this.resolveCommit(`refs/tags/${name}`);
      if (existing === commitId) {
        return { name, commit: commitId, created: false };
      }
      throw new ReleaseError("TagExists", `Tag ${name} already exists at ${existing ?? "unknown commit"}`);
    }
    if (this.remoteTagExists(name)) {
      throw new ReleaseError("TagExists", `Tag ${name} already exists on ${this.remote}`);
    }

    try {
      this.git("tag", "-s", "-u", signingIdentity, "-m", `Release ${name}`, name, commitId);
    } catch (err) {
      throw new ReleaseError("SigningFailed", `Signing tag ${name} as ${signingIdentity} failed: ${describeError(err)}`);
    }

    this.logger.info("tag_created", `Tagged ${commitId} as ${name}`, { tag: name, signedBy: signingIdentity });
    return { name, commit: commitId, created: true };
  }

  push(target: BranchRef | TagRef): void {
    const refspec = "tag" in target ? `refs/tags/${target.tag}` : `refs/heads/${target.name}`;
    try {
      this.git("push", this.remote, refspec);
    } catch (err) {
      throw new ReleaseError("CommandFailed", `Pushing ${refspec} to ${this.remote} failed: ${describeError(err)}`);
    }
    this.logger.info("ref_pushed", `Pushed ${refspec}`, { remote: this.remote, refspec });
  }

  cherryPick(commitId: CommitId, onto: BranchRef): CommitId {
    this.checkout(onto);

    try {
      this.git("cherry-pick", commitId);
    } catch (err) {
      const paths = this.conflictedPaths();
      if (paths.length === 0) {
        throw new ReleaseError("CommandFailed", `Cherry-picking ${commitId} onto ${onto.name} failed: ${describeError(err)}`);
      }
      this.git("cherry-pick", "--abort");
      throw new ReleaseError("Conflict", `Cherry-picking ${commitId} onto ${onto.name} conflicts: ${describeError(err)}`, {
        paths,
      });
    }

    const head = this.resolveCommit("HEAD");
    if (!head) {
      throw new ReleaseError("CommandFailed", "HEAD does not resolve after cherry-pick");
    }
    return head;
  }

  merge(source: BranchRef, into: BranchRef, strategy: MergeStrategy): MergeResult {
    this.verify(source);
    this.checkout(into);

    if (this.isAncestor(source.name, into.name)) {
      return { status: "up-to-date", commit: this.resolveCommit(into.name) ?? "" };
    }

    const args =
      strategy === "fast-forward-preferred"
        ? ["merge", "--ff", "--no-edit", source.name]
        : ["merge", "--no-ff", "--no-edit", "-m", `Merge ${source.name} into ${into.name}`, source.name];

    try {
      this.git(...args);
    } catch (err) {
      const paths = this.conflictedPaths();
      if (paths.length === 0) {
        throw new ReleaseError("CommandFailed", `Merging ${source.name} into ${into.name} failed: ${describeError(err)}`);
      }
      this.git("merge", "--abort");
      throw new ReleaseError("Conflict", `Merging ${source.name} into ${into.name} conflicts: ${describeError(err)}`, {
        paths,
      });
    }

    const commit = this.resolveCommit("HEAD");
    if (!commit) {
      throw new ReleaseError("CommandFailed", "HEAD does not resolve after merge");
    }

    this.logger.info("branch_merged", `Merged ${source.name} into ${into.name}`, { source: source.name, into: into.name, strategy });
    return { status: "merged", commit };
  }

  /**
   * Check `ref` out in a linked worktree at `dir` and return a manager bound
   * to it. The project checkout is left alone, so releases on different lines
   * never move each other's HEAD.
   */
  addWorktree(dir: string, ref: BranchRef): BranchManager {
    this.verify(ref);
    try {
      this.git("worktree", "add", "--force", dir, ref.name);
    } catch (err) {
      throw new ReleaseError("CommandFailed", `Adding worktree ${dir} for ${ref.name} failed: ${describeError(err)}`);
    }
    return new BranchManager(this.shell, this.logger, { remote: this.remote, cwd: dir });
  }

  removeWorktree(dir: string): void {
    try {
      this.git("worktree", "remove", "--force", dir);
    } catch (err) {
      throw new ReleaseError("CommandFailed", `Removing worktree ${dir} failed: ${describeError(err)}`);
    }
  }
}
