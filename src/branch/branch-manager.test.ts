import { describe, test, expect, beforeEach } from "vitest";
import { BranchManager } from "./branch-manager";
import { createMockFileSystem, createMockLogger } from "#/test-utils/mocks";
import { createFakeGit, type FakeGit } from "#/test-utils/fake-git";
import { ReleaseError } from "#/core";
import type { BranchRef } from "./branch.types";

const MAIN: BranchRef = { kind: "mainline", name: "main" };
const RELEASE: BranchRef = { kind: "release", name: "release-1.4.0" };
const MAINTENANCE: BranchRef = { kind: "maintenance", name: "maintenance-1.4" };
const IDENTITY = "release@example.com";
const WORKTREE = "/project/.release/work/release-1.4.0";

function captureError(fn: () => unknown): ReleaseError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ReleaseError) return err;
    throw err;
  }
  throw new Error("expected a ReleaseError");
}

describe("BranchManager", () => {
  let fs: ReturnType<typeof createMockFileSystem>;
  let git: FakeGit;
  let manager: BranchManager;

  beforeEach(() => {
    fs = createMockFileSystem({ "/project/pyproject.toml": 'version = "1.3.2"\n' });
    git = createFakeGit(fs, { root: "/project", tracked: ["pyproject.toml"] });
    manager = new BranchManager(git, createMockLogger(), { remote: "origin" });
  });

  /** Commit a change to pyproject.toml on main. */
  function commitOnMain(): string {
    fs.writeFile("/project/pyproject.toml", 'version = "1.3.3"\n');
    return manager.commit("Hotfix", ["pyproject.toml"]);
  }

  /** Create release-1.4.0 from main and commit one change on it. */
  function commitOnRelease(content = 'version = "1.4.0"\n'): string {
    manager.createBranch(MAIN, RELEASE.name);
    manager.checkout(RELEASE);
    fs.writeFile("/project/pyproject.toml", content);
    return manager.commit("Bump version to 1.4.0", ["pyproject.toml"]);
  }

  describe("queries", () => {
    test("resolves existing refs and returns null for missing ones", () => {
      expect(manager.resolveCommit("main")).toBe("c000001");
      expect(manager.resolveCommit("release-9.9.9")).toBeNull();
    });

    test("reports the current branch and its subject", () => {
      expect(manager.currentBranch()).toBe("main");
      expect(manager.headSubject()).toBe("Initial commit");
    });

    test("reads a file as committed at a ref", () => {
      expect(manager.showFile("main", "pyproject.toml")).toBe('version = "1.3.2"\n');
      expect(manager.showFile("main", "setup.cfg")).toBeNull();
    });

    test("lists uncommitted paths", () => {
      git.dirty.push("notes.txt");

      expect(manager.changedPaths()).toEqual(["notes.txt"]);
      expect(manager.isClean()).toBe(false);
    });
  });

  describe("createBranch", () => {
    test("creates a branch at the parent's head", () => {
      const ref = manager.createBranch(MAIN, "release-1.4.0");

      expect(ref).toEqual({ kind: "release", name: "release-1.4.0", expectedParent: "main" });
      expect(git.branches.get("release-1.4.0")).toBe("c000001");
    });

    test("fails with AlreadyExists for an existing branch", () => {
      manager.createBranch(MAIN, "release-1.4.0");

      expect(captureError(() => manager.createBranch(MAIN, "release-1.4.0")).kind).toBe("AlreadyExists");
    });

    test("fails with ParentNotFound for a missing parent", () => {
      const error = captureError(() =>
        manager.createBranch({ kind: "release", name: "release-1.3.2" }, "maintenance-1.3", "maintenance")
      );

      expect(error.kind).toBe("ParentNotFound");
      expect(git.branches.has("maintenance-1.3")).toBe(false);
    });

    test("fails with InvalidBranchName when the name does not fit the kind", () => {
      const error = captureError(() => manager.createBranch(MAIN, "release-1.4", "release"));

      expect(error.kind).toBe("InvalidBranchName");
      expect(error.message).toBe("release-1.4 is not a valid release branch name");
      expect(git.branches.has("release-1.4")).toBe(false);
    });
  });

  describe("checkout", () => {
    test("refuses to switch with uncommitted changes", () => {
      manager.createBranch(MAIN, RELEASE.name);
      git.dirty.push("pyproject.toml");

      const error = captureError(() => manager.checkout(RELEASE));

      expect(error.kind).toBe("DirtyWorkingState");
      expect(error.details.paths).toEqual(["pyproject.toml"]);
      expect(git.head()).toBe("main");
    });

    test("refuses a ref whose name does not fit its kind", () => {
      expect(captureError(() => manager.checkout({ kind: "release", name: "main" })).kind).toBe("InvalidBranchName");
    });

    test("refuses a branch that does not descend from its expected parent", () => {
      manager.createBranch(MAIN, RELEASE.name);
      const hotfix = commitOnMain();

      const error = captureError(() => manager.checkout({ ...RELEASE, expectedParent: hotfix }));

      expect(error.kind).toBe("ParentNotFound");
      expect(error.message).toBe(`release-1.4.0 does not descend from ${hotfix}`);
      expect(git.head()).toBe("main");
    });

    test("is a no-op for the current branch even when dirty", () => {
      git.dirty.push("pyproject.toml");

      manager.checkout(MAIN);

      expect(git.head()).toBe("main");
    });
  });

  describe("commit", () => {
    test("commits the given paths and returns the new head", () => {
      const sha = commitOnRelease();

      expect(sha).toBe("c000002");
      expect(git.fileAt("release-1.4.0", "pyproject.toml")).toBe('version = "1.4.0"\n');
      expect(manager.headSubject("release-1.4.0")).toBe("Bump version to 1.4.0");
    });

    test("fails with NothingToCommit when nothing changed", () => {
      const error = captureError(() => manager.commit("Bump version to 1.3.2", ["pyproject.toml"]));

      expect(error.kind).toBe("NothingToCommit");
      expect(git.commitCount("main")).toBe(1);
    });
  });

  describe("tag", () => {
    test("creates a tag signed by the given identity", () => {
      const result = manager.tag("v1.4.0", "c000001", IDENTITY);

      expect(result).toEqual({ name: "v1.4.0", commit: "c000001", created: true });
      expect(git.tags.get("v1.4.0")).toEqual({ commit: "c000001", signedBy: IDENTITY });
    });

    test("reports an identical existing tag as not created", () => {
      manager.tag("v1.4.0", "c000001", IDENTITY);

      expect(manager.tag("v1.4.0", "c000001", IDENTITY).created).toBe(false);
    });

    test("fails with TagExists when the tag points elsewhere", () => {
      const sha = commitOnRelease();
      manager.tag("v1.4.0", "c000001", IDENTITY);

      const error = captureError(() => manager.tag("v1.4.0", sha, IDENTITY));

      expect(error.kind).toBe("TagExists");
      expect(error.message).toBe("Tag v1.4.0 already exists at c000001");
    });

    test("fails with TagExists when only the remote has the tag", () => {
      git.remoteTags.set("v1.4.0", "c000001");

      const error = captureError(() => manager.tag("v1.4.0", "c000001", IDENTITY));

      expect(error.kind).toBe("TagExists");
      expect(error.message).toBe("Tag v1.4.0 already exists on origin");
    });

    test("fails with SigningFailed when signing fails", () => {
      git.signingError = "gpg: signing failed: No secret key";

      const error = captureError(() => manager.tag("v1.4.0", "c000001", IDENTITY));

      expect(error.kind).toBe("SigningFailed");
      expect(error.message).toBe("Signing tag v1.4.0 as release@example.com failed: gpg: signing failed: No secret key");
      expect(git.tags.has("v1.4.0")).toBe(false);
    });
  });

  describe("push", () => {
    test("pushes branches and tags by full refspec", () => {
      const sha = commitOnRelease();
      manager.tag("v1.4.0", sha, IDENTITY);

      manager.push(RELEASE);
      manager.push({ tag: "v1.4.0" });

      expect(git.remoteBranches.get("release-1.4.0")).toBe(sha);
      expect(git.remoteTags.get("v1.4.0")).toBe(sha);
    });

    test("fails with CommandFailed when the remote rejects", () => {
      git.failures.set("push origin refs/heads/main", "! [rejected] main -> main (fetch first)");

      const error = captureError(() => manager.push(MAIN));

      expect(error.kind).toBe("CommandFailed");
      expect(error.message).toBe("Pushing refs/heads/main to origin failed: ! [rejected] main -> main (fetch first)");
    });
  });

  describe("merge", () => {
    test("fast-forwards when preferred and possible", () => {
      manager.createBranch(MAIN, MAINTENANCE.name, "maintenance");
      const sha = commitOnRelease();

      const result = manager.merge(RELEASE, MAINTENANCE, "fast-forward-preferred");

      expect(result).toEqual({ status: "merged", commit: sha });
      expect(git.branches.get("maintenance-1.4")).toBe(sha);
    });

    test("creates an explicit merge commit", () => {
      const sha = commitOnRelease();

      const result = manager.merge(RELEASE, MAIN, "explicit-merge-commit");

      expect(result).toEqual({ status: "merged", commit: "c000003" });
      expect(git.commits.get("c000003")?.parents).toEqual(["c000001", sha]);
      expect(manager.headSubject("main")).toBe("Merge release-1.4.0 into main");
      expect(fs.readFile("/project/pyproject.toml")).toBe('version = "1.4.0"\n');
    });

    test("is up-to-date when the target already contains the source", () => {
      commitOnRelease();
      manager.merge(RELEASE, MAIN, "explicit-merge-commit");

      const result = manager.merge(RELEASE, MAIN, "explicit-merge-commit");

      expect(result).toEqual({ status: "up-to-date", commit: "c000003" });
      expect(git.commitCount("main")).toBe(2);
    });

    test("aborts and reports the paths on conflict", () => {
      commitOnRelease();
      git.conflicts.set("release-1.4.0", ["pyproject.toml", "CHANGES.md"]);

      const error = captureError(() => manager.merge(RELEASE, MAIN, "explicit-merge-commit"));

      expect(error.kind).toBe("Conflict");
      expect(error.details.paths).toEqual(["pyproject.toml", "CHANGES.md"]);
      expect(git.calls.at(-1)?.args).toEqual(["merge", "--abort"]);
      expect(git.branches.get("main")).toBe("c000001");
    });

    test("a failure without conflicting paths is CommandFailed", () => {
      commitOnRelease();
      git.failures.set(
        "merge --no-ff --no-edit -m Merge release-1.4.0 into main release-1.4.0",
        "fatal: refusing to merge unrelated histories"
      );

      const error = captureError(() => manager.merge(RELEASE, MAIN, "explicit-merge-commit"));

      expect(error.kind).toBe("CommandFailed");
      expect(error.message).toBe("Merging release-1.4.0 into main failed: fatal: refusing to merge unrelated histories");
      expect(git.calls.some((call) => call.args.join(" ") === "merge --abort")).toBe(false);
    });

    test("refuses a source that does not descend from its expected parent", () => {
      manager.createBranch(MAIN, RELEASE.name);
      const hotfix = commitOnMain();

      const error = captureError(() =>
        manager.merge({ ...RELEASE, expectedParent: hotfix }, MAINTENANCE, "fast-forward-preferred")
      );

      expect(error.kind).toBe("ParentNotFound");
      expect(git.branches.has("maintenance-1.4")).toBe(false);
    });
  });

  describe("worktrees", () => {
    test("commits in a linked worktree without touching the project checkout", () => {
      manager.createBranch(MAIN, RELEASE.name);
      const release = manager.addWorktree(WORKTREE, RELEASE);

      fs.writeFile(`${WORKTREE}/pyproject.toml`, 'version = "1.4.0"\n');
      const sha = release.commit("Bump version to 1.4.0", ["pyproject.toml"]);

      expect(git.calls.at(-1)?.args).toEqual(["-C", WORKTREE, "rev-parse", "--verify", "--quiet", "HEAD^{commit}"]);
      expect(git.branches.get("release-1.4.0")).toBe(sha);
      expect(release.currentBranch()).toBe("release-1.4.0");
      expect(git.head()).toBe("main");
      expect(fs.readFile("/project/pyproject.toml")).toBe('version = "1.3.2"\n');
    });

    test("removes the worktree and its files", () => {
      manager.createBranch(MAIN, RELEASE.name);
      manager.addWorktree(WORKTREE, RELEASE);

      manager.removeWorktree(WORKTREE);

      expect(git.worktrees()).toEqual([]);
      expect(fs.exists(WORKTREE)).toBe(false);
    });

    test("checks the ref before adding a worktree", () => {
      const error = captureError(() => manager.addWorktree(WORKTREE, { kind: "maintenance", name: "release-1.4.0" }));

      expect(error.kind).toBe("InvalidBranchName");
      expect(git.worktrees()).toEqual([]);
    });
  });

  describe("cherryPick", () => {
    test("applies a commit onto another branch", () => {
      const sha = commitOnRelease('version = "1.4.0"\nextra = true\n');

      const picked = manager.cherryPick(sha, MAIN);

      expect(picked).toBe("c000003");
      expect(git.fileAt("main", "pyproject.toml")).toBe('version = "1.4.0"\nextra = true\n');
      expect(manager.headSubject("main")).toBe("Bump version to 1.4.0");
    });

    test("aborts and reports the paths on conflict", () => {
      const sha = commitOnRelease();
      git.conflicts.set(sha, ["pyproject.toml"]);

      const error = captureError(() => manager.cherryPick(sha, MAIN));

      expect(error.kind).toBe("Conflict");
      expect(error.details.paths).toEqual(["pyproject.toml"]);
      expect(git.calls.at(-1)?.args).toEqual(["cherry-pick", "--abort"]);
    });
  });
});
