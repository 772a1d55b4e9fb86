/**
 * In-process git stand-in implementing ShellExecutor.
 *
 * Understands exactly the git invocations BranchManager and ArtifactPublisher
 * issue. Commits snapshot tracked file contents from the mock FileSystem, and
 * checkout writes the branch's snapshot back, so switching branches changes
 * what the engine reads just like a real working tree. `git -C <dir>` runs a
 * command in a linked worktree added with `git worktree add`.
 */

import type { FileSystem, ShellExecutor } from "#/core";
import type { ShellCall } from "./mocks";

interface FakeCommit {
  sha: string;
  parents: string[];
  subject: string;
  snapshot: Map<string, string>;
  /** Paths this commit changed relative to its first parent */
  changed: string[];
}

interface FakeWorktree {
  dir: string;
  /** null when detached */
  branch: string | null;
  detachedAt: string | null;
  staged: Set<string>;
  conflictPaths: string[];
}

interface FakeTag {
  commit: string;
  signedBy: string | null;
}

export interface FakeGitOptions {
  /** Project root; git paths are relative to it */
  root: string;
  /** Paths (relative to root) tracked in the initial commit */
  tracked: string[];
  mainline?: string;
  /** Executor for every command that is not git (build and upload tools) */
  fallback?: ShellExecutor;
}

export interface FakeGit extends ShellExecutor {
  calls: ShellCall[];
  commits: Map<string, FakeCommit>;
  branches: Map<string, string>;
  tags: Map<string, FakeTag>;
  remoteBranches: Map<string, string>;
  remoteTags: Map<string, string>;
  /** Branch checked out in the main worktree */
  head(): string;
  /** Linked worktree directories currently registered */
  worktrees(): string[];
  /** Runs after every git command; tests use it to interleave other invocations */
  afterCommand: ((args: string[]) => void) | null;
  /** Paths reported as modified by `git status` in the main worktree in addition to staged ones */
  dirty: string[];
  /** Merging (or cherry-picking from) these branches/commits conflicts on the given paths */
  conflicts: Map<string, string[]>;
  /** When set, signed tag creation fails with this message */
  signingError: string | null;
  /** Commands (joined with spaces, without `-C <dir>`) that fail with the given message */
  failures: Map<string, string>;
  commitCount(branch: string): number;
  fileAt(ref: string, path: string): string | undefined;
}

class GitError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "GitError";
  }
}

export function createFakeGit(fs: FileSystem, options: FakeGitOptions): FakeGit {
  const mainline = options.mainline ?? "main";
  const commits = new Map<string, FakeCommit>();
  const branches = new Map<string, string>();
  const tags = new Map<string, FakeTag>();
  const remoteBranches = new Map<string, string>();
  const remoteTags = new Map<string, string>();
  const calls: ShellCall[] = [];
  const main: FakeWorktree = {
    dir: options.root,
    branch: mainline,
    detachedAt: null,
    staged: new Set(),
    conflictPaths: [],
  };
  const linked = new Map<string, FakeWorktree>();
  let counter = 0;

  const abs = (wt: FakeWorktree, path: string) => `${wt.dir}/${path}`;

  function newSha(): string {
    counter += 1;
    return `c${counter.toString().padStart(6, "0")}`;
  }

  function createCommit(parents: string[], subject: string, snapshot: Map<string, string>, changed: string[]): string {
    const sha = newSha();
    commits.set(sha, { sha, parents, subject, snapshot, changed });
    return sha;
  }

  function getCommit(sha: string): FakeCommit {
    const commit = commits.get(sha);
    if (!commit) {
      throw new GitError(`fatal: bad object ${sha}`);
    }
    return commit;
  }

  function headSha(wt: FakeWorktree): string | null {
    return wt.branch !== null ? branches.get(wt.branch) ?? null : wt.detachedAt;
  }

  function headCommit(wt: FakeWorktree): FakeCommit {
    const sha = headSha(wt);
    if (!sha) {
      throw new GitError(`fatal: branch ${wt.branch ?? "HEAD"} has no commits`);
    }
    return getCommit(sha);
  }

  function moveHead(wt: FakeWorktree, sha: string): void {
    if (wt.branch !== null) {
      branches.set(wt.branch, sha);
    } else {
      wt.detachedAt = sha;
    }
  }

  function resolve(ref: string, wt: FakeWorktree = main): string | null {
    const bare = ref.replace(/\^\{commit\}$/, "");
    if (bare === "HEAD") return headSha(wt);
    if (bare.startsWith("refs/heads/")) return branches.get(bare.slice("refs/heads/".length)) ?? null;
    if (bare.startsWith("refs/tags/")) return tags.get(bare.slice("refs/tags/".length))?.commit ?? null;
    return branches.get(bare) ?? tags.get(bare)?.commit ?? (commits.has(bare) ? bare : null);
  }

  function mustResolve(ref: string, wt: FakeWorktree = main): string {
    const sha = resolve(ref, wt);
    if (!sha) {
      throw new GitError(`fatal: ambiguous argument '${ref}': unknown revision`);
    }
    return sha;
  }

  function isAncestor(ancestor: string, descendant: string): boolean {
    const queue = [descendant];
    const seen = new Set<string>();
    while (queue.length > 0) {
      const sha = queue.shift();
      if (sha === undefined || seen.has(sha)) continue;
      if (sha === ancestor) return true;
      seen.add(sha);
      queue.push(...getCommit(sha).parents);
    }
    return false;
  }

  function writeSnapshot(wt: FakeWorktree, snapshot: Map<string, string>): void {
    for (const [path, content] of snapshot) {
      fs.writeFile(abs(wt, path), content);
    }
  }

  function readWorkingTree(wt: FakeWorktree, path: string): string | undefined {
    return fs.exists(abs(wt, path)) ? fs.readFile(abs(wt, path)) : undefined;
  }

  function commitStaged(wt: FakeWorktree, subject: string): string {
    const parent = headCommit(wt);
    const snapshot = new Map(parent.snapshot);
    const changed = [...wt.staged].sort();
    for (const path of changed) {
      const content = readWorkingTree(wt, path);
      if (content !== undefined) snapshot.set(path, content);
    }
    const sha = createCommit([parent.sha], subject, snapshot, changed);
    moveHead(wt, sha);
    wt.staged.clear();
    return sha;
  }

  function applyMerge(wt: FakeWorktree, sourceRef: string, args: string[]): void {
    const source = mustResolve(sourceRef, wt);
    const into = headCommit(wt);
    const conflict = fake.conflicts.get(sourceRef);
    if (conflict) {
      wt.conflictPaths = conflict;
      throw new GitError(`CONFLICT (content): Merge conflict in ${conflict.join(", ")}`);
    }
    if (args.includes("--ff") && isAncestor(into.sha, source)) {
      moveHead(wt, source);
    } else {
      const incoming = getCommit(source);
      const snapshot = new Map([...into.snapshot, ...incoming.snapshot]);
      const messageIndex = args.indexOf("-m");
      const subject = messageIndex >= 0 ? args[messageIndex + 1] ?? "" : `Merge branch '${sourceRef}'`;
      moveHead(wt, createCommit([into.sha, source], subject, snapshot, [...incoming.snapshot.keys()]));
    }
    writeSnapshot(wt, headCommit(wt).snapshot);
  }

  function applyCherryPick(wt: FakeWorktree, sha: string): void {
    const picked = getCommit(mustResolve(sha, wt));
    const conflict = fake.conflicts.get(sha);
    if (conflict) {
      wt.conflictPaths = conflict;
      throw new GitError(`error: could not apply ${sha}`);
    }
    const base = headCommit(wt);
    const snapshot = new Map(base.snapshot);
    for (const path of picked.changed) {
      const content = picked.snapshot.get(path);
      if (content !== undefined) snapshot.set(path, content);
    }
    moveHead(wt, createCommit([base.sha], picked.subject, snapshot, picked.changed));
    writeSnapshot(wt, snapshot);
  }

  function checkedOutAt(branch: string): FakeWorktree | undefined {
    return [main, ...linked.values()].find((wt) => wt.branch === branch);
  }

  function worktree(rest: string[]): string {
    const [sub, ...args] = rest;
    const force = args.includes("--force");
    const positional = args.filter((arg) => !arg.startsWith("--"));

    if (sub === "add") {
      const [dir, ref] = positional;
      if (!dir || !ref) throw new GitError("usage: git worktree add <path> <commit-ish>");
      if (fs.exists(dir)) throw new GitError(`fatal: '${dir}' already exists`);
      const detach = args.includes("--detach") || !branches.has(ref);
      if (!detach) {
        const other = checkedOutAt(ref);
        if (other && !force) throw new GitError(`fatal: '${ref}' is already checked out at '${other.dir}'`);
      }
      const wt: FakeWorktree = {
        dir,
        branch: detach ? null : ref,
        detachedAt: detach ? mustResolve(ref) : null,
        staged: new Set(),
        conflictPaths: [],
      };
      linked.set(dir, wt);
      writeSnapshot(wt, headCommit(wt).snapshot);
      return "";
    }
    if (sub === "remove") {
      const [dir] = positional;
      if (!dir || !linked.has(dir)) throw new GitError(`fatal: '${dir ?? ""}' is not a working tree`);
      linked.delete(dir);
      fs.rmdir(dir, { recursive: true });
      return "";
    }
    throw new GitError(`git worktree ${sub ?? ""} is not supported by the fake`);
  }

  function run(wt: FakeWorktree, args: string[]): string {
    const [cmd, ...rest] = args;

    switch (cmd) {
      case "rev-parse": {
        if (rest[0] === "--abbrev-ref") return `${wt.branch ?? "HEAD"}\n`;
        const ref = rest[rest.length - 1] ?? "";
        return `${mustResolve(ref, wt)}\n`;
      }
      case "status": {
        const dirty = wt === main ? fake.dirty : [];
        return [...new Set([...dirty, ...wt.staged])].map((path) => ` M ${path}`).join("\n");
      }
      case "branch": {
        const [name, from] = rest;
        if (!name || !from) throw new GitError("usage: git branch <name> <start>");
        if (branches.has(name)) throw new GitError(`fatal: a branch named '${name}' already exists`);
        branches.set(name, mustResolve(from, wt));
        return "";
      }
      case "checkout": {
        const name = rest[0] ?? "";
        if (!branches.has(name)) throw new GitError(`error: pathspec '${name}' did not match`);
        const other = checkedOutAt(name);
        if (other && other !== wt) throw new GitError(`fatal: '${name}' is already checked out at '${other.dir}'`);
        wt.branch = name;
        wt.detachedAt = null;
        writeSnapshot(wt, headCommit(wt).snapshot);
        return "";
      }
      case "add": {
        const head = headCommit(wt);
        for (const path of rest.filter((arg) => arg !== "--")) {
          if (readWorkingTree(wt, path) !== head.snapshot.get(path)) wt.staged.add(path);
        }
        return "";
      }
      case "diff":
        if (rest.includes("--cached")) return [...wt.staged].join("\n");
        if (rest.includes("--diff-filter=U")) return wt.conflictPaths.join("\n");
        return "";
      case "commit": {
        if (wt.staged.size === 0) throw new GitError("nothing to commit, working tree clean");
        const subject = rest[rest.indexOf("-m") + 1] ?? "";
        commitStaged(wt, subject);
        return "";
      }
      case "show": {
        const spec = rest[rest.length - 1] ?? "";
        const separator = spec.indexOf(":");
        const ref = spec.slice(0, separator);
        const path = spec.slice(separator + 1);
        const content = separator > 0 ? getCommit(mustResolve(ref, wt)).snapshot.get(path) : undefined;
        if (content === undefined) throw new GitError(`fatal: path '${path}' does not exist in '${ref}'`);
        return content;
      }
      case "tag": {
        const name = rest[rest.length - 2] ?? "";
        const target = rest[rest.length - 1] ?? "";
        if (tags.has(name)) throw new GitError(`fatal: tag '${name}' already exists`);
        const signed = rest.includes("-s");
        if (signed && fake.signingError) throw new GitError(fake.signingError);
        const identity = signed ? rest[rest.indexOf("-u") + 1] ?? null : null;
        tags.set(name, { commit: mustResolve(target, wt), signedBy: identity });
        return "";
      }
      case "ls-remote": {
        const ref = rest[rest.length - 1] ?? "";
        const name = ref.replace("refs/tags/", "");
        const sha = remoteTags.get(name);
        return sha ? `${sha}\t${ref}\n` : "";
      }
      case "push": {
        const refspec = rest[1] ?? "";
        if (refspec.startsWith("refs/tags/")) {
          const name = refspec.slice("refs/tags/".length);
          remoteTags.set(name, mustResolve(refspec));
        } else {
          const name = refspec.replace("refs/heads/", "");
          remoteBranches.set(name, mustResolve(refspec));
        }
        return "";
      }
      case "merge-base": {
        const [, ancestor, descendant] = rest;
        if (!isAncestor(mustResolve(ancestor ?? "", wt), mustResolve(descendant ?? "", wt))) {
          throw new GitError("");
        }
        return "";
      }
      case "log": {
        const ref = rest[rest.length - 1] ?? "HEAD";
        return `${getCommit(mustResolve(ref, wt)).subject}\n`;
      }
      case "merge":
        if (rest[0] === "--abort") {
          if (wt.conflictPaths.length === 0) throw new GitError("fatal: There is no merge to abort (MERGE_HEAD missing).");
          wt.conflictPaths = [];
          return "";
        }
        applyMerge(wt, rest[rest.length - 1] ?? "", rest);
        return "";
      case "cherry-pick":
        if (rest[0] === "--abort") {
          wt.conflictPaths = [];
          return "";
        }
        applyCherryPick(wt, rest[0] ?? "");
        return "";
      case "worktree":
        return worktree(rest);
      default:
        throw new GitError(`git: '${cmd}' is not supported by the fake`);
    }
  }

  const initialSnapshot = new Map<string, string>();
  for (const path of options.tracked) {
    const content = readWorkingTree(main, path);
    if (content !== undefined) initialSnapshot.set(path, content);
  }
  const root = createCommit([], "Initial commit", initialSnapshot, [...initialSnapshot.keys()]);
  branches.set(mainline, root);
  remoteBranches.set(mainline, root);

  const fake: FakeGit = {
    calls,
    commits,
    branches,
    tags,
    remoteBranches,
    remoteTags,
    dirty: [],
    conflicts: new Map(),
    signingError: null,
    failures: new Map(),

    afterCommand: null,

    head: () => main.branch ?? "HEAD",

    worktrees: () => [...linked.keys()],

    commitCount(branch: string): number {
      let count = 0;
      let sha: string | undefined = branches.get(branch);
      while (sha) {
        count += 1;
        sha = getCommit(sha).parents[0];
      }
      return count;
    },

    fileAt(ref: string, path: string): string | undefined {
      return getCommit(mustResolve(ref)).snapshot.get(path);
    },

    execFile(command: string, args: string[]): string {
      calls.push({ command, args });
      if (command !== "git") {
        if (!options.fallback) {
          throw new GitError(`${command}: command not found`);
        }
        return options.fallback.execFile(command, args);
      }
      let wt = main;
      let gitArgs = args;
      if (args[0] === "-C") {
        const dir = args[1] ?? "";
        const found = dir === options.root ? main : linked.get(dir);
        if (!found) throw new GitError(`fatal: cannot change to '${dir}': No such file or directory`);
        wt = found;
        gitArgs = args.slice(2);
      }
      const failure = fake.failures.get(gitArgs.join(" "));
      if (failure !== undefined) {
        throw new GitError(failure);
      }
      const output = run(wt, gitArgs);
      fake.afterCommand?.(gitArgs);
      return output;
    },
  };

  return fake;
}
