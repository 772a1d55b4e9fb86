/**
 * Release workflow
 *
 * Drives one release through Frozen → VersionBumped → Tagged → DocsPublished →
 * PackagePublished → BranchesMerged → Closed. `record.stage` is the last
 * completed stage and is persisted after every transition, so a failed run
 * resumes from where it stopped.
 *
 * Every transition is re-entrant: running it again after it (partly)
 * succeeded finds its postcondition already satisfied and changes nothing.
 * Nothing is rolled back once a tag or an upload has left the machine.
 *
 * The project checkout is never switched. Versions are read from the base
 * branch with `git show`, and the bump and merges happen in linked worktrees
 * under `<stateDir>/work`, so releases on different lines never share a HEAD.
 */

import { join } from "path";
import {
  ReleaseError,
  describeError,
  isReleaseError,
  type EngineContext,
  type Logger,
} from "#/core";
import type { ReleaseConfig, ReleaseRecord } from "#/schemas";
import { hasReached, nextStage, type Stage } from "#/stages";
import {
  bumpVersion,
  compareVersions,
  formatVersion,
  getHighestVersion,
  isLineChange,
  lineOf,
  parseVersion,
  versionsEqual,
  type SemanticVersion,
} from "#/version";
import { inspectLocations, readCurrent, stamp, workingTreeReader, type LocationReport } from "#/versioning";
import {
  BranchManager,
  docsDirName,
  maintenanceBranchName,
  parseMaintenanceBranchName,
  releaseBranchName,
  tagName,
  type BranchRef,
} from "#/branch";
import { ArtifactPublisher, runCommand } from "#/publisher";
import { toPublishTargets, type PublishTargets } from "#/config";
import { LineLock } from "./lock";
import { getRecord, listRecords, saveRecord } from "./record-store";
import type { StartOptions, WorkflowResult } from "./workflow.types";

const LINE_REGEX = /^\d+\.\d+$/;

/**
 * @example bumpMessage({ major: 1, minor: 4, patch: 0 }) → "Bump version to 1.4.0"
 */
export function bumpMessage(version: SemanticVersion): string {
  return `Bump version to ${formatVersion(version)}`;
}

interface FreezePlan {
  base: BranchRef;
  baseCommit: string;
  current: SemanticVersion;
  version: SemanticVersion;
}

function required<T>(value: T | null, field: string, record: ReleaseRecord): T {
  if (value === null) {
    throw new ReleaseError(
      "InvalidRecord",
      `Record for ${formatVersion(record.version)} is at ${record.stage} but has no ${field}`
    );
  }
  return value;
}

export class ReleaseWorkflow {
  private ctx: EngineContext;
  private config: ReleaseConfig;
  private logger: Logger;
  private branches: BranchManager;
  private publisher: ArtifactPublisher;
  private lock: LineLock;
  private targets: PublishTargets;

  constructor(ctx: EngineContext, config: ReleaseConfig) {
    this.ctx = ctx;
    this.config = config;
    this.logger = ctx.logger;
    this.branches = new BranchManager(ctx.shell, ctx.logger, { remote: config.remote });
    this.publisher = new ArtifactPublisher(ctx.fs, ctx.shell, ctx.logger, {
      projectRoot: ctx.paths.projectRoot,
      workDir: join(ctx.paths.stateDir, "work"),
    });
    this.lock = new LineLock(ctx.fs, ctx.clock, ctx.logger, ctx.paths.stateDir);
    this.targets = toPublishTargets(config, ctx.paths.projectRoot);
  }

  // --- Operations ---

  /**
   * Freeze a new release and run it to Closed. Starting a release that
   * already has a record resumes it instead.
   */
  start(options: StartOptions): WorkflowResult {
    // Only reads happen before the lock is held
    let plan: FreezePlan;
    try {
      plan = this.plan(options);
      const existing = getRecord(this.ctx.fs, this.ctx.paths.stateDir, plan.version);
      if (existing) {
        this.logger.info("release_exists", `Release ${formatVersion(plan.version)} already started, resuming`);
        return this.resume(formatVersion(plan.version));
      }
    } catch (err) {
      return this.failure("Frozen", null, err);
    }

    return this.locked(lineOf(plan.version), "Frozen", null, () => this.advance(this.freeze(plan), null));
  }

  /**
   * Continue a release from its last completed stage.
   */
  resume(version: string): WorkflowResult {
    let record: ReleaseRecord;
    try {
      record = this.requireRecord(version);
    } catch (err) {
      return this.failure(null, null, err);
    }

    if (record.archived) {
      return { success: true, record };
    }
    return this.locked(lineOf(record.version), nextStage(record.stage), record, () => this.advance(record, null));
  }

  /**
   * Run exactly `stage`, which must be the next one. A stage the record has
   * already completed is a no-op.
   */
  runStage(version: string, stage: Stage): WorkflowResult {
    let record: ReleaseRecord;
    try {
      record = this.requireRecord(version);
    } catch (err) {
      return this.failure(stage, null, err);
    }

    if (hasReached(record.stage, stage)) {
      return { success: true, record };
    }
    const next = nextStage(record.stage);
    if (next !== stage) {
      const error = new ReleaseError(
        "OutOfOrder",
        `Cannot run ${stage} for ${version}: the next stage is ${next ?? "none"}`
      );
      return this.failure(stage, record, error);
    }

    return this.locked(lineOf(record.version), stage, record, () => this.advance(record, stage));
  }

  /**
   * All records in version order, or the record for one version.
   */
  status(version?: string): ReleaseRecord[] {
    if (version === undefined) {
      return listRecords(this.ctx.fs, this.ctx.paths.stateDir);
    }
    return [this.requireRecord(version)];
  }

  /**
   * What each version location holds on `ref`, read from git rather than
   * the project checkout.
   */
  locations(ref: string = this.config.mainline): LocationReport[] {
    return inspectLocations((path) => this.branches.showFile(ref, path), this.config.locations);
  }

  /**
   * Remove the lock file a crashed invocation left for `line` ("1.4").
   */
  unlock(line: string): boolean {
    if (!LINE_REGEX.test(line)) {
      throw new ReleaseError("InvalidVersion", `Invalid release line "${line}". Must be MAJOR.MINOR (e.g., 1.4)`);
    }
    return this.lock.forceRelease(line);
  }

  // --- Orchestration ---

  private requireRecord(version: string): ReleaseRecord {
    const record = getRecord(this.ctx.fs, this.ctx.paths.stateDir, parseVersion(version));
    if (!record) {
      throw new ReleaseError("NotFound", `No release record for ${version}`);
    }
    return record;
  }

  private locked(
    line: string,
    stage: Stage | null,
    record: ReleaseRecord | null,
    fn: () => WorkflowResult
  ): WorkflowResult {
    try {
      return this.lock.withLock(line, fn);
    } catch (err) {
      return this.failure(stage, record, err);
    }
  }

  private failure(stage: Stage | null, record: ReleaseRecord | null, err: unknown): WorkflowResult {
    const error = isReleaseError(err) ? err : new ReleaseError("CommandFailed", describeError(err));
    this.logger.error("stage_failed", error.message, {
      stage,
      kind: error.kind,
      version: record ? formatVersion(record.version) : null,
    });
    return { success: false, stage, error, record };
  }

  /**
   * Run stages after the record's current one, stopping after `until`
   * (or at Closed) or at the first failure.
   */
  private advance(from: ReleaseRecord, until: Stage | null): WorkflowResult {
    let record = from;
    for (let stage = nextStage(record.stage); stage !== null; stage = nextStage(stage)) {
      try {
        record = this.complete(record, stage, this.transition(stage, record));
      } catch (err) {
        return this.failure(stage, record, err);
      }
      if (stage === until) {
        break;
      }
    }
    return { success: true, record };
  }

  private transition(stage: Stage, record: ReleaseRecord): Partial<ReleaseRecord> {
    switch (stage) {
      case "Frozen":
        throw new ReleaseError("OutOfOrder", "Frozen is entered by starting a release");
      case "VersionBumped":
        return this.bump(record);
      case "Tagged":
        return this.tag(record);
      case "DocsPublished":
        return this.publishDocs(record);
      case "PackagePublished":
        return this.publishPackage(record);
      case "BranchesMerged":
        return this.mergeBranches(record);
      case "Closed":
        return this.close(record);
    }
  }

  private complete(record: ReleaseRecord, stage: Stage, changes: Partial<ReleaseRecord>): ReleaseRecord {
    const at = this.ctx.clock.now().toISOString();
    const updated: ReleaseRecord = {
      ...record,
      ...changes,
      stage,
      updatedAt: at,
      history: [...record.history, { stage, at }],
    };
    saveRecord(this.ctx.fs, this.ctx.paths.stateDir, updated);
    this.logger.info("stage_completed", `${formatVersion(record.version)} ${stage}`, { stage });
    return updated;
  }

  // --- Stages ---

  private plan(options: StartOptions): FreezePlan {
    const baseName = options.from ?? this.config.mainline;
    const base: BranchRef = {
      kind:
        baseName === this.config.mainline
          ? "mainline"
          : parseMaintenanceBranchName(baseName)
            ? "maintenance"
            : "feature",
      name: baseName,
    };

    this.branches.verify(base);
    const baseCommit = this.branches.resolveCommit(base.name);
    if (!baseCommit) {
      throw new ReleaseError("NotFound", `Base branch ${base.name} does not exist`);
    }
    const current = readCurrent((path) => this.branches.showFile(baseCommit, path), this.config.locations);
    const version = "version" in options ? parseVersion(options.version) : bumpVersion(current, options.bump);

    if (compareVersions(version, current) <= 0 && !getRecord(this.ctx.fs, this.ctx.paths.stateDir, version)) {
      throw new ReleaseError(
        "InvalidVersion",
        `Version ${formatVersion(version)} is not newer than ${formatVersion(current)} on ${base.name}`
      );
    }

    return { base, baseCommit, current, version };
  }

  private freeze({ base, baseCommit, current, version }: FreezePlan): ReleaseRecord {
    const formatted = formatVersion(version);
    const line = lineOf(version);

    const existing = getRecord(this.ctx.fs, this.ctx.paths.stateDir, version);
    if (existing) {
      return existing;
    }

    const open = listRecords(this.ctx.fs, this.ctx.paths.stateDir).find(
      (record) => !record.archived && lineOf(record.version) === line && !versionsEqual(record.version, version)
    );
    if (open) {
      throw new ReleaseError(
        "Busy",
        `Release ${formatVersion(open.version)} is still open on line ${line} (at ${open.stage})`
      );
    }

    const releaseBranch = releaseBranchName(version);
    if (this.branches.branchExists(releaseBranch)) {
      if (!this.branches.isAncestor(baseCommit, releaseBranch)) {
        throw new ReleaseError(
          "AlreadyExists",
          `Release branch ${releaseBranch} already exists and does not contain ${base.name} at ${baseCommit}`
        );
      }
      this.logger.info("branch_reused", `Release branch ${releaseBranch} already exists`);
    } else {
      this.branches.createBranch(base, releaseBranch, "release");
    }

    const now = this.ctx.clock.now().toISOString();
    const record: ReleaseRecord = {
      version,
      previousVersion: current,
      stage: "Frozen",
      baseBranch: base.name,
      baseCommit,
      releaseBranch,
      maintenanceBranch: null,
      maintenanceAction: null,
      bumpCommit: null,
      tagName: null,
      archived: false,
      createdAt: now,
      updatedAt: now,
      history: [{ stage: "Frozen", at: now }],
    };
    saveRecord(this.ctx.fs, this.ctx.paths.stateDir, record);

    this.logger.info("release_frozen", `Froze ${formatted} from ${base.name}`, {
      version: formatted,
      previous: formatVersion(current),
      branch: releaseBranch,
    });
    return record;
  }

  private releaseRef(record: ReleaseRecord): BranchRef {
    const ref: BranchRef = { kind: "release", name: record.releaseBranch };
    return record.baseCommit === null ? ref : { ...ref, expectedParent: record.baseCommit };
  }

  /**
   * Run `fn` in a linked worktree of `ref` for this release, removing it
   * afterwards. A worktree left behind by a crashed run is replaced.
   */
  private inWorktree<T>(record: ReleaseRecord, ref: BranchRef, fn: (branches: BranchManager, dir: string) => T): T {
    const dir = join(this.ctx.paths.stateDir, "work", `worktree-${ref.name}-${formatVersion(record.version)}`);
    if (this.ctx.fs.exists(dir)) {
      this.removeWorktree(dir);
      if (this.ctx.fs.exists(dir)) {
        this.ctx.fs.rmdir(dir, { recursive: true });
      }
    }

    const branches = this.branches.addWorktree(dir, ref);
    try {
      return fn(branches, dir);
    } finally {
      this.removeWorktree(dir);
    }
  }

  private removeWorktree(dir: string): void {
    try {
      this.branches.removeWorktree(dir);
    } catch (err) {
      this.logger.warn("worktree_cleanup_failed", `Could not remove worktree ${dir}`, { error: describeError(err) });
    }
  }

  /**
   * The release this one follows: the latest archived record below it,
   * else the version read when it was frozen.
   */
  private previousRelease(record: ReleaseRecord): SemanticVersion {
    const archived = listRecords(this.ctx.fs, this.ctx.paths.stateDir)
      .filter((candidate) => candidate.archived && compareVersions(candidate.version, record.version) < 0)
      .map((candidate) => candidate.version);
    return getHighestVersion(archived) ?? record.previousVersion;
  }

  private bump(record: ReleaseRecord): Partial<ReleaseRecord> {
    const release = this.releaseRef(record);

    let maintenanceAction = record.maintenanceAction;
    if (maintenanceAction === null) {
      const previous = this.previousRelease(record);
      maintenanceAction = isLineChange(previous, record.version) ? "create" : "merge";
      this.logger.info("maintenance_decided", `${formatVersion(previous)} → ${formatVersion(record.version)}: ${maintenanceAction}`, {
        previous: formatVersion(previous),
        action: maintenanceAction,
      });
    }

    const bumpCommit = this.inWorktree(record, release, (branches, dir) => {
      const stamped = stamp(this.ctx.fs, dir, this.config.locations, record.version);

      let commit: string;
      try {
        commit = branches.commit(bumpMessage(record.version), [...new Set(stamped.paths)]);
      } catch (err) {
        if (!isReleaseError(err, "NothingToCommit")) {
          throw err;
        }
        const head = branches.resolveCommit(release.name);
        if (!head) {
          throw new ReleaseError("NotFound", `Release branch ${release.name} does not resolve`);
        }
        commit = head;
        this.logger.info("bump_already_committed", `${release.name} already carries ${stamped.version}`, { commit: head });
      }

      const current = readCurrent(workingTreeReader(this.ctx.fs, dir), this.config.locations);
      if (!versionsEqual(current, record.version)) {
        throw new ReleaseError("InconsistentVersion", `Stamped ${stamped.version} but read back ${formatVersion(current)}`);
      }
      return commit;
    });

    return {
      maintenanceAction,
      maintenanceBranch: maintenanceBranchName(record.version),
      bumpCommit,
    };
  }

  private tag(record: ReleaseRecord): Partial<ReleaseRecord> {
    const commit = required(record.bumpCommit, "bump commit", record);
    const name = tagName(record.version);

    this.branches.push(this.releaseRef(record));
    this.branches.tag(name, commit, this.config.signingIdentity);
    if (!this.branches.remoteTagExists(name)) {
      this.branches.push({ tag: name });
    }

    return { tagName: name };
  }

  private publishDocs(record: ReleaseRecord): Partial<ReleaseRecord> {
    const target = this.targets.docs;
    const handle = this.publisher.build(target, required(record.tagName, "tag", record), record.version);

    this.publisher.publish(handle, target);
    this.publisher.updateSymlink(
      join(target.destination, target.alias),
      join(target.destination, docsDirName(record.version))
    );
    return {};
  }

  private publishPackage(record: ReleaseRecord): Partial<ReleaseRecord> {
    const target = this.targets.package;
    const handle = this.publisher.build(target, required(record.tagName, "tag", record), record.version);

    this.publisher.publish(handle, target);
    return {};
  }

  private mergeBranches(record: ReleaseRecord): Partial<ReleaseRecord> {
    const release = this.releaseRef(record);
    const action = required(record.maintenanceAction, "maintenance action", record);
    const maintenance: BranchRef = {
      kind: "maintenance",
      name: record.maintenanceBranch ?? maintenanceBranchName(record.version),
    };
    const mainline: BranchRef = { kind: "mainline", name: this.config.mainline };

    if (this.branches.branchExists(maintenance.name)) {
      this.inWorktree(record, maintenance, (branches) => branches.merge(release, maintenance, "fast-forward-preferred"));
    } else if (action === "create") {
      this.branches.createBranch(release, maintenance.name, "maintenance");
    } else {
      throw new ReleaseError("NotFound", `Maintenance branch ${maintenance.name} does not exist`);
    }
    this.inWorktree(record, mainline, (branches) => branches.merge(release, mainline, "explicit-merge-commit"));

    this.branches.push(maintenance);
    this.branches.push(mainline);
    return { maintenanceBranch: maintenance.name };
  }

  private close(record: ReleaseRecord): Partial<ReleaseRecord> {
    this.closeIssues(record.version);
    return { archived: true };
  }

  /**
   * Best effort: a tracker failure is logged and never blocks Closed.
   */
  private closeIssues(version: SemanticVersion): void {
    const tracker = this.config.issues;
    if (!tracker) {
      return;
    }

    const formatted = formatVersion(version);
    try {
      const output = runCommand(this.ctx.shell, tracker.close, { version: formatted });
      const count = Number.parseInt(output.trim(), 10);
      this.logger.info("issues_closed", `Closed ${Number.isNaN(count) ? "?" : count} issues for ${formatted}`, {
        count: Number.isNaN(count) ? null : count,
      });
    } catch (err) {
      this.logger.warn("issues_close_failed", `Could not close issues for ${formatted}`, {
        error: describeError(err),
      });
    }
  }
}
