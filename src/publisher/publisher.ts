/**
 * Artifact publisher
 *
 * Drives the external build and upload collaborators and checks their
 * postconditions. Docs publishing is content-addressed: a version directory
 * that already holds identical files is left alone, and one that holds
 * anything else is never overwritten.
 */

import { basename, dirname, join, relative, resolve } from "path";
import { ReleaseError, describeError, type FileSystem, type Logger, type ShellExecutor } from "#/core";
import { docsDirName } from "#/branch";
import { formatVersion, parseVersion, type SemanticVersion } from "#/version";
import { commandSucceeds, expandTemplate, runCommand, type CommandVariables } from "./command";
import { calculateIntegrity, compareDirectory, copyDirectory, hashDirectory, hashFile } from "./integrity";
import type {
  ArtifactHandle,
  DocsTarget,
  PackageTarget,
  PublishOutcome,
  PublishTarget,
  PublisherOptions,
} from "./publisher.types";

export class ArtifactPublisher {
  private fs: FileSystem;
  private shell: ShellExecutor;
  private logger: Logger;
  private projectRoot: string;
  private workDir: string;

  constructor(fs: FileSystem, shell: ShellExecutor, logger: Logger, options: PublisherOptions) {
    this.fs = fs;
    this.shell = shell;
    this.logger = logger;
    this.projectRoot = options.projectRoot;
    this.workDir = options.workDir;
  }

  /**
   * Build `target` from `sourceRef` in a detached worktree.
   * The build command receives {version}, {ref}, {source} and {output}.
   * Whatever an earlier, failed build left at the output is removed first.
   */
  build(target: PublishTarget, sourceRef: string, version: SemanticVersion): ArtifactHandle {
    const formatted = formatVersion(version);
    const variables: CommandVariables = { version: formatted, ref: sourceRef };
    const output = resolve(this.projectRoot, expandTemplate(target.output, variables));
    const source = join(this.workDir, `worktree-${target.kind}-${formatted}`);

    this.logger.info("build_started", `Building ${target.kind} for ${formatted}`, { ref: sourceRef, output });

    this.removeWorktree(source);
    try {
      this.clearOutput(output);
      this.shell.execFile("git", ["worktree", "add", "--force", "--detach", source, sourceRef]);
      runCommand(this.shell, target.build, { ...variables, source, output });
    } catch (err) {
      throw new ReleaseError("BuildFailed", `${target.kind} build for ${formatted} failed: ${describeError(err)}`);
    } finally {
      this.removeWorktree(source);
    }

    const files = this.collectOutput(target, output);
    this.logger.info("build_completed", `Built ${target.kind} for ${formatted}`, { files: Object.keys(files).length });

    return {
      kind: target.kind,
      version: formatted,
      sourceRef,
      path: output,
      files,
      integrity: calculateIntegrity(files),
    };
  }

  publish(handle: ArtifactHandle, target: PublishTarget): PublishOutcome {
    if (handle.kind !== target.kind) {
      throw new ReleaseError("UploadFailed", `Cannot publish a ${handle.kind} artifact to a ${target.kind} target`);
    }
    return target.kind === "docs" ? this.publishDocs(handle, target) : this.publishPackage(handle, target);
  }

  /**
   * Atomically point `aliasPath` at `targetPath`.
   *
   * A temporary link is created beside the alias and renamed over it, so the
   * alias resolves either to its old target or to the new, fully published one.
   */
  updateSymlink(aliasPath: string, targetPath: string): PublishOutcome {
    if (!this.fs.exists(targetPath)) {
      throw new ReleaseError("TargetMissing", `Cannot point ${aliasPath} at ${targetPath}: target does not exist`);
    }

    const linkTarget = relative(dirname(aliasPath), targetPath);
    if (this.fs.readlink(aliasPath) === linkTarget) {
      return { status: "unchanged", location: aliasPath };
    }

    const temporary = `${aliasPath}.next`;
    if (this.fs.readlink(temporary) !== null || this.fs.exists(temporary)) {
      this.fs.unlink(temporary);
    }
    this.fs.symlink(linkTarget, temporary);
    this.fs.rename(temporary, aliasPath);

    this.logger.info("alias_updated", `${basename(aliasPath)} → ${linkTarget}`, { alias: aliasPath, target: linkTarget });
    return { status: "published", location: aliasPath };
  }

  private clearOutput(output: string): void {
    if (!this.fs.exists(output)) {
      return;
    }
    if (this.fs.stat(output).isDirectory) {
      this.fs.rmdir(output, { recursive: true });
    } else {
      this.fs.unlink(output);
    }
  }

  private collectOutput(target: PublishTarget, output: string): Record<string, string> {
    if (!this.fs.exists(output)) {
      throw new ReleaseError("BuildFailed", `${target.kind} build produced nothing at ${output}`);
    }

    const isDirectory = this.fs.stat(output).isDirectory;
    if (target.kind === "docs") {
      const files = isDirectory ? hashDirectory(this.fs, output) : {};
      if (Object.keys(files).length === 0) {
        throw new ReleaseError("BuildFailed", `docs build output ${output} is not a non-empty directory`);
      }
      return files;
    }

    if (isDirectory) {
      throw new ReleaseError("BuildFailed", `package build output ${output} is a directory, expected a file`);
    }
    return hashFile(this.fs, output);
  }

  private publishDocs(handle: ArtifactHandle, target: DocsTarget): PublishOutcome {
    const version = docsDirName(parseVersion(handle.version));
    const destination = join(target.destination, version);

    if (this.fs.exists(destination)) {
      const comparison = compareDirectory(this.fs, destination, handle.files);
      if (comparison.identical) {
        this.logger.info("docs_unchanged", `Docs for ${handle.version} already published`, { destination });
        return { status: "unchanged", location: destination };
      }
      throw new ReleaseError("DestinationConflict", `${destination} already exists with different content`, {
        paths: [...comparison.modifiedFiles, ...comparison.missingFiles, ...comparison.extraFiles].sort(),
      });
    }

    // Stage beside the destination so the final rename stays on one filesystem
    const staging = join(target.destination, `.${version}.staging`);
    if (this.fs.exists(staging)) {
      this.fs.rmdir(staging, { recursive: true });
    }
    this.fs.mkdir(target.destination, { recursive: true });

    try {
      copyDirectory(this.fs, handle.path, staging);
    } catch (err) {
      throw new ReleaseError("UploadFailed", `Copying docs to ${staging} failed: ${describeError(err)}`);
    }

    if (!compareDirectory(this.fs, staging, handle.files).identical) {
      throw new ReleaseError("UploadFailed", `Staged docs at ${staging} do not match the build`);
    }
    this.fs.rename(staging, destination);

    this.logger.info("docs_published", `Published docs for ${handle.version}`, { destination });
    return { status: "published", location: destination };
  }

  private publishPackage(handle: ArtifactHandle, target: PackageTarget): PublishOutcome {
    const variables: CommandVariables = {
      version: handle.version,
      artifact: handle.path,
      index: target.destination,
    };

    if (target.exists && commandSucceeds(this.shell, target.exists, variables)) {
      this.logger.info("package_unchanged", `${handle.version} already on ${target.destination}`);
      return { status: "unchanged", location: target.destination };
    }

    try {
      runCommand(this.shell, target.upload, variables);
    } catch (err) {
      throw new ReleaseError("UploadFailed", `Uploading ${basename(handle.path)} to ${target.destination} failed: ${describeError(err)}`);
    }

    this.logger.info("package_published", `Uploaded ${basename(handle.path)}`, { index: target.destination });
    return { status: "published", location: target.destination };
  }

  private removeWorktree(path: string): void {
    if (!this.fs.exists(path)) {
      return;
    }
    try {
      this.shell.execFile("git", ["worktree", "remove", "--force", path]);
    } catch (err) {
      this.logger.warn("worktree_cleanup_failed", `Could not remove worktree ${path}`, { error: describeError(err) });
    }
  }
}
