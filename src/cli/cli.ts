/**
 * Release CLI
 *
 * Operator entry points over ReleaseWorkflow. Every command loads
 * release.yaml first; workflow failures print the failing stage, the error
 * kind and the sub-item breakdown, and exit non-zero.
 */

import { Argument, Command, CommanderError, Option } from "commander";
import { resolve } from "path";
import { isReleaseError, type EngineContext, type FileSystem, type PathConfig } from "#/core";
import { CONFIG_FILENAME, loadConfig, resolvePaths } from "#/config";
import { formatFriendlyError, formatReleaseError } from "#/friendly-errors";
import type { ReleaseConfig, ReleaseRecord } from "#/schemas";
import { STAGES, STAGE_CONFIG, isValidStage } from "#/stages";
import { BUMP_TYPES, formatVersion } from "#/version";
import { ReleaseWorkflow, type VersionChoice, type WorkflowResult } from "#/workflow";

export interface CliDeps {
  cwd: string;
  /** Used to read release.yaml before an engine context exists */
  fs: FileSystem;
  createContext(paths: PathConfig): EngineContext;
  out(line: string): void;
  err(line: string): void;
}

interface Session {
  config: ReleaseConfig;
  workflow: ReleaseWorkflow;
}

interface StartFlags {
  bump?: string;
  releaseVersion?: string;
  from?: string;
}

class CliFailure extends Error {}

function describeRecord(record: ReleaseRecord): string {
  const state = record.archived ? "archived" : "open";
  return `${formatVersion(record.version)}  ${record.stage}  ${state}  ${record.releaseBranch}`;
}

export function createProgram(deps: CliDeps): Command {
  const program = new Command()
    .name("release")
    .description("Freeze, tag, publish and merge a release")
    .option("-c, --config <path>", "Path to release.yaml", CONFIG_FILENAME)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => deps.out(text.trimEnd()),
      writeErr: (text) => deps.err(text.trimEnd()),
    });

  const open = (): Session => {
    const configFile = resolve(deps.cwd, program.opts<{ config: string }>().config);
    const loaded = loadConfig(deps.fs, configFile);
    if (!loaded.success) {
      formatFriendlyError(loaded.error).forEach((line) => deps.err(line));
      throw new CliFailure(loaded.error.message);
    }

    const ctx = deps.createContext(resolvePaths(configFile, loaded.data));
    return { config: loaded.data, workflow: new ReleaseWorkflow(ctx, loaded.data) };
  };

  const report = (result: WorkflowResult): void => {
    if (result.success) {
      deps.out(`Release ${formatVersion(result.record.version)} is at ${result.record.stage}`);
      return;
    }

    const { record } = result;
    const subject = record ? `Release ${formatVersion(record.version)}` : "Release";
    deps.err(`${subject} failed${result.stage ? ` at ${result.stage}` : ""}`);
    formatReleaseError(result.error).forEach((line) => deps.err(line));
    if (record && STAGE_CONFIG[record.stage].irreversible) {
      deps.err(`${record.stage} cannot be undone; fix the cause and run: resume ${formatVersion(record.version)}`);
    }
    throw new CliFailure(result.error.message);
  };

  program
    .command("start")
    .description("Freeze a new release from the current version and run it to the end")
    .addOption(new Option("-b, --bump <type>", "Version component to bump").choices([...BUMP_TYPES]))
    .option("-r, --release-version <version>", "Exact version to release (e.g. 1.4.0)")
    .option("-f, --from <branch>", "Branch to freeze from (defaults to mainline)")
    .action((flags: StartFlags) => {
      const bump = BUMP_TYPES.find((type) => type === flags.bump);
      let choice: VersionChoice;
      if (bump !== undefined && flags.releaseVersion === undefined) {
        choice = { bump };
      } else if (bump === undefined && flags.releaseVersion !== undefined) {
        choice = { version: flags.releaseVersion };
      } else {
        deps.err("Pass exactly one of --bump or --release-version");
        throw new CliFailure("invalid arguments");
      }

      report(open().workflow.start({ ...choice, from: flags.from }));
    });

  program
    .command("resume")
    .description("Continue a release from its last completed stage")
    .argument("<version>", "Release version (e.g. 1.4.0)")
    .action((version: string) => {
      report(open().workflow.resume(version));
    });

  program
    .command("run-stage")
    .description("Run only the next stage of a release")
    .argument("<version>", "Release version (e.g. 1.4.0)")
    .addArgument(new Argument("<stage>", "Stage to run").choices([...STAGES]))
    .action((version: string, stage: string) => {
      if (!isValidStage(stage)) {
        deps.err(`Unknown stage ${stage}`);
        throw new CliFailure("invalid arguments");
      }
      report(open().workflow.runStage(version, stage));
    });

  program
    .command("status")
    .description("Show release records and the version each location holds")
    .argument("[version]", "Show only this release")
    .action((version: string | undefined) => {
      const { config, workflow } = open();
      const records = workflow.status(version);

      if (records.length === 0) {
        deps.out("No releases");
      }
      for (const record of records) {
        deps.out(describeRecord(record));
        if (version !== undefined) {
          record.history.forEach((entry) =>
            deps.out(`  ${entry.stage}  ${entry.at}  ${STAGE_CONFIG[entry.stage].description}`)
          );
        }
      }

      if (version === undefined) {
        deps.out(`Locations on ${config.mainline}:`);
        for (const location of workflow.locations()) {
          deps.out(`  ${location.location}  ${location.version ?? `error: ${location.error ?? "unreadable"}`}`);
        }
      }
    });

  program
    .command("unlock")
    .description("Remove a stale lock left by a crashed run")
    .argument("<line>", "Release line (e.g. 1.4)")
    .action((line: string) => {
      const removed = open().workflow.unlock(line);
      deps.out(removed ? `Removed lock for ${line}` : `No lock for ${line}`);
    });

  return program;
}

/**
 * Run the CLI and return its exit code.
 */
export function run(argv: string[], deps: CliDeps): number {
  const program = createProgram(deps);
  try {
    program.parse(argv, { from: "user" });
    return 0;
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode;
    }
    if (err instanceof CliFailure) {
      return 1;
    }
    if (isReleaseError(err)) {
      formatReleaseError(err).forEach((line) => deps.err(line));
      return 1;
    }
    throw err;
  }
}
