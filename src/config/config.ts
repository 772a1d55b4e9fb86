/**
 * Release configuration
 *
 * release.yaml lives at the project root. Relative paths inside it (state
 * directory, docs root, build outputs) resolve against the project root.
 */

import { dirname, resolve } from "path";
import type { FileSystem, PathConfig } from "#/core";
import { ReleaseConfigSchema, type ReleaseConfig } from "#/schemas";
import { safeParseYaml, type ParseResult } from "#/friendly-errors";
import type { DocsTarget, PackageTarget } from "#/publisher";

export const CONFIG_FILENAME = "release.yaml";

export interface PublishTargets {
  docs: DocsTarget;
  package: PackageTarget;
}

export function loadConfig(fs: FileSystem, configFile: string): ParseResult<ReleaseConfig> {
  if (!fs.exists(configFile)) {
    return {
      success: false,
      error: { type: "missing", message: `Config file not found: ${configFile}` },
    };
  }
  return safeParseYaml(fs.readFile(configFile), ReleaseConfigSchema, configFile);
}

/**
 * @example resolvePaths("/srv/app/release.yaml", { stateDir: ".release", ... }) → { projectRoot: "/srv/app", configFile: "/srv/app/release.yaml", stateDir: "/srv/app/.release" }
 */
export function resolvePaths(configFile: string, config: ReleaseConfig): PathConfig {
  const projectRoot = dirname(resolve(configFile));
  return {
    projectRoot,
    configFile: resolve(configFile),
    stateDir: resolve(projectRoot, config.stateDir),
  };
}

export function toPublishTargets(config: ReleaseConfig, projectRoot: string): PublishTargets {
  const { docs, package: pkg } = config.targets;
  return {
    docs: {
      kind: "docs",
      destination: resolve(projectRoot, docs.root),
      alias: docs.alias,
      build: docs.build,
      output: docs.output,
    },
    package: {
      kind: "package",
      destination: pkg.index,
      build: pkg.build,
      output: pkg.output,
      upload: pkg.upload,
      exists: pkg.exists,
    },
  };
}
