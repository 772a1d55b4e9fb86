/**
 * Node.js implementations of the core interfaces.
 */

import {
  copyFileSync,
  existsSync,
  mkdirSync,
  readdirSync,
  readFileSync,
  readlinkSync,
  renameSync,
  rmSync,
  statSync,
  symlinkSync,
  unlinkSync,
  writeFileSync,
} from "fs";
import { execFileSync } from "child_process";
import { dirname } from "path";
import type { Clock, EngineContext, FileSystem, LogData, Logger, PathConfig, ShellExecutor } from "#/core";

function hasErrorCode(err: unknown, ...codes: string[]): boolean {
  return err instanceof Error && "code" in err && typeof err.code === "string" && codes.includes(err.code);
}

export function createNodeFileSystem(): FileSystem {
  return {
    readFile: (path) => readFileSync(path, "utf-8"),
    readFileBinary: (path) => readFileSync(path),
    writeFile: (path, content) => {
      mkdirSync(dirname(path), { recursive: true });
      writeFileSync(path, content, "utf-8");
    },
    writeFileExclusive: (path, content) => {
      mkdirSync(dirname(path), { recursive: true });
      try {
        writeFileSync(path, content, { encoding: "utf-8", flag: "wx" });
        return true;
      } catch (err) {
        if (hasErrorCode(err, "EEXIST")) {
          return false;
        }
        throw err;
      }
    },
    exists: (path) => existsSync(path),
    mkdir: (path, options) => {
      mkdirSync(path, options);
    },
    readdir: (path) => readdirSync(path).sort(),
    stat: (path) => {
      const stats = statSync(path);
      return { isDirectory: stats.isDirectory(), isFile: stats.isFile(), size: stats.size };
    },
    unlink: (path) => unlinkSync(path),
    rmdir: (path, options) => rmSync(path, { recursive: options?.recursive ?? false, force: true }),
    copyFile: (src, dest) => {
      mkdirSync(dirname(dest), { recursive: true });
      copyFileSync(src, dest);
    },
    rename: (src, dest) => renameSync(src, dest),
    symlink: (target, path) => symlinkSync(target, path),
    readlink: (path) => {
      try {
        return readlinkSync(path);
      } catch (err) {
        // EINVAL: exists but is not a link
        if (hasErrorCode(err, "EINVAL", "ENOENT")) {
          return null;
        }
        throw err;
      }
    },
  };
}

function stderrOf(err: unknown): string {
  if (err instanceof Error && "stderr" in err) {
    const { stderr } = err;
    if (typeof stderr === "string") return stderr.trim();
    if (Buffer.isBuffer(stderr)) return stderr.toString("utf-8").trim();
  }
  return "";
}

/**
 * Run executables directly (no shell) from `cwd`. A non-zero exit throws an
 * Error whose message is the command's stderr.
 */
export function createNodeShellExecutor(cwd: string): ShellExecutor {
  return {
    execFile(command, args) {
      try {
        return execFileSync(command, args, {
          cwd,
          encoding: "utf-8",
          stdio: ["ignore", "pipe", "pipe"],
        });
      } catch (err) {
        const stderr = stderrOf(err);
        const reason = stderr || (err instanceof Error ? err.message : String(err));
        throw new Error(reason, { cause: err });
      }
    },
  };
}

export const systemClock: Clock = {
  now: () => new Date(),
};

type Level = "info" | "warn" | "error";

/**
 * One JSON object per line: timestamp, level, event, message, data.
 */
export function createJsonLogger(write: (line: string) => void, clock: Clock = systemClock): Logger {
  const log = (level: Level) => (event: string, message: string, data?: LogData) => {
    write(JSON.stringify({ timestamp: clock.now().toISOString(), level, event, message, data }));
  };

  return {
    info: log("info"),
    warn: log("warn"),
    error: log("error"),
  };
}

export function createNodeContext(paths: PathConfig): EngineContext {
  return {
    fs: createNodeFileSystem(),
    shell: createNodeShellExecutor(paths.projectRoot),
    logger: createJsonLogger((line) => process.stderr.write(`${line}\n`)),
    clock: systemClock,
    paths,
  };
}
