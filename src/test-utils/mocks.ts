/**
 * Test utilities - Mock factories for dependency injection interfaces
 */

import type { Clock, EngineContext, FileSystem, LogData, Logger, ShellExecutor } from "#/core";

interface MockFileEntry {
  content: string | Buffer;
  isDirectory: boolean;
  linkTarget?: string;
}

function stripTrailingSlash(path: string): string {
  return path.endsWith("/") && path.length > 1 ? path.slice(0, -1) : path;
}

/**
 * Create a mock FileSystem with in-memory storage.
 * Directories exist implicitly when any file lives below them.
 */
export function createMockFileSystem(
  initialFiles: Record<string, string | Buffer> = {}
): FileSystem & { files: Map<string, MockFileEntry> } {
  const files = new Map<string, MockFileEntry>();

  for (const [path, content] of Object.entries(initialFiles)) {
    files.set(path, { content, isDirectory: false });
  }

  function hasChildren(path: string): boolean {
    const prefix = stripTrailingSlash(path) + "/";
    for (const filePath of files.keys()) {
      if (filePath.startsWith(prefix)) {
        return true;
      }
    }
    return false;
  }

  function readEntry(path: string, op: string): MockFileEntry {
    const entry = files.get(path);
    if (!entry || entry.isDirectory) {
      throw new Error(`ENOENT: no such file or directory, ${op} '${path}'`);
    }
    return entry;
  }

  return {
    files,

    readFile(path: string): string {
      const entry = readEntry(path, "open");
      return typeof entry.content === "string" ? entry.content : entry.content.toString("utf-8");
    },

    readFileBinary(path: string): Buffer {
      const entry = readEntry(path, "open");
      return typeof entry.content === "string" ? Buffer.from(entry.content) : entry.content;
    },

    writeFile(path: string, content: string): void {
      files.set(path, { content, isDirectory: false });
    },

    writeFileExclusive(path: string, content: string): boolean {
      if (files.has(path)) {
        return false;
      }
      files.set(path, { content, isDirectory: false });
      return true;
    },

    exists(path: string): boolean {
      return files.has(stripTrailingSlash(path)) || hasChildren(path);
    },

    mkdir(path: string, _options?: { recursive?: boolean }): void {
      const normalized = stripTrailingSlash(path);
      if (!files.has(normalized)) {
        files.set(normalized, { content: "", isDirectory: true });
      }
    },

    readdir(path: string): string[] {
      const normalizedPath = stripTrailingSlash(path);
      const results: Set<string> = new Set();

      for (const filePath of files.keys()) {
        if (filePath.startsWith(normalizedPath + "/")) {
          const relativePath = filePath.slice(normalizedPath.length + 1);
          const firstPart = relativePath.split("/")[0];
          if (firstPart) {
            results.add(firstPart);
          }
        }
      }

      return Array.from(results).sort();
    },

    stat(path: string): { isDirectory: boolean; isFile: boolean; size: number } {
      const entry = files.get(stripTrailingSlash(path));
      if (!entry) {
        if (hasChildren(path)) {
          return { isDirectory: true, isFile: false, size: 0 };
        }
        throw new Error(`ENOENT: no such file or directory, stat '${path}'`);
      }

      if (entry.isDirectory) {
        return { isDirectory: true, isFile: false, size: 0 };
      }

      return { isDirectory: false, isFile: true, size: entry.content.length };
    },

    unlink(path: string): void {
      files.delete(path);
    },

    rmdir(path: string, _options?: { recursive?: boolean }): void {
      const normalizedPath = stripTrailingSlash(path);
      for (const filePath of [...files.keys()]) {
        if (filePath === normalizedPath || filePath.startsWith(normalizedPath + "/")) {
          files.delete(filePath);
        }
      }
    },

    copyFile(src: string, dest: string): void {
      const entry = readEntry(src, "copyfile");
      files.set(dest, { ...entry });
    },

    rename(src: string, dest: string): void {
      const source = stripTrailingSlash(src);
      const moved = [...files.entries()].filter(
        ([filePath]) => filePath === source || filePath.startsWith(source + "/")
      );
      if (moved.length === 0) {
        throw new Error(`ENOENT: no such file or directory, rename '${src}'`);
      }
      for (const [filePath, entry] of moved) {
        files.delete(filePath);
        files.set(stripTrailingSlash(dest) + filePath.slice(source.length), entry);
      }
    },

    symlink(target: string, path: string): void {
      if (files.has(path)) {
        throw new Error(`EEXIST: file already exists, symlink '${target}' -> '${path}'`);
      }
      files.set(path, { content: "", isDirectory: false, linkTarget: target });
    },

    readlink(path: string): string | null {
      return files.get(path)?.linkTarget ?? null;
    },
  };
}

/**
 * Recorded shell execution call
 */
export interface ShellCall {
  command: string;
  args: string[];
}

export type ShellHandler = (args: string[]) => string;

/**
 * Create a mock ShellExecutor with predefined command outputs.
 *
 * Keys match the start of the full command line ("git", "git tag", "make docs"),
 * longest key first. A value may be an output string, an Error to throw, or a
 * handler computing the output from the arguments.
 */
export function createMockShellExecutor(
  results: Record<string, string | Error | ShellHandler> = {}
): ShellExecutor & { calls: ShellCall[]; commands: string[] } {
  const calls: ShellCall[] = [];
  const commands: string[] = [];
  const patterns = Object.keys(results).sort((a, b) => b.length - a.length);

  return {
    calls,
    commands,

    execFile(command: string, args: string[]): string {
      calls.push({ command, args });
      const line = [command, ...args].join(" ");
      commands.push(line);

      const pattern = patterns.find((p) => line === p || line.startsWith(p + " "));
      if (pattern === undefined) {
        // Default: command succeeded with no output
        return "";
      }

      const result = results[pattern];
      if (result instanceof Error) {
        throw result;
      }
      if (typeof result === "function") {
        return result(args);
      }
      return result ?? "";
    },
  };
}

export interface LogEntry {
  level: "info" | "warn" | "error";
  event: string;
  message: string;
  data?: LogData;
}

/**
 * Create a Logger that records entries instead of printing them.
 */
export function createMockLogger(): Logger & { entries: LogEntry[]; events: () => string[] } {
  const entries: LogEntry[] = [];
  const record = (level: LogEntry["level"]) => (event: string, message: string, data?: LogData) => {
    entries.push({ level, event, message, data });
  };

  return {
    entries,
    events: () => entries.map((entry) => entry.event),
    info: record("info"),
    warn: record("warn"),
    error: record("error"),
  };
}

/**
 * Create a Clock that returns a fixed instant, advancing one second per call.
 */
export function createMockClock(start = "2024-05-01T12:00:00.000Z"): Clock {
  let current = new Date(start).getTime();
  return {
    now(): Date {
      const date = new Date(current);
      current += 1000;
      return date;
    },
  };
}

/**
 * Assemble an EngineContext from mocks, rooted at /project.
 */
export function createMockContext(
  overrides: Partial<EngineContext> = {}
): EngineContext {
  return {
    fs: createMockFileSystem(),
    shell: createMockShellExecutor(),
    logger: createMockLogger(),
    clock: createMockClock(),
    paths: {
      projectRoot: "/project",
      configFile: "/project/release.yaml",
      stateDir: "/project/.release",
    },
    ...overrides,
  };
}
