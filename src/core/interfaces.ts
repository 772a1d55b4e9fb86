/**
 * Core interfaces for dependency injection.
 * These abstract away I/O operations for testability and portability.
 */

export interface FileSystem {
  readFile(path: string): string;
  readFileBinary(path: string): Buffer;
  writeFile(path: string, content: string): void;
  /**
   * Create a file only if nothing exists at `path`.
   * Returns false (and writes nothing) when the path is already taken.
   */
  writeFileExclusive(path: string, content: string): boolean;
  exists(path: string): boolean;
  mkdir(path: string, options?: { recursive?: boolean }): void;
  readdir(path: string): string[];
  stat(path: string): { isDirectory: boolean; isFile: boolean; size: number };
  unlink(path: string): void;
  rmdir(path: string, options?: { recursive?: boolean }): void;
  copyFile(src: string, dest: string): void;
  rename(src: string, dest: string): void;
  symlink(target: string, path: string): void;
  /** Returns the link target, or null when `path` is not a symlink. */
  readlink(path: string): string | null;
}

/**
 * Shell command executor using array-based arguments.
 * Arguments are passed directly to the executable without shell interpretation.
 *
 * Implementations throw when the command exits non-zero; the thrown error's
 * message carries the command's stderr.
 */
export interface ShellExecutor {
  execFile(command: string, args: string[]): string;
}

export type LogData = Record<string, unknown>;

/**
 * Structured logger. `event` is a stable snake_case identifier,
 * `message` is for humans.
 */
export interface Logger {
  info(event: string, message: string, data?: LogData): void;
  warn(event: string, message: string, data?: LogData): void;
  error(event: string, message: string, data?: LogData): void;
}

export interface Clock {
  now(): Date;
}

export interface PathConfig {
  projectRoot: string;
  configFile: string;
  stateDir: string;
}

export interface EngineContext {
  fs: FileSystem;
  shell: ShellExecutor;
  logger: Logger;
  clock: Clock;
  paths: PathConfig;
}
