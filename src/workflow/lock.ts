/**
 * Release line lock
 *
 * At most one workflow invocation per (major, minor) line. The lock is held in
 * an in-process registry and as an exclusive file under <stateDir>/locks, so a
 * second invocation fails fast whether it runs in this process or another.
 */

import { join } from "path";
import { parse, stringify } from "yaml";
import { ReleaseError, type Clock, type FileSystem, type Logger } from "#/core";

// Lock files held by this process, keyed by absolute path
const heldLocks = new Set<string>();

export interface LockHandle {
  line: string;
  path: string;
}

function describeHolder(content: string): string {
  const parsed: unknown = parse(content);
  if (typeof parsed === "object" && parsed !== null && "acquiredAt" in parsed) {
    return ` since ${String(parsed.acquiredAt)}`;
  }
  return "";
}

export class LineLock {
  private fs: FileSystem;
  private clock: Clock;
  private logger: Logger;
  private dir: string;

  constructor(fs: FileSystem, clock: Clock, logger: Logger, stateDir: string) {
    this.fs = fs;
    this.clock = clock;
    this.logger = logger;
    this.dir = join(stateDir, "locks");
  }

  lockPath(line: string): string {
    return join(this.dir, `${line}.lock`);
  }

  isHeld(line: string): boolean {
    const path = this.lockPath(line);
    return heldLocks.has(path) || this.fs.exists(path);
  }

  /**
   * Take the lock for `line` or fail with Busy.
   */
  acquire(line: string): LockHandle {
    const path = this.lockPath(line);
    if (heldLocks.has(path)) {
      throw new ReleaseError("Busy", `Release line ${line} is already being worked on by this process`);
    }

    this.fs.mkdir(this.dir, { recursive: true });
    const content = stringify({ line, acquiredAt: this.clock.now().toISOString() });
    if (!this.fs.writeFileExclusive(path, content)) {
      throw new ReleaseError(
        "Busy",
        `Release line ${line} is locked${describeHolder(this.fs.readFile(path))} (${path})`
      );
    }

    heldLocks.add(path);
    return { line, path };
  }

  release(handle: LockHandle): void {
    heldLocks.delete(handle.path);
    if (this.fs.exists(handle.path)) {
      this.fs.unlink(handle.path);
    }
  }

  /**
   * Run `fn` while holding the lock for `line`.
   */
  withLock<T>(line: string, fn: () => T): T {
    const handle = this.acquire(line);
    try {
      return fn();
    } finally {
      this.release(handle);
    }
  }

  /**
   * Remove a lock file left behind by a crashed process.
   * Returns false when there was nothing to remove.
   */
  forceRelease(line: string): boolean {
    const path = this.lockPath(line);
    if (heldLocks.has(path)) {
      throw new ReleaseError("Busy", `Release line ${line} is held by a running workflow in this process`);
    }
    if (!this.fs.exists(path)) {
      return false;
    }

    this.fs.unlink(path);
    this.logger.warn("lock_removed", `Removed stale lock for ${line}`, { path });
    return true;
  }
}
