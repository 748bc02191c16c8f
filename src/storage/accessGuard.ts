import fs from "node:fs";
import { LedgerLockUnavailableError } from "./errors";

export const LOCK_SUFFIX = ".lock";

/** A lock file with no readable owner is only reclaimed once it is this old. */
export const DEFAULT_LOCK_STALE_MS = 30_000;

export interface AccessGuardOptions {
  staleMs?: number;
  /** Liveness probe, replaceable in tests. */
  isProcessAlive?: (pid: number) => boolean;
  pid?: number;
}

export interface AccessGuard {
  readonly lockPath: string;
  readonly ownerPid: number;
  readonly released: boolean;
  release(): void;
}

export function lockPathFor(resourcePath: string): string {
  return `${resourcePath}${LOCK_SUFFIX}`;
}

function errorCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    return errorCode(err) === "EPERM";
  }
}

function readLockOwnerPid(lockPath: string): number | null {
  try {
    const firstLine = fs.readFileSync(lockPath, "utf-8").split(/\r?\n/u, 1)[0]?.trim();
    if (!firstLine || !/^\d+$/u.test(firstLine)) return null;
    const pid = Number.parseInt(firstLine, 10);
    return Number.isInteger(pid) && pid > 0 ? pid : null;
  } catch {
    return null;
  }
}

function removeIfPresent(filePath: string): void {
  try {
    fs.rmSync(filePath);
  } catch (err) {
    if (errorCode(err) !== "ENOENT") {
      throw err;
    }
  }
}

class LockFileGuard implements AccessGuard {
  private isReleased = false;
  private readonly onExit = () => this.release();

  constructor(
    readonly lockPath: string,
    readonly ownerPid: number
  ) {
    process.once("exit", this.onExit);
  }

  get released(): boolean {
    return this.isReleased;
  }

  release(): void {
    if (this.isReleased) return;
    this.isReleased = true;
    process.removeListener("exit", this.onExit);
    // Only remove the file while it still names us; a reclaimed lock belongs to someone else.
    if (readLockOwnerPid(this.lockPath) === this.ownerPid) {
      removeIfPresent(this.lockPath);
    }
  }
}

type LockState = { kind: "missing" } | { kind: "held"; ownerPid: number | null } | { kind: "stale" };

function inspectLock(filePath: string, alive: (pid: number) => boolean, staleMs: number): LockState {
  const ownerPid = readLockOwnerPid(filePath);
  if (ownerPid !== null) {
    return alive(ownerPid) ? { kind: "held", ownerPid } : { kind: "stale" };
  }

  let ageMs: number;
  try {
    ageMs = Date.now() - fs.statSync(filePath).mtimeMs;
  } catch (err) {
    if (errorCode(err) === "ENOENT") return { kind: "missing" };
    throw err;
  }
  // Possibly a holder that has created the file but not written its pid yet.
  return ageMs <= staleMs ? { kind: "held", ownerPid: null } : { kind: "stale" };
}

/** Put a lock moved aside by mistake back in place, unless a new one exists already. */
function restoreLock(movedPath: string, lockPath: string): void {
  try {
    fs.linkSync(movedPath, lockPath);
  } catch (err) {
    if (errorCode(err) !== "EEXIST") throw err;
  } finally {
    removeIfPresent(movedPath);
  }
}

const MAX_ATTEMPTS = 3;

/**
 * Take exclusive, advisory ownership of `resourcePath` without waiting.
 *
 * The guard is a sidecar `<resource>.lock` file created with `wx`, holding the
 * owner's pid. A lock whose pid is no longer alive is reclaimed, so a killed
 * run never blocks the next one. Throws LedgerLockUnavailableError when a live
 * owner (this process included) holds the lock.
 *
 * Reclaiming renames the stale lock aside first. Only one contender's rename
 * can take a given file, and the renamed file is checked again, so a lock
 * that a faster contender created in the meantime is put back, not deleted.
 */
export function acquireAccessGuard(resourcePath: string, options: AccessGuardOptions = {}): AccessGuard {
  const lockPath = lockPathFor(resourcePath);
  const staleMs = options.staleMs ?? DEFAULT_LOCK_STALE_MS;
  const alive = options.isProcessAlive ?? isProcessAlive;
  const pid = options.pid ?? process.pid;

  for (let attempt = 0; attempt < MAX_ATTEMPTS; attempt++) {
    try {
      const fd = fs.openSync(lockPath, "wx");
      try {
        fs.writeFileSync(fd, `${pid}\n${new Date().toISOString()}\n`);
      } finally {
        fs.closeSync(fd);
      }
      return new LockFileGuard(lockPath, pid);
    } catch (err) {
      if (errorCode(err) !== "EEXIST") {
        throw err;
      }
    }

    const state = inspectLock(lockPath, alive, staleMs);
    if (state.kind === "held") {
      throw new LedgerLockUnavailableError(resourcePath, state.ownerPid);
    }
    if (state.kind === "missing") continue;

    const movedPath = `${lockPath}.${pid}.stale`;
    try {
      fs.renameSync(lockPath, movedPath);
    } catch (err) {
      if (errorCode(err) === "ENOENT") continue;
      throw err;
    }

    const moved = inspectLock(movedPath, alive, staleMs);
    if (moved.kind === "held") {
      restoreLock(movedPath, lockPath);
      throw new LedgerLockUnavailableError(resourcePath, moved.ownerPid);
    }
    removeIfPresent(movedPath);
  }

  throw new LedgerLockUnavailableError(resourcePath, readLockOwnerPid(lockPath));
}
