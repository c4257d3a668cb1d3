/**
 * Run Lock
 *
 * Only one sync pass may run at a time: the store lookup and the task
 * creation are separate steps, so two overlapping passes could both see an
 * event as new. The lock is a file created with O_EXCL.
 */

import * as fs from "fs";
import * as path from "path";

export const STALE_LOCK_MS = 6 * 60 * 60 * 1000;

export class RunLockError extends Error {
  constructor(readonly lockPath: string) {
    super(`Another sync is already running (lock file ${lockPath})`);
    this.name = "RunLockError";
  }
}

function hasCode(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}

function tryCreate(lockPath: string): boolean {
  try {
    const fd = fs.openSync(lockPath, "wx");
    fs.writeSync(fd, JSON.stringify({ pid: process.pid, acquiredAt: new Date().toISOString() }));
    fs.closeSync(fd);
    return true;
  } catch (error) {
    if (hasCode(error, "EEXIST")) {
      return false;
    }
    throw error;
  }
}

/**
 * Remove the stale lock described by `stale`. The file is first renamed to a
 * private name, so only one run can claim it; if what got moved is not the
 * stale file (another run already replaced it), it is put back.
 * Returns false when the lock is now held by someone else.
 */
export function removeStaleLock(lockPath: string, stale: fs.Stats): boolean {
  const claimed = `${lockPath}.${process.pid}.${Date.now()}.stale`;
  try {
    fs.renameSync(lockPath, claimed);
  } catch (error) {
    // Already removed; the exclusive create decides who wins
    if (hasCode(error, "ENOENT")) return true;
    throw error;
  }

  const moved = fs.statSync(claimed);
  if (moved.ino === stale.ino && moved.mtimeMs === stale.mtimeMs) {
    fs.rmSync(claimed, { force: true });
    return true;
  }

  try {
    fs.linkSync(claimed, lockPath);
  } catch (error) {
    if (!hasCode(error, "EEXIST")) throw error;
  } finally {
    fs.rmSync(claimed, { force: true });
  }
  return false;
}

/**
 * Take the lock, replacing it if it is older than `staleAfterMs`.
 * Returns a function that releases it.
 */
export function acquireRunLock(
  lockPath: string,
  staleAfterMs: number = STALE_LOCK_MS
): () => void {
  const dir = path.dirname(lockPath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }

  if (!tryCreate(lockPath)) {
    const existing = fs.statSync(lockPath);
    if (Date.now() - existing.mtimeMs < staleAfterMs) {
      throw new RunLockError(lockPath);
    }
    // Left behind by a crashed run
    if (!removeStaleLock(lockPath, existing) || !tryCreate(lockPath)) {
      throw new RunLockError(lockPath);
    }
  }

  let released = false;
  return () => {
    if (released) return;
    released = true;
    fs.rmSync(lockPath, { force: true });
  };
}
