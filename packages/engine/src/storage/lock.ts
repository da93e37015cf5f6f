// ============================================================================
// @phrasebank/engine — Writer Lock
// ============================================================================
//
// One writer per dictionary directory. The lock file appears with its
// content already in place: the owner's pid is written to a private
// temporary file that is then hard-linked onto the lock path, which fails
// if a lock exists. A lock whose owner is no longer running is moved aside
// with rename, so two processes reclaiming it cannot both succeed.
// ============================================================================

import { randomBytes } from 'node:crypto';
import * as fs from 'node:fs';
import { DictionaryLockedError, logger } from '@phrasebank/core';
import { errorCode } from './errno.js';

/** An unreadable lock younger than this is treated as held. */
export const LOCK_GRACE_MS = 30_000;

const ACQUIRE_ATTEMPTS = 3;

interface LockHolder {
  /** Undefined when the file holds no valid pid. */
  pid?: number;
  ino: number;
  mtimeMs: number;
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM: the process exists but belongs to someone else.
    return errorCode(err) === 'EPERM';
  }
}

function readHolder(lockPath: string): LockHolder | undefined {
  let fd: number;
  try {
    fd = fs.openSync(lockPath, 'r');
  } catch (err) {
    if (errorCode(err) === 'ENOENT') return undefined;
    throw err;
  }
  try {
    const stats = fs.fstatSync(fd);
    const pid = Number.parseInt(fs.readFileSync(fd, 'utf-8').trim(), 10);
    return {
      pid: Number.isSafeInteger(pid) && pid > 0 ? pid : undefined,
      ino: stats.ino,
      mtimeMs: stats.mtimeMs,
    };
  } finally {
    fs.closeSync(fd);
  }
}

function uniqueSibling(lockPath: string, tag: string): string {
  return `${lockPath}.${tag}-${process.pid}-${randomBytes(4).toString('hex')}`;
}

/** Link a file holding our pid onto `lockPath`; false when a lock exists. */
function tryCreate(lockPath: string): boolean {
  const tmpPath = uniqueSibling(lockPath, 'new');
  try {
    const fd = fs.openSync(tmpPath, 'wx');
    try {
      fs.writeSync(fd, `${process.pid}\n`);
      fs.fsyncSync(fd);
    } finally {
      fs.closeSync(fd);
    }
    fs.linkSync(tmpPath, lockPath);
    return true;
  } catch (err) {
    if (errorCode(err) === 'EEXIST') return false;
    throw err;
  } finally {
    fs.rmSync(tmpPath, { force: true });
  }
}

/**
 * Move the stale lock aside. False when the file at `lockPath` is no longer
 * the one `holder` describes; a lock taken over in between is linked back.
 */
function reclaim(lockPath: string, holder: LockHolder): boolean {
  const asidePath = uniqueSibling(lockPath, 'stale');
  try {
    fs.renameSync(lockPath, asidePath);
  } catch (err) {
    if (errorCode(err) === 'ENOENT') return false;
    throw err;
  }
  try {
    if (fs.statSync(asidePath).ino !== holder.ino) {
      try {
        fs.linkSync(asidePath, lockPath);
      } catch (err) {
        if (errorCode(err) !== 'EEXIST') throw err;
      }
      return false;
    }
    logger.warn('Removed stale dictionary lock', { path: lockPath, pid: holder.pid });
    return true;
  } finally {
    fs.rmSync(asidePath, { force: true });
  }
}

export class DirectoryLock {
  readonly path: string;
  private released = false;

  private constructor(lockPath: string) {
    this.path = lockPath;
  }

  /**
   * @throws {DictionaryLockedError} When a live process (including this one)
   *   holds the lock, or the lock is unreadable and recent.
   */
  static acquire(lockPath: string): DirectoryLock {
    for (let attempt = 0; attempt < ACQUIRE_ATTEMPTS; attempt++) {
      if (tryCreate(lockPath)) {
        return new DirectoryLock(lockPath);
      }

      const holder = readHolder(lockPath);
      if (!holder) continue;
      if (holder.pid === undefined) {
        if (Date.now() - holder.mtimeMs < LOCK_GRACE_MS) {
          throw new DictionaryLockedError(lockPath);
        }
      } else if (isProcessAlive(holder.pid)) {
        throw new DictionaryLockedError(lockPath, holder.pid);
      }
      reclaim(lockPath, holder);
    }
    throw new DictionaryLockedError(lockPath);
  }

  release(): void {
    if (this.released) return;
    this.released = true;
    fs.rmSync(this.path, { force: true });
  }
}
