import fs from "node:fs/promises";
import path from "node:path";
import { BuildError, BuildErrorCode } from "../shared/errors.js";
import { logger } from "../logger.js";

export const LOCK_FILENAME = ".claude-desktop-build.lock";

interface LockRecord {
  pid: number;
  startedAt: string;
}

function isLockRecord(value: unknown): value is LockRecord {
  return typeof value === "object" && value !== null && "pid" in value && typeof value.pid === "number";
}

function isAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM means the process exists but belongs to someone else
    return (err as NodeJS.ErrnoException).code === "EPERM";
  }
}

async function readLock(lockPath: string): Promise<LockRecord | null> {
  try {
    const parsed: unknown = JSON.parse(await fs.readFile(lockPath, "utf-8"));
    return isLockRecord(parsed) ? parsed : null;
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") return null;
    logger.warn({ lockPath, err }, "Unreadable build lock");
    return null;
  }
}

/**
 * Create the lock file with its record already in it. The record is written
 * to a private temp file and hard-linked into place, so the lock never exists
 * half-written. Returns false when another lock is already there.
 */
async function createLock(lockPath: string): Promise<boolean> {
  const record: LockRecord = { pid: process.pid, startedAt: new Date().toISOString() };
  const tmpPath = `${lockPath}.${process.pid}.${Date.now()}.${Math.random().toString(36).slice(2)}`;
  await fs.writeFile(tmpPath, JSON.stringify(record), { encoding: "utf-8", flag: "wx" });
  try {
    await fs.link(tmpPath, lockPath);
    return true;
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "EEXIST") return false;
    throw err;
  } finally {
    await fs.rm(tmpPath, { force: true });
  }
}

/**
 * Take the per-directory build lock. Two runs sharing a work dir would delete
 * each other's artifacts, so a live holder rejects the second run. The file is
 * created exclusively; a lock left by a dead process (or one that cannot be
 * read) is removed and creation is retried once.
 * Returns the release function.
 */
export async function acquireBuildLock(dir: string): Promise<() => Promise<void>> {
  const lockPath = path.join(dir, LOCK_FILENAME);

  for (let attempt = 0; attempt < 2; attempt++) {
    if (await createLock(lockPath)) {
      return async () => {
        await fs.rm(lockPath, { force: true });
      };
    }

    const existing = await readLock(lockPath);
    if (existing && isAlive(existing.pid)) {
      throw new BuildError(
        BuildErrorCode.BUILD_IN_PROGRESS,
        `Another build is running in ${dir} (PID ${existing.pid}, started ${existing.startedAt}).`,
        { lockPath, pid: existing.pid },
      );
    }
    if (attempt === 0) {
      logger.warn({ lockPath, pid: existing?.pid }, "Removing stale build lock");
      await fs.rm(lockPath, { force: true });
    }
  }

  throw new BuildError(BuildErrorCode.BUILD_IN_PROGRESS, `Could not take the build lock in ${dir}.`, { lockPath });
}
