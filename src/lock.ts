/**
 * Sync lock files.
 *
 * The engine never locks; callers that start runs (the CLI, the auto-sync
 * trigger) take a lock on both replica roots so two runs never overlap on the
 * same pair. A lock is stale when it is older than 30 minutes or its process
 * is gone on this host.
 */

import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { z } from "zod";
import { SyncLockError, errorMessage } from "./errors.js";
import { replicaPaths } from "./store/layout.js";

export const LOCK_STALE_AFTER_MS = 30 * 60 * 1000;

const LockInfoSchema = z.object({
  processId: z.number().int(),
  timestamp: z.string(),
  hostname: z.string(),
});

export type LockInfo = z.infer<typeof LockInfoSchema>;

export interface LockOptions {
  now?: () => Date;
  processId?: number;
  hostname?: string;
  /** Liveness probe for a pid on this host */
  isProcessRunning?: (pid: number) => boolean;
  quiet?: boolean;
}

export interface SyncLock {
  readonly lockFiles: readonly string[];
  release(): Promise<void>;
}

/**
 * Take the sync lock on every root.
 *
 * Stale locks are removed first. If any root holds an active lock nothing is
 * written.
 *
 * @throws SyncLockError if another run holds a lock
 */
export async function acquireSyncLocks(
  roots: readonly string[],
  options: LockOptions = {}
): Promise<SyncLock> {
  const lockFiles = roots.map((root) => replicaPaths(root).lockFile);

  for (const lockFile of lockFiles) {
    const holder = await readActiveLock(lockFile, options);
    if (holder) {
      throw new SyncLockError(
        `Another sync is running (pid ${holder.processId} on ${holder.hostname}, since ${holder.timestamp})`,
        lockFile
      );
    }
  }

  const info: LockInfo = {
    processId: options.processId ?? process.pid,
    timestamp: (options.now ?? (() => new Date()))().toISOString(),
    hostname: options.hostname ?? os.hostname(),
  };

  const written: string[] = [];
  const release = async (): Promise<void> => {
    for (const lockFile of written.splice(0)) {
      try {
        await fs.rm(lockFile, { force: true });
      } catch (error) {
        if (!options.quiet) {
          console.warn(`[sync] Failed to remove lock ${lockFile}:`, errorMessage(error));
        }
      }
    }
  };

  try {
    for (const lockFile of lockFiles) {
      await fs.mkdir(path.dirname(lockFile), { recursive: true });
      await fs.writeFile(lockFile, JSON.stringify(info), { encoding: "utf-8", flag: "wx" });
      written.push(lockFile);
    }
  } catch (error) {
    await release();
    if ((error as NodeJS.ErrnoException).code === "EEXIST") {
      throw new SyncLockError("Another sync acquired the lock first", lockFiles[written.length] ?? "");
    }
    throw error;
  }

  return { lockFiles, release };
}

/**
 * Read a lock file and return its holder if the lock is still active.
 * Stale, unreadable and malformed locks are removed.
 */
export async function readActiveLock(
  lockFile: string,
  options: LockOptions = {}
): Promise<LockInfo | null> {
  let content: string;
  try {
    content = await fs.readFile(lockFile, "utf-8");
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      return null;
    }
    throw error;
  }

  let info: LockInfo;
  try {
    info = LockInfoSchema.parse(JSON.parse(content));
  } catch {
    await removeStaleLock(lockFile, "malformed", options.quiet);
    return null;
  }

  if (!isLockActive(info, options)) {
    await removeStaleLock(lockFile, "stale", options.quiet);
    return null;
  }

  return info;
}

/**
 * A lock is active when it is younger than LOCK_STALE_AFTER_MS and, if it
 * was taken on this host, its process is still running.
 */
export function isLockActive(info: LockInfo, options: LockOptions = {}): boolean {
  const now = (options.now ?? (() => new Date()))().getTime();
  const takenAt = Date.parse(info.timestamp);
  if (Number.isNaN(takenAt) || now - takenAt > LOCK_STALE_AFTER_MS) {
    return false;
  }

  const hostname = options.hostname ?? os.hostname();
  if (info.hostname !== hostname) {
    return true;
  }

  const isRunning = options.isProcessRunning ?? processRunning;
  return isRunning(info.processId);
}

function processRunning(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists but belongs to another user
    return (error as NodeJS.ErrnoException).code === "EPERM";
  }
}

async function removeStaleLock(lockFile: string, reason: string, quiet = false): Promise<void> {
  if (!quiet) console.warn(`[sync] Removing ${reason} lock ${lockFile}`);
  await fs.rm(lockFile, { force: true });
}
