/**
 * Auto-sync trigger for callers that mutate the local library.
 *
 * When PAPER_SYNC_AUTO is "true" and a remote path is configured, runs an
 * auto-mode sync (every conflict kept both) under the sync lock.
 */

import type { SyncResult } from "../types.js";
import { buildConfig, ENV_REMOTE_PATH, isAutoSyncEnabled } from "../config.js";
import { errorMessage } from "../errors.js";
import { acquireSyncLocks, type LockOptions, type SyncLock } from "../lock.js";
import { syncLibraries, type SyncOptions } from "./engine.js";

export interface AutoSyncOptions extends Pick<SyncOptions, "stores" | "quiet"> {
  lock?: LockOptions;
  /** Receives the result of an attempted sync */
  onResult?: (result: SyncResult) => void;
}

/**
 * Run an auto-mode sync if the environment enables it.
 *
 * @returns true if a sync was attempted (whatever its outcome), false if
 *   auto-sync is disabled, unconfigured or another sync holds the lock
 */
export async function triggerAutoSync(
  env: NodeJS.ProcessEnv = process.env,
  options: AutoSyncOptions = {}
): Promise<boolean> {
  const { quiet = false } = options;

  if (!isAutoSyncEnabled(env)) {
    return false;
  }

  if (!env[ENV_REMOTE_PATH]) {
    if (!quiet) console.log("[auto-sync] Auto-sync enabled but no remote path configured; skipped");
    return false;
  }

  const built = buildConfig({ autoMode: true }, env);
  if (!built.ok) {
    if (!quiet) {
      for (const error of built.errors) {
        console.warn(`[auto-sync] ${error}`);
      }
    }
    return false;
  }
  const { config } = built;

  let lock: SyncLock;
  try {
    lock = await acquireSyncLocks([config.localRoot, config.remoteRoot], {
      quiet,
      ...options.lock,
    });
  } catch (error) {
    if (!quiet) console.warn(`[auto-sync] Skipped: ${errorMessage(error)}`);
    return false;
  }

  try {
    const result = await syncLibraries(config, { quiet: true, stores: options.stores });
    options.onResult?.(result);
    if (!quiet) {
      if (result.status === "completed" && result.errors.length === 0) {
        console.log("[auto-sync] Auto-sync completed successfully");
      } else {
        console.warn(`[auto-sync] ${result.getSummary().split("\n")[0]}`);
      }
    }
  } catch (error) {
    if (!quiet) console.error(`[auto-sync] Auto-sync failed: ${errorMessage(error)}`);
  } finally {
    await lock.release();
  }

  return true;
}
