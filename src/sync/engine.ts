/**
 * Sync engine: library reconciliation orchestration.
 *
 * Runs one bounded pass over a local and a remote replica:
 * 1. Prepare the remote root (created if missing)
 * 2. Read both snapshots and the last-sync baseline
 * 3. Diff them
 * 4. Resolve conflicts (skipped when there are none)
 * 5. Apply records, then collections, then PDF files
 * 6. Persist record keys, re-read both replicas and store the new baseline
 *
 * Cancellation is honored until merging begins. Infrastructure failures end
 * the run as "failed"; per-item failures are collected on the result.
 */

import type {
  DiffResult,
  RecordRepository,
  Resolution,
  SyncConfig,
  SyncError,
  SyncResult,
} from "../types.js";
import { InfrastructureError, errorMessage } from "../errors.js";
import { replicaPaths } from "../store/layout.js";
import { YamlRecordStore } from "../store/record-store.js";
import { diffSnapshots } from "./diff.js";
import { MergeApplier, persistRecordKeys } from "./merge.js";
import { ProgressReporter, type ProgressSink } from "./progress.js";
import { resolveConflicts, type ConflictResolver } from "./resolution.js";
import { ResultAggregator } from "./result.js";
import { SyncRun } from "./run.js";
import { ensureRemoteRoot, readSnapshot } from "./snapshot.js";
import { buildBaseline, loadState, saveState } from "./state.js";

/**
 * Options for a sync run.
 */
export interface SyncOptions {
  /** Called with pending conflicts when not in auto mode */
  resolver?: ConflictResolver;
  /** Receives stage transitions and item counts */
  progress?: ProgressSink;
  /** Cooperative cancellation; honored until merging begins */
  signal?: AbortSignal;
  /** If true, suppress console output */
  quiet?: boolean;
  /** Consecutive resolver polls without progress before giving up (default: 3) */
  maxStalledPolls?: number;
  /** Record repositories to use instead of each replica's `library.yaml` */
  stores?: { local?: RecordRepository; remote?: RecordRepository };
  /** Clock for the baseline timestamp */
  now?: () => Date;
}

/**
 * Handle of a sync started in the background.
 */
export interface SyncHandle {
  /** Settles with the result; never rejects for infrastructure failures */
  readonly done: Promise<SyncResult>;
  /** Request cancellation. No effect once merging has begun beyond skipping remaining items. */
  cancel(): void;
}

/**
 * Preview of what a sync would do; nothing is written.
 */
export interface SyncInspection {
  diff: DiffResult;
  /** Per-item read failures on either replica */
  errors: SyncError[];
  /** Whether a baseline from a previous sync with this remote was found */
  hasBaseline: boolean;
}

/**
 * Reconciles the local and remote replicas.
 *
 * @param config - Replica roots and auto mode
 * @param options - Resolver, progress sink, cancellation signal
 * @returns The frozen result of the run. Infrastructure failures produce
 *   `status: "failed"` instead of a rejection.
 *
 * @example
 * ```ts
 * const result = await syncLibraries(
 *   { localRoot: "~/papers", remoteRoot: "/mnt/share/papers", autoMode: true },
 *   { progress: (stage) => console.log(stage) }
 * );
 * console.log(result.getSummary());
 * ```
 */
export async function syncLibraries(
  config: SyncConfig,
  options: SyncOptions = {}
): Promise<SyncResult> {
  const { quiet = false, signal } = options;
  const now = options.now ?? (() => new Date());

  const localPaths = replicaPaths(config.localRoot);
  const remotePaths = replicaPaths(config.remoteRoot);
  const localStore = options.stores?.local ?? new YamlRecordStore(localPaths.libraryFile);
  const remoteStore = options.stores?.remote ?? new YamlRecordStore(remotePaths.libraryFile);

  const run = new SyncRun(new ProgressReporter(options.progress, quiet));
  const result = new ResultAggregator();

  const cancelRequested = (): boolean => signal?.aborted === true;
  const cancel = (): SyncResult => {
    run.cancel();
    if (!quiet) console.log("[sync] Sync cancelled before any changes were applied");
    return result.build({ status: "cancelled" });
  };

  try {
    // Step 1: Prepare the remote root
    if (cancelRequested()) return cancel();
    run.advance("preparing-remote");
    if (!quiet) console.log(`[sync] Preparing remote ${remotePaths.root}...`);
    await ensureRemoteRoot(remotePaths.root);

    // Step 2: Read both replicas
    if (cancelRequested()) return cancel();
    run.advance("reading-snapshots");
    const local = await readSnapshot("local", localPaths.root, { store: localStore, quiet });
    const remote = await readSnapshot("remote", remotePaths.root, {
      store: remoteStore,
      createMissing: true,
      quiet,
    });
    result.addErrors(local.errors);
    result.addErrors(remote.errors);
    const baseline = await loadState(localPaths.stateFile, remotePaths.root, quiet);

    // Step 3: Diff
    if (cancelRequested()) return cancel();
    run.advance("detecting-conflicts");
    const diff = diffSnapshots(local, remote, baseline);
    if (!quiet) {
      console.log(
        `[sync] Records: ${diff.records.localOnly.length} local-only, ${diff.records.remoteOnly.length} remote-only, ${diff.records.conflicts.length} conflicts`
      );
      console.log(
        `[sync] PDFs: ${diff.pdfs.localOnly.length} local-only, ${diff.pdfs.remoteOnly.length} remote-only, ${diff.pdfs.conflicts.length} conflicts`
      );
    }

    // Step 4: Resolve conflicts
    let resolutions = new Map<string, Resolution>();
    if (diff.conflicts.length > 0) {
      if (cancelRequested()) return cancel();
      run.advance("resolving-conflicts", { done: 0, total: diff.conflicts.length });
      result.count("conflicts", diff.conflicts.length);

      const outcome = await resolveConflicts(diff.conflicts, {
        resolver: options.resolver,
        autoMode: config.autoMode,
        signal,
        maxStalledPolls: options.maxStalledPolls,
        quiet,
      });
      if (outcome.status === "cancelled") return cancel();

      resolutions = outcome.resolutions;
      for (const [conflictId, resolution] of resolutions) {
        result.setResolution(conflictId, resolution);
      }
      for (const { conflictId, reason } of outcome.unresolved) {
        result.addError({
          category: "resolution",
          key: conflictId,
          message: `Conflict ${conflictId} left unresolved: ${reason}`,
        });
      }
      result.count("unresolved", outcome.unresolved.length);
    }

    // Last point where cancellation leaves both replicas untouched
    if (cancelRequested()) return cancel();

    // Step 5: Apply
    const applier = new MergeApplier({
      local: { side: "local", snapshot: local, store: localStore, pdfDir: localPaths.pdfDir },
      remote: { side: "remote", snapshot: remote, store: remoteStore, pdfDir: remotePaths.pdfDir },
      diff,
      resolutions,
      result,
      run,
      signal,
      quiet,
    });

    run.advance("applying-records");
    await applier.applyRecords();
    run.advance("applying-collections");
    await applier.applyCollections();
    run.advance("applying-pdfs");
    await applier.applyPdfs();

    // Step 6: Store the new baseline
    run.advance("finalizing");
    await finalize();

    run.advance("completed");
    const built = result.build({ status: "completed", interrupted: applier.interrupted });
    if (!quiet) {
      console.log(
        `[sync] Done: ${result.changeCount} changes, ${built.errors.length} errors${applier.interrupted ? " (interrupted)" : ""}`
      );
    }
    return built;
  } catch (error) {
    if (!(error instanceof InfrastructureError)) {
      throw error;
    }
    run.fail();
    if (!quiet) console.error(`[sync] Sync failed (${error.code}): ${error.message}`);
    return result.build({ status: "failed", fatalError: error.message });
  }

  async function finalize(): Promise<void> {
    for (const [side, store] of [
      ["local", localStore],
      ["remote", remoteStore],
    ] as const) {
      try {
        await persistRecordKeys(store);
      } catch (error) {
        const message = `Failed to store sync keys on ${side}: ${errorMessage(error)}`;
        result.addError({ category: "baseline", message });
        if (!quiet) console.warn(`[sync] ${message}`);
      }
    }

    try {
      const [local, remote] = await Promise.all([
        readSnapshot("local", localPaths.root, { store: localStore, quiet: true }),
        readSnapshot("remote", remotePaths.root, { store: remoteStore, quiet: true }),
      ]);
      await saveState(localPaths.stateFile, buildBaseline(local, remote, now().toISOString()));
    } catch (error) {
      const message = `Failed to save sync baseline: ${errorMessage(error)}`;
      result.addError({ category: "baseline", message });
      if (!quiet) console.warn(`[sync] ${message}`);
    }
  }
}

/**
 * Start a sync without awaiting it.
 *
 * @example
 * ```ts
 * const handle = startSync(config, { resolver: session.resolver });
 * onEscape(() => handle.cancel());
 * const result = await handle.done;
 * ```
 */
export function startSync(config: SyncConfig, options: SyncOptions = {}): SyncHandle {
  const controller = new AbortController();
  const external = options.signal;
  const onAbort = (): void => controller.abort();
  if (external) {
    if (external.aborted) {
      controller.abort();
    } else {
      external.addEventListener("abort", onAbort, { once: true });
    }
  }

  const done = syncLibraries(config, { ...options, signal: controller.signal }).finally(() =>
    external?.removeEventListener("abort", onAbort)
  );

  return { done, cancel: () => controller.abort() };
}

/**
 * Read both replicas and diff them without writing anything. A missing
 * remote reads as empty.
 *
 * @throws InfrastructureError if either replica cannot be read
 */
export async function inspectReplicas(
  config: Pick<SyncConfig, "localRoot" | "remoteRoot">,
  options: Pick<SyncOptions, "quiet" | "stores"> = {}
): Promise<SyncInspection> {
  const { quiet = false } = options;
  const localPaths = replicaPaths(config.localRoot);
  const remotePaths = replicaPaths(config.remoteRoot);

  const local = await readSnapshot("local", localPaths.root, {
    store: options.stores?.local,
    quiet,
  });
  const remote = await readSnapshot("remote", remotePaths.root, {
    store: options.stores?.remote,
    quiet,
  });
  const baseline = await loadState(localPaths.stateFile, remotePaths.root, quiet);

  return {
    diff: diffSnapshots(local, remote, baseline),
    errors: [...local.errors, ...remote.errors],
    hasBaseline: baseline.lastSyncTime !== "",
  };
}
