/**
 * Sync baseline: the last-known-equal state of every item.
 *
 * After a completed run the engine records, for each item that is identical
 * on both replicas, its record fingerprint or PDF content hash. The next run
 * uses it to tell a one-sided edit (auto-merged) from a true conflict (both
 * sides changed since they were last equal).
 *
 * The baseline lives in the local replica root and is keyed by conflict id
 * ("record:<key>" / "pdf:<key>").
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { z } from "zod";
import type { ItemKind, Snapshot } from "../types.js";
import { recordFingerprint } from "./record-view.js";

/**
 * Current baseline file schema version.
 * Increment when making breaking changes to the file format.
 */
export const STATE_FILE_VERSION = 1;

const BaselineEntrySchema = z.object({
  kind: z.enum(["record", "pdf"]),
  fingerprint: z.string(),
});

const SyncStateFileSchema = z.object({
  version: z.literal(STATE_FILE_VERSION),
  remoteRoot: z.string(),
  lastSyncTime: z.string(),
  items: z.record(BaselineEntrySchema),
});

export type BaselineEntry = z.infer<typeof BaselineEntrySchema>;
export type SyncStateFile = z.infer<typeof SyncStateFileSchema>;

export function createEmptyState(remoteRoot = ""): SyncStateFile {
  return {
    version: STATE_FILE_VERSION,
    remoteRoot,
    lastSyncTime: "",
    items: {},
  };
}

/**
 * Load the baseline for a given remote.
 *
 * A missing file, a corrupted file, or a baseline recorded against a
 * different remote root all yield an empty baseline, which makes every
 * divergence a conflict (never a silent overwrite).
 *
 * @param stateFilePath - Path to the baseline JSON file
 * @param remoteRoot - Absolute remote root the baseline must belong to
 */
export async function loadState(
  stateFilePath: string,
  remoteRoot: string,
  quiet = false
): Promise<SyncStateFile> {
  let content: string;
  try {
    content = await fs.readFile(stateFilePath, "utf-8");
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      return createEmptyState(remoteRoot);
    }
    if (!quiet) {
      console.warn(
        `[sync-state] Failed to read ${stateFilePath}:`,
        error instanceof Error ? error.message : error
      );
    }
    return createEmptyState(remoteRoot);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    if (!quiet) {
      console.warn(
        `[sync-state] State file ${stateFilePath} is not valid JSON. Starting without a baseline.`
      );
    }
    return createEmptyState(remoteRoot);
  }

  const parsed = SyncStateFileSchema.safeParse(raw);
  if (!parsed.success) {
    if (!quiet) {
      console.warn(
        `[sync-state] State file ${stateFilePath} has invalid structure. Starting without a baseline.`
      );
    }
    return createEmptyState(remoteRoot);
  }

  if (parsed.data.remoteRoot !== remoteRoot) {
    if (!quiet) {
      console.warn(
        `[sync-state] Baseline belongs to ${parsed.data.remoteRoot}, not ${remoteRoot}. Starting without a baseline.`
      );
    }
    return createEmptyState(remoteRoot);
  }

  return parsed.data;
}

/**
 * Save the baseline atomically (temp file then rename).
 */
export async function saveState(stateFilePath: string, state: SyncStateFile): Promise<void> {
  await fs.mkdir(path.dirname(stateFilePath), { recursive: true });

  const tempPath = `${stateFilePath}.tmp`;
  await fs.writeFile(tempPath, JSON.stringify(state, null, 2), "utf-8");
  await fs.rename(tempPath, stateFilePath);
}

/**
 * Build a baseline from two snapshots taken after merging.
 *
 * Only items present and equal on both sides are recorded.
 */
export function buildBaseline(
  local: Snapshot,
  remote: Snapshot,
  lastSyncTime: string
): SyncStateFile {
  const state = createEmptyState(remote.root);
  state.lastSyncTime = lastSyncTime;

  for (const [key, localView] of local.records) {
    const remoteView = remote.records.get(key);
    if (!remoteView) continue;
    const fingerprint = recordFingerprint(localView);
    if (fingerprint === recordFingerprint(remoteView)) {
      state.items[itemId("record", key)] = { kind: "record", fingerprint };
    }
  }

  for (const [key, localPdf] of local.pdfs) {
    const remotePdf = remote.pdfs.get(key);
    if (remotePdf && localPdf.contentHash === remotePdf.contentHash) {
      state.items[itemId("pdf", key)] = { kind: "pdf", fingerprint: localPdf.contentHash };
    }
  }

  return state;
}

/**
 * Fingerprint recorded for an item at the last sync, if any.
 */
export function baselineFingerprint(
  state: SyncStateFile,
  kind: ItemKind,
  key: string
): string | undefined {
  return state.items[itemId(kind, key)]?.fingerprint;
}

/**
 * Conflict / baseline id of an item.
 */
export function itemId(kind: ItemKind, key: string): string {
  return `${kind}:${key}`;
}
