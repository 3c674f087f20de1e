/**
 * Diff engine: classifies every item across the two snapshots.
 *
 * For each item kind the union of keys is split into:
 * - `localOnly` / `remoteOnly`: present on one side; copied, never conflicts
 * - `identical`: every modeled field (or the PDF content hash) is equal
 * - `localAhead` / `remoteAhead`: differs, but the other side still matches
 *   the last-sync baseline, so only one side changed
 * - `conflicts`: differs and both sides moved since they were last equal
 *   (or there is no baseline entry)
 *
 * There is no last-write-wins: timestamps are never consulted, because
 * neither replica's clock is trusted.
 */

import type {
  CollectionDiff,
  CollectionView,
  DiffResult,
  FieldDiff,
  ItemDiff,
  PdfConflict,
  PdfView,
  RecordConflict,
  RecordView,
  Snapshot,
  SyncConflict,
} from "../types.js";
import { diffRecordViews, fieldValuesEqual, recordFingerprint } from "./record-view.js";
import { baselineFingerprint, createEmptyState, itemId, type SyncStateFile } from "./state.js";

/**
 * Compare two snapshots.
 *
 * @param local - Local replica snapshot
 * @param remote - Remote replica snapshot
 * @param baseline - Last-known-equal state (default: none, every divergence conflicts)
 */
export function diffSnapshots(
  local: Snapshot,
  remote: Snapshot,
  baseline: SyncStateFile = createEmptyState()
): DiffResult {
  const skipped = new Set([...local.unreadable, ...remote.unreadable]);

  const records = diffItems<RecordView, RecordConflict>(local.records, remote.records, {
    isSkipped: (key) => skipped.has(itemId("record", key)),
    fingerprint: recordFingerprint,
    baseline: (key) => baselineFingerprint(baseline, "record", key),
    conflict: (key, localView, remoteView) => ({
      id: itemId("record", key),
      itemKey: key,
      kind: "record",
      local: localView,
      remote: remoteView,
      fieldDiffs: diffRecordViews(localView, remoteView),
    }),
  });

  const pdfs = diffItems<PdfView, PdfConflict>(local.pdfs, remote.pdfs, {
    isSkipped: (key) => skipped.has(itemId("pdf", key)),
    fingerprint: (pdf) => pdf.contentHash,
    baseline: (key) => baselineFingerprint(baseline, "pdf", key),
    conflict: (key, localPdf, remotePdf) => ({
      id: itemId("pdf", key),
      itemKey: key,
      kind: "pdf",
      local: localPdf,
      remote: remotePdf,
      fieldDiffs: pdfFieldDiffs(localPdf, remotePdf),
    }),
  });

  const collections = diffCollections(local.collections, remote.collections);

  return {
    records,
    pdfs,
    collections,
    conflicts: [...records.conflicts, ...pdfs.conflicts],
  };
}

interface ItemComparator<V, C extends SyncConflict> {
  isSkipped(key: string): boolean;
  fingerprint(view: V): string;
  baseline(key: string): string | undefined;
  conflict(key: string, local: V, remote: V): C;
}

function diffItems<V, C extends SyncConflict>(
  local: Map<string, V>,
  remote: Map<string, V>,
  comparator: ItemComparator<V, C>
): ItemDiff<C> {
  const result: ItemDiff<C> = {
    conflicts: [],
    localOnly: [],
    remoteOnly: [],
    localAhead: [],
    remoteAhead: [],
    identical: [],
  };

  const keys = [...new Set([...local.keys(), ...remote.keys()])].sort();

  for (const key of keys) {
    if (comparator.isSkipped(key)) continue;

    const localView = local.get(key);
    const remoteView = remote.get(key);

    if (localView === undefined && remoteView !== undefined) {
      result.remoteOnly.push(key);
      continue;
    }
    if (remoteView === undefined || localView === undefined) {
      result.localOnly.push(key);
      continue;
    }

    const localFingerprint = comparator.fingerprint(localView);
    const remoteFingerprint = comparator.fingerprint(remoteView);
    if (localFingerprint === remoteFingerprint) {
      result.identical.push(key);
      continue;
    }

    const base = comparator.baseline(key);
    if (base !== undefined && base === localFingerprint) {
      result.remoteAhead.push(key);
      continue;
    }
    if (base !== undefined && base === remoteFingerprint) {
      result.localAhead.push(key);
      continue;
    }

    result.conflicts.push(comparator.conflict(key, localView, remoteView));
  }

  return result;
}

function pdfFieldDiffs(local: PdfView, remote: PdfView): Record<string, FieldDiff> {
  const diffs: Record<string, FieldDiff> = {
    contentHash: { local: local.contentHash, remote: remote.contentHash },
  };
  if (local.size !== remote.size) {
    diffs.size = { local: local.size, remote: remote.size };
  }
  if (local.modifiedTime !== remote.modifiedTime) {
    diffs.modifiedTime = { local: local.modifiedTime, remote: remote.modifiedTime };
  }
  return diffs;
}

/**
 * Compare collections by name. Collections never conflict; divergent ones
 * are merged by the applier.
 */
export function diffCollections(
  local: Map<string, CollectionView>,
  remote: Map<string, CollectionView>
): CollectionDiff {
  const result: CollectionDiff = { localOnly: [], remoteOnly: [], divergent: [], identical: [] };
  const names = [...new Set([...local.keys(), ...remote.keys()])].sort();

  for (const name of names) {
    const localCollection = local.get(name);
    const remoteCollection = remote.get(name);

    if (!localCollection) {
      result.remoteOnly.push(name);
    } else if (!remoteCollection) {
      result.localOnly.push(name);
    } else if (
      localCollection.description !== remoteCollection.description ||
      !fieldValuesEqual(localCollection.memberKeys, remoteCollection.memberKeys)
    ) {
      result.divergent.push(name);
    } else {
      result.identical.push(name);
    }
  }

  return result;
}
