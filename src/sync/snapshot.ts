/**
 * Snapshot reader: loads a canonical, comparable view of one replica.
 *
 * A snapshot holds records by sync key, PDFs by file name (with content
 * hashes), and collections by name with their members expressed as record
 * keys. Nothing replica-local (auto-increment ids, timestamps) survives into
 * a snapshot.
 */

import * as fs from "node:fs/promises";
import type {
  CollectionView,
  LibraryCollection,
  LibraryRecord,
  RecordRepository,
  ReplicaSide,
  Snapshot,
} from "../types.js";
import { InfrastructureError, errorMessage } from "../errors.js";
import { replicaPaths } from "../store/layout.js";
import { YamlRecordStore } from "../store/record-store.js";
import { scanPdfFiles, type PdfScanResult } from "../store/pdf-files.js";
import { toRecordView } from "./record-view.js";
import { itemId } from "./state.js";

export interface ReadSnapshotOptions {
  /**
   * Create the replica root and `pdfs/` if missing (remote side only).
   * When false, a missing remote reads as empty.
   */
  createMissing?: boolean;
  /** Record repository to read from (default: the replica's `library.yaml`) */
  store?: RecordRepository;
  quiet?: boolean;
}

/**
 * Create the remote root and its `pdfs/` directory if they do not exist.
 *
 * @throws InfrastructureError (REMOTE_UNREACHABLE) if they cannot be created
 */
export async function ensureRemoteRoot(root: string): Promise<void> {
  const paths = replicaPaths(root);
  try {
    await fs.mkdir(paths.pdfDir, { recursive: true });
  } catch (error) {
    throw new InfrastructureError(
      `Remote root ${paths.root} cannot be created: ${errorMessage(error)}`,
      "REMOTE_UNREACHABLE",
      { cause: error }
    );
  }
}

/**
 * Read one replica into a snapshot.
 *
 * The local replica must already exist with a record store; it is never
 * fabricated. Per-item read failures (a PDF that cannot be hashed, a
 * duplicate key) are collected on the snapshot and the item is left out.
 *
 * @throws InfrastructureError if the replica as a whole cannot be read
 */
export async function readSnapshot(
  side: ReplicaSide,
  root: string,
  options: ReadSnapshotOptions = {}
): Promise<Snapshot> {
  const { quiet = false } = options;
  const paths = replicaPaths(root);
  const store = options.store ?? new YamlRecordStore(paths.libraryFile);
  const failureCode = side === "local" ? "LOCAL_UNREADABLE" : "REMOTE_UNREADABLE";

  const snapshot: Snapshot = {
    side,
    root: paths.root,
    records: new Map(),
    pdfs: new Map(),
    collections: new Map(),
    unreadable: new Set(),
    errors: [],
  };

  if (side === "local") {
    await assertLocalReplica(paths.root, store);
  } else if (options.createMissing) {
    await ensureRemoteRoot(paths.root);
  } else if (!(await directoryExists(paths.root))) {
    return snapshot;
  }

  let records: LibraryRecord[];
  let collections: LibraryCollection[];
  try {
    records = await store.listAll();
    collections = await store.listCollections();
  } catch (error) {
    throw new InfrastructureError(
      `Cannot read ${side} record store at ${paths.root}: ${errorMessage(error)}`,
      failureCode,
      { cause: error }
    );
  }

  const keyById = new Map<number, string>();
  for (const record of [...records].sort((a, b) => a.id - b.id)) {
    const view = toRecordView(record);
    const duplicate = snapshot.records.get(view.key);
    if (duplicate) {
      snapshot.errors.push({
        category: "item",
        key: view.key,
        message: `Duplicate ${side} record "${record.title}" (id ${record.id}) shares key ${view.key}; skipped`,
      });
      continue;
    }

    snapshot.records.set(view.key, view);
    keyById.set(record.id, view.key);
  }

  for (const collection of collections) {
    snapshot.collections.set(collection.name, toCollectionView(collection, keyById));
  }

  let scan: PdfScanResult;
  try {
    scan = await scanPdfFiles(paths.pdfDir);
  } catch (error) {
    throw new InfrastructureError(
      `Cannot list ${side} PDF directory ${paths.pdfDir}: ${errorMessage(error)}`,
      failureCode,
      { cause: error }
    );
  }

  for (const pdf of scan.pdfs) {
    snapshot.pdfs.set(pdf.key, pdf);
  }
  for (const failure of scan.failures) {
    snapshot.unreadable.add(itemId("pdf", failure.fileName));
    snapshot.errors.push({
      category: "item",
      key: failure.fileName,
      message: `Cannot read ${side} PDF "${failure.fileName}": ${failure.message}`,
    });
  }

  if (!quiet) {
    console.log(
      `[snapshot] ${side}: ${snapshot.records.size} records, ${snapshot.pdfs.size} PDFs, ${snapshot.collections.size} collections`
    );
  }

  return snapshot;
}

/**
 * Collection with members mapped from replica-local ids to sync keys.
 * Ids that no longer resolve to a record are dropped.
 */
export function toCollectionView(
  collection: LibraryCollection,
  keyById: Map<number, string>
): CollectionView {
  const memberKeys = new Set<string>();
  for (const id of collection.paperIds) {
    const key = keyById.get(id);
    if (key) memberKeys.add(key);
  }

  return {
    name: collection.name,
    description: collection.description ? collection.description : null,
    memberKeys: [...memberKeys].sort(),
  };
}

async function assertLocalReplica(root: string, store: RecordRepository): Promise<void> {
  if (!(await directoryExists(root))) {
    throw new InfrastructureError(`Local library root ${root} does not exist`, "LOCAL_UNREADABLE");
  }

  let exists: boolean;
  try {
    exists = await store.exists();
  } catch (error) {
    throw new InfrastructureError(
      `Cannot access local record store in ${root}: ${errorMessage(error)}`,
      "LOCAL_UNREADABLE",
      { cause: error }
    );
  }
  if (!exists) {
    throw new InfrastructureError(`No local record store found in ${root}`, "LOCAL_UNREADABLE");
  }
}

async function directoryExists(dir: string): Promise<boolean> {
  try {
    const stats = await fs.stat(dir);
    return stats.isDirectory();
  } catch {
    return false;
  }
}
