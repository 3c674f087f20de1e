/**
 * Merge applier.
 *
 * Applies one-sided deltas and resolved conflicts to both replicas in three
 * stages (records, collections, PDFs). Each stage runs to completion before
 * the next one starts; a failure on one item is recorded and the loop moves
 * on. Cancellation observed mid-merge skips the remaining items of every
 * stage but never undoes a write already issued.
 */

import * as path from "node:path";
import type {
  CollectionView,
  DiffResult,
  Direction,
  ItemDiff,
  LibraryCollection,
  LibraryRecord,
  PdfConflict,
  RecordConflict,
  RecordRepository,
  RecordView,
  ReplicaSide,
  Resolution,
  Snapshot,
  SyncConflict,
} from "../types.js";
import { InfrastructureError, errorMessage } from "../errors.js";
import { copyPdfFile, pdfExists } from "../store/pdf-files.js";
import { deriveRecordKey, shortHash } from "./identity.js";
import { recordFingerprint, recordFromView } from "./record-view.js";
import type { ChangeEntry, ResultAggregator } from "./result.js";
import type { SyncRun } from "./run.js";

/** Title suffix of the remote version kept beside the local one */
export const REMOTE_VERSION_SUFFIX = " (remote version)";

export interface ReplicaTarget {
  side: ReplicaSide;
  snapshot: Snapshot;
  store: RecordRepository;
  pdfDir: string;
}

export interface MergeContext {
  local: ReplicaTarget;
  remote: ReplicaTarget;
  diff: DiffResult;
  resolutions: ReadonlyMap<string, Resolution>;
  result: ResultAggregator;
  /** Receives per-item progress of the current stage */
  run?: SyncRun;
  signal?: AbortSignal;
  quiet?: boolean;
}

interface CopyTask<V> {
  type: "copy";
  key: string;
  from: ReplicaTarget;
  to: ReplicaTarget;
  view: V;
}

interface KeepBothTask<C extends SyncConflict> {
  type: "keep-both";
  conflict: C;
}

type MergeTask<V, C extends SyncConflict> = CopyTask<V> | KeepBothTask<C>;

type RecordIndexes = Record<ReplicaSide, Map<string, LibraryRecord>>;

export class MergeApplier {
  private stopped = false;
  private readonly keptBothKeys = new Map<string, string>();
  private readonly takenRecordKeys = new Set<string>();
  private readonly takenPdfNames = new Set<string>();
  private readonly pdfCopyNames = new Map<string, string>();

  constructor(private readonly ctx: MergeContext) {
    for (const name of [...ctx.local.snapshot.pdfs.keys(), ...ctx.remote.snapshot.pdfs.keys()]) {
      this.takenPdfNames.add(name);
    }
  }

  /** Whether cancellation stopped the merge before every item was applied */
  get interrupted(): boolean {
    return this.stopped;
  }

  /**
   * Stage 1: copy, overwrite or duplicate records.
   *
   * @throws InfrastructureError if either record store cannot be listed
   */
  async applyRecords(): Promise<void> {
    const tasks = this.plan(this.ctx.diff.records, (replica) => replica.snapshot.records);
    if (tasks.length === 0) return;

    const indexes: RecordIndexes = {
      local: await indexRecords(this.ctx.local),
      remote: await indexRecords(this.ctx.remote),
    };
    for (const key of [
      ...this.ctx.local.snapshot.records.keys(),
      ...this.ctx.remote.snapshot.records.keys(),
      ...indexes.local.keys(),
      ...indexes.remote.keys(),
    ]) {
      this.takenRecordKeys.add(key);
    }

    await this.runTasks(
      tasks,
      (task) => (task.type === "copy" ? task.key : task.conflict.itemKey),
      async (task) => {
        if (task.type === "keep-both") {
          await this.keepBothRecords(task.conflict, indexes);
          return;
        }

        const outcome = await writeRecord(task.to, indexes[task.to.side], task.view, task.key);
        this.change({
          category: "records",
          direction: direction(task.from),
          action: outcome,
          label: task.view.title,
          counter: outcome === "added" ? "recordsAdded" : "recordsUpdated",
        });
      }
    );
  }

  /**
   * Stage 2: merge collections by name.
   *
   * Members are the union of both sides, plus the remote copy of every
   * member that was kept both. Members missing on a replica are dropped
   * there.
   *
   * @throws InfrastructureError if either record store cannot be listed
   */
  async applyCollections(): Promise<void> {
    const { local, remote } = this.ctx;
    const names = [
      ...new Set([...local.snapshot.collections.keys(), ...remote.snapshot.collections.keys()]),
    ].sort();
    if (names.length === 0) return;

    const indexes: RecordIndexes = {
      local: await indexRecords(local),
      remote: await indexRecords(remote),
    };
    const existing: Record<ReplicaSide, Map<string, LibraryCollection>> = {
      local: await indexCollections(local),
      remote: await indexCollections(remote),
    };

    await this.runTasks(
      names,
      (name) => name,
      async (name) => {
        const desired = this.desiredCollection(name);
        for (const target of [local, remote]) {
          await this.writeCollection(
            target,
            indexes[target.side],
            existing[target.side].get(name),
            desired
          );
        }
      }
    );
  }

  /**
   * Stage 3: copy, overwrite or duplicate PDF files.
   */
  async applyPdfs(): Promise<void> {
    const tasks = this.plan(this.ctx.diff.pdfs, (replica) => replica.snapshot.pdfs);
    if (tasks.length === 0) return;

    await this.runTasks(
      tasks,
      (task) => (task.type === "copy" ? task.key : task.conflict.itemKey),
      async (task) => {
        if (task.type === "keep-both") {
          await this.keepBothPdfs(task.conflict);
          return;
        }

        const replacing = task.to.snapshot.pdfs.has(task.key);
        await copyPdfFile(task.view.path, task.to.pdfDir, task.key);
        this.change({
          category: "pdfs",
          direction: direction(task.from),
          action: replacing ? "updated" : "copied",
          label: task.key,
          counter: replacing ? "pdfsUpdated" : "pdfsCopied",
        });
      }
    );
  }

  /**
   * Order: local-only, remote-only, local-ahead, remote-ahead, then
   * conflicts by their resolution. Conflicts without one are skipped.
   */
  private plan<V, C extends SyncConflict>(
    items: ItemDiff<C>,
    views: (replica: ReplicaTarget) => Map<string, V>
  ): MergeTask<V, C>[] {
    const { local, remote, resolutions } = this.ctx;
    const tasks: MergeTask<V, C>[] = [];

    const copy = (key: string, from: ReplicaTarget, to: ReplicaTarget): void => {
      const view = views(from).get(key);
      if (view !== undefined) {
        tasks.push({ type: "copy", key, from, to, view });
      }
    };

    for (const key of items.localOnly) copy(key, local, remote);
    for (const key of items.remoteOnly) copy(key, remote, local);
    for (const key of items.localAhead) copy(key, local, remote);
    for (const key of items.remoteAhead) copy(key, remote, local);

    for (const conflict of items.conflicts) {
      switch (resolutions.get(conflict.id)) {
        case "use-local":
          copy(conflict.itemKey, local, remote);
          break;
        case "use-remote":
          copy(conflict.itemKey, remote, local);
          break;
        case "keep-both":
          tasks.push({ type: "keep-both", conflict });
          break;
        case undefined:
          break;
      }
    }

    return tasks;
  }

  /**
   * The local version stays at the original key on both sides; the remote
   * version is added on both sides under a disambiguated key. When the
   * remote version's PDF is kept both as well, the copy links to the PDF
   * copy holding the remote bytes.
   */
  private async keepBothRecords(conflict: RecordConflict, indexes: RecordIndexes): Promise<void> {
    const { local, remote, result } = this.ctx;
    const copyKey = this.uniqueRecordKey(conflict.itemKey, recordFingerprint(conflict.remote));
    const pdfConflict = this.keptBothPdf(conflict.remote.pdfFile);
    const copy: RecordView = {
      ...conflict.remote,
      key: copyKey,
      title: `${conflict.remote.title}${REMOTE_VERSION_SUFFIX}`,
      pdfFile: pdfConflict ? await this.pdfCopyName(pdfConflict) : conflict.remote.pdfFile,
    };

    await writeRecord(local, indexes.local, copy, copyKey);
    this.change({
      category: "records",
      direction: "remote→local",
      action: "added",
      label: copy.title,
      counter: "recordsAdded",
    });

    await writeRecord(remote, indexes.remote, copy, copyKey);
    await writeRecord(remote, indexes.remote, conflict.local, conflict.itemKey);
    this.keptBothKeys.set(conflict.itemKey, copyKey);
    result.count("keptBoth");
    this.change({
      category: "records",
      direction: "local→remote",
      action: "kept both",
      label: conflict.local.title,
      counter: "recordsUpdated",
    });
  }

  /**
   * Local bytes stay under the original name on both sides; remote bytes
   * are written on both sides under a disambiguated name.
   */
  private async keepBothPdfs(conflict: PdfConflict): Promise<void> {
    const { local, remote, result } = this.ctx;
    const copyName = await this.pdfCopyName(conflict);

    await copyPdfFile(conflict.remote.path, local.pdfDir, copyName);
    this.change({
      category: "pdfs",
      direction: "remote→local",
      action: "copied",
      label: copyName,
      counter: "pdfsCopied",
    });

    await copyPdfFile(conflict.remote.path, remote.pdfDir, copyName);
    await copyPdfFile(conflict.local.path, remote.pdfDir, conflict.itemKey);
    result.count("keptBoth");
    this.change({
      category: "pdfs",
      direction: "local→remote",
      action: "kept both",
      label: conflict.itemKey,
      counter: "pdfsUpdated",
    });
  }

  private desiredCollection(name: string): CollectionView {
    const localView = this.ctx.local.snapshot.collections.get(name);
    const remoteView = this.ctx.remote.snapshot.collections.get(name);

    const members = new Set([...(localView?.memberKeys ?? []), ...(remoteView?.memberKeys ?? [])]);
    for (const key of [...members]) {
      const copyKey = this.keptBothKeys.get(key);
      if (copyKey) members.add(copyKey);
    }

    return {
      name,
      description: localView?.description ?? remoteView?.description ?? null,
      memberKeys: [...members].sort(),
    };
  }

  private async writeCollection(
    target: ReplicaTarget,
    records: Map<string, LibraryRecord>,
    existing: LibraryCollection | undefined,
    desired: CollectionView
  ): Promise<void> {
    const paperIds: number[] = [];
    for (const key of desired.memberKeys) {
      const record = records.get(key);
      if (record) {
        paperIds.push(record.id);
      } else if (!this.ctx.quiet) {
        console.warn(
          `[merge] Collection "${desired.name}": record ${key} is missing on ${target.side}; member dropped`
        );
      }
    }
    paperIds.sort((a, b) => a - b);

    if (
      existing &&
      (existing.description || null) === desired.description &&
      sameIds(existing.paperIds, paperIds)
    ) {
      return;
    }

    await target.store.saveCollection({
      name: desired.name,
      description: desired.description,
      paperIds,
    });
    this.change({
      category: "collections",
      direction: target.side === "remote" ? "local→remote" : "remote→local",
      action: existing ? "updated" : "added",
      label: desired.name,
      counter: existing ? "collectionsUpdated" : "collectionsAdded",
    });
  }

  private keptBothPdf(fileName: string | null): PdfConflict | undefined {
    if (fileName === null) return undefined;
    return this.ctx.diff.pdfs.conflicts.find(
      (conflict) =>
        conflict.itemKey === fileName && this.ctx.resolutions.get(conflict.id) === "keep-both"
    );
  }

  /** Name of the remote copy of a kept-both PDF; stable within the run */
  private async pdfCopyName(conflict: PdfConflict): Promise<string> {
    const known = this.pdfCopyNames.get(conflict.itemKey);
    if (known !== undefined) return known;

    const name = await this.uniquePdfName(conflict.itemKey, conflict.remote.contentHash);
    this.pdfCopyNames.set(conflict.itemKey, name);
    return name;
  }

  private uniqueRecordKey(key: string, fingerprint: string): string {
    const base = `${key}~${shortHash(fingerprint)}`;
    let candidate = base;
    for (let attempt = 2; this.takenRecordKeys.has(candidate); attempt++) {
      candidate = `${base}-${attempt}`;
    }
    this.takenRecordKeys.add(candidate);
    return candidate;
  }

  private async uniquePdfName(fileName: string, contentHash: string): Promise<string> {
    const ext = path.extname(fileName);
    const stem = path.basename(fileName, ext);
    const base = `${stem}_remote-${shortHash(contentHash)}`;

    let candidate = `${base}${ext}`;
    for (let attempt = 2; await this.pdfNameTaken(candidate); attempt++) {
      candidate = `${base}-${attempt}${ext}`;
    }
    this.takenPdfNames.add(candidate);
    return candidate;
  }

  private async pdfNameTaken(name: string): Promise<boolean> {
    if (this.takenPdfNames.has(name)) return true;
    const [onLocal, onRemote] = await Promise.all([
      pdfExists(this.ctx.local.pdfDir, name),
      pdfExists(this.ctx.remote.pdfDir, name),
    ]);
    return onLocal || onRemote;
  }

  private async runTasks<T>(
    tasks: readonly T[],
    label: (task: T) => string,
    apply: (task: T) => Promise<void>
  ): Promise<void> {
    let done = 0;
    for (const task of tasks) {
      if (this.checkCancelled()) return;

      try {
        await apply(task);
      } catch (error) {
        const key = label(task);
        const message = `Failed to sync "${key}": ${errorMessage(error)}`;
        this.ctx.result.addError({ category: "item", key, message });
        if (!this.ctx.quiet) console.warn(`[merge] ${message}`);
      }

      done++;
      this.ctx.run?.reportItems({ done, total: tasks.length });
    }
  }

  private checkCancelled(): boolean {
    if (!this.stopped && this.ctx.signal?.aborted) {
      this.stopped = true;
      if (!this.ctx.quiet) {
        console.log("[merge] Cancellation received; skipping remaining items");
      }
    }
    return this.stopped;
  }

  private change(entry: ChangeEntry): void {
    const line = this.ctx.result.addChange(entry);
    if (!this.ctx.quiet) console.log(`[merge] ${line}`);
  }
}

function direction(from: ReplicaTarget): Direction {
  return from.side === "local" ? "local→remote" : "remote→local";
}

/**
 * Write a view into a replica under the given key: replace the record that
 * already carries the key, or create a new one. The key is persisted as
 * `syncKey` either way.
 */
async function writeRecord(
  target: ReplicaTarget,
  index: Map<string, LibraryRecord>,
  view: RecordView,
  key: string
): Promise<"added" | "updated"> {
  const fields = recordFromView(view, key);
  const existing = index.get(key);

  if (existing) {
    index.set(key, await target.store.upsert({ ...existing, ...fields }));
    return "updated";
  }

  index.set(key, await target.store.create(fields));
  return "added";
}

/**
 * Store the derived key as `syncKey` on every record that has none yet, so
 * a later edit of the title or DOI does not change the record's identity.
 *
 * @returns Number of records updated
 */
export async function persistRecordKeys(store: RecordRepository): Promise<number> {
  let updated = 0;
  for (const record of await store.listAll()) {
    if (record.syncKey) continue;
    await store.upsert({ ...record, syncKey: deriveRecordKey(record) });
    updated++;
  }
  return updated;
}

/**
 * Current records of a replica by sync key; the lowest id wins a shared key.
 */
async function indexRecords(replica: ReplicaTarget): Promise<Map<string, LibraryRecord>> {
  let records: LibraryRecord[];
  try {
    records = await replica.store.listAll();
  } catch (error) {
    throw unreadable(replica, error);
  }

  const index = new Map<string, LibraryRecord>();
  for (const record of [...records].sort((a, b) => a.id - b.id)) {
    const key = deriveRecordKey(record);
    if (!index.has(key)) index.set(key, record);
  }
  return index;
}

async function indexCollections(replica: ReplicaTarget): Promise<Map<string, LibraryCollection>> {
  let collections: LibraryCollection[];
  try {
    collections = await replica.store.listCollections();
  } catch (error) {
    throw unreadable(replica, error);
  }
  return new Map(collections.map((collection) => [collection.name, collection]));
}

function unreadable(replica: ReplicaTarget, error: unknown): InfrastructureError {
  return new InfrastructureError(
    `Cannot read ${replica.side} record store: ${errorMessage(error)}`,
    replica.side === "local" ? "LOCAL_UNREADABLE" : "REMOTE_UNREADABLE",
    { cause: error }
  );
}

function sameIds(a: readonly number[], b: readonly number[]): boolean {
  const left = [...new Set(a)].sort((x, y) => x - y);
  const right = [...new Set(b)].sort((x, y) => x - y);
  return left.length === right.length && left.every((id, i) => id === right[i]);
}
