/**
 * Core types for the library sync engine.
 */

export type ReplicaSide = "local" | "remote";

/** Direction tag used on every applied change. */
export type Direction = "local→remote" | "remote→local";

export type ItemKind = "record" | "pdf";

export type Resolution = "use-local" | "use-remote" | "keep-both";

// =============================================================================
// Record Store Types
// =============================================================================

/**
 * A paper record as persisted in a replica's `library.yaml`.
 *
 * `id`, `addedDate` and `modifiedDate` are replica-local bookkeeping and are
 * never compared across replicas.
 */
export interface LibraryRecord {
  /** Replica-local auto-increment id */
  id: number;
  /** Stable cross-replica key, persisted once the record has been synced */
  syncKey?: string;
  title: string;
  authors: string[];
  abstract?: string | null;
  venueFull?: string | null;
  venueAcronym?: string | null;
  year?: number | null;
  volume?: string | null;
  issue?: string | null;
  pages?: string | null;
  paperType?: string | null;
  doi?: string | null;
  preprintId?: string | null;
  category?: string | null;
  url?: string | null;
  /** PDF file name inside the replica's `pdfs/` directory */
  pdfPath?: string | null;
  notes?: string | null;
  tags: string[];
  addedDate: string;
  modifiedDate: string;
}

/** Record payload for creation; the store assigns `id` and dates. */
export type NewLibraryRecord = Omit<LibraryRecord, "id" | "addedDate" | "modifiedDate">;

export interface LibraryCollection {
  id: number;
  name: string;
  description?: string | null;
  createdAt: string;
  lastModified: string;
  /** Replica-local record ids */
  paperIds: number[];
}

export type CollectionInput = Pick<LibraryCollection, "name" | "description" | "paperIds">;

/**
 * Record repository consumed by the engine.
 *
 * One instance per replica. Implementations must not share state between
 * replicas.
 */
export interface RecordRepository {
  /** Whether the backing store exists (nothing is created by checking) */
  exists(): Promise<boolean>;
  listAll(): Promise<LibraryRecord[]>;
  create(record: NewLibraryRecord): Promise<LibraryRecord>;
  /** Replace the record with the same `id` */
  upsert(record: LibraryRecord): Promise<LibraryRecord>;
  listCollections(): Promise<LibraryCollection[]>;
  /** Create or replace the collection with the same name */
  saveCollection(collection: CollectionInput): Promise<LibraryCollection>;
}

// =============================================================================
// Snapshot Types
// =============================================================================

/** Value of a single comparable field. */
export type FieldValue = string | number | readonly string[] | null;

/**
 * Comparable view of a record. Holds exactly the fields the diff engine is
 * allowed to compare (see RECORD_VIEW_FIELDS).
 */
export interface RecordView {
  key: string;
  title: string;
  authors: readonly string[];
  abstract: string | null;
  venueFull: string | null;
  venueAcronym: string | null;
  year: number | null;
  volume: string | null;
  issue: string | null;
  pages: string | null;
  paperType: string | null;
  doi: string | null;
  preprintId: string | null;
  category: string | null;
  url: string | null;
  /** Base name of the record's PDF, if any */
  pdfFile: string | null;
  notes: string | null;
  /** Sorted */
  tags: readonly string[];
}

export interface PdfView {
  /** File name inside `pdfs/` */
  key: string;
  /** Absolute path on this replica */
  path: string;
  size: number;
  /** ISO timestamp from file mtime */
  modifiedTime: string;
  /** "sha256:<hex>" */
  contentHash: string;
}

export interface CollectionView {
  name: string;
  description: string | null;
  /** Sorted record keys */
  memberKeys: readonly string[];
}

export interface Snapshot {
  side: ReplicaSide;
  root: string;
  records: Map<string, RecordView>;
  pdfs: Map<string, PdfView>;
  collections: Map<string, CollectionView>;
  /** Conflict ids of items that could not be read; excluded from diffing */
  unreadable: Set<string>;
  /** Per-item read failures */
  errors: SyncError[];
}

// =============================================================================
// Diff Types
// =============================================================================

export interface FieldDiff {
  local: FieldValue;
  remote: FieldValue;
}

interface ConflictBase {
  /** "<kind>:<key>", unique across a run */
  id: string;
  itemKey: string;
  /** Only the differing fields */
  fieldDiffs: Record<string, FieldDiff>;
}

export interface RecordConflict extends ConflictBase {
  kind: "record";
  local: RecordView;
  remote: RecordView;
}

export interface PdfConflict extends ConflictBase {
  kind: "pdf";
  local: PdfView;
  remote: PdfView;
}

export type SyncConflict = RecordConflict | PdfConflict;

/** Classification of one item kind across both replicas. */
export interface ItemDiff<C extends SyncConflict> {
  conflicts: C[];
  localOnly: string[];
  remoteOnly: string[];
  /** Changed only on the local side since the last sync */
  localAhead: string[];
  /** Changed only on the remote side since the last sync */
  remoteAhead: string[];
  identical: string[];
}

export interface CollectionDiff {
  localOnly: string[];
  remoteOnly: string[];
  divergent: string[];
  identical: string[];
}

export interface DiffResult {
  records: ItemDiff<RecordConflict>;
  pdfs: ItemDiff<PdfConflict>;
  collections: CollectionDiff;
  /** Record and PDF conflicts, in that order */
  conflicts: SyncConflict[];
}

// =============================================================================
// Run / Result Types
// =============================================================================

export type SyncStage =
  | "idle"
  | "preparing-remote"
  | "reading-snapshots"
  | "detecting-conflicts"
  | "resolving-conflicts"
  | "applying-records"
  | "applying-collections"
  | "applying-pdfs"
  | "finalizing"
  | "completed"
  | "cancelled"
  | "failed";

export type ChangeCategory = "records" | "collections" | "pdfs";

export interface SyncError {
  category: "item" | "resolution" | "baseline";
  /** Item key or collection name, when the error concerns one item */
  key?: string;
  message: string;
}

export interface SyncCounts {
  recordsAdded: number;
  recordsUpdated: number;
  collectionsAdded: number;
  collectionsUpdated: number;
  pdfsCopied: number;
  pdfsUpdated: number;
  conflicts: number;
  keptBoth: number;
  unresolved: number;
  errors: number;
}

export type SyncStatus = "completed" | "cancelled" | "failed";

export interface SyncResult {
  readonly status: SyncStatus;
  readonly errors: readonly string[];
  readonly failures: readonly SyncError[];
  readonly detailedChanges: Readonly<Record<ChangeCategory, readonly string[]>>;
  readonly counts: Readonly<SyncCounts>;
  /** Decision applied per conflict id */
  readonly resolutions: Readonly<Record<string, Resolution>>;
  /** Cancellation arrived after merging began; remaining items were skipped */
  readonly interrupted: boolean;
  /** Infrastructure failure that ended the run */
  readonly fatalError?: string;
  getSummary(): string;
}

// =============================================================================
// Configuration
// =============================================================================

export interface SyncConfig {
  /** Local replica root (must already contain a library) */
  localRoot: string;
  /** Remote replica root (created if missing) */
  remoteRoot: string;
  /** Resolve every conflict as keep-both without invoking a resolver */
  autoMode: boolean;
}
