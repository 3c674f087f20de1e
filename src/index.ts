/**
 * paper-library-sync
 *
 * Bidirectional reconciliation of a local paper library with a remote copy.
 *
 * @packageDocumentation
 */

// =============================================================================
// Core Sync Functions
// =============================================================================

export {
  syncLibraries,
  startSync,
  inspectReplicas,
  type SyncOptions,
  type SyncHandle,
  type SyncInspection,
} from "./sync/engine.js";

export { triggerAutoSync, type AutoSyncOptions } from "./sync/auto-sync.js";

// =============================================================================
// Conflict Resolution
// =============================================================================

export {
  resolveConflicts,
  createStrategyResolver,
  isResolution,
  RESOLUTIONS,
  DEFAULT_MAX_STALLED_POLLS,
  type ConflictResolver,
  type ResolverDecisions,
  type ResolveOptions,
  type ResolutionOutcome,
  type UnresolvedConflict,
} from "./sync/resolution.js";

export {
  ResolutionSession,
  type ConflictPosition,
  type ConflictPromptHandler,
} from "./sync/resolution-session.js";

// =============================================================================
// Progress and Results
// =============================================================================

export {
  SYNC_STAGES,
  stageIndex,
  ProgressReporter,
  type ProgressCounts,
  type ProgressSink,
} from "./sync/progress.js";

export { SUMMARY_PREVIEW_LIMIT, formatChange } from "./sync/result.js";

// =============================================================================
// Building Blocks (for advanced use cases)
// =============================================================================

export { readSnapshot, ensureRemoteRoot, type ReadSnapshotOptions } from "./sync/snapshot.js";
export { diffSnapshots, diffCollections } from "./sync/diff.js";
export { deriveRecordKey, normalizeDoi, normalizeText } from "./sync/identity.js";
export {
  toRecordView,
  recordFingerprint,
  diffRecordViews,
  RECORD_VIEW_VERSION,
  RECORD_VIEW_FIELDS,
  type RecordViewField,
} from "./sync/record-view.js";
export {
  loadState,
  saveState,
  createEmptyState,
  buildBaseline,
  STATE_FILE_VERSION,
  type SyncStateFile,
} from "./sync/state.js";
export { YamlRecordStore, type YamlRecordStoreOptions } from "./store/record-store.js";
export { replicaPaths, LIBRARY_FILE, PDF_DIR, STATE_FILE, LOCK_FILE } from "./store/layout.js";
export { acquireSyncLocks, readActiveLock, isLockActive, type SyncLock, type LockInfo } from "./lock.js";
export { buildConfig, type ConfigOverrides, type ConfigResult } from "./config.js";

// =============================================================================
// Errors
// =============================================================================

export { InfrastructureError, LibraryFormatError, SyncLockError, type InfrastructureErrorCode } from "./errors.js";

// =============================================================================
// Core Types
// =============================================================================

export type {
  // Replicas and records
  ReplicaSide,
  Direction,
  ItemKind,
  LibraryRecord,
  NewLibraryRecord,
  LibraryCollection,
  CollectionInput,
  RecordRepository,
  // Snapshots and diffs
  FieldValue,
  RecordView,
  PdfView,
  CollectionView,
  Snapshot,
  FieldDiff,
  RecordConflict,
  PdfConflict,
  SyncConflict,
  ItemDiff,
  CollectionDiff,
  DiffResult,
  // Runs and results
  Resolution,
  SyncStage,
  ChangeCategory,
  SyncError,
  SyncCounts,
  SyncStatus,
  SyncResult,
  SyncConfig,
} from "./types.js";
