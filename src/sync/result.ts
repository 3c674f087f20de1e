/**
 * Result aggregation for a sync run.
 *
 * Collects change lines per category, non-fatal errors and counters while the
 * run progresses, then freezes them into a SyncResult.
 */

import type {
  ChangeCategory,
  Direction,
  Resolution,
  SyncCounts,
  SyncError,
  SyncResult,
  SyncStatus,
} from "../types.js";

/** Change lines shown per category before the list is truncated */
export const SUMMARY_PREVIEW_LIMIT = 5;

const CATEGORY_TITLES: Record<ChangeCategory, string> = {
  records: "Records",
  collections: "Collections",
  pdfs: "PDFs",
};

const CATEGORIES: readonly ChangeCategory[] = ["records", "collections", "pdfs"];

export type ChangeCounter = Extract<
  keyof SyncCounts,
  | "recordsAdded"
  | "recordsUpdated"
  | "collectionsAdded"
  | "collectionsUpdated"
  | "pdfsCopied"
  | "pdfsUpdated"
>;

export interface ChangeEntry {
  category: ChangeCategory;
  direction: Direction;
  /** Verb phrase, e.g. "added", "updated", "kept both" */
  action: string;
  /** Title, collection name or file name */
  label: string;
  counter: ChangeCounter;
}

export interface BuildOptions {
  status: SyncStatus;
  interrupted?: boolean;
  fatalError?: string;
}

/**
 * Format a change line: `local→remote: added "Title"`.
 */
export function formatChange(direction: Direction, action: string, label: string): string {
  return `${direction}: ${action} "${label}"`;
}

export function createEmptyCounts(): SyncCounts {
  return {
    recordsAdded: 0,
    recordsUpdated: 0,
    collectionsAdded: 0,
    collectionsUpdated: 0,
    pdfsCopied: 0,
    pdfsUpdated: 0,
    conflicts: 0,
    keptBoth: 0,
    unresolved: 0,
    errors: 0,
  };
}

export class ResultAggregator {
  private readonly changes: Record<ChangeCategory, string[]> = {
    records: [],
    collections: [],
    pdfs: [],
  };
  private readonly failures: SyncError[] = [];
  private readonly counts = createEmptyCounts();
  private readonly resolutions: Record<string, Resolution> = {};

  /**
   * Record one applied mutation and return its change line.
   */
  addChange(entry: ChangeEntry): string {
    const line = formatChange(entry.direction, entry.action, entry.label);
    this.changes[entry.category].push(line);
    this.counts[entry.counter]++;
    return line;
  }

  addError(error: SyncError): void {
    this.failures.push(error);
  }

  addErrors(errors: readonly SyncError[]): void {
    for (const error of errors) {
      this.addError(error);
    }
  }

  count(counter: "conflicts" | "keptBoth" | "unresolved", by = 1): void {
    this.counts[counter] += by;
  }

  setResolution(conflictId: string, resolution: Resolution): void {
    this.resolutions[conflictId] = resolution;
  }

  /** Number of change lines recorded so far */
  get changeCount(): number {
    return CATEGORIES.reduce((total, category) => total + this.changes[category].length, 0);
  }

  /**
   * Freeze the collected state into an immutable result.
   */
  build(options: BuildOptions): SyncResult {
    const detailedChanges = Object.freeze({
      records: Object.freeze([...this.changes.records]),
      collections: Object.freeze([...this.changes.collections]),
      pdfs: Object.freeze([...this.changes.pdfs]),
    });
    const failures = Object.freeze(this.failures.map((failure) => Object.freeze({ ...failure })));
    const errors = Object.freeze(failures.map((failure) => failure.message));
    const counts = Object.freeze({ ...this.counts, errors: errors.length });
    const resolutions = Object.freeze({ ...this.resolutions });
    const interrupted = options.interrupted ?? false;

    const summaryInput: SummaryInput = {
      status: options.status,
      detailedChanges,
      errors,
      interrupted,
      fatalError: options.fatalError,
    };

    const result: SyncResult = {
      status: options.status,
      errors,
      failures,
      detailedChanges,
      counts,
      resolutions,
      interrupted,
      ...(options.fatalError === undefined ? {} : { fatalError: options.fatalError }),
      getSummary: () => renderSummary(summaryInput),
    };

    return Object.freeze(result);
  }
}

interface SummaryInput {
  status: SyncStatus;
  detailedChanges: Readonly<Record<ChangeCategory, readonly string[]>>;
  errors: readonly string[];
  interrupted: boolean;
  fatalError?: string;
}

function renderSummary(input: SummaryInput): string {
  const totalChanges = CATEGORIES.reduce(
    (total, category) => total + input.detailedChanges[category].length,
    0
  );
  const errorCount = input.errors.length;

  if (input.status === "completed" && totalChanges === 0 && errorCount === 0) {
    return "No changes to sync - local and remote are already in sync";
  }

  const lines: string[] = [headline(input, errorCount)];

  for (const category of CATEGORIES) {
    const changes = input.detailedChanges[category];
    if (changes.length === 0) continue;

    lines.push("", `${CATEGORY_TITLES[category]} (${changes.length}):`);
    for (const change of changes.slice(0, SUMMARY_PREVIEW_LIMIT)) {
      lines.push(`  - ${change}`);
    }
    if (changes.length > SUMMARY_PREVIEW_LIMIT) {
      lines.push(`  … and ${changes.length - SUMMARY_PREVIEW_LIMIT} more`);
    }
  }

  if (errorCount > 0) {
    lines.push("", `Errors (${errorCount}):`);
    for (const error of input.errors) {
      lines.push(`  - ${error}`);
    }
  }

  return lines.join("\n");
}

function headline(input: SummaryInput, errorCount: number): string {
  const errorSuffix = errorCount > 0 ? ` - ${pluralize(errorCount, "error")}` : "";

  switch (input.status) {
    case "failed":
      return `Sync failed: ${input.fatalError ?? "unknown error"}${errorSuffix}`;
    case "cancelled":
      return `Sync cancelled - no changes were applied${errorSuffix}`;
    case "completed":
      return input.interrupted
        ? `Sync interrupted - remaining items were skipped${errorSuffix}`
        : `Sync completed${errorSuffix}`;
  }
}

function pluralize(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? "" : "s"}`;
}
