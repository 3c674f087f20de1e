/**
 * Versioned comparable view of a library record.
 *
 * Only the fields listed in RECORD_VIEW_FIELDS take part in diffing, so new
 * columns added to the store never cause spurious conflicts until they are
 * added here (together with a RECORD_VIEW_VERSION bump).
 */

import * as crypto from "node:crypto";
import type { FieldDiff, FieldValue, LibraryRecord, NewLibraryRecord, RecordView } from "../types.js";
import { deriveRecordKey } from "./identity.js";

/**
 * Increment when RECORD_VIEW_FIELDS changes; invalidates stored fingerprints.
 */
export const RECORD_VIEW_VERSION = 1;

export const RECORD_VIEW_FIELDS = [
  "title",
  "authors",
  "abstract",
  "venueFull",
  "venueAcronym",
  "year",
  "volume",
  "issue",
  "pages",
  "paperType",
  "doi",
  "preprintId",
  "category",
  "url",
  "pdfFile",
  "notes",
  "tags",
] as const satisfies readonly (keyof RecordView)[];

export type RecordViewField = (typeof RECORD_VIEW_FIELDS)[number];

/**
 * Build the comparable view of a stored record.
 *
 * Empty strings become null, tags are de-duplicated and sorted, and the PDF
 * path is reduced to its file name so absolute and relative paths to the
 * same file compare equal.
 */
export function toRecordView(record: LibraryRecord): RecordView {
  return {
    key: deriveRecordKey(record),
    title: record.title,
    authors: [...record.authors],
    abstract: text(record.abstract),
    venueFull: text(record.venueFull),
    venueAcronym: text(record.venueAcronym),
    year: record.year ?? null,
    volume: text(record.volume),
    issue: text(record.issue),
    pages: text(record.pages),
    paperType: text(record.paperType),
    doi: text(record.doi),
    preprintId: text(record.preprintId),
    category: text(record.category),
    url: text(record.url),
    pdfFile: pdfFileName(record.pdfPath),
    notes: text(record.notes),
    tags: [...new Set(record.tags)].sort(),
  };
}

/**
 * Convert a view back into storable record fields under the given key.
 */
export function recordFromView(view: RecordView, key: string = view.key): NewLibraryRecord {
  return {
    syncKey: key,
    title: view.title,
    authors: [...view.authors],
    abstract: view.abstract,
    venueFull: view.venueFull,
    venueAcronym: view.venueAcronym,
    year: view.year,
    volume: view.volume,
    issue: view.issue,
    pages: view.pages,
    paperType: view.paperType,
    doi: view.doi,
    preprintId: view.preprintId,
    category: view.category,
    url: view.url,
    pdfPath: view.pdfFile,
    notes: view.notes,
    tags: [...view.tags],
  };
}

/**
 * Content fingerprint of a view ("sha256:<hex>"). The key is not part of it.
 */
export function recordFingerprint(view: RecordView): string {
  const material = JSON.stringify([
    RECORD_VIEW_VERSION,
    ...RECORD_VIEW_FIELDS.map((field) => view[field]),
  ]);
  const hash = crypto.createHash("sha256").update(material, "utf-8").digest("hex");
  return `sha256:${hash}`;
}

/**
 * Compare two views field by field and return only the differing fields.
 */
export function diffRecordViews(local: RecordView, remote: RecordView): Record<string, FieldDiff> {
  const diffs: Record<string, FieldDiff> = {};
  for (const field of RECORD_VIEW_FIELDS) {
    const localValue: FieldValue = local[field];
    const remoteValue: FieldValue = remote[field];
    if (!fieldValuesEqual(localValue, remoteValue)) {
      diffs[field] = { local: localValue, remote: remoteValue };
    }
  }
  return diffs;
}

export function fieldValuesEqual(a: FieldValue, b: FieldValue): boolean {
  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b)) return false;
    return a.length === b.length && a.every((value, i) => value === b[i]);
  }
  return a === b;
}

function text(value: string | null | undefined): string | null {
  return value === undefined || value === null || value === "" ? null : value;
}

function pdfFileName(pdfPath: string | null | undefined): string | null {
  if (!pdfPath) return null;
  const segments = pdfPath.split(/[\\/]/);
  return segments[segments.length - 1] || null;
}
