/**
 * Stable, replica-independent identity keys.
 *
 * Replica-local record ids are assigned independently on each side, so they
 * can never identify the same paper across replicas. Keys are derived from
 * content instead:
 *
 * 1. An explicitly persisted `syncKey` (written by the merge applier, and the
 *    only way a keep-both copy keeps its disambiguated key)
 * 2. `doi:<doi>`
 * 3. `preprint:<id>`
 * 4. `title:<hash of normalized title, first author and year>`
 */

import * as crypto from "node:crypto";
import type { LibraryRecord } from "../types.js";

type KeySource = Pick<LibraryRecord, "title" | "authors"> &
  Partial<Pick<LibraryRecord, "syncKey" | "doi" | "preprintId" | "year">>;

/**
 * Derive the sync key for a stored record.
 *
 * @example
 * ```ts
 * deriveRecordKey({ title: "X", authors: [], doi: "https://doi.org/10.1/X" });
 * // "doi:10.1/x"
 * deriveRecordKey({ title: "X", authors: [], preprintId: "arXiv  2505.15134" });
 * // "preprint:arxiv 2505.15134"
 * ```
 */
export function deriveRecordKey(record: KeySource): string {
  if (record.syncKey) {
    return record.syncKey;
  }

  const doi = normalizeDoi(record.doi);
  if (doi) {
    return `doi:${doi}`;
  }

  const preprint = normalizeText(record.preprintId);
  if (preprint) {
    return `preprint:${preprint}`;
  }

  const firstAuthor = record.authors[0] ?? "";
  const material = [
    normalizeText(record.title),
    normalizeText(firstAuthor),
    record.year === null || record.year === undefined ? "" : String(record.year),
  ].join("|");
  const digest = crypto.createHash("sha256").update(material, "utf-8").digest("hex");
  return `title:${digest.slice(0, 16)}`;
}

/**
 * Lower-case a DOI and strip resolver prefixes.
 */
export function normalizeDoi(doi: string | null | undefined): string {
  if (!doi) return "";
  return doi
    .trim()
    .toLowerCase()
    .replace(/^https?:\/\/(dx\.)?doi\.org\//, "")
    .replace(/^doi:\s*/, "");
}

/**
 * Lower-case, strip accents, collapse whitespace.
 */
export function normalizeText(value: string | null | undefined): string {
  if (!value) return "";
  return value
    .normalize("NFD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/\s+/g, " ")
    .trim();
}

/**
 * Short hex tag used to disambiguate keep-both copies.
 *
 * @param hash - A "sha256:<hex>" string
 */
export function shortHash(hash: string): string {
  return hash.replace(/^sha256:/, "").slice(0, 8);
}
