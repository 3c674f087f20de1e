/**
 * Fixture builders for library replicas, snapshots and conflicts.
 *
 * Replica fixtures are written straight to disk (bypassing the record store)
 * so tests control ids and timestamps exactly.
 */

import * as crypto from "node:crypto";
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { parse, stringify } from "yaml";
import type {
  CollectionView,
  LibraryCollection,
  LibraryRecord,
  PdfView,
  RecordConflict,
  RecordView,
  ReplicaSide,
  Snapshot,
} from "../src/types.js";
import { LIBRARY_FILE, PDF_DIR } from "../src/store/layout.js";
import { LibraryFileSchema, type LibraryFile } from "../src/store/schema.js";
import { diffRecordViews, toRecordView } from "../src/sync/record-view.js";

/**
 * "sha256:<hex>" of text content, as the PDF scanner reports it for a file
 * holding that text.
 */
export function computeContentHash(content: string): string {
  return `sha256:${crypto.createHash("sha256").update(content, "utf-8").digest("hex")}`;
}

export const TEST_NOW = new Date("2024-05-01T12:00:00.000Z");

/**
 * Creates a stored record with sensible defaults.
 */
export function makeRecord(overrides: Partial<LibraryRecord> = {}): LibraryRecord {
  return {
    id: 1,
    title: "Untitled",
    authors: [],
    tags: [],
    addedDate: TEST_NOW.toISOString(),
    modifiedDate: TEST_NOW.toISOString(),
    ...overrides,
  };
}

export function makeCollection(overrides: Partial<LibraryCollection> = {}): LibraryCollection {
  return {
    id: 100,
    name: "Reading",
    description: null,
    createdAt: TEST_NOW.toISOString(),
    lastModified: TEST_NOW.toISOString(),
    paperIds: [],
    ...overrides,
  };
}

export interface ReplicaFixture {
  records?: LibraryRecord[];
  collections?: LibraryCollection[];
  /** PDF file name → file content */
  pdfs?: Record<string, string>;
}

/**
 * Writes `library.yaml` and the given PDFs under a replica root.
 */
export async function writeReplica(root: string, fixture: ReplicaFixture = {}): Promise<void> {
  const records = fixture.records ?? [];
  const collections = fixture.collections ?? [];
  const ids = [...records.map((r) => r.id), ...collections.map((c) => c.id)];
  const library: LibraryFile = {
    version: 1,
    nextId: Math.max(0, ...ids) + 1,
    records,
    collections,
  };

  await fs.mkdir(path.join(root, PDF_DIR), { recursive: true });
  await fs.writeFile(path.join(root, LIBRARY_FILE), stringify(library), "utf-8");
  for (const [name, content] of Object.entries(fixture.pdfs ?? {})) {
    await fs.writeFile(path.join(root, PDF_DIR, name), content, "utf-8");
  }
}

export async function readLibrary(root: string): Promise<LibraryFile> {
  const content = await fs.readFile(path.join(root, LIBRARY_FILE), "utf-8");
  return LibraryFileSchema.parse(parse(content));
}

export async function readPdf(root: string, name: string): Promise<string> {
  return fs.readFile(path.join(root, PDF_DIR, name), "utf-8");
}

export async function listPdfNames(root: string): Promise<string[]> {
  const entries = await fs.readdir(path.join(root, PDF_DIR));
  return entries.filter((name) => name.endsWith(".pdf")).sort();
}

export async function makeTempDir(prefix: string): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

// =============================================================================
// In-memory snapshots
// =============================================================================

export function makeView(overrides: Partial<LibraryRecord> = {}): RecordView {
  return toRecordView(makeRecord(overrides));
}

export function makePdfView(key: string, content: string, overrides: Partial<PdfView> = {}): PdfView {
  return {
    key,
    path: path.join(os.tmpdir(), key),
    size: Buffer.byteLength(content),
    modifiedTime: TEST_NOW.toISOString(),
    contentHash: computeContentHash(content),
    ...overrides,
  };
}

export interface SnapshotFixture {
  records?: RecordView[];
  pdfs?: PdfView[];
  collections?: CollectionView[];
  unreadable?: string[];
}

export function makeSnapshot(side: ReplicaSide, fixture: SnapshotFixture = {}): Snapshot {
  return {
    side,
    root: path.join(os.tmpdir(), side),
    records: new Map((fixture.records ?? []).map((view) => [view.key, view])),
    pdfs: new Map((fixture.pdfs ?? []).map((pdf) => [pdf.key, pdf])),
    collections: new Map((fixture.collections ?? []).map((c) => [c.name, c])),
    unreadable: new Set(fixture.unreadable ?? []),
    errors: [],
  };
}

/**
 * A record conflict whose sides differ only in title.
 */
export function makeRecordConflict(doi: string, localTitle: string, remoteTitle: string): RecordConflict {
  const local = makeView({ doi, title: localTitle });
  const remote = makeView({ doi, title: remoteTitle });
  return {
    id: `record:${local.key}`,
    itemKey: local.key,
    kind: "record",
    local,
    remote,
    fieldDiffs: diffRecordViews(local, remote),
  };
}
