/**
 * YAML-backed record repository.
 *
 * Each replica keeps its records and collections in a single `library.yaml`.
 * Every mutation is a read-modify-write of that file, written atomically
 * (temp file then rename), so a failed write leaves the previous version
 * intact.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { parse, stringify } from "yaml";
import type {
  CollectionInput,
  LibraryCollection,
  LibraryRecord,
  NewLibraryRecord,
  RecordRepository,
} from "../types.js";
import { LibraryFormatError } from "../errors.js";
import { createEmptyLibrary, LibraryFileSchema, type LibraryFile } from "./schema.js";

export interface YamlRecordStoreOptions {
  /** Clock used for `addedDate` / `modifiedDate` (default: `() => new Date()`) */
  now?: () => Date;
}

export class YamlRecordStore implements RecordRepository {
  private readonly now: () => Date;

  constructor(
    public readonly filePath: string,
    options: YamlRecordStoreOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async exists(): Promise<boolean> {
    try {
      await fs.access(this.filePath);
      return true;
    } catch {
      return false;
    }
  }

  async listAll(): Promise<LibraryRecord[]> {
    const library = await this.load();
    return library.records;
  }

  async create(record: NewLibraryRecord): Promise<LibraryRecord> {
    const library = await this.load();
    const timestamp = this.now().toISOString();
    const created: LibraryRecord = {
      ...record,
      id: library.nextId,
      addedDate: timestamp,
      modifiedDate: timestamp,
    };
    library.nextId += 1;
    library.records.push(created);
    await this.save(library);
    return created;
  }

  async upsert(record: LibraryRecord): Promise<LibraryRecord> {
    const library = await this.load();
    const updated: LibraryRecord = { ...record, modifiedDate: this.now().toISOString() };
    const index = library.records.findIndex((r) => r.id === record.id);

    if (index === -1) {
      library.records.push(updated);
      library.nextId = Math.max(library.nextId, record.id + 1);
    } else {
      library.records[index] = updated;
    }

    await this.save(library);
    return updated;
  }

  async listCollections(): Promise<LibraryCollection[]> {
    const library = await this.load();
    return library.collections;
  }

  async saveCollection(collection: CollectionInput): Promise<LibraryCollection> {
    const library = await this.load();
    const timestamp = this.now().toISOString();
    const index = library.collections.findIndex((c) => c.name === collection.name);

    if (index === -1) {
      const created: LibraryCollection = {
        id: library.nextId,
        name: collection.name,
        description: collection.description ?? null,
        createdAt: timestamp,
        lastModified: timestamp,
        paperIds: [...collection.paperIds],
      };
      library.nextId += 1;
      library.collections.push(created);
      await this.save(library);
      return created;
    }

    const existing = library.collections[index];
    const updated: LibraryCollection = {
      ...existing,
      description: collection.description ?? null,
      lastModified: timestamp,
      paperIds: [...collection.paperIds],
    };
    library.collections[index] = updated;
    await this.save(library);
    return updated;
  }

  /**
   * Load and validate the library file.
   *
   * A missing file reads as an empty library; nothing is written until the
   * first mutation.
   *
   * @throws LibraryFormatError if the file is not valid YAML or fails validation
   */
  private async load(): Promise<LibraryFile> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, "utf-8");
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === "ENOENT") {
        return createEmptyLibrary();
      }
      throw error;
    }

    let raw: unknown;
    try {
      raw = parse(content);
    } catch (error) {
      throw new LibraryFormatError(
        `Library file ${this.filePath} is not valid YAML: ${error instanceof Error ? error.message : String(error)}`,
        this.filePath
      );
    }

    // An empty file parses to null
    if (raw === null || raw === undefined) {
      return createEmptyLibrary();
    }

    const parsed = LibraryFileSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue ? `${issue.path.join(".") || "<root>"}: ${issue.message}` : "unknown issue";
      throw new LibraryFormatError(
        `Library file ${this.filePath} has invalid structure (${where})`,
        this.filePath
      );
    }

    return parsed.data;
  }

  private async save(library: LibraryFile): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });

    const tempPath = `${this.filePath}.tmp`;
    await fs.writeFile(tempPath, stringify(library), "utf-8");
    await fs.rename(tempPath, this.filePath);
  }
}
