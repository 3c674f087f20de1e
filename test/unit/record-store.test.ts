/**
 * Unit tests for the YAML record store.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { YamlRecordStore } from "../../src/store/record-store.js";
import { LibraryFormatError } from "../../src/errors.js";
import { TEST_NOW, makeRecord, makeTempDir, readLibrary, removeTempDir, writeReplica } from "../helpers.js";

describe("YamlRecordStore", () => {
  let tempDir: string;
  let filePath: string;
  let store: YamlRecordStore;

  beforeEach(async () => {
    tempDir = await makeTempDir("record-store-test-");
    filePath = path.join(tempDir, "library.yaml");
    store = new YamlRecordStore(filePath, { now: () => TEST_NOW });
  });

  afterEach(async () => {
    await removeTempDir(tempDir);
  });

  it("reads a missing file as an empty library without creating it", async () => {
    expect(await store.exists()).toBe(false);
    expect(await store.listAll()).toEqual([]);
    expect(await store.listCollections()).toEqual([]);
    expect(await store.exists()).toBe(false);
  });

  it("assigns sequential ids and timestamps on create", async () => {
    const first = await store.create({ title: "First", authors: ["A"], tags: [] });
    const second = await store.create({ title: "Second", authors: [], tags: ["x"] });

    expect(first.id).toBe(1);
    expect(second.id).toBe(2);
    expect(first.addedDate).toBe(TEST_NOW.toISOString());
    expect(first.modifiedDate).toBe(TEST_NOW.toISOString());
    expect((await store.listAll()).map((r) => r.title)).toEqual(["First", "Second"]);
  });

  it("replaces the record with the same id on upsert", async () => {
    await writeReplica(tempDir, { records: [makeRecord({ id: 7, title: "Before" })] });
    const later = new Date("2024-06-01T00:00:00.000Z");
    store = new YamlRecordStore(filePath, { now: () => later });

    const [record] = await store.listAll();
    const updated = await store.upsert({ ...record, title: "After" });

    expect(updated.modifiedDate).toBe(later.toISOString());
    const library = await readLibrary(tempDir);
    expect(library.records).toHaveLength(1);
    expect(library.records[0].title).toBe("After");
    expect(library.records[0].addedDate).toBe(TEST_NOW.toISOString());
  });

  it("creates then updates collections by name, sharing the id sequence", async () => {
    await store.create({ title: "One", authors: [], tags: [] });
    await store.create({ title: "Two", authors: [], tags: [] });

    const created = await store.saveCollection({ name: "ML", description: "Models", paperIds: [1] });
    const updated = await store.saveCollection({ name: "ML", description: null, paperIds: [1, 2] });

    expect(created.id).toBe(3);
    expect(updated.id).toBe(3);
    expect(updated.description).toBeNull();
    expect(updated.paperIds).toEqual([1, 2]);
    expect(await store.listCollections()).toHaveLength(1);
  });

  it("leaves no temporary file behind after a write", async () => {
    await store.create({ title: "One", authors: [], tags: [] });

    expect(await fs.readdir(tempDir)).toEqual(["library.yaml"]);
  });

  it("reads an empty file as an empty library", async () => {
    await fs.writeFile(filePath, "", "utf-8");

    expect(await store.listAll()).toEqual([]);
  });

  it("rejects invalid YAML with LibraryFormatError", async () => {
    await fs.writeFile(filePath, "records: [\n", "utf-8");

    await expect(store.listAll()).rejects.toBeInstanceOf(LibraryFormatError);
  });

  it("rejects an unsupported schema version", async () => {
    await fs.writeFile(filePath, "version: 2\nrecords: []\n", "utf-8");

    await expect(store.listAll()).rejects.toThrow(/invalid structure \(version:/);
  });
});
