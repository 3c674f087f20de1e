/**
 * Unit tests for the diff engine.
 */

import { describe, it, expect } from "vitest";
import { diffCollections, diffSnapshots } from "../../src/sync/diff.js";
import { recordFingerprint } from "../../src/sync/record-view.js";
import { createEmptyState, type SyncStateFile } from "../../src/sync/state.js";
import { makePdfView, makeSnapshot, makeView } from "../helpers.js";

function baselineWith(entries: Record<string, { kind: "record" | "pdf"; fingerprint: string }>): SyncStateFile {
  return { ...createEmptyState("/remote"), lastSyncTime: "2024-01-01T00:00:00.000Z", items: entries };
}

describe("diff engine", () => {
  describe("records", () => {
    it("splits keys into local-only, remote-only and identical", () => {
      const shared = makeView({ doi: "10.1/s", title: "Shared" });
      const local = makeSnapshot("local", { records: [shared, makeView({ doi: "10.1/l" })] });
      const remote = makeSnapshot("remote", { records: [shared, makeView({ doi: "10.1/r" })] });

      const { records, conflicts } = diffSnapshots(local, remote);

      expect(records.localOnly).toEqual(["doi:10.1/l"]);
      expect(records.remoteOnly).toEqual(["doi:10.1/r"]);
      expect(records.identical).toEqual(["doi:10.1/s"]);
      expect(conflicts).toEqual([]);
    });

    it("reports a conflict carrying only the differing fields when there is no baseline", () => {
      const localView = makeView({ doi: "10.1/x", title: "Old", year: 2020 });
      const remoteView = makeView({ doi: "10.1/x", title: "New", year: 2020 });

      const result = diffSnapshots(
        makeSnapshot("local", { records: [localView] }),
        makeSnapshot("remote", { records: [remoteView] })
      );

      expect(result.conflicts).toEqual([
        {
          id: "record:doi:10.1/x",
          itemKey: "doi:10.1/x",
          kind: "record",
          local: localView,
          remote: remoteView,
          fieldDiffs: { title: { local: "Old", remote: "New" } },
        },
      ]);
    });

    it("classifies a remote-only edit as remote-ahead", () => {
      const before = makeView({ doi: "10.1/x", title: "Before" });
      const after = makeView({ doi: "10.1/x", title: "After" });
      const baseline = baselineWith({
        "record:doi:10.1/x": { kind: "record", fingerprint: recordFingerprint(before) },
      });

      const { records, conflicts } = diffSnapshots(
        makeSnapshot("local", { records: [before] }),
        makeSnapshot("remote", { records: [after] }),
        baseline
      );

      expect(records.remoteAhead).toEqual(["doi:10.1/x"]);
      expect(records.localAhead).toEqual([]);
      expect(conflicts).toEqual([]);
    });

    it("classifies a local-only edit as local-ahead", () => {
      const before = makeView({ doi: "10.1/x", title: "Before" });
      const after = makeView({ doi: "10.1/x", title: "After" });
      const baseline = baselineWith({
        "record:doi:10.1/x": { kind: "record", fingerprint: recordFingerprint(before) },
      });

      const { records } = diffSnapshots(
        makeSnapshot("local", { records: [after] }),
        makeSnapshot("remote", { records: [before] }),
        baseline
      );

      expect(records.localAhead).toEqual(["doi:10.1/x"]);
    });

    it("reports a conflict when both sides moved away from the baseline", () => {
      const baseline = baselineWith({
        "record:doi:10.1/x": {
          kind: "record",
          fingerprint: recordFingerprint(makeView({ doi: "10.1/x", title: "Base" })),
        },
      });

      const { records, conflicts } = diffSnapshots(
        makeSnapshot("local", { records: [makeView({ doi: "10.1/x", title: "Mine" })] }),
        makeSnapshot("remote", { records: [makeView({ doi: "10.1/x", title: "Theirs" })] }),
        baseline
      );

      expect(records.conflicts).toHaveLength(1);
      expect(conflicts.map((c) => c.id)).toEqual(["record:doi:10.1/x"]);
    });
  });

  describe("pdfs", () => {
    it("compares PDFs by content hash only", () => {
      const local = makeSnapshot("local", {
        pdfs: [makePdfView("same.pdf", "bytes", { modifiedTime: "2020-01-01T00:00:00.000Z" })],
      });
      const remote = makeSnapshot("remote", {
        pdfs: [makePdfView("same.pdf", "bytes", { modifiedTime: "2024-01-01T00:00:00.000Z" })],
      });

      expect(diffSnapshots(local, remote).pdfs.identical).toEqual(["same.pdf"]);
    });

    it("reports the content hash and size in a PDF conflict", () => {
      const localPdf = makePdfView("p.pdf", "short");
      const remotePdf = makePdfView("p.pdf", "much longer");

      const { conflicts } = diffSnapshots(
        makeSnapshot("local", { pdfs: [localPdf] }),
        makeSnapshot("remote", { pdfs: [remotePdf] })
      );

      expect(conflicts).toHaveLength(1);
      expect(conflicts[0].id).toBe("pdf:p.pdf");
      expect(conflicts[0].fieldDiffs).toEqual({
        contentHash: { local: localPdf.contentHash, remote: remotePdf.contentHash },
        size: { local: 5, remote: 11 },
      });
    });

    it("leaves unreadable items out of every category", () => {
      const local = makeSnapshot("local", { unreadable: ["pdf:broken.pdf"] });
      const remote = makeSnapshot("remote", { pdfs: [makePdfView("broken.pdf", "remote copy")] });

      const { pdfs } = diffSnapshots(local, remote);

      expect(pdfs.remoteOnly).toEqual([]);
      expect(pdfs.conflicts).toEqual([]);
    });
  });

  it("produces independent record and PDF conflicts for the same paper", () => {
    const local = makeSnapshot("local", {
      records: [makeView({ doi: "10.1/x", title: "A", pdfPath: "x.pdf" })],
      pdfs: [makePdfView("x.pdf", "one")],
    });
    const remote = makeSnapshot("remote", {
      records: [makeView({ doi: "10.1/x", title: "B", pdfPath: "x.pdf" })],
      pdfs: [makePdfView("x.pdf", "two")],
    });

    const { conflicts } = diffSnapshots(local, remote);

    expect(conflicts.map((c) => [c.kind, c.id])).toEqual([
      ["record", "record:doi:10.1/x"],
      ["pdf", "pdf:x.pdf"],
    ]);
  });

  describe("diffCollections", () => {
    it("classifies collections by name", () => {
      const result = diffCollections(
        new Map([
          ["Same", { name: "Same", description: null, memberKeys: ["a"] }],
          ["Changed", { name: "Changed", description: null, memberKeys: ["a"] }],
          ["Mine", { name: "Mine", description: null, memberKeys: [] }],
        ]),
        new Map([
          ["Same", { name: "Same", description: null, memberKeys: ["a"] }],
          ["Changed", { name: "Changed", description: null, memberKeys: ["a", "b"] }],
          ["Theirs", { name: "Theirs", description: "d", memberKeys: [] }],
        ])
      );

      expect(result).toEqual({
        localOnly: ["Mine"],
        remoteOnly: ["Theirs"],
        divergent: ["Changed"],
        identical: ["Same"],
      });
    });
  });
});
