/**
 * Unit tests for the versioned record view.
 */

import { describe, it, expect } from "vitest";
import {
  diffRecordViews,
  fieldValuesEqual,
  recordFingerprint,
  recordFromView,
  toRecordView,
} from "../../src/sync/record-view.js";
import { makeRecord, makeView } from "../helpers.js";

describe("record view", () => {
  describe("toRecordView", () => {
    it("maps empty text to null and sorts unique tags", () => {
      const view = toRecordView(
        makeRecord({ doi: "10.1/x", abstract: "", notes: null, tags: ["nlp", "cv", "nlp"] })
      );

      expect(view.key).toBe("doi:10.1/x");
      expect(view.abstract).toBeNull();
      expect(view.notes).toBeNull();
      expect(view.year).toBeNull();
      expect(view.tags).toEqual(["cv", "nlp"]);
    });

    it("reduces the PDF path to its file name", () => {
      expect(toRecordView(makeRecord({ pdfPath: "/home/me/papers/pdfs/a.pdf" })).pdfFile).toBe("a.pdf");
      expect(toRecordView(makeRecord({ pdfPath: "pdfs\\b.pdf" })).pdfFile).toBe("b.pdf");
      expect(toRecordView(makeRecord({ pdfPath: "" })).pdfFile).toBeNull();
    });
  });

  describe("recordFingerprint", () => {
    it("ignores replica-local ids and timestamps", () => {
      const a = makeView({ id: 1, doi: "10.1/x", title: "Same" });
      const b = makeView({
        id: 42,
        doi: "10.1/x",
        title: "Same",
        addedDate: "2020-01-01T00:00:00.000Z",
        modifiedDate: "2023-01-01T00:00:00.000Z",
      });

      expect(recordFingerprint(a)).toBe(recordFingerprint(b));
    });

    it("changes when a compared field changes", () => {
      const a = makeView({ doi: "10.1/x", notes: "first" });
      const b = makeView({ doi: "10.1/x", notes: "second" });

      expect(recordFingerprint(a)).not.toBe(recordFingerprint(b));
    });

    it("treats tag order as irrelevant", () => {
      const a = makeView({ tags: ["b", "a"] });
      const b = makeView({ tags: ["a", "b"] });

      expect(recordFingerprint(a)).toBe(recordFingerprint(b));
    });

    it("has the sha256 prefix", () => {
      expect(recordFingerprint(makeView())).toMatch(/^sha256:[0-9a-f]{64}$/);
    });
  });

  describe("diffRecordViews", () => {
    it("returns only the differing fields", () => {
      const local = makeView({ doi: "10.1/x", title: "Old", tags: ["a"], year: 2020 });
      const remote = makeView({ doi: "10.1/x", title: "New", tags: ["a", "b"], year: 2020 });

      expect(diffRecordViews(local, remote)).toEqual({
        title: { local: "Old", remote: "New" },
        tags: { local: ["a"], remote: ["a", "b"] },
      });
    });

    it("returns an empty object for equal views", () => {
      expect(diffRecordViews(makeView({ title: "X" }), makeView({ title: "X" }))).toEqual({});
    });
  });

  describe("recordFromView", () => {
    it("persists the given key and the PDF file name", () => {
      const view = makeView({ doi: "10.1/x", title: "Kept", pdfPath: "/abs/k.pdf" });

      const record = recordFromView(view, "doi:10.1/x~12345678");

      expect(record.syncKey).toBe("doi:10.1/x~12345678");
      expect(record.title).toBe("Kept");
      expect(record.pdfPath).toBe("k.pdf");
      expect(record.doi).toBe("10.1/x");
    });

    it("defaults to the view's own key", () => {
      const view = makeView({ doi: "10.1/x" });

      expect(recordFromView(view).syncKey).toBe("doi:10.1/x");
    });
  });

  describe("fieldValuesEqual", () => {
    it("compares arrays element by element", () => {
      expect(fieldValuesEqual(["a", "b"], ["a", "b"])).toBe(true);
      expect(fieldValuesEqual(["a", "b"], ["b", "a"])).toBe(false);
      expect(fieldValuesEqual(["a"], "a")).toBe(false);
    });

    it("compares scalars strictly", () => {
      expect(fieldValuesEqual(2020, 2020)).toBe(true);
      expect(fieldValuesEqual(null, "")).toBe(false);
    });
  });
});
