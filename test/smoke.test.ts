import { describe, it, expect } from "vitest";

describe("smoke test", () => {
  it("types module exports exist", async () => {
    const types = await import("../src/types.js");
    expect(types).toBeDefined();
  });

  it("index exports all public API modules", async () => {
    const index = await import("../src/index.js");

    // Core sync functions
    expect(typeof index.syncLibraries).toBe("function");
    expect(typeof index.startSync).toBe("function");
    expect(typeof index.inspectReplicas).toBe("function");
    expect(typeof index.triggerAutoSync).toBe("function");

    // Conflict resolution
    expect(typeof index.resolveConflicts).toBe("function");
    expect(typeof index.ResolutionSession).toBe("function");
    expect(index.RESOLUTIONS).toEqual(["use-local", "use-remote", "keep-both"]);

    // Building blocks
    expect(typeof index.readSnapshot).toBe("function");
    expect(typeof index.diffSnapshots).toBe("function");
    expect(typeof index.YamlRecordStore).toBe("function");
    expect(index.SYNC_STAGES).toHaveLength(8);
  });
});
