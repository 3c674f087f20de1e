/**
 * Unit tests for the resolution coordinator.
 */

import { describe, it, expect, vi } from "vitest";
import {
  createStrategyResolver,
  isResolution,
  resolveConflicts,
  type ConflictResolver,
} from "../../src/sync/resolution.js";
import type { SyncConflict } from "../../src/types.js";
import { makeRecordConflict } from "../helpers.js";

const first = makeRecordConflict("10.1/a", "A local", "A remote");
const second = makeRecordConflict("10.1/b", "B local", "B remote");
const conflicts: SyncConflict[] = [first, second];

describe("resolveConflicts", () => {
  it("keeps both versions in auto mode without calling the resolver", async () => {
    const resolver = vi.fn<Parameters<ConflictResolver>, ReturnType<ConflictResolver>>(() => ({}));

    const outcome = await resolveConflicts(conflicts, { resolver, autoMode: true, quiet: true });

    expect(resolver).not.toHaveBeenCalled();
    expect(outcome.status).toBe("resolved");
    expect(Object.fromEntries(outcome.resolutions)).toEqual({
      "record:doi:10.1/a": "keep-both",
      "record:doi:10.1/b": "keep-both",
    });
  });

  it("accepts a bulk decision map", async () => {
    const outcome = await resolveConflicts(conflicts, {
      resolver: createStrategyResolver("use-remote"),
      autoMode: false,
      quiet: true,
    });

    expect(outcome.unresolved).toEqual([]);
    expect(Object.fromEntries(outcome.resolutions)).toEqual({
      "record:doi:10.1/a": "use-remote",
      "record:doi:10.1/b": "use-remote",
    });
  });

  it("re-polls with the remaining conflicts after a partial decision", async () => {
    const resolver = vi.fn<Parameters<ConflictResolver>, ReturnType<ConflictResolver>>(
      async (pending) => ({ [pending[0].id]: "use-local" })
    );

    const outcome = await resolveConflicts(conflicts, { resolver, autoMode: false, quiet: true });

    expect(resolver).toHaveBeenCalledTimes(2);
    expect(resolver.mock.calls[0][0].map((c) => c.id)).toEqual([first.id, second.id]);
    expect(resolver.mock.calls[1][0].map((c) => c.id)).toEqual([second.id]);
    expect(outcome.resolutions.get(second.id)).toBe("use-local");
  });

  it("treats a null answer as cancellation", async () => {
    const outcome = await resolveConflicts(conflicts, {
      resolver: () => null,
      autoMode: false,
      quiet: true,
    });

    expect(outcome).toEqual({ status: "cancelled", resolutions: new Map(), unresolved: [] });
  });

  it("leaves unrecognized values unresolved instead of defaulting", async () => {
    const outcome = await resolveConflicts(conflicts, {
      resolver: () => ({ [first.id]: "local", [second.id]: "keep-both" }),
      autoMode: false,
      quiet: true,
    });

    expect(outcome.resolutions.has(first.id)).toBe(false);
    expect(outcome.resolutions.get(second.id)).toBe("keep-both");
    expect(outcome.unresolved).toEqual([
      { conflictId: first.id, reason: 'Unrecognized resolution "local"' },
    ]);
  });

  it("gives up after the resolver stalls for maxStalledPolls polls", async () => {
    const resolver = vi.fn<Parameters<ConflictResolver>, ReturnType<ConflictResolver>>(() => ({}));

    const outcome = await resolveConflicts([first], {
      resolver,
      autoMode: false,
      maxStalledPolls: 2,
      quiet: true,
    });

    expect(resolver).toHaveBeenCalledTimes(2);
    expect(outcome.status).toBe("resolved");
    expect(outcome.unresolved).toEqual([
      { conflictId: first.id, reason: "No resolution was provided" },
    ]);
  });

  it("leaves every conflict unresolved when no resolver is supplied", async () => {
    const outcome = await resolveConflicts(conflicts, { autoMode: false, quiet: true });

    expect(outcome.unresolved.map((u) => u.reason)).toEqual([
      "No resolver was supplied",
      "No resolver was supplied",
    ]);
  });

  it("leaves the remaining conflicts unresolved when the resolver throws", async () => {
    const outcome = await resolveConflicts(conflicts, {
      resolver: () => {
        throw new Error("ui crashed");
      },
      autoMode: false,
      quiet: true,
    });

    expect(outcome.status).toBe("resolved");
    expect(outcome.unresolved).toEqual([
      { conflictId: first.id, reason: "Resolver failed: ui crashed" },
      { conflictId: second.id, reason: "Resolver failed: ui crashed" },
    ]);
  });

  it("stops waiting as soon as the signal aborts", async () => {
    const controller = new AbortController();
    const resolver: ConflictResolver = () => {
      controller.abort();
      return new Promise<null>(() => {});
    };

    const outcome = await resolveConflicts(conflicts, {
      resolver,
      autoMode: false,
      signal: controller.signal,
      quiet: true,
    });

    expect(outcome.status).toBe("cancelled");
  });

  it("does not call the resolver when already cancelled", async () => {
    const controller = new AbortController();
    controller.abort();
    const resolver = vi.fn<Parameters<ConflictResolver>, ReturnType<ConflictResolver>>(() => ({}));

    const outcome = await resolveConflicts(conflicts, {
      resolver,
      autoMode: false,
      signal: controller.signal,
      quiet: true,
    });

    expect(outcome.status).toBe("cancelled");
    expect(resolver).not.toHaveBeenCalled();
  });

  it("resolves immediately when there are no conflicts", async () => {
    const outcome = await resolveConflicts([], { autoMode: false, quiet: true });

    expect(outcome).toEqual({ status: "resolved", resolutions: new Map(), unresolved: [] });
  });
});

describe("isResolution", () => {
  it("accepts only the three resolutions", () => {
    expect(isResolution("use-local")).toBe(true);
    expect(isResolution("use-remote")).toBe(true);
    expect(isResolution("keep-both")).toBe(true);
    expect(isResolution("remote")).toBe(false);
    expect(isResolution(undefined)).toBe(false);
  });
});
