import { describe, it, expect } from "vitest";
import { ResolutionSession, type ConflictPosition } from "../../src/sync/resolution-session.js";
import { resolveConflicts } from "../../src/sync/resolution.js";
import { makeRecordConflict } from "../helpers.js";

const conflicts = [
  makeRecordConflict("10.1/a", "A local", "A remote"),
  makeRecordConflict("10.1/b", "B local", "B remote"),
];

describe("ResolutionSession", () => {
  it("prompts one conflict at a time with its review position", async () => {
    const prompts: Array<[string, ConflictPosition]> = [];
    const session = new ResolutionSession((conflict, position) => {
      prompts.push([conflict.id, position]);
      session.resolveCurrent(prompts.length === 1 ? "use-local" : "use-remote");
    });

    const outcome = await resolveConflicts(conflicts, {
      resolver: session.resolver,
      autoMode: false,
      quiet: true,
    });

    expect(prompts).toEqual([
      ["record:doi:10.1/a", { index: 0, total: 2 }],
      ["record:doi:10.1/b", { index: 1, total: 2 }],
    ]);
    expect(Object.fromEntries(outcome.resolutions)).toEqual({
      "record:doi:10.1/a": "use-local",
      "record:doi:10.1/b": "use-remote",
    });
    expect(session.current).toBeUndefined();
  });

  it("answers every remaining conflict at once", async () => {
    let promptCount = 0;
    const session = new ResolutionSession(() => {
      promptCount++;
      session.resolveAllRemaining("keep-both");
    });

    const outcome = await resolveConflicts(conflicts, {
      resolver: session.resolver,
      autoMode: false,
      quiet: true,
    });

    expect(promptCount).toBe(1);
    expect([...outcome.resolutions.values()]).toEqual(["keep-both", "keep-both"]);
    expect(session.position).toEqual({ index: 2, total: 2 });
  });

  it("cancels the review", async () => {
    const session = new ResolutionSession(() => session.cancel());

    const outcome = await resolveConflicts(conflicts, {
      resolver: session.resolver,
      autoMode: false,
      quiet: true,
    });

    expect(outcome.status).toBe("cancelled");
    expect(session.isCancelled).toBe(true);
    expect(await session.resolver(conflicts)).toBeNull();
  });

  it("exposes the conflict awaiting a decision", async () => {
    const session = new ResolutionSession();

    const answer = session.resolver(conflicts);

    expect(session.current?.id).toBe("record:doi:10.1/a");
    session.resolveCurrent("use-remote");
    expect(await answer).toEqual({ "record:doi:10.1/a": "use-remote" });
  });

  it("refuses a decision when nothing is awaiting one", () => {
    const session = new ResolutionSession();

    expect(() => session.resolveCurrent("use-local")).toThrow("No conflict is awaiting a decision");
    expect(() => session.resolveAllRemaining("use-local")).toThrow(
      "No conflict is awaiting a decision"
    );
  });
});
