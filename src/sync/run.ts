/**
 * Per-invocation run state.
 *
 * Enforces the stage order
 *   idle → preparing-remote → reading-snapshots → detecting-conflicts →
 *   [resolving-conflicts] → applying-records → applying-collections →
 *   applying-pdfs → finalizing → completed
 * with `cancelled` reachable only before applying-records and `failed`
 * reachable from any non-terminal stage.
 */

import type { SyncStage } from "../types.js";
import type { ProgressCounts, ProgressReporter } from "./progress.js";

const TRANSITIONS: Record<SyncStage, readonly SyncStage[]> = {
  idle: ["preparing-remote"],
  "preparing-remote": ["reading-snapshots"],
  "reading-snapshots": ["detecting-conflicts"],
  "detecting-conflicts": ["resolving-conflicts", "applying-records"],
  "resolving-conflicts": ["applying-records"],
  "applying-records": ["applying-collections"],
  "applying-collections": ["applying-pdfs"],
  "applying-pdfs": ["finalizing"],
  finalizing: ["completed"],
  completed: [],
  cancelled: [],
  failed: [],
};

const CANCELLABLE: ReadonlySet<SyncStage> = new Set([
  "idle",
  "preparing-remote",
  "reading-snapshots",
  "detecting-conflicts",
  "resolving-conflicts",
]);

const TERMINAL: ReadonlySet<SyncStage> = new Set(["completed", "cancelled", "failed"]);

export class SyncRun {
  private current: SyncStage = "idle";
  private readonly visited: SyncStage[] = ["idle"];

  constructor(private readonly progress?: ProgressReporter) {}

  get stage(): SyncStage {
    return this.current;
  }

  /** Stages entered so far, in order */
  get history(): readonly SyncStage[] {
    return [...this.visited];
  }

  get isTerminal(): boolean {
    return TERMINAL.has(this.current);
  }

  /** Whether cancellation can still end the run without writes */
  get canCancel(): boolean {
    return CANCELLABLE.has(this.current);
  }

  /**
   * Move to the next working stage.
   *
   * @throws Error if the transition skips or reorders a stage
   */
  advance(next: SyncStage, counts?: ProgressCounts): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new Error(`Illegal sync stage transition: ${this.current} → ${next}`);
    }
    this.enter(next, counts);
  }

  /**
   * @throws Error once merging has begun
   */
  cancel(): void {
    if (!this.canCancel) {
      throw new Error(`Cannot cancel a sync run in stage ${this.current}`);
    }
    this.enter("cancelled");
  }

  /**
   * @throws Error if the run already ended
   */
  fail(): void {
    if (this.isTerminal) {
      throw new Error(`Cannot fail a sync run that already ended (${this.current})`);
    }
    this.enter("failed");
  }

  /**
   * Report item progress within the current stage.
   */
  reportItems(counts: ProgressCounts): void {
    this.progress?.report(this.current, counts);
  }

  private enter(stage: SyncStage, counts?: ProgressCounts): void {
    this.current = stage;
    this.visited.push(stage);
    this.progress?.report(stage, counts);
  }
}
