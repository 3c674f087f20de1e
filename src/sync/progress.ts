/**
 * Progress reporting.
 *
 * The engine only announces stage transitions and item counts. Callers turn
 * them into a percentage with `stageIndex(stage) / SYNC_STAGES.length`.
 */

import type { SyncStage } from "../types.js";

/**
 * Working stages in execution order. `resolving-conflicts` is skipped when
 * there is nothing to resolve.
 */
export const SYNC_STAGES = [
  "preparing-remote",
  "reading-snapshots",
  "detecting-conflicts",
  "resolving-conflicts",
  "applying-records",
  "applying-collections",
  "applying-pdfs",
  "finalizing",
] as const satisfies readonly SyncStage[];

export interface ProgressCounts {
  /** Items processed so far in this stage */
  done: number;
  /** Items this stage will process */
  total: number;
}

export type ProgressSink = (stage: SyncStage, counts?: ProgressCounts) => void;

/**
 * Position of a stage in SYNC_STAGES (0-based). Terminal stages report
 * `SYNC_STAGES.length`, `idle` reports 0.
 */
export function stageIndex(stage: SyncStage): number {
  if (stage === "completed" || stage === "cancelled" || stage === "failed") {
    return SYNC_STAGES.length;
  }
  const index = SYNC_STAGES.findIndex((s) => s === stage);
  return index === -1 ? 0 : index;
}

/**
 * Fire-and-forget wrapper around an optional sink.
 *
 * A missing sink is a no-op. A sink that throws is logged and ignored; it
 * never interrupts the run.
 */
export class ProgressReporter {
  constructor(
    private readonly sink?: ProgressSink,
    private readonly quiet = false
  ) {}

  report(stage: SyncStage, counts?: ProgressCounts): void {
    if (!this.sink) return;
    try {
      this.sink(stage, counts);
    } catch (error) {
      if (!this.quiet) {
        console.warn(
          `[sync] Progress sink failed at ${stage}:`,
          error instanceof Error ? error.message : error
        );
      }
    }
  }
}
