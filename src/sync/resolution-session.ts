/**
 * Incremental conflict review for interactive resolvers.
 *
 * The session owns the review position and pending decisions; the engine
 * only sees `session.resolver`, which suspends until the UI answers the
 * current conflict, answers all remaining ones, or cancels.
 *
 * @example
 * ```ts
 * const session = new ResolutionSession((conflict, { index, total }) => {
 *   showConflict(conflict, `${index + 1}/${total}`);
 * });
 * const handle = startSync(config, { resolver: session.resolver });
 * // later, from the UI:
 * session.resolveCurrent("use-remote");
 * ```
 */

import type { Resolution, SyncConflict } from "../types.js";
import type { ConflictResolver, ResolverDecisions } from "./resolution.js";

export interface ConflictPosition {
  /** 0-based index across the whole review */
  index: number;
  total: number;
}

export type ConflictPromptHandler = (conflict: SyncConflict, position: ConflictPosition) => void;

export class ResolutionSession {
  private pending: readonly SyncConflict[] = [];
  private reviewed = 0;
  private closed = false;
  private deliver: ((decisions: ResolverDecisions | null) => void) | undefined;

  constructor(private readonly onPrompt?: ConflictPromptHandler) {}

  /**
   * Resolver to hand to the engine.
   */
  readonly resolver: ConflictResolver = (conflicts) => this.poll(conflicts);

  /** Conflict awaiting a decision, if the engine is waiting */
  get current(): SyncConflict | undefined {
    return this.deliver ? this.pending[0] : undefined;
  }

  get position(): ConflictPosition {
    return { index: this.reviewed, total: this.reviewed + this.pending.length };
  }

  get isCancelled(): boolean {
    return this.closed;
  }

  /**
   * Decide the current conflict only; the next one is prompted when the
   * engine polls again.
   *
   * @throws Error if no conflict is awaiting a decision
   */
  resolveCurrent(resolution: Resolution): void {
    const conflict = this.current;
    if (!conflict) {
      throw new Error("No conflict is awaiting a decision");
    }
    this.reviewed++;
    this.settle({ [conflict.id]: resolution });
  }

  /**
   * Apply one decision to the current and every remaining conflict.
   *
   * @throws Error if no conflict is awaiting a decision
   */
  resolveAllRemaining(resolution: Resolution): void {
    if (!this.current) {
      throw new Error("No conflict is awaiting a decision");
    }
    this.reviewed += this.pending.length;
    this.settle(Object.fromEntries(this.pending.map((conflict) => [conflict.id, resolution])));
  }

  /**
   * Abort the review. Later polls answer `null` immediately.
   */
  cancel(): void {
    this.closed = true;
    this.settle(null);
  }

  private poll(conflicts: readonly SyncConflict[]): Promise<ResolverDecisions | null> {
    if (this.closed) {
      return Promise.resolve(null);
    }

    this.pending = conflicts;
    return new Promise((resolve) => {
      this.deliver = resolve;
      const conflict = conflicts[0];
      if (conflict && this.onPrompt) {
        this.onPrompt(conflict, this.position);
      }
    });
  }

  private settle(decisions: ResolverDecisions | null): void {
    const deliver = this.deliver;
    this.deliver = undefined;
    if (decisions !== null) {
      this.pending = [];
    }
    deliver?.(decisions);
  }
}
