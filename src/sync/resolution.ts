/**
 * Resolution coordinator.
 *
 * Turns a conflict list into one Resolution per conflict id, either by
 * policy (auto mode: keep both, resolver never called) or by polling a
 * caller-supplied resolver until every conflict has a decision, the resolver
 * stops making progress, or the run is cancelled.
 */

import type { Resolution, SyncConflict } from "../types.js";
import { errorMessage } from "../errors.js";

/** Partial or complete decisions keyed by conflict id */
export type ResolverDecisions = Readonly<Record<string, string>>;

/**
 * Resolver contract. Called with the conflicts still pending; may return a
 * partial map, in which case it is called again with the rest. Returning
 * `null` cancels the run.
 */
export type ConflictResolver = (
  conflicts: readonly SyncConflict[]
) => ResolverDecisions | null | Promise<ResolverDecisions | null>;

export const RESOLUTIONS: readonly Resolution[] = ["use-local", "use-remote", "keep-both"];

/** Consecutive polls without a new decision before giving up */
export const DEFAULT_MAX_STALLED_POLLS = 3;

export interface ResolveOptions {
  resolver?: ConflictResolver;
  autoMode: boolean;
  signal?: AbortSignal;
  maxStalledPolls?: number;
  quiet?: boolean;
}

export interface UnresolvedConflict {
  conflictId: string;
  reason: string;
}

export interface ResolutionOutcome {
  status: "resolved" | "cancelled";
  resolutions: Map<string, Resolution>;
  /** Conflicts left without a usable decision; skipped by the merge */
  unresolved: UnresolvedConflict[];
}

export function isResolution(value: unknown): value is Resolution {
  return RESOLUTIONS.some((resolution) => resolution === value);
}

/**
 * Resolver that answers every conflict with the same decision.
 *
 * @example
 * ```ts
 * await syncLibraries(config, { resolver: createStrategyResolver("use-remote") });
 * ```
 */
export function createStrategyResolver(resolution: Resolution): ConflictResolver {
  return (conflicts) =>
    Object.fromEntries(conflicts.map((conflict) => [conflict.id, resolution]));
}

const CANCELLED = Symbol("cancelled");

/**
 * Collect a decision for every conflict.
 */
export async function resolveConflicts(
  conflicts: readonly SyncConflict[],
  options: ResolveOptions
): Promise<ResolutionOutcome> {
  const { resolver, autoMode, signal, quiet = false } = options;
  const maxStalledPolls = Math.max(1, options.maxStalledPolls ?? DEFAULT_MAX_STALLED_POLLS);
  const resolutions = new Map<string, Resolution>();
  const unresolved: UnresolvedConflict[] = [];

  if (signal?.aborted) {
    return cancelled();
  }

  if (conflicts.length === 0) {
    return { status: "resolved", resolutions, unresolved };
  }

  if (autoMode) {
    for (const conflict of conflicts) {
      resolutions.set(conflict.id, "keep-both");
    }
    if (!quiet) {
      console.log(`[resolve] Auto mode: keeping both versions of ${conflicts.length} conflict(s)`);
    }
    return { status: "resolved", resolutions, unresolved };
  }

  if (!resolver) {
    for (const conflict of conflicts) {
      unresolved.push({ conflictId: conflict.id, reason: "No resolver was supplied" });
    }
    logUnresolved(unresolved, quiet);
    return { status: "resolved", resolutions, unresolved };
  }

  let pending = [...conflicts];
  let stalledPolls = 0;

  while (pending.length > 0) {
    let decisions: ResolverDecisions | null | typeof CANCELLED;
    try {
      const snapshot = [...pending];
      decisions = await untilCancelled(
        Promise.resolve().then(() => resolver(snapshot)),
        signal
      );
    } catch (error) {
      for (const conflict of pending) {
        unresolved.push({
          conflictId: conflict.id,
          reason: `Resolver failed: ${errorMessage(error)}`,
        });
      }
      break;
    }

    if (decisions === CANCELLED || decisions === null || signal?.aborted) {
      return cancelled();
    }

    const remaining: SyncConflict[] = [];
    for (const conflict of pending) {
      if (!Object.hasOwn(decisions, conflict.id)) {
        remaining.push(conflict);
        continue;
      }

      const value: unknown = decisions[conflict.id];
      if (isResolution(value)) {
        resolutions.set(conflict.id, value);
      } else {
        unresolved.push({
          conflictId: conflict.id,
          reason: `Unrecognized resolution "${String(value)}"`,
        });
      }
    }

    stalledPolls = remaining.length === pending.length ? stalledPolls + 1 : 0;
    pending = remaining;

    if (pending.length > 0 && stalledPolls >= maxStalledPolls) {
      for (const conflict of pending) {
        unresolved.push({ conflictId: conflict.id, reason: "No resolution was provided" });
      }
      break;
    }
  }

  logUnresolved(unresolved, quiet);
  return { status: "resolved", resolutions, unresolved };

  function cancelled(): ResolutionOutcome {
    if (!quiet) console.log("[resolve] Conflict resolution cancelled");
    return { status: "cancelled", resolutions: new Map(), unresolved: [] };
  }
}

/**
 * Settle with the work's value, or with CANCELLED as soon as the signal
 * aborts, whichever happens first.
 */
async function untilCancelled<T>(
  work: Promise<T>,
  signal?: AbortSignal
): Promise<T | typeof CANCELLED> {
  if (!signal) return work;
  if (signal.aborted) return CANCELLED;

  let onAbort: (() => void) | undefined;
  const aborted = new Promise<typeof CANCELLED>((resolve) => {
    onAbort = () => resolve(CANCELLED);
    signal.addEventListener("abort", onAbort, { once: true });
  });

  try {
    return await Promise.race([work, aborted]);
  } finally {
    if (onAbort) signal.removeEventListener("abort", onAbort);
  }
}

function logUnresolved(unresolved: readonly UnresolvedConflict[], quiet: boolean): void {
  if (quiet || unresolved.length === 0) return;
  console.warn(`[resolve] ${unresolved.length} conflict(s) left unresolved and will be skipped`);
}
