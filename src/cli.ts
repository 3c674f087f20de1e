#!/usr/bin/env node

/**
 * CLI entry point for paper-library-sync.
 *
 * Commands:
 * - `sync` reconciles the local and remote libraries
 * - `status` previews what a sync would do without writing anything
 * - `auto` runs the auto-sync trigger (honors PAPER_SYNC_AUTO)
 *
 * Configuration via environment variables (flags take precedence):
 * - PAPER_SYNC_REMOTE_PATH (required): remote library root
 * - PAPER_SYNC_LOCAL_PATH: local library root (default: ~/.paper-library)
 * - PAPER_SYNC_AUTO: "true" to keep both versions of every conflict
 */

import * as readline from "node:readline/promises";
import { buildConfig, ENV_AUTO, ENV_LOCAL_PATH, ENV_REMOTE_PATH } from "./config.js";
import { errorMessage } from "./errors.js";
import { acquireSyncLocks, type SyncLock } from "./lock.js";
import { triggerAutoSync } from "./sync/auto-sync.js";
import { inspectReplicas, startSync, type SyncOptions } from "./sync/engine.js";
import { SYNC_STAGES, stageIndex } from "./sync/progress.js";
import { ResolutionSession, type ConflictPosition } from "./sync/resolution-session.js";
import { RESOLUTIONS, createStrategyResolver, isResolution } from "./sync/resolution.js";
import type { FieldValue, Resolution, SyncConfig, SyncConflict } from "./types.js";

interface CliArgs {
  command: string | null;
  localRoot: string | undefined;
  remoteRoot: string | undefined;
  autoMode: boolean | undefined;
  prefer: Resolution | undefined;
  quiet: boolean;
  help: boolean;
}

function parseArgs(args: string[]): CliArgs {
  const result: CliArgs = {
    command: null,
    localRoot: undefined,
    remoteRoot: undefined,
    autoMode: undefined,
    prefer: undefined,
    quiet: false,
    help: false,
  };

  const requireValue = (flag: string, index: number, what: string): string => {
    const value = args[index + 1];
    if (!value || value.startsWith("-")) {
      console.error(`Error: ${flag} requires ${what}`);
      process.exit(1);
    }
    return value;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "--help" || arg === "-h") {
      result.help = true;
    } else if (arg === "--quiet" || arg === "-q") {
      result.quiet = true;
    } else if (arg === "--auto" || arg === "-a") {
      result.autoMode = true;
    } else if (arg === "--local" || arg === "-l") {
      result.localRoot = requireValue(arg, i, "a directory path");
      i++; // Skip the value
    } else if (arg === "--remote" || arg === "-r") {
      result.remoteRoot = requireValue(arg, i, "a directory path");
      i++; // Skip the value
    } else if (arg === "--prefer") {
      const value = requireValue(arg, i, `a resolution (${RESOLUTIONS.join(", ")})`);
      if (!isResolution(value)) {
        console.error(`Error: --prefer must be one of: ${RESOLUTIONS.join(", ")}`);
        process.exit(1);
      }
      result.prefer = value;
      i++; // Skip the value
    } else if (!arg.startsWith("-") && !result.command) {
      result.command = arg;
    }
  }

  return result;
}

function printHelp(): void {
  console.log(`
paper-sync - Reconcile a local paper library with a remote copy

Usage:
  paper-sync <command> [options]

Commands:
  sync    Synchronize local and remote libraries (both directions)
  status  Show what a sync would change, without writing anything
  auto    Run a sync only if ${ENV_AUTO}=true (for hooks after edits)

Options:
  --local, -l <dir>   Local library root (default: $${ENV_LOCAL_PATH} or ~/.paper-library)
  --remote, -r <dir>  Remote library root (default: $${ENV_REMOTE_PATH})
  --auto, -a          Keep both versions of every conflict without prompting
  --prefer <choice>   Resolve every conflict the same way without prompting
                      Values: ${RESOLUTIONS.join(", ")}
  --quiet, -q         Only print the final summary
  --help, -h          Show this help message

Interactive conflict keys:
  l / r / b           Use local / use remote / keep both for this conflict
  L / R / B           Same, for this and every remaining conflict
  c                   Cancel the sync (nothing is changed)

Examples:
  paper-sync sync --remote /mnt/share/papers
  paper-sync sync --auto
  paper-sync sync --prefer use-local
  paper-sync status
`);
}

function loadConfig(args: CliArgs): SyncConfig {
  const built = buildConfig({
    localRoot: args.localRoot,
    remoteRoot: args.remoteRoot,
    autoMode: args.autoMode,
  });

  if (!built.ok) {
    console.error("Configuration error:");
    for (const error of built.errors) {
      console.error(`  - ${error}`);
    }
    console.error("\nSet these environment variables or flags and try again.");
    console.error("Run with --help for more information.");
    process.exit(1);
  }

  return built.config;
}

async function runSync(args: CliArgs): Promise<void> {
  const config = loadConfig(args);

  if (!args.quiet) {
    console.log("Starting library sync...");
    console.log(`  Local: ${config.localRoot}`);
    console.log(`  Remote: ${config.remoteRoot}`);
    console.log(`  Conflicts: ${config.autoMode ? "keep both (auto)" : args.prefer ?? "interactive"}`);
    console.log("");
  }

  let lock: SyncLock;
  try {
    lock = await acquireSyncLocks([config.localRoot, config.remoteRoot], { quiet: args.quiet });
  } catch (error) {
    console.error("Sync not started:", errorMessage(error));
    process.exit(1);
  }

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  const options: SyncOptions = {
    quiet: args.quiet,
    progress: args.quiet
      ? undefined
      : (stage, counts) => {
          if (counts) return;
          console.log(`[${stageIndex(stage)}/${SYNC_STAGES.length}] ${stage}`);
        },
  };

  let session: ResolutionSession | undefined;
  if (args.prefer) {
    options.resolver = createStrategyResolver(args.prefer);
  } else if (!config.autoMode && process.stdin.isTTY) {
    session = createInteractiveSession(rl);
    options.resolver = session.resolver;
  }

  const handle = startSync(config, options);
  rl.on("SIGINT", () => {
    console.log("\nCancelling...");
    session?.cancel();
    handle.cancel();
  });

  let exitCode = 0;
  try {
    const result = await handle.done;

    console.log("");
    console.log(result.getSummary());

    if (result.status === "failed" || result.errors.length > 0) {
      exitCode = 1;
    }
  } catch (error) {
    console.error("Sync failed:", errorMessage(error));
    exitCode = 1;
  } finally {
    rl.close();
    await lock.release();
  }

  if (exitCode !== 0) {
    process.exit(exitCode);
  }
}

async function runStatus(args: CliArgs): Promise<void> {
  const config = loadConfig(args);

  try {
    const inspection = await inspectReplicas(config, { quiet: args.quiet });
    const { records, pdfs, collections, conflicts } = inspection.diff;

    console.log("");
    console.log("Sync status:");
    console.log(`  Baseline: ${inspection.hasBaseline ? "found" : "none (first sync)"}`);
    console.log("");
    console.log("  Records:");
    console.log(`    Local only: ${records.localOnly.length}`);
    console.log(`    Remote only: ${records.remoteOnly.length}`);
    console.log(`    Changed locally: ${records.localAhead.length}`);
    console.log(`    Changed remotely: ${records.remoteAhead.length}`);
    console.log(`    Identical: ${records.identical.length}`);
    console.log("");
    console.log("  PDFs:");
    console.log(`    Local only: ${pdfs.localOnly.length}`);
    console.log(`    Remote only: ${pdfs.remoteOnly.length}`);
    console.log(`    Changed locally: ${pdfs.localAhead.length}`);
    console.log(`    Changed remotely: ${pdfs.remoteAhead.length}`);
    console.log(`    Identical: ${pdfs.identical.length}`);
    console.log("");
    console.log("  Collections:");
    console.log(`    Local only: ${collections.localOnly.length}`);
    console.log(`    Remote only: ${collections.remoteOnly.length}`);
    console.log(`    To merge: ${collections.divergent.length}`);

    if (conflicts.length > 0) {
      console.log("");
      console.log(`  Conflicts: ${conflicts.length}`);
      for (const conflict of conflicts) {
        console.log(`    - ${conflict.id} (${Object.keys(conflict.fieldDiffs).join(", ")})`);
      }
    }

    if (inspection.errors.length > 0) {
      console.log("");
      console.log(`  Errors: ${inspection.errors.length}`);
      for (const error of inspection.errors) {
        console.error(`    - ${error.message}`);
      }
    }
  } catch (error) {
    console.error("Status failed:", errorMessage(error));
    process.exit(1);
  }
}

async function runAuto(args: CliArgs): Promise<void> {
  const env: NodeJS.ProcessEnv = { ...process.env };
  if (args.localRoot) env[ENV_LOCAL_PATH] = args.localRoot;
  if (args.remoteRoot) env[ENV_REMOTE_PATH] = args.remoteRoot;

  const attempted = await triggerAutoSync(env, {
    quiet: args.quiet,
    onResult: (result) => {
      if (!args.quiet) console.log(result.getSummary());
    },
  });

  if (!attempted && !args.quiet) {
    console.log(`Auto-sync not run (set ${ENV_AUTO}=true and ${ENV_REMOTE_PATH} to enable).`);
  }
}

// =============================================================================
// Interactive conflict review
// =============================================================================

const PROMPT_CHOICES: Record<string, { resolution: Resolution; all: boolean }> = {
  l: { resolution: "use-local", all: false },
  r: { resolution: "use-remote", all: false },
  b: { resolution: "keep-both", all: false },
  L: { resolution: "use-local", all: true },
  R: { resolution: "use-remote", all: true },
  B: { resolution: "keep-both", all: true },
};

function createInteractiveSession(rl: readline.Interface): ResolutionSession {
  const session = new ResolutionSession((conflict, position) => {
    void promptForDecision(rl, session, conflict, position);
  });
  return session;
}

async function promptForDecision(
  rl: readline.Interface,
  session: ResolutionSession,
  conflict: SyncConflict,
  position: ConflictPosition
): Promise<void> {
  console.log("");
  console.log(`Conflict ${position.index + 1}/${position.total}: ${conflict.id}`);
  for (const [field, diff] of Object.entries(conflict.fieldDiffs)) {
    console.log(`  ${field}:`);
    console.log(`    local:  ${formatValue(diff.local)}`);
    console.log(`    remote: ${formatValue(diff.remote)}`);
  }

  try {
    for (;;) {
      const answer = (await rl.question("[l]ocal [r]emote [b]oth (L/R/B for all remaining), [c]ancel: ")).trim();
      if (answer === "c" || answer === "C") {
        session.cancel();
        return;
      }

      const choice = PROMPT_CHOICES[answer];
      if (!choice) {
        console.log(`Unrecognized choice "${answer}"`);
        continue;
      }

      if (choice.all) {
        session.resolveAllRemaining(choice.resolution);
      } else {
        session.resolveCurrent(choice.resolution);
      }
      return;
    }
  } catch (error) {
    console.error("Conflict prompt failed:", errorMessage(error));
    session.cancel();
  }
}

function formatValue(value: FieldValue): string {
  if (value === null) return "(empty)";
  if (typeof value === "string" || typeof value === "number") return String(value);
  return value.length === 0 ? "(none)" : value.join(", ");
}

async function main(): Promise<void> {
  // Skip node and script path
  const args = parseArgs(process.argv.slice(2));

  if (args.help || !args.command) {
    printHelp();
    process.exit(args.help ? 0 : 1);
  }

  switch (args.command) {
    case "sync":
      await runSync(args);
      break;
    case "status":
      await runStatus(args);
      break;
    case "auto":
      await runAuto(args);
      break;
    default:
      console.error(`Unknown command: ${args.command}`);
      console.error("Run with --help for usage information.");
      process.exit(1);
  }
}

main().catch((error) => {
  console.error("Unexpected error:", error);
  process.exit(1);
});
