/**
 * Configuration from environment variables and CLI overrides.
 *
 * Environment:
 * - PAPER_SYNC_LOCAL_PATH: local library root (default: ~/.paper-library)
 * - PAPER_SYNC_REMOTE_PATH (required): remote library root
 * - PAPER_SYNC_AUTO: "true" to resolve conflicts as keep-both without prompting
 */

import * as os from "node:os";
import * as path from "node:path";
import type { SyncConfig } from "./types.js";

export const ENV_LOCAL_PATH = "PAPER_SYNC_LOCAL_PATH";
export const ENV_REMOTE_PATH = "PAPER_SYNC_REMOTE_PATH";
export const ENV_AUTO = "PAPER_SYNC_AUTO";

export const DEFAULT_LOCAL_DIR = ".paper-library";

export interface ConfigOverrides {
  localRoot?: string;
  remoteRoot?: string;
  autoMode?: boolean;
}

export type ConfigResult =
  | { ok: true; config: SyncConfig }
  | { ok: false; errors: string[] };

/**
 * Build a SyncConfig, collecting every validation error.
 *
 * @param overrides - Values from CLI flags; they take precedence over env
 * @param env - Environment to read (default: process.env)
 */
export function buildConfig(
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): ConfigResult {
  const errors: string[] = [];

  const localRoot = expandHome(
    overrides.localRoot ?? (env[ENV_LOCAL_PATH] || path.join("~", DEFAULT_LOCAL_DIR))
  );

  const remoteValue = overrides.remoteRoot ?? env[ENV_REMOTE_PATH];
  if (!remoteValue) {
    errors.push(`${ENV_REMOTE_PATH} environment variable is not set (or pass --remote)`);
  }

  let autoMode = overrides.autoMode;
  if (autoMode === undefined) {
    const parsed = parseBoolean(env[ENV_AUTO]);
    if (parsed === null) {
      errors.push(`${ENV_AUTO} must be "true" or "false", got "${env[ENV_AUTO]}"`);
    }
    autoMode = parsed ?? false;
  }

  const remoteRoot = remoteValue ? expandHome(remoteValue) : "";
  if (remoteRoot && path.resolve(localRoot) === path.resolve(remoteRoot)) {
    errors.push(`Local and remote paths must differ (both are ${path.resolve(localRoot)})`);
  }

  if (errors.length > 0) {
    return { ok: false, errors };
  }

  return { ok: true, config: { localRoot, remoteRoot, autoMode } };
}

/**
 * Whether auto-sync after edits is switched on in this environment.
 */
export function isAutoSyncEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  return parseBoolean(env[ENV_AUTO]) === true;
}

/**
 * Replace a leading `~` with the home directory.
 */
export function expandHome(value: string): string {
  if (value === "~") return os.homedir();
  if (value.startsWith("~/") || value.startsWith("~\\")) {
    return path.join(os.homedir(), value.slice(2));
  }
  return value;
}

/**
 * @returns undefined when unset, null when set to something unrecognized
 */
function parseBoolean(value: string | undefined): boolean | undefined | null {
  if (value === undefined || value.trim() === "") return undefined;
  const normalized = value.trim().toLowerCase();
  if (normalized === "true" || normalized === "1" || normalized === "yes") return true;
  if (normalized === "false" || normalized === "0" || normalized === "no") return false;
  return null;
}
