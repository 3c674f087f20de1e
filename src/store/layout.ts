/**
 * File layout of a replica root.
 */

import * as path from "node:path";

export const LIBRARY_FILE = "library.yaml";
export const PDF_DIR = "pdfs";
export const STATE_FILE = ".paper-sync-state.json";
export const LOCK_FILE = ".paper-sync.lock";

export interface ReplicaPaths {
  root: string;
  libraryFile: string;
  pdfDir: string;
  stateFile: string;
  lockFile: string;
}

export function replicaPaths(root: string): ReplicaPaths {
  const resolved = path.resolve(root);
  return {
    root: resolved,
    libraryFile: path.join(resolved, LIBRARY_FILE),
    pdfDir: path.join(resolved, PDF_DIR),
    stateFile: path.join(resolved, STATE_FILE),
    lockFile: path.join(resolved, LOCK_FILE),
  };
}
