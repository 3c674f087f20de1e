/**
 * PDF directory access for a replica.
 *
 * Scans the `pdfs/` directory (non-recursive), hashes each file's content,
 * and copies files between replicas atomically.
 */

import { createReadStream, type Dirent } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as crypto from "node:crypto";
import type { PdfView } from "../types.js";
import { errorMessage } from "../errors.js";

export interface PdfScanResult {
  pdfs: PdfView[];
  /** Files that were listed but could not be stat'ed or hashed */
  failures: { fileName: string; message: string }[];
}

/**
 * Scan a directory for PDF files and return their metadata.
 *
 * A missing directory scans as empty.
 *
 * @param pdfDir - The directory to scan
 */
export async function scanPdfFiles(pdfDir: string): Promise<PdfScanResult> {
  const result: PdfScanResult = { pdfs: [], failures: [] };

  let entries: Dirent[];
  try {
    entries = await fs.readdir(pdfDir, { withFileTypes: true });
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      return result;
    }
    throw error;
  }

  const pdfEntries = entries
    .filter((entry) => entry.isFile() && /\.pdf$/i.test(entry.name))
    .sort((a, b) => a.name.localeCompare(b.name));

  for (const entry of pdfEntries) {
    try {
      result.pdfs.push(await readPdfView(pdfDir, entry.name));
    } catch (error) {
      result.failures.push({ fileName: entry.name, message: errorMessage(error) });
    }
  }

  return result;
}

/**
 * Stat and hash a single PDF.
 */
export async function readPdfView(pdfDir: string, fileName: string): Promise<PdfView> {
  const fullPath = path.join(pdfDir, fileName);
  const [stats, contentHash] = await Promise.all([fs.stat(fullPath), hashFile(fullPath)]);

  return {
    key: fileName,
    path: fullPath,
    size: stats.size,
    modifiedTime: stats.mtime.toISOString(),
    contentHash,
  };
}

/**
 * SHA-256 of a file's bytes, streamed.
 *
 * @returns Hash string in format "sha256:<hexdigest>"
 */
export async function hashFile(filePath: string): Promise<string> {
  const hash = crypto.createHash("sha256");
  for await (const chunk of createReadStream(filePath)) {
    hash.update(chunk);
  }
  return `sha256:${hash.digest("hex")}`;
}

/**
 * Copy a PDF into a directory under the given name.
 *
 * Writes to a temporary file first, then renames over the target, and keeps
 * the source modification time.
 *
 * @returns The absolute path of the written file
 */
export async function copyPdfFile(
  sourcePath: string,
  targetDir: string,
  targetName: string
): Promise<string> {
  await fs.mkdir(targetDir, { recursive: true });

  const targetPath = path.resolve(targetDir, targetName);
  const tempPath = `${targetPath}.tmp`;

  await fs.copyFile(sourcePath, tempPath);
  try {
    const stats = await fs.stat(sourcePath);
    await fs.utimes(tempPath, stats.atime, stats.mtime);
    await fs.rename(tempPath, targetPath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }

  return targetPath;
}

/**
 * Whether a file with this name exists in the directory.
 */
export async function pdfExists(pdfDir: string, fileName: string): Promise<boolean> {
  try {
    await fs.access(path.join(pdfDir, fileName));
    return true;
  } catch {
    return false;
  }
}
