/**
 * Per-request temp work directories.
 * Created under the OS temp dir, removed once the request is done,
 * and swept on startup in case a previous process died mid-download.
 */

import { mkdir, mkdtemp, readdir, rm, stat } from "fs/promises";
import path from "path";
import os from "os";

export const WORK_DIR_ROOT = path.join(os.tmpdir(), "media-relay");

/**
 * Creates a fresh, uniquely named work directory.
 */
export async function createWorkDir(root: string = WORK_DIR_ROOT): Promise<string> {
  await mkdir(root, { recursive: true });
  return mkdtemp(path.join(root, "job-"));
}

/**
 * Removes a work directory and everything in it. Missing directories are fine.
 */
export async function removeWorkDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/**
 * Removes work directories older than maxAgeHours.
 * Returns how many were removed.
 */
export async function cleanupStaleWorkDirs(
  maxAgeHours: number = 24,
  root: string = WORK_DIR_ROOT
): Promise<number> {
  let entries: string[];
  try {
    entries = await readdir(root);
  } catch (error) {
    if (isNotFound(error)) {
      console.log("[cleanup] No work directory found, nothing to clean");
      return 0;
    }
    throw error;
  }

  const cutoff = Date.now() - maxAgeHours * 60 * 60 * 1000;
  let removed = 0;

  for (const entry of entries) {
    const dir = path.join(root, entry);
    try {
      const stats = await stat(dir);
      if (!stats.isDirectory() || stats.mtimeMs >= cutoff) {
        continue;
      }
      await removeWorkDir(dir);
      removed++;
      console.log(`[cleanup] Removed stale work directory: ${entry}`);
    } catch (err) {
      console.warn(`[cleanup] Failed to process ${entry}:`, err);
    }
  }

  console.log(`[cleanup] ✓ Removed ${removed} stale work directories`);
  return removed;
}

export function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
