/**
 * Delete served downloads older than a given age
 * Run with: npx tsx src/scripts/cleanupDownloads.ts [maxAgeHours=72]
 *
 * WARNING: This permanently deletes files from DOWNLOAD_DIR!
 * Links previously returned with source "local" stop working.
 */

import "dotenv/config";
import type { Stats } from "fs";
import { readdir, stat, unlink } from "fs/promises";
import path from "path";
import { fileURLToPath } from "url";
import { loadConfig } from "../config/env.js";
import { isNotFound } from "../utils/cleanupTemp.js";

export interface CleanupSummary {
  removedFiles: number;
  freedBytes: number;
}

/**
 * Removes regular files in `dir` whose mtime is older than maxAgeHours.
 * Subdirectories are left alone.
 */
export async function cleanupDownloads(
  dir: string,
  maxAgeHours: number,
  now: number = Date.now()
): Promise<CleanupSummary> {
  const cutoff = now - maxAgeHours * 60 * 60 * 1000;
  const summary: CleanupSummary = { removedFiles: 0, freedBytes: 0 };

  let entries: string[];
  try {
    entries = await readdir(dir);
  } catch (error) {
    if (isNotFound(error)) return summary;
    throw error;
  }

  for (const entry of entries) {
    const filePath = path.join(dir, entry);
    let stats: Stats;
    try {
      stats = await stat(filePath);
      if (!stats.isFile() || stats.mtimeMs >= cutoff) {
        continue;
      }
      await unlink(filePath);
    } catch (error) {
      // Renamed or removed since readdir
      if (isNotFound(error)) continue;
      throw error;
    }
    summary.removedFiles++;
    summary.freedBytes += stats.size;
    console.log(`[cleanup] Removed ${entry} (${((now - stats.mtimeMs) / 3600000).toFixed(1)}h old)`);
  }

  return summary;
}

async function main() {
  const maxAgeHours = Number(process.argv[2] ?? "72");
  if (!Number.isFinite(maxAgeHours) || maxAgeHours < 0) {
    console.error(`Invalid maxAgeHours: ${process.argv[2]}`);
    process.exit(1);
  }

  const { downloadDir } = loadConfig();
  console.log(`⚠️  Deleting files older than ${maxAgeHours}h from ${downloadDir}\n`);

  const { removedFiles, freedBytes } = await cleanupDownloads(downloadDir, maxAgeHours);
  console.log(`\n✓ Removed ${removedFiles} files, freed ${(freedBytes / (1024 * 1024)).toFixed(0)}MB`);
}

// Only run when executed directly, so tests can import cleanupDownloads.
if (process.argv[1] && path.resolve(process.argv[1]) === fileURLToPath(import.meta.url)) {
  main().catch((error: unknown) => {
    console.error("✗ Cleanup failed:", error);
    process.exit(1);
  });
}
