/**
 * Application Initialization
 * Ensures the download directory exists and sweeps stale work dirs on startup.
 */

import { mkdir } from "fs/promises";
import type { AppConfig } from "./env.js";
import { cleanupStaleWorkDirs } from "../utils/cleanupTemp.js";

/**
 * Initializes application dependencies on startup.
 */
export async function initializeApp(config: AppConfig): Promise<void> {
  console.log("Initializing application...");

  try {
    await mkdir(config.downloadDir, { recursive: true });
    console.log(`✓ Download directory: ${config.downloadDir}`);

    if (config.useTempWorkDir) {
      await cleanupStaleWorkDirs();
    }

    console.log(
      config.storage.enabled
        ? `✓ Object storage: ${config.storage.bucket} @ ${config.storage.endpoint} (${config.storage.publicRead ? "public" : "presigned"})`
        : "✓ Object storage disabled, serving downloads locally"
    );
    if (config.cookies.kind === "none") {
      console.log("[ytdlp] No cookie source configured - some sites may ask to confirm you're not a bot");
    }

    console.log("✓ Application initialized successfully\n");
  } catch (error) {
    console.error("✗ Application initialization failed:", error);
    throw error;
  }
}
