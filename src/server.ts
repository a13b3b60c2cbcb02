/**
 * HTTP Server Entry Point
 * Loads configuration, prepares the download directory and starts listening.
 * Handles graceful shutdown on SIGTERM signal.
 */
import "dotenv/config";
import { createServer } from "http";
import { createApp } from "./app.js";
import { loadConfig, type AppConfig } from "./config/env.js";
import { initializeApp } from "./config/init.js";

/** Misconfigured storage is fatal: the process exits before listening. */
function readConfig(): AppConfig {
  try {
    return loadConfig();
  } catch (error) {
    console.error("✗ Invalid configuration:", error instanceof Error ? error.message : error);
    process.exit(1);
  }
}

const config = readConfig();

initializeApp(config)
  .then(() => {
    /** HTTP server instance wrapping the Express application. */
    const server = createServer(createApp(config));

    server.listen(config.port, "0.0.0.0", () => {
      console.log(`Server running on 0.0.0.0:${config.port}`);
    });

    /**
     * Handles graceful shutdown on SIGTERM signal.
     * Closes the server and exits the process cleanly.
     */
    process.on("SIGTERM", () => {
      server.close(() => process.exit(0));
    });
  })
  .catch((error: unknown) => {
    console.error("✗ Initialization failed:", error);
    process.exit(1);
  });
