/**
 * @tally/node — Entry point.
 *
 * Bootstraps the Hono app, loads config, opens the history,
 * starts the HTTP server, and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { InMemoryHistoryStore, JsonlHistoryStore } from "@tally/event-store";
import type { HistoryStore } from "@tally/event-store";
import { loadConfig } from "./config.js";
import { createApp } from "./app.js";

// =============================================================================
// Bootstrap
// =============================================================================

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  let store: HistoryStore;
  if (config.HISTORY_FILE !== "") {
    const jsonl = new JsonlHistoryStore({ filePath: config.HISTORY_FILE });
    if (jsonl.skippedLines > 0) {
      logger.warn(
        { file: config.HISTORY_FILE, skippedLines: jsonl.skippedLines },
        "Skipped a torn last history line; it is cut off on the next write",
      );
    }
    logger.info({ file: config.HISTORY_FILE, records: jsonl.size() }, "History loaded");
    store = jsonl;
  } else {
    logger.warn("HISTORY_FILE not set; history is kept in memory and lost on exit");
    store = new InMemoryHistoryStore();
  }

  const { app } = createApp({
    store,
    logger,
    activityLimit: config.ACTIVITY_LIMIT,
    logFn: (entry) => {
      logger[entry.level](entry, `${entry.method} ${entry.path} ${entry.status}`);
    },
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info({ port: config.PORT, host: config.HOST }, "Tally node started");

  // Graceful shutdown
  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    server.close(() => {
      logger.info("Shutdown complete");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
