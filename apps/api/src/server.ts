/**
 * ─────────────────────────────────────────────────────────
 *  Social Network API
 *  Stack: Node.js + TypeScript + Express + SQLite (better-sqlite3)
 * ─────────────────────────────────────────────────────────
 *
 *  Startup: create the store on first run (schema + seed rows),
 *  then serve. An existing store file is reused as-is.
 */

import { createApp } from "./app";
import { loadConfig } from "./config";
import { initDatabase } from "./db";
import { logger } from "./logger";

const config = loadConfig();
logger.level = config.logLevel;

try {
  const created = initDatabase(config.dbPath);
  logger.info({ dbPath: config.dbPath }, created ? "Database created" : "Using existing database");
} catch (err) {
  logger.fatal({ err, dbPath: config.dbPath }, "Database initialization failed");
  process.exit(1);
}

const app = createApp(config);

// ─── Graceful Shutdown ────────────────────────────────────
const server = app.listen(config.port, config.host, () => {
  logger.info(`API (${config.nodeEnv}) listening on http://${config.host}:${config.port}`);
});

const shutdown = (signal: string) => {
  logger.info(`${signal} — shutting down`);
  server.close(() => process.exit(0));
  setTimeout(() => process.exit(1), 10_000).unref();
};

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
