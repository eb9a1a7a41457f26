/**
 * Stampboard — src/db/db.ts
 * WHAT: SQLite connection bootstrap for the check-in table.
 * FLOWS:
 *  - openDatabase(path) → mkdir → open → set PRAGMAs → ensureCheckinSchema
 *  - closeDatabase(db) on shutdown → flush Sentry
 * DOCS:
 *  - better-sqlite3 API: https://github.com/WiseLibs/better-sqlite3/blob/master/docs/api.md
 *  - SQLite PRAGMA: https://sqlite.org/pragma.html
 *
 * NOTE: better‑sqlite3 is synchronous; a statement finishes before the call returns.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import Database from "better-sqlite3";
import fs from "node:fs";
import path from "node:path";
import { StorageError, classifyError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { ensureCheckinSchema } from "./ensure.js";

export type Db = Database.Database;

const DB_BUSY_TIMEOUT_MS = 5000;
const MEMORY_PATH = ":memory:";

/**
 * Opens (creating if needed) the database file and makes sure the schema exists.
 * Failures surface as StorageError so the caller can report them like any other
 * storage problem.
 */
export function openDatabase(dbPath: string): Db {
  try {
    if (dbPath !== MEMORY_PATH) {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }
    const db = new Database(dbPath, { fileMustExist: false });
    // WAL lets the leaderboard read while a check-in writes
    if (dbPath !== MEMORY_PATH) {
      db.pragma("journal_mode = WAL");
    }
    db.pragma("synchronous = NORMAL");
    db.pragma(`busy_timeout = ${DB_BUSY_TIMEOUT_MS}`);
    ensureCheckinSchema(db);
    logger.info({ dbPath }, "SQLite opened");
    return db;
  } catch (err) {
    const classified = classifyError(err);
    const code = classified.kind === "storage" ? classified.code : "OPEN_FAILED";
    throw new StorageError(`Could not open database at ${dbPath}: ${classified.message}`, code, {
      cause: err,
    });
  }
}

/**
 * Never throws; shutdown should always get to process.exit.
 */
export async function closeDatabase(db: Db): Promise<void> {
  logger.info("Closing database connection...");
  try {
    db.close();
    logger.info("Database closed successfully");
  } catch (err) {
    logger.error({ err }, "Error closing database");
  }

  try {
    const { flushSentry } = await import("../lib/sentry.js");
    await flushSentry();
  } catch (err) {
    logger.warn({ err }, "Failed to flush Sentry events");
  }
}
