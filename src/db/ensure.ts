/**
 * Stampboard — src/db/ensure.ts
 * WHAT: On-start schema creation for the checkin_record table and its indexes.
 * FLOWS:
 *  - Check existence → create table → ensure unique key index + lookup indexes
 * DOCS:
 *  - SQLite CREATE INDEX: https://sqlite.org/lang_createindex.html
 *
 * NOTE: There is no migration scheme; the table layout is fixed.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import type { Database } from "better-sqlite3";
import { logger } from "../lib/logger.js";

export const CHECKIN_TABLE = "checkin_record";

/**
 * Idempotent. Safe to call on every start and on fresh :memory: databases.
 */
export function ensureCheckinSchema(db: Database): void {
  const tableExists = db
    .prepare(`SELECT name FROM sqlite_master WHERE type='table' AND name=?`)
    .get(CHECKIN_TABLE);

  if (!tableExists) {
    logger.info(`[ensure] ${CHECKIN_TABLE} table does not exist, creating`);
  }

  // name_key is the normalized participant name; participant_name keeps what was typed
  db.exec(`
    CREATE TABLE IF NOT EXISTS ${CHECKIN_TABLE} (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      event_id TEXT NOT NULL,
      category TEXT NOT NULL,
      participant_name TEXT NOT NULL,
      name_key TEXT NOT NULL,
      date TEXT NOT NULL,
      timestamp INTEGER NOT NULL,
      points INTEGER NOT NULL
    )
  `);

  // Backs the uniqueness guard across processes sharing the file
  db.exec(`
    CREATE UNIQUE INDEX IF NOT EXISTS ux_checkin_key
    ON ${CHECKIN_TABLE}(event_id, category, date, name_key)
  `);

  // Personal history and leaderboard group by name_key
  db.exec(`CREATE INDEX IF NOT EXISTS idx_checkin_name ON ${CHECKIN_TABLE}(name_key, timestamp)`);
  db.exec(`CREATE INDEX IF NOT EXISTS idx_checkin_date ON ${CHECKIN_TABLE}(date)`);

  if (!tableExists) {
    logger.info(`[ensure] ${CHECKIN_TABLE} table created`);
  }
}
