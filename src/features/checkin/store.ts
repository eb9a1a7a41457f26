/**
 * Stampboard — src/features/checkin/store.ts
 * WHAT: The record store: append-only check-in table with a uniqueness guard.
 * FLOWS:
 *  - append(record) → validate → [txn: guard → INSERT] → StoredCheckIn
 *  - query(filters) → SELECT ... ORDER BY id | timestamp DESC
 * DOCS:
 *  - better-sqlite3 transactions: https://github.com/WiseLibs/better-sqlite3/blob/master/docs/api.md#transactionfunction---function
 *
 * Records are never updated or deleted here.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { Database, Statement } from "better-sqlite3";
import { CHECKIN_TABLE } from "../../db/ensure.js";
import {
  DuplicateCheckInError,
  StorageError,
  ValidationError,
  classifyError,
} from "../../lib/errors.js";
import { logger, redact } from "../../lib/logger.js";
import { ctx } from "../../lib/reqctx.js";
import { isIsoDate, isValidTs } from "../../lib/time.js";
import { isDuplicate, normalizeName, type DuplicateReader, type UniquenessKey } from "./guard.js";
import type { CheckInFilters, CheckInKey, CheckInRecord, StoredCheckIn } from "./types.js";

interface CheckinRow {
  id: number;
  event_id: string;
  category: string;
  participant_name: string;
  date: string;
  timestamp: number;
  points: number;
}

const SELECT_COLUMNS = "id, event_id, category, participant_name, date, timestamp, points";

function rowToRecord(row: CheckinRow): StoredCheckIn {
  return {
    id: row.id,
    eventId: row.event_id,
    category: row.category,
    participantName: row.participant_name,
    date: row.date,
    timestamp: row.timestamp,
    points: row.points,
  };
}

function toStorageError(err: unknown, op: string): StorageError {
  const classified = classifyError(err);
  const code = classified.kind === "storage" ? classified.code : "UNKNOWN";
  return new StorageError(`check-in ${op} failed: ${classified.message}`, code, { cause: err });
}

function validateRecord(record: CheckInRecord): void {
  if (!record.eventId.trim()) throw new ValidationError("eventId", "Event id is required.");
  if (!record.category.trim()) throw new ValidationError("category", "Category is required.");
  if (!record.participantName.trim()) {
    throw new ValidationError("participantName", "Participant name is required.");
  }
  if (!isIsoDate(record.date)) {
    throw new ValidationError("date", `Date must be YYYY-MM-DD, got "${record.date}".`);
  }
  if (!isValidTs(record.timestamp)) {
    throw new ValidationError("timestamp", "Timestamp must be whole Unix seconds within the Date range.");
  }
  if (!Number.isInteger(record.points)) {
    throw new ValidationError("points", "Points must be a whole number.");
  }
}

export class CheckInStore implements DuplicateReader {
  private readonly hasKeyStmt: Statement<[string, string, string, string], { found: number }>;
  private readonly insertStmt: Statement<[string, string, string, string, string, number, number]>;
  private readonly countStmt: Statement<[], { n: number }>;
  private readonly appendTxn: (record: CheckInRecord) => StoredCheckIn;

  constructor(private readonly db: Database) {
    this.hasKeyStmt = db.prepare<[string, string, string, string], { found: number }>(
      `SELECT 1 AS found FROM ${CHECKIN_TABLE}
       WHERE event_id = ? AND category = ? AND date = ? AND name_key = ?
       LIMIT 1`
    );
    this.insertStmt = db.prepare<[string, string, string, string, string, number, number]>(
      `INSERT INTO ${CHECKIN_TABLE}
         (event_id, category, participant_name, name_key, date, timestamp, points)
       VALUES (?, ?, ?, ?, ?, ?, ?)`
    );
    this.countStmt = db.prepare<[], { n: number }>(`SELECT COUNT(*) AS n FROM ${CHECKIN_TABLE}`);

    // Guard read and insert in one transaction: nothing is written when the guard says no
    this.appendTxn = db.transaction((record: CheckInRecord): StoredCheckIn => {
      if (isDuplicate(this, record)) {
        throw new DuplicateCheckInError(record.eventId, record.category, record.date, record.participantName);
      }
      const info = this.insertStmt.run(
        record.eventId,
        record.category,
        record.participantName,
        normalizeName(record.participantName),
        record.date,
        record.timestamp,
        record.points
      );
      return { ...record, id: Number(info.lastInsertRowid) };
    });
  }

  hasKey(key: UniquenessKey): boolean {
    try {
      return this.hasKeyStmt.get(key.eventId, key.category, key.date, key.nameKey) !== undefined;
    } catch (err) {
      throw toStorageError(err, "lookup");
    }
  }

  isDuplicate(fields: CheckInKey): boolean {
    return isDuplicate(this, fields);
  }

  /**
   * Writes one record. Throws DuplicateCheckInError (nothing written),
   * ValidationError for malformed fields, StorageError for anything SQLite reports.
   */
  append(input: CheckInRecord): StoredCheckIn {
    const record: CheckInRecord = {
      ...input,
      eventId: input.eventId.trim(),
      category: input.category.trim(),
      participantName: input.participantName.trim(),
    };
    validateRecord(record);

    let stored: StoredCheckIn;
    try {
      stored = this.appendTxn(record);
    } catch (err) {
      if (err instanceof DuplicateCheckInError) {
        logger.info(
          {
            evt: "checkin_duplicate",
            traceId: ctx().traceId,
            eventId: record.eventId,
            category: record.category,
            date: record.date,
            name: redact(record.participantName),
          },
          "check-in rejected as duplicate"
        );
        throw err;
      }
      const classified = classifyError(err);
      // Another process got there between our guard read and the insert
      if (classified.kind === "storage" && classified.code === "SQLITE_CONSTRAINT_UNIQUE") {
        throw new DuplicateCheckInError(record.eventId, record.category, record.date, record.participantName);
      }
      logger.error({ err, evt: "checkin_append_failed", traceId: ctx().traceId }, "check-in append failed");
      throw toStorageError(err, "append");
    }

    logger.info(
      {
        evt: "checkin_append",
        traceId: ctx().traceId,
        id: stored.id,
        eventId: stored.eventId,
        category: stored.category,
        date: stored.date,
        points: stored.points,
        name: redact(stored.participantName),
      },
      "check-in recorded"
    );
    return stored;
  }

  /**
   * Filtered read. Insertion order unless `order: "newest"`.
   */
  query(filters: CheckInFilters = {}): StoredCheckIn[] {
    const conditions: string[] = [];
    const params: Array<string | number> = [];

    if (filters.eventId !== undefined) {
      conditions.push("event_id = ?");
      params.push(filters.eventId);
    }
    if (filters.eventIdContains) {
      conditions.push("instr(event_id, ?) > 0");
      params.push(filters.eventIdContains);
    }
    if (filters.participantName !== undefined) {
      conditions.push("name_key = ?");
      params.push(normalizeName(filters.participantName));
    }
    if (filters.category !== undefined) {
      conditions.push("category = ?");
      params.push(filters.category);
    }
    if (filters.date !== undefined) {
      conditions.push("date = ?");
      params.push(filters.date);
    }
    if (filters.from !== undefined) {
      conditions.push("date >= ?");
      params.push(filters.from);
    }
    if (filters.to !== undefined) {
      conditions.push("date <= ?");
      params.push(filters.to);
    }

    let sql = `SELECT ${SELECT_COLUMNS} FROM ${CHECKIN_TABLE}`;
    if (conditions.length > 0) {
      sql += ` WHERE ${conditions.join(" AND ")}`;
    }
    sql += filters.order === "newest" ? " ORDER BY timestamp DESC, id DESC" : " ORDER BY id ASC";

    try {
      return this.db.prepare<Array<string | number>, CheckinRow>(sql).all(...params).map(rowToRecord);
    } catch (err) {
      throw toStorageError(err, "query");
    }
  }

  count(): number {
    try {
      return this.countStmt.get()?.n ?? 0;
    } catch (err) {
      throw toStorageError(err, "count");
    }
  }
}
