/**
 * Stampboard — tests/db/db.test.ts
 * WHAT: Opening and closing the SQLite database.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync, existsSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

vi.mock("../../src/lib/logger.js", () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

const { mockFlushSentry } = vi.hoisted(() => ({ mockFlushSentry: vi.fn() }));

vi.mock("../../src/lib/sentry.js", () => ({
  flushSentry: mockFlushSentry,
}));

import { closeDatabase, openDatabase } from "../../src/db/db.js";
import { StorageError } from "../../src/lib/errors.js";

describe("db", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "stampboard-db-"));
    mockFlushSentry.mockResolvedValue(true);
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("creates the directory, the file and the schema", async () => {
    const file = join(dir, "data", "checkins.db");

    const db = openDatabase(file);

    expect(existsSync(file)).toBe(true);
    expect(db.pragma("journal_mode", { simple: true })).toBe("wal");
    expect(
      db.prepare(`SELECT name FROM sqlite_master WHERE type='table' AND name='checkin_record'`).get()
    ).toEqual({ name: "checkin_record" });

    await closeDatabase(db);
    expect(db.open).toBe(false);
    expect(mockFlushSentry).toHaveBeenCalledTimes(1);
  });

  it("opens an in-memory database without touching the disk", async () => {
    const db = openDatabase(":memory:");

    expect(db.memory).toBe(true);
    await closeDatabase(db);
  });

  it("wraps open failures in StorageError", () => {
    const notADir = join(dir, "file.txt");
    writeFileSync(notADir, "x");

    expect(() => openDatabase(join(notADir, "checkins.db"))).toThrow(StorageError);
  });
});
