/**
 * Stampboard — tests/utils/dbFixtures.ts
 * WHAT: In-memory check-in stores and record builders for tests.
 * USAGE:
 *  import { createTestStore, makeRecord } from "../utils/dbFixtures.js";
 *  const { store, cleanup } = createTestStore();
 *  store.append(makeRecord({ participantName: "Alice" }));
 *
 * PATTERN: Each test gets its own :memory: database, so nothing leaks between tests.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import Database from "better-sqlite3";
import { ensureCheckinSchema } from "../../src/db/ensure.js";
import { CheckInStore } from "../../src/features/checkin/store.js";
import type { CheckInRecord } from "../../src/features/checkin/types.js";

export interface TestStoreContext {
  db: Database.Database;
  store: CheckInStore;
  cleanup: () => void;
}

export function createTestStore(): TestStoreContext {
  const db = new Database(":memory:");
  ensureCheckinSchema(db);
  return {
    db,
    store: new CheckInStore(db),
    cleanup: () => db.close(),
  };
}

// 2024-05-01T08:00:00Z
export const BASE_TS = 1714550400;

export function makeRecord(overrides: Partial<CheckInRecord> = {}): CheckInRecord {
  return {
    eventId: "E1",
    category: "keynote",
    participantName: "Alice",
    date: "2024-05-01",
    timestamp: BASE_TS,
    points: 10,
    ...overrides,
  };
}
