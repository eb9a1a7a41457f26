/**
 * Stampboard — tests/features/checkin/importer.test.ts
 * WHAT: Re-importing an exported CSV into a store.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

vi.mock("../../../src/lib/logger.js", () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
  redact: (value: string) => value,
}));

import { importCsv } from "../../../src/features/checkin/importer.js";
import { checkInsToCsv } from "../../../src/lib/csv.js";
import { createTestStore, makeRecord, type TestStoreContext } from "../../utils/dbFixtures.js";

describe("importCsv", () => {
  let source: TestStoreContext;
  let target: TestStoreContext;

  beforeEach(() => {
    source = createTestStore();
    target = createTestStore();
  });

  afterEach(() => {
    source.cleanup();
    target.cleanup();
  });

  it("copies an export into an empty store, preserving values and order", () => {
    source.store.append(makeRecord({ participantName: "陳小明" }));
    source.store.append(makeRecord({ participantName: "Bob", category: "workshop" }));
    const csv = checkInsToCsv(source.store.query(), { bom: true });

    const report = importCsv(target.store, csv);

    expect(report).toEqual({ imported: 2, duplicates: 0, errors: [] });
    expect(target.store.query()).toEqual(source.store.query());
  });

  it("skips rows that are already present", () => {
    source.store.append(makeRecord({ participantName: "Alice" }));
    source.store.append(makeRecord({ participantName: "Bob" }));
    target.store.append(makeRecord({ participantName: "alice" }));

    const report = importCsv(target.store, checkInsToCsv(source.store.query()));

    expect(report).toEqual({ imported: 1, duplicates: 1, errors: [] });
    expect(target.store.count()).toBe(2);
  });

  it("writes nothing on a dry run", () => {
    source.store.append(makeRecord({ participantName: "Alice" }));
    source.store.append(makeRecord({ participantName: "Bob" }));
    target.store.append(makeRecord({ participantName: "Alice" }));

    const report = importCsv(target.store, checkInsToCsv(source.store.query()), { dryRun: true });

    expect(report).toEqual({ imported: 1, duplicates: 1, errors: [] });
    expect(target.store.count()).toBe(1);
  });

  it("counts a repeated key within the file the same way on a dry run as on a real import", () => {
    const csv = [
      "event_id,category,participant_name,date,timestamp,points",
      "E1,keynote,Alice,2024-05-01,1714550400,10",
      "E1,keynote,alice,2024-05-01,1714550460,10",
      "E1,workshop,alice,2024-05-01,1714550520,5",
    ].join("\n");

    const planned = importCsv(target.store, csv, { dryRun: true });
    expect(planned).toEqual({ imported: 2, duplicates: 1, errors: [] });
    expect(target.store.count()).toBe(0);

    expect(importCsv(target.store, csv)).toEqual(planned);
    expect(target.store.count()).toBe(2);
  });

  it("rejects a timestamp outside the Date range and keeps the export readable", () => {
    const csv = "event_id,category,participant_name,date,timestamp,points\nE1,keynote,Alice,2024-05-01,99999999999999999999,10\n";

    expect(importCsv(target.store, csv)).toEqual({
      imported: 0,
      duplicates: 0,
      errors: [{ line: 2, message: 'invalid timestamp "99999999999999999999"' }],
    });
    expect(checkInsToCsv(target.store.query())).toBe("event_id,category,participant_name,date,timestamp,points\r\n");
  });

  it("passes CSV row errors through", () => {
    const csv = "event_id,category,participant_name,date,timestamp,points\nE1,keynote,Alice,2024-05-01,1714550400,x\n";

    expect(importCsv(target.store, csv)).toEqual({
      imported: 0,
      duplicates: 0,
      errors: [{ line: 2, message: 'invalid points "x"' }],
    });
  });
});
