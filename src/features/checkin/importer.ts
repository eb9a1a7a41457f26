/**
 * Stampboard — src/features/checkin/importer.ts
 * WHAT: Loads an exported CSV back into a store. Used by scripts/import-csv.ts.
 * FLOWS: recordsFromCsv(text) → store.append per record → ImportReport
 *
 * Rows that would duplicate an existing record are skipped and counted, so
 * importing the same file twice is harmless.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { recordsFromCsv, type CsvRowError } from "../../lib/csv.js";
import { DuplicateCheckInError } from "../../lib/errors.js";
import { uniquenessKey } from "./guard.js";
import type { CheckInStore } from "./store.js";

export type ImportReport = {
  imported: number;
  duplicates: number;
  /** Rows the CSV parser rejected; nothing was written for them */
  errors: CsvRowError[];
};

export function importCsv(store: CheckInStore, text: string, opts: { dryRun?: boolean } = {}): ImportReport {
  const { records, errors } = recordsFromCsv(text);
  const report: ImportReport = { imported: 0, duplicates: 0, errors };
  // Dry runs write nothing, so repeats within the file are tracked here
  const planned = new Set<string>();

  for (const record of records) {
    if (opts.dryRun) {
      const key = JSON.stringify(uniquenessKey(record));
      if (planned.has(key) || store.isDuplicate(record)) {
        report.duplicates += 1;
      } else {
        planned.add(key);
        report.imported += 1;
      }
      continue;
    }
    try {
      store.append(record);
      report.imported += 1;
    } catch (err) {
      if (!(err instanceof DuplicateCheckInError)) throw err;
      report.duplicates += 1;
    }
  }

  return report;
}
