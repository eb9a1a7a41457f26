/**
 * Stampboard — scripts/import-csv.ts
 * WHAT: Loads check-ins from a CSV export into the database.
 * USAGE:
 *   tsx scripts/import-csv.ts <file.csv>             # Import into DB_PATH
 *   tsx scripts/import-csv.ts <file.csv> --dry-run   # Report what would happen
 *
 * Exit codes: 0 ok, 1 bad usage or unreadable file, 2 some rows were rejected.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import fs from "node:fs";
import { closeDatabase, openDatabase } from "../src/db/db.js";
import { importCsv } from "../src/features/checkin/importer.js";
import { CheckInStore } from "../src/features/checkin/store.js";
import { env } from "../src/lib/env.js";

const args = process.argv.slice(2);
const dryRun = args.includes("--dry-run");
const file = args.find((a) => !a.startsWith("--"));

async function main(): Promise<number> {
  if (!file) {
    console.error("Usage: tsx scripts/import-csv.ts <file.csv> [--dry-run]");
    return 1;
  }

  let text: string;
  try {
    text = fs.readFileSync(file, "utf8");
  } catch (err) {
    console.error(`Cannot read ${file}: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }

  const db = openDatabase(env.DB_PATH);
  try {
    const report = importCsv(new CheckInStore(db), text, { dryRun });

    console.log(`${dryRun ? "[dry-run] " : ""}${file} → ${env.DB_PATH}`);
    console.log(`  imported:   ${report.imported}`);
    console.log(`  duplicates: ${report.duplicates} (skipped)`);
    console.log(`  rejected:   ${report.errors.length}`);
    for (const e of report.errors) {
      console.log(`    row ${e.line}: ${e.message}`);
    }
    return report.errors.length > 0 ? 2 : 0;
  } finally {
    await closeDatabase(db);
  }
}

main()
  .then((code) => process.exit(code))
  .catch((err: unknown) => {
    console.error("Import failed:", err);
    process.exit(1);
  });
