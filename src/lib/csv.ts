/**
 * Stampboard — src/lib/csv.ts
 * WHAT: CSV export and import for check-in records.
 * FLOWS:
 *  - checkInsToCsv(records) → header + one line per record
 *  - parseCsv(text) → rows of fields
 *  - recordsFromCsv(text) → validated CheckInRecords + per-line errors
 * DOCS:
 *  - RFC 4180 CSV: https://datatracker.ietf.org/doc/html/rfc4180
 *
 * Columns: event_id,category,participant_name,date,timestamp,points
 * timestamp is ISO-8601 UTC in the file and Unix seconds in memory.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { CheckInRecord } from "../features/checkin/types.js";
import { isIsoDate, isValidTs, isoToTs, tsToIso } from "./time.js";

export const CSV_COLUMNS = [
  "event_id",
  "category",
  "participant_name",
  "date",
  "timestamp",
  "points",
] as const;

export type CsvColumn = (typeof CSV_COLUMNS)[number];

/** Spreadsheet apps need this to read UTF-8 rather than the system code page */
export const UTF8_BOM = "\uFEFF";

/**
 * escapeCsvField
 * WHAT: Escapes a field for CSV output per RFC 4180.
 * HOW: Wraps in quotes if it contains comma/newline/quote; doubles internal quotes.
 */
export function escapeCsvField(value: string | number | null | undefined): string {
  if (value === null || value === undefined) {
    return "";
  }

  const str = String(value);

  if (str.includes(",") || str.includes("\n") || str.includes("\r") || str.includes('"')) {
    return `"${str.replace(/"/g, '""')}"`;
  }

  return str;
}

function recordToFields(record: CheckInRecord): Record<CsvColumn, string | number> {
  return {
    event_id: record.eventId,
    category: record.category,
    participant_name: record.participantName,
    date: record.date,
    timestamp: tsToIso(record.timestamp),
    points: record.points,
  };
}

/**
 * Serializes records with a header row. Lines end in \r\n per RFC 4180.
 */
export function checkInsToCsv(records: readonly CheckInRecord[], opts: { bom?: boolean } = {}): string {
  const header = CSV_COLUMNS.join(",");
  const lines = records.map((record) => {
    const fields = recordToFields(record);
    return CSV_COLUMNS.map((col) => escapeCsvField(fields[col])).join(",");
  });
  const body = [header, ...lines].join("\r\n") + "\r\n";
  return opts.bom ? UTF8_BOM + body : body;
}

/**
 * parseCsv
 * WHAT: Splits RFC 4180 text into rows of fields.
 * HOW: Single pass state machine; quoted fields may contain commas, quotes
 *      ("" → ") and line breaks. A leading BOM is dropped. Blank lines are skipped.
 */
export function parseCsv(text: string): string[][] {
  const input = text.startsWith(UTF8_BOM) ? text.slice(1) : text;
  const rows: string[][] = [];
  let row: string[] = [];
  let field = "";
  let inQuotes = false;
  // distinguishes an empty line from a line holding one empty quoted field
  let rowHasContent = false;

  const endField = () => {
    row.push(field);
    field = "";
  };
  const endRow = () => {
    endField();
    if (rowHasContent || row.length > 1) {
      rows.push(row);
    }
    row = [];
    rowHasContent = false;
  };

  for (let i = 0; i < input.length; i++) {
    const ch = input[i];

    if (inQuotes) {
      if (ch === '"') {
        if (input[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        field += ch;
      }
      continue;
    }

    if (ch === '"') {
      inQuotes = true;
      rowHasContent = true;
    } else if (ch === ",") {
      endField();
    } else if (ch === "\n" || ch === "\r") {
      if (ch === "\r" && input[i + 1] === "\n") i++;
      endRow();
    } else {
      field += ch;
      rowHasContent = true;
    }
  }

  if (field.length > 0 || row.length > 0 || rowHasContent) {
    endRow();
  }

  return rows;
}

export interface CsvRowError {
  /** 1-based row number; the header is row 1 */
  line: number;
  message: string;
}

export interface CsvImportResult {
  records: CheckInRecord[];
  errors: CsvRowError[];
}

function parseTimestamp(value: string): number | null {
  if (!/^\d+$/.test(value)) return isoToTs(value);
  const seconds = Number(value);
  return isValidTs(seconds) ? seconds : null;
}

/**
 * recordsFromCsv
 * WHAT: Reads an exported CSV back into records, in file order.
 * Column order in the header may differ from the export; extra columns are ignored.
 * A missing required column is reported once on line 1 and no rows are read.
 */
export function recordsFromCsv(text: string): CsvImportResult {
  const rows = parseCsv(text);
  if (rows.length === 0) {
    return { records: [], errors: [{ line: 1, message: "empty file" }] };
  }

  const header = rows[0].map((h) => h.trim());
  const index = new Map<CsvColumn, number>();
  const missing: string[] = [];
  for (const col of CSV_COLUMNS) {
    const at = header.indexOf(col);
    if (at === -1) missing.push(col);
    else index.set(col, at);
  }
  if (missing.length > 0) {
    return { records: [], errors: [{ line: 1, message: `missing column(s): ${missing.join(", ")}` }] };
  }

  const records: CheckInRecord[] = [];
  const errors: CsvRowError[] = [];

  rows.slice(1).forEach((row, i) => {
    const line = i + 2;
    const get = (col: CsvColumn): string => row[index.get(col) ?? -1] ?? "";

    const eventId = get("event_id").trim();
    const category = get("category").trim();
    const participantName = get("participant_name").trim();
    const date = get("date").trim();
    const timestamp = parseTimestamp(get("timestamp").trim());
    const pointsRaw = get("points").trim();
    const points = Number(pointsRaw);

    if (!eventId || !category || !participantName) {
      errors.push({ line, message: "event_id, category and participant_name are required" });
      return;
    }
    if (!isIsoDate(date)) {
      errors.push({ line, message: `invalid date "${date}"` });
      return;
    }
    if (timestamp === null) {
      errors.push({ line, message: `invalid timestamp "${get("timestamp")}"` });
      return;
    }
    if (pointsRaw === "" || !Number.isInteger(points)) {
      errors.push({ line, message: `invalid points "${pointsRaw}"` });
      return;
    }

    records.push({ eventId, category, participantName, date, timestamp, points });
  });

  return { records, errors };
}
