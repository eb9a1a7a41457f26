/**
 * Stampboard — src/features/checkin/guard.ts
 * WHAT: Decides whether a check-in would duplicate an existing record.
 * FLOWS: normalizeName(raw) → uniquenessKey(fields) → isDuplicate(reader, fields)
 *
 * A record is a duplicate when event id, category and date match exactly and the
 * participant names normalize to the same key.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { CheckInKey } from "./types.js";

/**
 * The name key: NFKC (folds full-width letters and digits), trimmed, inner
 * whitespace collapsed to one space, lower-cased.
 *
 * @example
 * normalizeName("  Alice   Chen ") // "alice chen"
 * normalizeName("ＡＬＩＣＥ")       // "alice"
 */
export function normalizeName(raw: string): string {
  return raw.normalize("NFKC").trim().replace(/\s+/g, " ").toLowerCase();
}

export interface UniquenessKey {
  eventId: string;
  category: string;
  date: string;
  nameKey: string;
}

export function uniquenessKey(fields: CheckInKey): UniquenessKey {
  return {
    eventId: fields.eventId,
    category: fields.category,
    date: fields.date,
    nameKey: normalizeName(fields.participantName),
  };
}

/** Read side of the record store the guard needs. */
export interface DuplicateReader {
  hasKey(key: UniquenessKey): boolean;
}

export function isDuplicate(reader: DuplicateReader, fields: CheckInKey): boolean {
  return reader.hasKey(uniquenessKey(fields));
}
