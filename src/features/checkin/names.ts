/**
 * Stampboard — src/features/checkin/names.ts
 * WHAT: Turns the free-text name box into a list of participant names.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { normalizeName } from "./guard.js";

// ASCII and full-width parentheses, non-greedy so "A (x), B (y)" keeps B
const ANNOTATION_RE = /[（(][^（()）]*[）)]/g;
// Spaces are not separators: "Alice Chen" is one person
const SEPARATOR_RE = /[,，、;；\r\n]+/;

/**
 * splitNames
 * WHAT: Splits a submission holding one or more names.
 * HOW: Strips "(note)" annotations, splits on commas (ASCII or full-width),
 *      the ideographic comma, semicolons and line breaks, trims, then drops
 *      blanks and repeats. Names keep their inner spacing as typed; repeats
 *      are detected by name key and the first spelling wins.
 *
 * @example
 * splitNames("Alice, Bob (guest)\nalice、陳小明") // ["Alice", "Bob", "陳小明"]
 */
export function splitNames(raw: string): string[] {
  const seen = new Set<string>();
  const names: string[] = [];

  for (const part of raw.replace(ANNOTATION_RE, "").split(SEPARATOR_RE)) {
    const name = part.trim();
    if (!name) continue;
    const key = normalizeName(name);
    if (seen.has(key)) continue;
    seen.add(key);
    names.push(name);
  }

  return names;
}
