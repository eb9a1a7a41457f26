/**
 * Stampboard — src/features/qr/link.ts
 * WHAT: Builds and reads the check-in link a QR code points at.
 * FLOWS:
 *  - buildCheckInUrl(base, { eventId, category?, date? }) → "<base>?event=<id>&..."
 *  - parseCheckInParams(searchParams) → form defaults
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { EncodingError } from "../../lib/errors.js";

export type CheckInLink = {
  eventId: string;
  /** Pre-selects the category on the form */
  category?: string;
  /** Event date (YYYY-MM-DD) to record instead of today's */
  date?: string;
};

export const LINK_PARAMS = {
  eventId: "event",
  category: "category",
  date: "date",
} as const;

/**
 * Query parameters already on the base URL are kept. Throws EncodingError for
 * a blank event id or a base URL that does not parse.
 */
export function buildCheckInUrl(baseUrl: string, link: CheckInLink): string {
  const eventId = link.eventId.trim();
  if (!eventId) {
    throw new EncodingError("Event id is empty.");
  }

  let url: URL;
  try {
    url = new URL(baseUrl);
  } catch (err) {
    throw new EncodingError(`Base URL "${baseUrl}" is not a valid URL.`, { cause: err });
  }

  url.searchParams.set(LINK_PARAMS.eventId, eventId);
  const category = link.category?.trim();
  if (category) url.searchParams.set(LINK_PARAMS.category, category);
  const date = link.date?.trim();
  if (date) url.searchParams.set(LINK_PARAMS.date, date);

  return url.toString();
}

export function parseCheckInParams(params: URLSearchParams): Required<CheckInLink> {
  return {
    eventId: params.get(LINK_PARAMS.eventId)?.trim() ?? "",
    category: params.get(LINK_PARAMS.category)?.trim() ?? "",
    date: params.get(LINK_PARAMS.date)?.trim() ?? "",
  };
}
