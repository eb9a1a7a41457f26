/**
 * Stampboard — src/features/checkin/service.ts
 * WHAT: The check-in action: validate the form, look up points, append one record per name.
 * FLOWS:
 *  - checkIn(ctx, input) → splitNames → for each name: store.append → CheckInOutcome
 *
 * Duplicates do not fail the batch; they are listed in the outcome so the
 * page can say who was already checked in. Any other error stops the batch.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { categoryPoints, type PointsConfig } from "../../config/pointsConfig.js";
import { DuplicateCheckInError, ValidationError } from "../../lib/errors.js";
import { logger } from "../../lib/logger.js";
import { ctx as reqCtx } from "../../lib/reqctx.js";
import { calendarDate, isIsoDate } from "../../lib/time.js";
import { splitNames } from "./names.js";
import type { CheckInStore } from "./store.js";
import type { CheckInOutcome } from "./types.js";

/**
 * Everything a handler needs, passed explicitly rather than held in module state.
 */
export type CheckInContext = {
  store: CheckInStore;
  config: PointsConfig;
  /** IANA zone used to turn the check-in time into a calendar date */
  timeZone: string;
  /** Unix seconds */
  now: () => number;
};

export type CheckInInput = {
  eventId: string;
  category: string;
  /** Raw name box; may hold several names */
  names: string;
  /** Event date from the link; defaults to today in ctx.timeZone */
  date?: string;
};

export function checkIn(ctx: CheckInContext, input: CheckInInput): CheckInOutcome {
  const eventId = input.eventId.trim();
  const category = input.category.trim();

  if (!eventId) {
    throw new ValidationError("eventId", "Event id is required.");
  }

  const points = categoryPoints(ctx.config, category);
  if (points === null) {
    const known = ctx.config.categories.map((c) => c.category).join(", ");
    throw new ValidationError("category", `Unknown category "${category}". Choose one of: ${known}.`);
  }

  const names = splitNames(input.names);
  if (names.length === 0) {
    throw new ValidationError("names", "Enter at least one name.");
  }

  const timestamp = ctx.now();
  const explicitDate = input.date?.trim();
  if (explicitDate && !isIsoDate(explicitDate)) {
    throw new ValidationError("date", `Date must be YYYY-MM-DD, got "${explicitDate}".`);
  }
  const date = explicitDate || calendarDate(timestamp, ctx.timeZone);

  const outcome: CheckInOutcome = { checkedIn: [], duplicates: [] };
  for (const participantName of names) {
    try {
      outcome.checkedIn.push(
        ctx.store.append({ eventId, category, participantName, date, timestamp, points })
      );
    } catch (err) {
      if (err instanceof DuplicateCheckInError) {
        outcome.duplicates.push(participantName);
        continue;
      }
      throw err;
    }
  }

  logger.info(
    {
      evt: "checkin_batch",
      traceId: reqCtx().traceId,
      eventId,
      category,
      date,
      checkedIn: outcome.checkedIn.length,
      duplicates: outcome.duplicates.length,
    },
    "check-in batch processed"
  );

  return outcome;
}
