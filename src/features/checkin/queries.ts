/**
 * Stampboard — src/features/checkin/queries.ts
 * WHAT: Read-only views over the check-in table.
 * FLOWS:
 *  - personalSummary → one participant's records, total and reward progress
 *  - leaderboard → per-participant totals, highest first
 *  - fullLog → every record, optionally for one event
 *  - participantsOn → who checked in on a date, newest first
 *
 * NOTE: Nothing is cached. Every call re-reads the store, so a check-in is visible
 * to the very next request.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { normalizeName } from "./guard.js";
import type { CheckInStore } from "./store.js";
import type {
  LeaderboardEntry,
  NextReward,
  PersonalSummary,
  RewardTier,
  StoredCheckIn,
} from "./types.js";

export type DateRange = {
  /** Inclusive YYYY-MM-DD */
  from?: string;
  /** Inclusive YYYY-MM-DD */
  to?: string;
};

export type LeaderboardOptions = {
  /** Top-N; omitted or 0 means everyone */
  limit?: number;
  eventId?: string;
};

export type ParticipantsOptions = {
  date?: string;
  category?: string;
  /** Substring of the event id */
  keyword?: string;
};

/**
 * rewardProgress
 * WHAT: Splits reward tiers into unlocked ones and the next one to aim for.
 * Tiers are considered in threshold order regardless of how they are configured.
 */
export function rewardProgress(
  totalPoints: number,
  rewards: readonly RewardTier[]
): { unlockedRewards: RewardTier[]; nextReward: NextReward | null } {
  const sorted = [...rewards].sort((a, b) => a.threshold - b.threshold);
  const unlockedRewards = sorted.filter((tier) => tier.threshold <= totalPoints);
  const next = sorted.find((tier) => tier.threshold > totalPoints);
  return {
    unlockedRewards,
    nextReward: next ? { ...next, pointsNeeded: next.threshold - totalPoints } : null,
  };
}

export function sumPoints(records: readonly StoredCheckIn[]): number {
  return records.reduce((total, record) => total + record.points, 0);
}

/**
 * personalSummary
 * WHAT: Everything one participant has earned, optionally limited to a date range.
 * The name is matched by its normalized key, so "alice " finds "Alice".
 */
export function personalSummary(
  store: CheckInStore,
  participantName: string,
  range: DateRange = {},
  rewards: readonly RewardTier[] = []
): PersonalSummary {
  const records = store.query({
    participantName,
    from: range.from,
    to: range.to,
  });
  const totalPoints = sumPoints(records);

  return {
    participantName: records[0]?.participantName ?? participantName.trim(),
    totalPoints,
    records,
    ...rewardProgress(totalPoints, rewards),
  };
}

type Tally = {
  participantName: string;
  totalPoints: number;
  checkIns: number;
  reachedAt: number;
};

/**
 * leaderboard
 * WHAT: Sums points per participant and ranks them.
 * HOW: Groups by name key (first-seen spelling is displayed). Sorted by total
 *      descending; equal totals go to whoever got there first, i.e. the earlier
 *      latest check-in, then alphabetically. Ranks are 1-based and unique.
 */
export function leaderboard(store: CheckInStore, opts: LeaderboardOptions = {}): LeaderboardEntry[] {
  const records = store.query({ eventId: opts.eventId });
  const tallies = new Map<string, Tally>();

  for (const record of records) {
    const key = normalizeName(record.participantName);
    const tally = tallies.get(key);
    if (tally) {
      tally.totalPoints += record.points;
      tally.checkIns += 1;
      tally.reachedAt = Math.max(tally.reachedAt, record.timestamp);
    } else {
      tallies.set(key, {
        participantName: record.participantName,
        totalPoints: record.points,
        checkIns: 1,
        reachedAt: record.timestamp,
      });
    }
  }

  const ranked = [...tallies.values()].sort(
    (a, b) =>
      b.totalPoints - a.totalPoints ||
      a.reachedAt - b.reachedAt ||
      a.participantName.localeCompare(b.participantName)
  );

  const limited = opts.limit && opts.limit > 0 ? ranked.slice(0, opts.limit) : ranked;
  return limited.map((tally, i) => ({ rank: i + 1, ...tally }));
}

export function fullLog(store: CheckInStore, opts: { eventId?: string } = {}): StoredCheckIn[] {
  return store.query({ eventId: opts.eventId });
}

/**
 * participantsOn
 * WHAT: The "who came" view: filter by date, category and event keyword, newest first.
 */
export function participantsOn(store: CheckInStore, opts: ParticipantsOptions = {}): StoredCheckIn[] {
  return store.query({
    date: opts.date,
    category: opts.category,
    eventIdContains: opts.keyword?.trim() || undefined,
    order: "newest",
  });
}
