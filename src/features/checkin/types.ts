/**
 * Stampboard — src/features/checkin/types.ts
 * WHAT: Shared types for check-in records, store filters and aggregate views.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

/**
 * One check-in as written to the backing table and the CSV export.
 */
export interface CheckInRecord {
  eventId: string;
  category: string;
  /** Trimmed, otherwise as entered */
  participantName: string;
  /** YYYY-MM-DD */
  date: string;
  /** Unix seconds */
  timestamp: number;
  points: number;
}

/** A record read back from SQLite; id gives insertion order. */
export interface StoredCheckIn extends CheckInRecord {
  id: number;
}

/** The four fields a check-in must be unique on. */
export type CheckInKey = Pick<CheckInRecord, "eventId" | "category" | "date" | "participantName">;

export type CheckInOrder = "insertion" | "newest";

export interface CheckInFilters {
  eventId?: string;
  /** Substring match on event id (the "event title keyword" search) */
  eventIdContains?: string;
  /** Matched by normalized name, not literally */
  participantName?: string;
  category?: string;
  /** Exact YYYY-MM-DD */
  date?: string;
  /** Inclusive YYYY-MM-DD lower bound */
  from?: string;
  /** Inclusive YYYY-MM-DD upper bound */
  to?: string;
  order?: CheckInOrder;
}

export interface LeaderboardEntry {
  rank: number;
  participantName: string;
  totalPoints: number;
  checkIns: number;
  /** Timestamp of the check-in that brought them to totalPoints */
  reachedAt: number;
}

export interface RewardTier {
  threshold: number;
  reward: string;
}

export interface NextReward extends RewardTier {
  pointsNeeded: number;
}

export interface PersonalSummary {
  participantName: string;
  totalPoints: number;
  records: StoredCheckIn[];
  unlockedRewards: RewardTier[];
  /** null once every tier is unlocked */
  nextReward: NextReward | null;
}

export interface CheckInOutcome {
  checkedIn: StoredCheckIn[];
  /** Names that already had a record for this event/category/date */
  duplicates: string[];
}
