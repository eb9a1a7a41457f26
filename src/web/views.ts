/**
 * Stampboard — src/web/views.ts
 * WHAT: HTML for every page. Plain template strings, no client-side script.
 *
 * Every value that came from a user or the database goes through escapeHtml.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { PointsConfig } from "../config/pointsConfig.js";
import type {
  CheckInOutcome,
  LeaderboardEntry,
  PersonalSummary,
  StoredCheckIn,
} from "../features/checkin/types.js";
import type { CheckInLink } from "../features/qr/link.js";
import { formatUtc } from "../lib/time.js";

export function escapeHtml(unsafe: string): string {
  return unsafe
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#039;");
}

const NAV = [
  ["/", "Home"],
  ["/qr", "QR code"],
  ["/checkin", "Check in"],
  ["/history", "My points"],
  ["/leaderboard", "Leaderboard"],
  ["/participants", "By date"],
  ["/log", "Full log"],
] as const;

export function layout(title: string, body: string): string {
  const nav = NAV.map(([href, label]) => `<a href="${href}">${label}</a>`).join(" · ");
  return `<!DOCTYPE html>
<html lang="en">
  <head>
    <meta charset="utf-8">
    <meta name="viewport" content="width=device-width, initial-scale=1">
    <title>${escapeHtml(title)} · Stampboard</title>
  </head>
  <body style="font-family: system-ui; padding: 1rem; max-width: 760px; margin: 0 auto;">
    <nav>${nav}</nav>
    <h1>${escapeHtml(title)}</h1>
${body}
  </body>
</html>
`;
}

export type Notice = { tone: "ok" | "error"; text: string };

function notice(n: Notice | undefined): string {
  if (!n) return "";
  const color = n.tone === "ok" ? "#1a7f37" : "#cf222e";
  return `<p role="${n.tone === "ok" ? "status" : "alert"}" style="color: ${color};">${escapeHtml(n.text)}</p>`;
}

function categoryOptions(config: PointsConfig, selected: string, includeAll = false): string {
  const options = config.categories.map(
    (c) =>
      `<option value="${escapeHtml(c.category)}"${c.category === selected ? " selected" : ""}>` +
      `${escapeHtml(c.category)} (+${c.points})</option>`
  );
  if (includeAll) {
    options.unshift(`<option value=""${selected === "" ? " selected" : ""}>All categories</option>`);
  }
  return options.join("");
}

function recordTable(records: readonly StoredCheckIn[]): string {
  if (records.length === 0) {
    return "<p>No check-ins yet.</p>";
  }
  const rows = records
    .map(
      (r) =>
        `<tr><td>${escapeHtml(formatUtc(r.timestamp))}</td><td>${escapeHtml(r.participantName)}</td>` +
        `<td>${escapeHtml(r.eventId)}</td><td>${escapeHtml(r.category)}</td>` +
        `<td>${escapeHtml(r.date)}</td><td>${r.points}</td></tr>`
    )
    .join("\n");
  return `<table>
  <thead><tr><th>Time</th><th>Name</th><th>Event</th><th>Category</th><th>Date</th><th>Points</th></tr></thead>
  <tbody>
${rows}
  </tbody>
</table>`;
}

export function indexPage(config: PointsConfig): string {
  const categories = config.categories
    .map((c) => `<li><strong>${escapeHtml(c.category)}</strong> +${c.points}: ${escapeHtml(c.tips)}</li>`)
    .join("");
  const rewards = [...config.rewards]
    .sort((a, b) => a.threshold - b.threshold)
    .map((r) => `<li>${r.threshold} points: ${escapeHtml(r.reward)}</li>`)
    .join("");
  return layout(
    "Event check-in",
    `<p>Scan an event QR code to check in and collect points.</p>
<h2>Categories</h2><ul>${categories}</ul>
<h2>Rewards</h2><ul>${rewards}</ul>`
  );
}

export type QrView = {
  link: Required<CheckInLink>;
  config: PointsConfig;
  result?: { url: string; dataUrl: string };
  error?: string;
};

export function qrPage(view: QrView): string {
  const { link } = view;
  let output = "";
  if (view.result) {
    const pngHref = `/qr.png?${new URLSearchParams({
      event: link.eventId,
      category: link.category,
      date: link.date,
    }).toString()}`;
    output = `<p><img src="${escapeHtml(view.result.dataUrl)}" alt="Check-in QR code"></p>
<p>Link: <a href="${escapeHtml(view.result.url)}">${escapeHtml(view.result.url)}</a></p>
<p><a href="${escapeHtml(pngHref)}">Download PNG</a></p>`;
  }
  return layout(
    "Event QR code",
    `${notice(view.error ? { tone: "error", text: view.error } : undefined)}
<form method="get" action="/qr">
  <label>Event id <input name="event" value="${escapeHtml(link.eventId)}" required></label>
  <label>Category <select name="category"><option value="">Let attendees choose</option>${categoryOptions(view.config, link.category)}</select></label>
  <label>Event date <input type="date" name="date" value="${escapeHtml(link.date)}"></label>
  <button type="submit">Generate</button>
</form>
${output}`
  );
}

export type CheckInView = {
  link: Required<CheckInLink>;
  config: PointsConfig;
  names?: string;
  outcome?: CheckInOutcome;
  error?: string;
};

function outcomeNotices(outcome: CheckInOutcome): string {
  const parts: string[] = [];
  if (outcome.checkedIn.length > 0) {
    const who = outcome.checkedIn.map((r) => r.participantName).join(", ");
    const points = outcome.checkedIn[0]?.points ?? 0;
    parts.push(notice({ tone: "ok", text: `Checked in: ${who} (+${points} each)` }));
  }
  if (outcome.duplicates.length > 0) {
    parts.push(notice({ tone: "error", text: `Already checked in: ${outcome.duplicates.join(", ")}` }));
  }
  return parts.join("\n");
}

export function checkInPage(view: CheckInView): string {
  const { link } = view;
  const dateField = link.date
    ? `<input type="hidden" name="date" value="${escapeHtml(link.date)}"><p>Event date: ${escapeHtml(link.date)}</p>`
    : "";
  return layout(
    "Check in",
    `${view.outcome ? outcomeNotices(view.outcome) : ""}
${notice(view.error ? { tone: "error", text: view.error } : undefined)}
<form method="post" action="/checkin">
  <label>Event id <input name="event" value="${escapeHtml(link.eventId)}" required></label>
  <label>Category <select name="category">${categoryOptions(view.config, link.category)}</select></label>
  ${dateField}
  <label>Name(s) <textarea name="names" rows="3" placeholder="One or more names, separated by commas or new lines">${escapeHtml(view.names ?? "")}</textarea></label>
  <button type="submit">Check in</button>
</form>`
  );
}

export type HistoryView = {
  name: string;
  from: string;
  to: string;
  summary?: PersonalSummary;
};

export function historyPage(view: HistoryView): string {
  let result = "";
  if (view.summary) {
    const s = view.summary;
    const unlocked = s.unlockedRewards.length
      ? `<p>Unlocked: ${s.unlockedRewards.map((r) => escapeHtml(r.reward)).join(", ")}</p>`
      : "<p>No rewards unlocked yet.</p>";
    const next = s.nextReward
      ? `<p>${s.nextReward.pointsNeeded} more point(s) to unlock: ${escapeHtml(s.nextReward.reward)}</p>`
      : "<p>Every reward unlocked.</p>";
    result = `<h2>${escapeHtml(s.participantName)}: ${s.totalPoints} point(s)</h2>
${unlocked}
${next}
${recordTable(s.records)}`;
  }
  return layout(
    "My points",
    `<form method="get" action="/history">
  <label>Name <input name="name" value="${escapeHtml(view.name)}" required></label>
  <label>From <input type="date" name="from" value="${escapeHtml(view.from)}"></label>
  <label>To <input type="date" name="to" value="${escapeHtml(view.to)}"></label>
  <button type="submit">Show</button>
</form>
${result}`
  );
}

export function leaderboardPage(entries: readonly LeaderboardEntry[], eventId: string): string {
  const body =
    entries.length === 0
      ? "<p>No check-ins yet.</p>"
      : `<table>
  <thead><tr><th>#</th><th>Name</th><th>Points</th><th>Check-ins</th></tr></thead>
  <tbody>
${entries
  .map(
    (e) =>
      `<tr><td>${e.rank}</td><td>${escapeHtml(e.participantName)}</td><td>${e.totalPoints}</td><td>${e.checkIns}</td></tr>`
  )
  .join("\n")}
  </tbody>
</table>`;
  return layout(
    "Leaderboard",
    `<form method="get" action="/leaderboard">
  <label>Event id <input name="event" value="${escapeHtml(eventId)}"></label>
  <button type="submit">Filter</button>
</form>
${body}`
  );
}

export type ParticipantsView = {
  config: PointsConfig;
  date: string;
  category: string;
  keyword: string;
  records: readonly StoredCheckIn[];
};

export function participantsPage(view: ParticipantsView): string {
  return layout(
    "Participants by date",
    `<form method="get" action="/participants">
  <label>Date <input type="date" name="date" value="${escapeHtml(view.date)}"></label>
  <label>Category <select name="category">${categoryOptions(view.config, view.category, true)}</select></label>
  <label>Event keyword <input name="keyword" value="${escapeHtml(view.keyword)}"></label>
  <button type="submit">Search</button>
</form>
<p>${view.records.length} check-in(s)</p>
${recordTable(view.records)}`
  );
}

export function logPage(records: readonly StoredCheckIn[], eventId: string): string {
  const exportHref = eventId ? `/export.csv?${new URLSearchParams({ event: eventId }).toString()}` : "/export.csv";
  return layout(
    "Full log",
    `<form method="get" action="/log">
  <label>Event id <input name="event" value="${escapeHtml(eventId)}"></label>
  <button type="submit">Filter</button>
</form>
<p><a href="${escapeHtml(exportHref)}">Download CSV</a></p>
${recordTable(records)}`
  );
}

export function errorPage(status: number, message: string): string {
  return layout(status === 404 ? "Not found" : "Error", notice({ tone: "error", text: message }));
}
