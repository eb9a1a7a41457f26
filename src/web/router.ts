/**
 * Stampboard — src/web/router.ts
 * WHAT: Maps a request to a handler and turns the result (or the error) into a response.
 * FLOWS:
 *  - route(app, req) → match pathname + method → handler → WebResponse
 *  - thrown errors → classifyError → status + HTML (or JSON under /api)
 *
 * NOTE: No sockets in here. server.ts adapts node:http to this; tests call route() directly.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { savePointsConfig, type PointsConfig } from "../config/pointsConfig.js";
import {
  fullLog,
  leaderboard,
  participantsOn,
  personalSummary,
} from "../features/checkin/queries.js";
import { checkIn } from "../features/checkin/service.js";
import type { CheckInStore } from "../features/checkin/store.js";
import { generateQr } from "../features/qr/generate.js";
import { parseCheckInParams } from "../features/qr/link.js";
import { checkInsToCsv } from "../lib/csv.js";
import { ValidationError, classifyError, httpStatusFor, userMessageFor } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { ctx } from "../lib/reqctx.js";
import { isIsoDate } from "../lib/time.js";
import {
  checkInPage,
  errorPage,
  historyPage,
  indexPage,
  leaderboardPage,
  logPage,
  participantsPage,
  qrPage,
} from "./views.js";

/**
 * Shared by every request. `config` is replaced in place by PUT /api/config.
 */
export type AppContext = {
  store: CheckInStore;
  config: PointsConfig;
  configPath: string;
  /** Check-in page URL the QR codes point at */
  baseUrl: string;
  timeZone: string;
  now: () => number;
  startedAt: number;
};

export type WebRequest = {
  method: string;
  /** Path plus query string, as node:http gives it */
  url: string;
  body?: string;
};

export type WebResponse = {
  status: number;
  headers: Record<string, string>;
  body: string | Buffer;
};

const HTML = "text/html; charset=utf-8";
const JSON_TYPE = "application/json; charset=utf-8";

function html(status: number, body: string): WebResponse {
  return { status, headers: { "Content-Type": HTML }, body };
}

function json(status: number, value: unknown): WebResponse {
  return { status, headers: { "Content-Type": JSON_TYPE }, body: JSON.stringify(value) };
}

function optionalDate(params: URLSearchParams, field: string): string {
  const value = params.get(field)?.trim() ?? "";
  if (value && !isIsoDate(value)) {
    throw new ValidationError(field, `${field} must be a date in YYYY-MM-DD form.`);
  }
  return value;
}

function optionalLimit(params: URLSearchParams): number | undefined {
  const raw = params.get("limit")?.trim();
  if (!raw) return undefined;
  if (!/^\d+$/.test(raw)) {
    throw new ValidationError("limit", "limit must be a whole number.");
  }
  return Number(raw);
}

function safeFilePart(value: string): string {
  return value.replace(/[^A-Za-z0-9._-]+/g, "_").slice(0, 80) || "event";
}

type Handler = (app: AppContext, params: URLSearchParams, req: WebRequest) => WebResponse | Promise<WebResponse>;

async function showQr(app: AppContext, params: URLSearchParams): Promise<WebResponse> {
  const link = parseCheckInParams(params);
  if (!link.eventId) {
    return html(200, qrPage({ link, config: app.config }));
  }
  try {
    const result = await generateQr(app.baseUrl, link);
    return html(200, qrPage({ link, config: app.config, result }));
  } catch (err) {
    const classified = classifyError(err);
    if (classified.kind !== "encoding") throw err;
    return html(httpStatusFor(classified), qrPage({ link, config: app.config, error: userMessageFor(classified) }));
  }
}

async function downloadQr(app: AppContext, params: URLSearchParams): Promise<WebResponse> {
  const link = parseCheckInParams(params);
  const { png } = await generateQr(app.baseUrl, link);
  return {
    status: 200,
    headers: {
      "Content-Type": "image/png",
      "Content-Disposition": `attachment; filename="qr-${safeFilePart(link.eventId)}.png"`,
    },
    body: png,
  };
}

function submitCheckIn(app: AppContext, _params: URLSearchParams, req: WebRequest): WebResponse {
  const form = new URLSearchParams(req.body ?? "");
  const link = parseCheckInParams(form);
  const names = form.get("names") ?? "";

  try {
    const outcome = checkIn(app, { ...link, names });
    // Everyone named was already checked in
    const status = outcome.checkedIn.length === 0 ? 409 : 200;
    return html(status, checkInPage({ link, config: app.config, outcome }));
  } catch (err) {
    const classified = classifyError(err);
    if (classified.kind !== "validation") throw err;
    return html(400, checkInPage({ link, config: app.config, names, error: userMessageFor(classified) }));
  }
}

function showHistory(app: AppContext, params: URLSearchParams): WebResponse {
  const name = params.get("name")?.trim() ?? "";
  const from = optionalDate(params, "from");
  const to = optionalDate(params, "to");
  const summary = name
    ? personalSummary(app.store, name, { from: from || undefined, to: to || undefined }, app.config.rewards)
    : undefined;
  return html(200, historyPage({ name, from, to, summary }));
}

function showLeaderboard(app: AppContext, params: URLSearchParams): WebResponse {
  const eventId = params.get("event")?.trim() ?? "";
  const entries = leaderboard(app.store, { eventId: eventId || undefined, limit: optionalLimit(params) });
  return html(200, leaderboardPage(entries, eventId));
}

function showParticipants(app: AppContext, params: URLSearchParams): WebResponse {
  const date = optionalDate(params, "date");
  const category = params.get("category")?.trim() ?? "";
  const keyword = params.get("keyword")?.trim() ?? "";
  const records = participantsOn(app.store, {
    date: date || undefined,
    category: category || undefined,
    keyword,
  });
  return html(200, participantsPage({ config: app.config, date, category, keyword, records }));
}

function showLog(app: AppContext, params: URLSearchParams): WebResponse {
  const eventId = params.get("event")?.trim() ?? "";
  return html(200, logPage(fullLog(app.store, { eventId: eventId || undefined }), eventId));
}

function exportCsv(app: AppContext, params: URLSearchParams): WebResponse {
  const eventId = params.get("event")?.trim() ?? "";
  const records = fullLog(app.store, { eventId: eventId || undefined });
  const filename = eventId ? `checkins-${safeFilePart(eventId)}.csv` : "checkins.csv";
  return {
    status: 200,
    headers: {
      "Content-Type": "text/csv; charset=utf-8",
      "Content-Disposition": `attachment; filename="${filename}"`,
    },
    body: checkInsToCsv(records, { bom: true }),
  };
}

function updateConfig(app: AppContext, _params: URLSearchParams, req: WebRequest): WebResponse {
  let input: unknown;
  try {
    input = JSON.parse(req.body ?? "");
  } catch {
    throw new ValidationError("config", "Request body must be JSON.");
  }
  app.config = savePointsConfig(app.configPath, input);
  return json(200, app.config);
}

function health(app: AppContext): WebResponse {
  return json(200, {
    status: "ok",
    records: app.store.count(),
    uptimeSeconds: app.now() - app.startedAt,
    timestamp: new Date().toISOString(),
  });
}

const ROUTES: Record<string, Partial<Record<string, Handler>>> = {
  "/": { GET: (app) => html(200, indexPage(app.config)) },
  "/qr": { GET: showQr },
  "/qr.png": { GET: downloadQr },
  "/checkin": {
    GET: (app, params) => html(200, checkInPage({ link: parseCheckInParams(params), config: app.config })),
    POST: submitCheckIn,
  },
  "/history": { GET: showHistory },
  "/leaderboard": { GET: showLeaderboard },
  "/participants": { GET: showParticipants },
  "/log": { GET: showLog },
  "/export.csv": { GET: exportCsv },
  "/api/config": {
    GET: (app) => json(200, app.config),
    PUT: updateConfig,
  },
  "/health": { GET: health },
};

function errorResponse(pathname: string, err: unknown): WebResponse {
  const classified = classifyError(err);
  const status = httpStatusFor(classified);
  const message = userMessageFor(classified);

  if (status >= 500) {
    logger.error({ err, traceId: ctx().traceId, pathname, kind: classified.kind }, "[web] request failed");
  } else {
    logger.warn({ traceId: ctx().traceId, pathname, kind: classified.kind, error: classified.message }, "[web] request rejected");
  }

  if (pathname.startsWith("/api/")) {
    return json(status, { error: classified.kind, message });
  }
  return html(status, errorPage(status, message));
}

export async function route(app: AppContext, req: WebRequest): Promise<WebResponse> {
  const url = new URL(req.url, "http://localhost");
  const methods = Object.hasOwn(ROUTES, url.pathname) ? ROUTES[url.pathname] : undefined;

  if (!methods) {
    return html(404, errorPage(404, `No page at ${url.pathname}.`));
  }

  const handler = methods[req.method.toUpperCase()];
  if (!handler) {
    const allow = Object.keys(methods).join(", ");
    return {
      status: 405,
      headers: { "Content-Type": "text/plain; charset=utf-8", Allow: allow },
      body: "Method not allowed",
    };
  }

  try {
    return await handler(app, url.searchParams, req);
  } catch (err) {
    return errorResponse(url.pathname, err);
  }
}
