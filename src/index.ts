/**
 * Stampboard — src/index.ts
 * WHAT: Main process entrypoint. Opens the database, loads the points config and serves the web UI.
 * FLOWS:
 *  - Boot: Sentry → env → openDatabase → loadPointsConfig → startWebServer
 *  - Shutdown: SIGTERM/SIGINT → close server → close DB (flushes Sentry) → exit
 * DOCS:
 *  - Node process events: https://nodejs.org/api/process.html#event-uncaughtexception
 *  - Sentry Node SDK: https://docs.sentry.io/platforms/javascript/guides/node/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { initializeSentry, captureException } from "./lib/sentry.js";
initializeSentry();

import { loadPointsConfig } from "./config/pointsConfig.js";
import { closeDatabase, openDatabase } from "./db/db.js";
import { CheckInStore } from "./features/checkin/store.js";
import { env } from "./lib/env.js";
import { logger } from "./lib/logger.js";
import { nowUtc } from "./lib/time.js";
import type { AppContext } from "./web/router.js";
import { startWebServer } from "./web/server.js";

const UNCAUGHT_EXCEPTION_EXIT_DELAY_MS = 1000;

// ===== Global Error Handlers =====

process.on("unhandledRejection", (reason) => {
  const error = reason instanceof Error ? reason : new Error(String(reason));
  logger.error({ evt: "unhandled_rejection", err: error }, "[process] Unhandled promise rejection");
  captureException(error, { context: "unhandledRejection" });
});

process.on("uncaughtException", (error, origin) => {
  logger.error({ evt: "uncaught_exception", err: error, origin }, "[process] Uncaught exception");
  captureException(error, { context: "uncaughtException", origin });
  // Give Sentry time to flush, then exit
  setTimeout(() => process.exit(1), UNCAUGHT_EXCEPTION_EXIT_DELAY_MS);
});

// ===== Boot =====

const db = openDatabase(env.DB_PATH);

const app: AppContext = {
  store: new CheckInStore(db),
  config: loadPointsConfig(env.POINTS_CONFIG_PATH),
  configPath: env.POINTS_CONFIG_PATH,
  baseUrl: env.PUBLIC_BASE_URL,
  timeZone: env.TIMEZONE,
  now: nowUtc,
  startedAt: nowUtc(),
};

logger.info(
  {
    dbPath: env.DB_PATH,
    records: app.store.count(),
    categories: app.config.categories.map((c) => c.category),
    timeZone: app.timeZone,
  },
  "[startup] check-in store ready"
);

const server = startWebServer(app, env.WEB_PORT);

// ===== Graceful Shutdown =====

let isShuttingDown = false;

async function gracefulShutdown(signal: string): Promise<void> {
  if (isShuttingDown) {
    logger.warn({ signal }, "[shutdown] Already shutting down, ignoring");
    return;
  }
  isShuttingDown = true;
  logger.info({ signal }, "[shutdown] Graceful shutdown initiated");

  try {
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
    logger.debug("[shutdown] HTTP server closed");
  } catch (err) {
    logger.warn({ err }, "[shutdown] HTTP server close failed (non-fatal)");
  }

  await closeDatabase(db);
  logger.info("[shutdown] Graceful shutdown complete");
  process.exit(0);
}

process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"));
process.on("SIGINT", () => void gracefulShutdown("SIGINT"));
