/**
 * Stampboard — src/lib/sentry.ts
 * WHAT: Sentry bootstrap and small helpers for capture.
 * FLOWS: initializeSentry() → isSentryEnabled → captureException → flushSentry on shutdown
 * DOCS:
 *  - Sentry Node SDK: https://docs.sentry.io/platforms/javascript/guides/node/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import * as Sentry from "@sentry/node";
import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { env } from "./env.js";
import { logger } from "./logger.js";

let sentryEnabled = false;

/** Structural check only: https://{key}@{host}/{project} */
export function hasValidDsn(dsn: string | undefined): dsn is string {
  if (!dsn) return false;
  try {
    const parsed = new URL(dsn);
    return (
      (parsed.protocol === "https:" || parsed.protocol === "http:") &&
      parsed.username.length > 0 &&
      parsed.pathname.length > 1
    );
  } catch {
    return false;
  }
}

const packageJsonSchema = z.object({ version: z.string() });

function getVersion(): string {
  try {
    const packagePath = path.join(process.cwd(), "package.json");
    const parsed = packageJsonSchema.safeParse(JSON.parse(fs.readFileSync(packagePath, "utf-8")));
    return parsed.success ? parsed.data.version : "unknown";
  } catch {
    return "unknown";
  }
}

/**
 * Initialize Sentry error tracking.
 * Only activates if SENTRY_DSN is set and we're not running under Vitest.
 */
export function initializeSentry(): void {
  if (process.env.VITEST_WORKER_ID) return;

  if (!hasValidDsn(env.SENTRY_DSN)) {
    logger.info("Sentry DSN missing or invalid, error tracking disabled");
    return;
  }

  try {
    Sentry.init({
      dsn: env.SENTRY_DSN,
      environment: env.SENTRY_ENVIRONMENT || env.NODE_ENV,
      release: `stampboard@${getVersion()}`,
      tracesSampleRate: env.SENTRY_TRACES_SAMPLE_RATE,
      integrations: [
        Sentry.consoleIntegration(),
        Sentry.httpIntegration(),
        Sentry.onUnhandledRejectionIntegration({ mode: "warn" }),
      ],
      // Participant names are personal data; keep them out of request bodies sent upstream
      beforeSend(event) {
        if (event.request?.data) {
          event.request.data = "[REDACTED]";
        }
        return event;
      },
      debug: env.NODE_ENV === "development",
    });

    sentryEnabled = true;
    logger.info({ environment: env.SENTRY_ENVIRONMENT || env.NODE_ENV }, "Sentry initialized");
  } catch (err) {
    logger.error({ err }, "Failed to initialize Sentry");
    sentryEnabled = false;
  }
}

export function isSentryEnabled(): boolean {
  return sentryEnabled;
}

/**
 * Capture an exception in Sentry
 */
export function captureException(error: unknown, context?: Record<string, unknown>): string | null {
  if (!sentryEnabled) return null;

  return Sentry.captureException(error, {
    contexts: context ? { custom: context } : undefined,
  });
}

/**
 * Flush any pending events (use before shutdown)
 */
export async function flushSentry(timeout = 2000): Promise<boolean> {
  if (!sentryEnabled) return true;

  try {
    return await Sentry.close(timeout);
  } catch (err) {
    logger.error({ err }, "Failed to flush Sentry events");
    return false;
  }
}
