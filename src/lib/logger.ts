/**
 * Stampboard — src/lib/logger.ts
 * WHAT: Pino logger with light redaction and Sentry capture on error-level logs.
 * FLOWS: create logger → redact helpers → hook to captureException on error logs
 * DOCS:
 *  - pino: https://getpino.io/#/docs/api
 *  - Sentry Node SDK: https://docs.sentry.io/platforms/javascript/guides/node/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import pino from "pino";

const dsnRe = /(https?:\/\/)([^:@]+):[^@]+@/gi;
const controlRe = /[\u0000-\u001f\u007f]/g;

// Only warn once per process if the Sentry module can't be loaded
let sentryImportWarned = false;

/**
 * Sanitizes strings before logging. Use on participant names and any other
 * form input. Truncates at 300 chars.
 */
export function redact(value: string): string {
  if (!value) return "";
  let sanitized = value.replace(controlRe, " ").replace(/\s+/g, " ").trim();
  sanitized = sanitized.replace(dsnRe, "$1$2:[redacted]@");
  if (sanitized.length > 300) {
    sanitized = `${sanitized.slice(0, 300)}...`;
  }
  return sanitized;
}

function serializeErr(e: unknown) {
  if (!(e instanceof Error)) {
    return { message: String(e) };
  }
  return {
    name: e.name,
    code: "code" in e ? e.code : undefined,
    kind: "kind" in e ? e.kind : undefined,
    message: e.message,
    stack: e.stack,
  };
}

/**
 * Pretty printing under Vitest and when LOG_PRETTY=true on a TTY;
 * newline-delimited JSON everywhere else.
 */
const logLevel = process.env.LOG_LEVEL ?? "info";
const isVitest = !!process.env.VITEST_WORKER_ID;
const wantPretty = isVitest || (process.env.LOG_PRETTY === "true" && process.stdout.isTTY);

export const logger = pino({
  level: logLevel,
  ...(wantPretty
    ? {
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "HH:MM:ss.l",
            ignore: "pid,hostname",
            singleLine: false,
          },
        },
      }
    : {}),
  base: undefined,
  serializers: {
    err: serializeErr,
  },
  hooks: {
    /**
     * Error-level logs carrying an Error (first arg, or `{ err }`) are
     * forwarded to Sentry. A no-op when no DSN is configured.
     */
    logMethod(args, method, level) {
      if (level >= pino.levels.values.error) {
        const firstArg: unknown = args[0];
        const errorCandidate =
          firstArg instanceof Error
            ? firstArg
            : firstArg && typeof firstArg === "object" && "err" in firstArg
              ? firstArg.err
              : undefined;

        if (errorCandidate instanceof Error) {
          const secondArg: unknown = args[1];
          const message = typeof secondArg === "string" ? secondArg : undefined;
          const label = pino.levels.labels[level] ?? "error";

          // Dynamic import keeps the logger free of a hard Sentry dependency at load time
          import("./sentry.js")
            .then(({ captureException, isSentryEnabled }) => {
              if (isSentryEnabled()) {
                captureException(errorCandidate, { message, level: label });
              }
            })
            .catch((importErr: unknown) => {
              if (!sentryImportWarned) {
                sentryImportWarned = true;
                console.warn("[logger] Failed to import Sentry module:", serializeErr(importErr).message);
              }
            });
        }
      }

      return method.apply(this, args);
    },
  },
});
