/**
 * Stampboard — src/lib/env.ts
 * WHAT: Environment loading/validation via dotenv + zod.
 * FLOWS: load .env → parse/validate → export typed env object
 * DOCS:
 *  - dotenv: https://github.com/motdotla/dotenv
 *  - zod: https://zod.dev
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import dotenv from "dotenv";
import path from "node:path";
import { z } from "zod";

// Tests set their variables before importing, so .env must not override them there.
const isTest = process.env.NODE_ENV === "test";
dotenv.config({ path: path.join(process.cwd(), ".env"), override: !isTest });

/**
 * Raw environment extraction. Every value is trimmed (stray whitespace from
 * copy-pasted .env lines), then validated in one pass below.
 */
const raw = {
  NODE_ENV: process.env.NODE_ENV?.trim(),
  DB_PATH: process.env.DB_PATH?.trim(),
  PUBLIC_BASE_URL: process.env.PUBLIC_BASE_URL?.trim(),
  WEB_PORT: process.env.WEB_PORT?.trim(),
  TIMEZONE: process.env.TIMEZONE?.trim(),
  POINTS_CONFIG_PATH: process.env.POINTS_CONFIG_PATH?.trim(),
  LOG_LEVEL: process.env.LOG_LEVEL?.trim(),
  SENTRY_DSN: process.env.SENTRY_DSN?.trim(),
  SENTRY_ENVIRONMENT: process.env.SENTRY_ENVIRONMENT?.trim(),
  SENTRY_TRACES_SAMPLE_RATE: process.env.SENTRY_TRACES_SAMPLE_RATE?.trim(),
};

function isKnownTimeZone(tz: string): boolean {
  try {
    new Intl.DateTimeFormat("en-CA", { timeZone: tz });
    return true;
  } catch {
    return false;
  }
}

const schema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  DB_PATH: z.string().min(1).default("data/checkins.db"),

  // The check-in form address that QR codes encode. Usually ends in /checkin.
  PUBLIC_BASE_URL: z.string().url().default("http://localhost:3000/checkin"),
  WEB_PORT: z.coerce.number().int().min(1).max(65535).default(3000),

  // Calendar used to turn a check-in timestamp into its YYYY-MM-DD date
  TIMEZONE: z
    .string()
    .default("UTC")
    .refine(isKnownTimeZone, { message: "TIMEZONE is not a known IANA time zone" }),

  POINTS_CONFIG_PATH: z.string().min(1).default("config/points.json"),

  LOG_LEVEL: z.string().optional(),

  // Sentry error tracking - disabled if DSN not provided
  SENTRY_DSN: z.string().optional(),
  SENTRY_ENVIRONMENT: z.string().optional(),
  SENTRY_TRACES_SAMPLE_RATE: z.coerce.number().min(0).max(1).default(0.1),
});

export type Env = z.infer<typeof schema>;

/**
 * safeParse so every problem is reported at once, then exit before anything
 * opens the database or binds a port.
 */
const parsed = schema.safeParse(raw);
if (!parsed.success) {
  const issues = parsed.error.issues.map((i) => `- ${i.path.join(".")}: ${i.message}`).join("\n");
  console.error(`Environment validation failed:\n${issues}`);
  process.exit(1);
}
export const env: Env = parsed.data;
