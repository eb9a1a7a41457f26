/**
 * Stampboard — tests/setup.ts
 * WHAT: Global Vitest setup, run before every test file (setupFiles in vitest.config.ts).
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { afterEach, vi } from "vitest";

// Set before any test file imports src/lib/env.ts, so a developer's .env
// cannot point tests at a real database or Sentry project
process.env.SENTRY_DSN = "";
process.env.DB_PATH = ":memory:";

afterEach(() => {
  // A test using vi.useFakeTimers() must not leak into the next one
  vi.clearAllTimers();
  vi.useRealTimers();
});
