/**
 * Stampboard — tests/lib/sentry.test.ts
 * WHAT: Sentry helpers stay inert without a DSN and under Vitest.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi } from "vitest";

const { mockInit, mockCaptureException, mockClose } = vi.hoisted(() => ({
  mockInit: vi.fn(),
  mockCaptureException: vi.fn().mockReturnValue("event-id-123"),
  mockClose: vi.fn().mockResolvedValue(true),
}));

vi.mock("@sentry/node", () => ({
  init: mockInit,
  captureException: mockCaptureException,
  close: mockClose,
  consoleIntegration: vi.fn(),
  httpIntegration: vi.fn(),
  onUnhandledRejectionIntegration: vi.fn(),
}));

vi.mock("../../src/lib/logger.js", () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

import {
  captureException,
  flushSentry,
  hasValidDsn,
  initializeSentry,
  isSentryEnabled,
} from "../../src/lib/sentry.js";

describe("lib/sentry", () => {
  describe("hasValidDsn", () => {
    it("accepts a structurally valid DSN", () => {
      expect(hasValidDsn("https://publickey@o0.ingest.example.com/42")).toBe(true);
    });

    it("rejects missing, keyless or project-less DSNs", () => {
      expect(hasValidDsn(undefined)).toBe(false);
      expect(hasValidDsn("")).toBe(false);
      expect(hasValidDsn("https://o0.ingest.example.com/42")).toBe(false);
      expect(hasValidDsn("https://publickey@o0.ingest.example.com/")).toBe(false);
      expect(hasValidDsn("not a dsn")).toBe(false);
    });
  });

  describe("when not initialized", () => {
    it("never calls the SDK", async () => {
      initializeSentry();

      expect(mockInit).not.toHaveBeenCalled();
      expect(isSentryEnabled()).toBe(false);
      expect(captureException(new Error("boom"))).toBeNull();
      await expect(flushSentry()).resolves.toBe(true);
      expect(mockCaptureException).not.toHaveBeenCalled();
      expect(mockClose).not.toHaveBeenCalled();
    });
  });
});
