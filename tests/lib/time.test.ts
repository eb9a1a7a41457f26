/**
 * Stampboard — tests/lib/time.test.ts
 * WHAT: Unix-seconds helpers and calendar-date derivation.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { calendarDate, formatUtc, isIsoDate, isValidTs, isoToTs, nowUtc, tsToIso } from "../../src/lib/time.js";

describe("time", () => {
  describe("nowUtc", () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it("floors to whole seconds", () => {
      vi.setSystemTime(new Date("2024-10-20T20:00:00.999Z"));

      expect(nowUtc()).toBe(1729454400);
    });
  });

  describe("tsToIso / isoToTs", () => {
    it("converts between seconds and ISO strings", () => {
      expect(tsToIso(1714550400)).toBe("2024-05-01T08:00:00.000Z");
      expect(isoToTs("2024-05-01T08:00:00.000Z")).toBe(1714550400);
    });

    it("returns null for an unparsable string", () => {
      expect(isoToTs("not a date")).toBeNull();
    });
  });

  describe("isValidTs", () => {
    it("accepts whole seconds up to the Date limit", () => {
      expect(isValidTs(1714550400)).toBe(true);
      expect(isValidTs(0)).toBe(true);
      expect(isValidTs(8_640_000_000_000)).toBe(true);
      expect(isValidTs(-8_640_000_000_000)).toBe(true);
    });

    it("rejects fractions, unsafe integers and values past the Date limit", () => {
      expect(isValidTs(1.5)).toBe(false);
      expect(isValidTs(8_640_000_000_001)).toBe(false);
      expect(isValidTs(1e20)).toBe(false);
      expect(isValidTs(Number.NaN)).toBe(false);
    });
  });

  describe("isIsoDate", () => {
    it("accepts real calendar dates", () => {
      expect(isIsoDate("2024-02-29")).toBe(true);
    });

    it("rejects impossible dates and other shapes", () => {
      expect(isIsoDate("2024-02-30")).toBe(false);
      expect(isIsoDate("2023-02-29")).toBe(false);
      expect(isIsoDate("2024-5-1")).toBe(false);
      expect(isIsoDate("")).toBe(false);
    });
  });

  describe("calendarDate", () => {
    it("depends on the time zone", () => {
      expect(calendarDate(1714604400, "UTC")).toBe("2024-05-01");
      expect(calendarDate(1714604400, "Asia/Taipei")).toBe("2024-05-02");
    });
  });

  describe("formatUtc", () => {
    it("formats to the minute", () => {
      expect(formatUtc(1714550400)).toBe("2024-05-01 08:00 UTC");
    });
  });
});
