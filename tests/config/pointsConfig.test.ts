/**
 * Stampboard — tests/config/pointsConfig.test.ts
 * WHAT: Loading, defaulting, validating and saving the points config file.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtempSync, readFileSync, rmSync, writeFileSync, existsSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

vi.mock("../../src/lib/logger.js", () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

import {
  DEFAULT_POINTS_CONFIG,
  categoryPoints,
  loadPointsConfig,
  savePointsConfig,
} from "../../src/config/pointsConfig.js";
import { ValidationError } from "../../src/lib/errors.js";
import { logger } from "../../src/lib/logger.js";

describe("pointsConfig", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "stampboard-config-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  describe("loadPointsConfig", () => {
    it("returns the defaults when the file does not exist", () => {
      expect(loadPointsConfig(join(dir, "missing.json"))).toEqual(DEFAULT_POINTS_CONFIG);
    });

    it("returns the defaults and warns on unreadable JSON", () => {
      const file = join(dir, "points.json");
      writeFileSync(file, "{ not json", "utf8");

      expect(loadPointsConfig(file)).toEqual(DEFAULT_POINTS_CONFIG);
      expect(logger.warn).toHaveBeenCalledTimes(1);
    });

    it("fills a missing top-level key from the defaults", () => {
      const file = join(dir, "points.json");
      writeFileSync(file, JSON.stringify({ categories: [{ category: "games", points: 3 }] }), "utf8");

      expect(loadPointsConfig(file)).toEqual({
        categories: [{ category: "games", points: 3, tips: "" }],
        rewards: DEFAULT_POINTS_CONFIG.rewards,
      });
    });

    it("returns the defaults when validation fails", () => {
      const file = join(dir, "points.json");
      writeFileSync(file, JSON.stringify({ categories: [{ category: "games", points: -1 }], rewards: [] }), "utf8");

      expect(loadPointsConfig(file)).toEqual(DEFAULT_POINTS_CONFIG);
      expect(logger.warn).toHaveBeenCalledTimes(1);
    });

    it("does not hand out the shared defaults object", () => {
      const config = loadPointsConfig(join(dir, "missing.json"));
      config.categories.push({ category: "extra", points: 1, tips: "" });

      expect(DEFAULT_POINTS_CONFIG.categories).toHaveLength(3);
    });
  });

  describe("savePointsConfig", () => {
    it("writes pretty JSON that loads back, creating the directory", () => {
      const file = join(dir, "nested", "points.json");
      const config = {
        categories: [{ category: "中華文化", points: 2, tips: "讀書會" }],
        rewards: [{ threshold: 3, reward: "晚餐免費" }],
      };

      expect(savePointsConfig(file, config)).toEqual(config);
      expect(readFileSync(file, "utf8")).toBe(`${JSON.stringify(config, null, 2)}\n`);
      expect(loadPointsConfig(file)).toEqual(config);
    });

    it("rejects duplicate categories without touching the file", () => {
      const file = join(dir, "points.json");
      const config = {
        categories: [
          { category: "kitchen", points: 1, tips: "" },
          { category: "kitchen", points: 2, tips: "" },
        ],
        rewards: [],
      };

      expect(() => savePointsConfig(file, config)).toThrow(ValidationError);
      expect(existsSync(file)).toBe(false);
    });
  });

  describe("categoryPoints", () => {
    it("looks up points by exact category name", () => {
      expect(categoryPoints(DEFAULT_POINTS_CONFIG, "culture")).toBe(2);
      expect(categoryPoints(DEFAULT_POINTS_CONFIG, "Culture")).toBeNull();
    });
  });
});
