/**
 * Stampboard — tests/lib/reqctx.test.ts
 * WHAT: Trace ids and async-local request context.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect } from "vitest";
import { ctx, newTraceId, runWithCtx } from "../../src/lib/reqctx.js";

describe("reqctx", () => {
  describe("newTraceId", () => {
    it("generates 11 base62 characters", () => {
      expect(newTraceId()).toMatch(/^[0-9A-Za-z]{11}$/);
    });

    it("generates unique ids", () => {
      const ids = new Set<string>();
      for (let i = 0; i < 100; i++) {
        ids.add(newTraceId());
      }
      expect(ids.size).toBe(100);
    });
  });

  describe("runWithCtx", () => {
    it("is empty outside a request", () => {
      expect(ctx()).toEqual({});
    });

    it("exposes the context to nested async code", async () => {
      const seen = await runWithCtx({ traceId: "trace-1", method: "POST", route: "/checkin" }, async () => {
        await Promise.resolve();
        return ctx();
      });

      expect(seen).toEqual({ traceId: "trace-1", method: "POST", route: "/checkin" });
    });

    it("lets nested calls inherit and override fields", () => {
      const inner = runWithCtx({ traceId: "outer", method: "GET" }, () =>
        runWithCtx({ route: "/leaderboard" }, () => ctx())
      );

      expect(inner).toEqual({ traceId: "outer", method: "GET", route: "/leaderboard" });
    });

    it("generates a trace id when none is given", () => {
      const traceId = runWithCtx({}, () => ctx().traceId);
      expect(traceId).toMatch(/^[0-9A-Za-z]{11}$/);
    });
  });
});
