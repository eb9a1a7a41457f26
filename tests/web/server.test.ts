/**
 * Stampboard — tests/web/server.test.ts
 * WHAT: Request body reading for the node:http front.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { once } from "node:events";
import { PassThrough } from "node:stream";
import { describe, it, expect, vi } from "vitest";

vi.mock("../../src/lib/logger.js", () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
  redact: (value: string) => value,
}));

import { BodyTooLargeError, MAX_BODY_BYTES, readBody } from "../../src/web/server.js";

describe("readBody", () => {
  it("joins chunks into a UTF-8 string", async () => {
    const stream = new PassThrough();
    const pending = readBody(stream);

    stream.write(Buffer.from("names=%E9%99%B3"));
    stream.end(Buffer.from("&event=E1"));

    await expect(pending).resolves.toBe("names=%E9%99%B3&event=E1");
  });

  it("rejects past the limit but keeps draining so a 413 can still be sent", async () => {
    const stream = new PassThrough();
    const ended = once(stream, "end");
    const pending = readBody(stream, 8);

    stream.write(Buffer.from("12345"));
    stream.write(Buffer.from("67890"));
    stream.end(Buffer.from("more"));

    await expect(pending).rejects.toBeInstanceOf(BodyTooLargeError);
    await expect(pending).rejects.toThrow("Request body exceeds 8 bytes");
    await ended;
    expect(stream.readableEnded).toBe(true);
  });

  it("uses a 64 KiB default limit", () => {
    expect(MAX_BODY_BYTES).toBe(65536);
  });
});
