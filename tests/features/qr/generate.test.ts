/**
 * Stampboard — tests/features/qr/generate.test.ts
 * WHAT: QR rendering through the qrcode library.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi } from "vitest";

vi.mock("../../../src/lib/logger.js", () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
  redact: (value: string) => value,
}));

import jsQRModule from "jsqr";
import { PNG } from "pngjs";
import { generateQr } from "../../../src/features/qr/generate.js";
import { EncodingError } from "../../../src/lib/errors.js";

// jsqr is CommonJS with a default export; under ESM the function sits on .default
const jsQR = jsQRModule.default;

function decodePng(png: Buffer): string | undefined {
  const image = PNG.sync.read(png);
  return jsQR(Uint8ClampedArray.from(image.data), image.width, image.height)?.data;
}

const BASE = "http://localhost:3000/checkin";
const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

describe("generateQr", () => {
  it("encodes a URL containing the event id", async () => {
    const qr = await generateQr(BASE, { eventId: "summer-fest" });

    expect(qr.url).toBe("http://localhost:3000/checkin?event=summer-fest");
    expect(qr.url).toContain("event=summer-fest");
    expect(qr.png.subarray(0, 8).equals(PNG_SIGNATURE)).toBe(true);
    expect(qr.dataUrl.startsWith("data:image/png;base64,")).toBe(true);
    expect(qr.version).toBeGreaterThanOrEqual(1);
    expect(qr.version).toBeLessThanOrEqual(40);
  });

  it("renders a PNG that scans back to the check-in URL", async () => {
    const qr = await generateQr(BASE, { eventId: "summer-fest" });

    const decoded = decodePng(qr.png);
    expect(decoded).toBe("http://localhost:3000/checkin?event=summer-fest");
    expect(decoded).toContain("event=summer-fest");
  });

  it("carries category and date through the scanned code", async () => {
    const qr = await generateQr(BASE, { eventId: "E 1", category: "kitchen", date: "2024-05-01" });

    expect(decodePng(qr.png)).toBe(qr.url);
    expect(new URL(qr.url).searchParams.get("event")).toBe("E 1");
  });

  it("is deterministic for the same input", async () => {
    const a = await generateQr(BASE, { eventId: "summer-fest", category: "kitchen" });
    const b = await generateQr(BASE, { eventId: "summer-fest", category: "kitchen" });

    expect(a.png.equals(b.png)).toBe(true);
    expect(a.dataUrl).toBe(b.dataUrl);
  });

  it("rejects an empty event id", async () => {
    await expect(generateQr(BASE, { eventId: "" })).rejects.toBeInstanceOf(EncodingError);
  });

  it("rejects a link too long for any QR version", async () => {
    await expect(generateQr(BASE, { eventId: "x".repeat(3000) })).rejects.toBeInstanceOf(EncodingError);
  });
});
