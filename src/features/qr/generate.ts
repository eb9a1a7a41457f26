/**
 * Stampboard — src/features/qr/generate.ts
 * WHAT: Renders the check-in link as a QR code (PNG bytes and a data: URL for <img>).
 * DOCS:
 *  - qrcode: https://github.com/soldair/node-qrcode#api
 *
 * Same input, same output; nothing is stored.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import QRCode from "qrcode";
import { EncodingError } from "../../lib/errors.js";
import { logger, redact } from "../../lib/logger.js";
import { buildCheckInUrl, type CheckInLink } from "./link.js";

export type GeneratedQr = {
  url: string;
  png: Buffer;
  dataUrl: string;
  /** QR symbol version (1-40) the library picked */
  version: number;
};

const QR_OPTIONS = {
  errorCorrectionLevel: "M",
  margin: 2,
  width: 320,
} as const;

export async function generateQr(baseUrl: string, link: CheckInLink): Promise<GeneratedQr> {
  const url = buildCheckInUrl(baseUrl, link);

  try {
    // create() throws synchronously when the payload does not fit in version 40
    const { version } = QRCode.create(url, { errorCorrectionLevel: QR_OPTIONS.errorCorrectionLevel });
    const [png, dataUrl] = await Promise.all([
      QRCode.toBuffer(url, { ...QR_OPTIONS, type: "png" }),
      QRCode.toDataURL(url, { ...QR_OPTIONS, type: "image/png" }),
    ]);
    logger.debug({ evt: "qr_generated", version, bytes: png.length }, "QR code generated");
    return { url, png, dataUrl, version };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.warn({ evt: "qr_failed", url: redact(url), error: message }, "QR generation failed");
    throw new EncodingError(`The link is too long or cannot be encoded (${message}).`, { cause: err });
  }
}
