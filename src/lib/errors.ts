/**
 * Stampboard — src/lib/errors.ts
 * WHAT: Thrown error classes for check-in failures plus a discriminated-union
 *       classifier for anything caught at the HTTP boundary.
 * FLOWS:
 *  - store/service/qr throw DuplicateCheckInError | EncodingError | StorageError | ValidationError
 *  - classifyError(err) → ClassifiedError union
 *  - httpStatusFor(classified) / userMessageFor(classified) → response
 * USAGE:
 *  import { classifyError } from "./errors.js";
 *  const classified = classifyError(err);
 *  if (classified.kind === "duplicate") { ... }
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

// ===== Thrown errors =====

/** Check-in key that already has a record. Non-fatal, no retry. */
export class DuplicateCheckInError extends Error {
  readonly kind = "duplicate" as const;

  constructor(
    readonly eventId: string,
    readonly category: string,
    readonly date: string,
    readonly participantName: string
  ) {
    super(`${participantName} already checked in to ${eventId} (${category}) on ${date}`);
    this.name = "DuplicateCheckInError";
  }
}

/** QR/link generation failed: malformed or oversized event id. */
export class EncodingError extends Error {
  readonly kind = "encoding" as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "EncodingError";
  }
}

/**
 * Reading or writing the backing table failed. `code` is the SQLite code when
 * there is one (SQLITE_BUSY, SQLITE_READONLY, SQLITE_CANTOPEN, ...).
 */
export class StorageError extends Error {
  readonly kind = "storage" as const;

  constructor(
    message: string,
    readonly code: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "StorageError";
  }
}

/** Bad form input: empty event id, unknown category, no names. */
export class ValidationError extends Error {
  readonly kind = "validation" as const;

  constructor(
    readonly field: string,
    message: string
  ) {
    super(message);
    this.name = "ValidationError";
  }
}

// ===== Classification =====

export interface AppError {
  kind: string;
  message: string;
  cause?: Error;
}

export interface DuplicateError extends AppError {
  kind: "duplicate";
  participantName: string;
}

export interface EncodingFailure extends AppError {
  kind: "encoding";
}

/** SQLite and filesystem failures */
export interface StorageFailure extends AppError {
  kind: "storage";
  code: string;
}

export interface ValidationFailure extends AppError {
  kind: "validation";
  field: string;
}

export interface UnknownError extends AppError {
  kind: "unknown";
}

export type ClassifiedError =
  | DuplicateError
  | EncodingFailure
  | StorageFailure
  | ValidationFailure
  | UnknownError;

const FS_CODES = ["EACCES", "EPERM", "EROFS", "ENOSPC", "EBUSY", "EMFILE"];

function stringProp(value: object, key: string): string | undefined {
  if (!(key in value)) return undefined;
  const prop: unknown = Reflect.get(value, key);
  return typeof prop === "string" ? prop : undefined;
}

/**
 * Classify any caught error. Our own classes first, then raw SQLite/fs errors
 * that escaped without being wrapped, then unknown.
 */
export function classifyError(err: unknown): ClassifiedError {
  if (err === null || err === undefined) {
    return { kind: "unknown", message: "Unknown error (null/undefined)" };
  }

  if (err instanceof DuplicateCheckInError) {
    return { kind: "duplicate", participantName: err.participantName, message: err.message, cause: err };
  }
  if (err instanceof EncodingError) {
    return { kind: "encoding", message: err.message, cause: err };
  }
  if (err instanceof StorageError) {
    return { kind: "storage", code: err.code, message: err.message, cause: err };
  }
  if (err instanceof ValidationError) {
    return { kind: "validation", field: err.field, message: err.message, cause: err };
  }

  if (typeof err !== "object") {
    return { kind: "unknown", message: String(err) };
  }

  const message = stringProp(err, "message") ?? String(err);
  const code = stringProp(err, "code");
  const name = stringProp(err, "name");
  const cause = err instanceof Error ? err : undefined;

  if (name === "SqliteError" || code?.startsWith("SQLITE_")) {
    return { kind: "storage", code: code ?? "UNKNOWN", message, cause };
  }

  if (code && FS_CODES.includes(code)) {
    return { kind: "storage", code, message, cause };
  }

  return { kind: "unknown", message, cause };
}

export function httpStatusFor(err: ClassifiedError): number {
  switch (err.kind) {
    case "validation":
      return 400;
    case "duplicate":
      return 409;
    case "encoding":
      return 422;
    case "storage":
    case "unknown":
      return 500;
  }
}

/**
 * Text shown to the person at the form. Storage errors are shown as-is;
 * unknown errors are not.
 */
export function userMessageFor(err: ClassifiedError): string {
  switch (err.kind) {
    case "duplicate":
      return `${err.participantName} is already checked in for this event, category and date.`;
    case "encoding":
      return `Could not generate the QR code: ${err.message}`;
    case "storage":
      return `Could not access the check-in records (${err.code}): ${err.message}`;
    case "validation":
      return err.message;
    case "unknown":
      return "Something went wrong. Please try again.";
  }
}
