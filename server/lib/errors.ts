import type { ZodIssue } from "zod";

export type ErrorCode =
  | "VALIDATION_ERROR"
  | "INVALID_KEY"
  | "MALFORMED_RECORD"
  | "UNSUPPORTED_ENCODING"
  | "KEY_MISMATCH"
  | "INTERNAL_ERROR"
  | "NOT_FOUND";

export interface AppErrorOptions {
  statusCode?: number;
  code?: ErrorCode;
  details?: unknown;
  cause?: unknown;
}

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: ErrorCode;
  public readonly details?: unknown;

  constructor(message: string, options: AppErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.statusCode = options.statusCode ?? 500;
    this.code = options.code ?? "INTERNAL_ERROR";
    this.details = options.details;
  }
}

type KeyErrorOptions = Omit<AppErrorOptions, "code" | "statusCode">;

/** A required private scalar is absent, zero, a rejected sentinel, or otherwise unusable. */
export class InvalidKeyError extends AppError {
  constructor(message: string, options: KeyErrorOptions = {}) {
    super(message, { ...options, statusCode: 422, code: "INVALID_KEY" });
  }
}

/** Structural violation in an ASN.1 EC private-key record. */
export class MalformedRecordError extends AppError {
  constructor(message: string, options: KeyErrorOptions = {}) {
    super(message, { ...options, statusCode: 422, code: "MALFORMED_RECORD" });
  }
}

/** Recognised but disallowed point encoding (infinity, hybrid). */
export class UnsupportedEncodingError extends AppError {
  constructor(message: string, options: KeyErrorOptions = {}) {
    super(message, { ...options, statusCode: 422, code: "UNSUPPORTED_ENCODING" });
  }
}

/** The public key carried in a record is not the one its private key derives to. */
export class KeyMismatchError extends AppError {
  constructor(message = "public key in record does not match private key", options: KeyErrorOptions = {}) {
    super(message, { ...options, statusCode: 422, code: "KEY_MISMATCH" });
  }
}

export const isAppError = (error: unknown): error is AppError => error instanceof AppError;

export const formatZodIssues = (issues: ZodIssue[]): string =>
  issues.map((issue) => `${issue.path.join(".") || "value"}: ${issue.message}`).join("; ");
