import type { ErrorKind, JsonValue } from "./types.js";

/**
 * Base error carrying the classification used to pick a status code.
 */
export class AppError extends Error {
  public readonly kind: ErrorKind;
  public readonly details: JsonValue | undefined;

  constructor(message: string, kind: ErrorKind = "internal", details?: JsonValue) {
    super(message);
    this.name = new.target.name;
    this.kind = kind;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/** Malformed identifiers and other caller mistakes detected before any upstream call. */
export class ClientInputError extends AppError {
  constructor(message: string, details?: JsonValue) {
    super(message, "invalid_input", details);
  }
}

export class UpstreamError extends AppError {
  public readonly upstreamStatus: number | undefined;

  constructor(message: string, upstreamStatus?: number) {
    super(message, "upstream");
    this.upstreamStatus = upstreamStatus;
  }
}

export class SerializationError extends AppError {
  constructor(message: string) {
    super(message, "serialization");
  }
}

export class DuplicateOperationError extends Error {
  constructor(public readonly operationName: string) {
    super(`Operation already registered: ${operationName}`);
    this.name = "DuplicateOperationError";
  }
}

/** JSON-RPC level failure; travels over HTTP 200. */
export class ProtocolError extends Error {
  constructor(
    public readonly code: number,
    message: string,
    public readonly data?: JsonValue
  ) {
    super(message);
    this.name = "ProtocolError";
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

export const STATUS_BY_KIND: Readonly<Record<ErrorKind, number>> = {
  invalid_input: 400,
  validation: 422,
  upstream: 502,
  serialization: 500,
  internal: 500,
};

export function errorMessage(error: unknown, fallback = "Unknown error"): string {
  return error instanceof Error ? error.message : fallback;
}
