import { STATUS_BY_KIND } from "./errors.js";
import { toJsonValue } from "./json.js";
import type { ErrorKind, HandlerResult, JsonObject, JsonValue } from "./types.js";

export interface NormalizedResponse {
  statusCode: number;
  body: JsonObject;
}

export type Clock = () => Date;

const systemClock: Clock = () => new Date();

function parseJson(text: string): JsonValue | undefined {
  try {
    return toJsonValue(JSON.parse(text));
  } catch (error) {
    if (error instanceof SyntaxError) {
      return undefined;
    }
    throw error;
  }
}

function withTimestamp(body: JsonObject, now: Clock): JsonObject {
  return "timestamp" in body ? body : { ...body, timestamp: now().toISOString() };
}

function wrapStructured(value: JsonValue[] | JsonObject): JsonObject {
  if (Array.isArray(value)) {
    return { status: "ok", result: value };
  }
  return "status" in value ? { ...value } : { status: "ok", ...value };
}

function wrap(value: Exclude<JsonValue, null>): JsonObject {
  if (typeof value === "string") {
    const parsed = parseJson(value);
    if (typeof parsed === "object" && parsed !== null) {
      return wrapStructured(parsed);
    }
    return { status: "ok", message: value };
  }
  if (typeof value === "object") {
    return wrapStructured(value);
  }
  return { status: "ok", result: String(value) };
}

/** Shape a successful operation value into the REST envelope. */
export function normalizeValue(
  value: JsonValue,
  now: Clock = systemClock
): NormalizedResponse {
  if (value === null) {
    return {
      statusCode: 500,
      body: withTimestamp(
        { status: "error", message: "No response from tool" },
        now
      ),
    };
  }
  return { statusCode: 200, body: withTimestamp(wrap(value), now) };
}

export function normalizeError(
  kind: ErrorKind,
  message: string,
  details?: JsonValue,
  now: Clock = systemClock
): NormalizedResponse {
  const body: JsonObject = { status: "error", error: message };
  if (details !== undefined) {
    body.details = details;
  }
  body.timestamp = now().toISOString();
  return { statusCode: STATUS_BY_KIND[kind], body };
}

export function normalizeResult(
  result: HandlerResult,
  now: Clock = systemClock
): NormalizedResponse {
  return result.ok
    ? normalizeValue(result.value, now)
    : normalizeError(result.kind, result.message, result.details, now);
}
