import { SerializationError, errorMessage } from "./errors.js";
import type { JsonObject, JsonValue } from "./types.js";

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Copy an arbitrary value into a `JsonValue`. Functions, symbols, bigints,
 * non-finite numbers and cyclic references are dropped (array slots become
 * `null`, as `JSON.stringify` does).
 */
export function toJsonValue(
  value: unknown,
  seen: WeakSet<object> = new WeakSet()
): JsonValue | undefined {
  if (
    value === null ||
    typeof value === "string" ||
    typeof value === "boolean"
  ) {
    return value;
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value !== "object") {
    return undefined;
  }
  if (seen.has(value)) {
    return undefined;
  }
  seen.add(value);

  if (Array.isArray(value)) {
    const items: JsonValue[] = [];
    for (const entry of value) {
      const converted = toJsonValue(entry, seen);
      items.push(converted === undefined ? null : converted);
    }
    seen.delete(value);
    return items;
  }

  const result: JsonObject = {};
  for (const [key, entry] of Object.entries(value)) {
    const converted = toJsonValue(entry, seen);
    if (converted !== undefined) {
      result[key] = converted;
    }
  }
  seen.delete(value);
  return result;
}

/**
 * Serialize and parse a freshly built result so that anything
 * `JSON.stringify` rejects fails here instead of on the wire.
 */
export function reserialize(value: unknown): JsonValue {
  let text: string | undefined;
  try {
    text = JSON.stringify(value);
  } catch (error) {
    throw new SerializationError(
      `Result is not JSON-serializable: ${errorMessage(error)}`
    );
  }
  if (text === undefined) {
    throw new SerializationError("Result is not JSON-serializable");
  }

  const parsed = toJsonValue(JSON.parse(text));
  if (parsed === undefined) {
    throw new SerializationError("Result is not JSON-serializable");
  }
  return parsed;
}
