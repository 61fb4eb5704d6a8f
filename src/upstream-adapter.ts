import { isJsonObject, toJsonValue } from "./json.js";
import type { JsonObject } from "./types.js";

/**
 * Shape normalization for vector store responses.
 *
 * Search pages, content pages and file records arrive as SDK class
 * instances, plain objects decoded from JSON, or bare arrays depending on
 * the SDK version and on whether a test double produced them. Everything
 * here reads `unknown` and returns the internal shapes below, so the
 * client and handlers never probe raw payloads.
 */

export const NO_CONTENT = "No content available";

export interface RawSearchItem {
  id: string;
  title: string;
  content: string;
}

export interface RawFileContent {
  text: string;
}

export interface RawFileInfo {
  filename: string | undefined;
  attributes: JsonObject | null;
}

type UnknownRecord = Record<string, unknown>;

function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === "object" && value !== null;
}

function readString(source: UnknownRecord, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = source[key];
    if (typeof value === "string" && value.length > 0) {
      return value;
    }
  }
  return undefined;
}

/** Items of a paginated response (`{ data: [...] }`) or of a bare list. */
export function readItems(response: unknown): unknown[] {
  if (Array.isArray(response)) {
    return response;
  }
  if (isRecord(response) && Array.isArray(response.data)) {
    return response.data;
  }
  return [];
}

/** Text of one content chunk: `{ text: "..." }`, `{ text: { value } }` or a plain string. */
export function readChunkText(chunk: unknown): string | undefined {
  if (typeof chunk === "string") {
    return chunk;
  }
  if (!isRecord(chunk)) {
    return undefined;
  }
  const text = chunk.text;
  if (typeof text === "string") {
    return text;
  }
  if (isRecord(text) && typeof text.value === "string") {
    return text.value;
  }
  return undefined;
}

export function toSearchItem(item: unknown, index: number): RawSearchItem {
  const source: UnknownRecord = isRecord(item) ? item : {};
  const contentList = Array.isArray(source.content) ? source.content : [];
  const firstText = contentList.length > 0 ? readChunkText(contentList[0]) : undefined;

  return {
    id: readString(source, "file_id", "id") ?? `vs_${index}`,
    title: readString(source, "filename", "name") ?? `Document ${index + 1}`,
    content: firstText ? firstText : NO_CONTENT,
  };
}

export function toSearchItems(response: unknown): RawSearchItem[] {
  return readItems(response).map((item, index) => toSearchItem(item, index));
}

/**
 * Content chunks in upstream order. Chunks without text are skipped; an
 * empty list means the store returned no readable content.
 */
export function toFileContent(response: unknown): RawFileContent[] {
  const chunks: RawFileContent[] = [];
  for (const chunk of readItems(response)) {
    const text = readChunkText(chunk);
    if (text !== undefined) {
      chunks.push({ text });
    }
  }
  return chunks;
}

export function toFileInfo(response: unknown): RawFileInfo {
  if (!isRecord(response)) {
    return { filename: undefined, attributes: null };
  }

  const attributes = toJsonValue(response.attributes);

  return {
    filename: readString(response, "filename", "name"),
    attributes:
      isJsonObject(attributes) && Object.keys(attributes).length > 0
        ? attributes
        : null,
  };
}
