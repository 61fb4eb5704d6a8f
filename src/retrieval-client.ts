import OpenAI from "openai";
import type { Config } from "./config.js";
import { ClientInputError, UpstreamError, errorMessage } from "./errors.js";
import { logger } from "./logger.js";
import type { FetchResponse, Match } from "./types.js";
import {
  NO_CONTENT,
  toFileContent,
  toFileInfo,
  toSearchItems,
  type RawSearchItem,
} from "./upstream-adapter.js";

export const DEFAULT_SEARCH_LIMIT = 100;
/** Upper bound the vector store search endpoint accepts for `max_num_results`. */
export const VECTOR_STORE_MAX_RESULTS = 50;
export const SNIPPET_LENGTH = 200;
export const FILE_ID_PATTERN = /^file[-_][A-Za-z0-9_-]+$/;

export interface VectorStoreSearchParams {
  query: string;
  maxResults: number;
}

/**
 * The three vector store calls the server needs. Results are left as
 * `unknown`; `upstream-adapter.ts` turns them into internal shapes.
 */
export interface VectorStoreBackend {
  search(vectorStoreId: string, params: VectorStoreSearchParams): Promise<unknown>;
  fileContent(vectorStoreId: string, fileId: string): Promise<unknown>;
  fileInfo(vectorStoreId: string, fileId: string): Promise<unknown>;
}

export function createOpenAIClient(settings: Config["openai"]): OpenAI {
  return new OpenAI({
    apiKey: settings.apiKey,
    baseURL: settings.baseUrl,
    timeout: settings.timeoutMs,
    maxRetries: settings.maxRetries,
  });
}

export function createOpenAIBackend(openai: OpenAI): VectorStoreBackend {
  return {
    async search(vectorStoreId, { query, maxResults }) {
      return openai.vectorStores.search(vectorStoreId, {
        query,
        max_num_results: maxResults,
      });
    },
    async fileContent(vectorStoreId, fileId) {
      return openai.vectorStores.files.content(vectorStoreId, fileId);
    },
    async fileInfo(vectorStoreId, fileId) {
      return openai.vectorStores.files.retrieve(vectorStoreId, fileId);
    },
  };
}

export function fileUrl(id: string): string {
  return `https://platform.openai.com/storage/files/${id}`;
}

export function toSnippet(text: string): string {
  return text.length > SNIPPET_LENGTH
    ? text.slice(0, SNIPPET_LENGTH) + "..."
    : text;
}

export function isValidFileId(id: unknown): boolean {
  return typeof id === "string" && FILE_ID_PATTERN.test(id);
}

function clampLimit(limit: number): number {
  if (!Number.isFinite(limit)) {
    return VECTOR_STORE_MAX_RESULTS;
  }
  return Math.min(Math.max(Math.trunc(limit), 1), VECTOR_STORE_MAX_RESULTS);
}

function toMatch(item: RawSearchItem): Match {
  return {
    id: item.id,
    title: item.title,
    snippet: toSnippet(item.content),
    url: fileUrl(item.id),
  };
}

function upstreamStatus(error: unknown): number | undefined {
  return error instanceof OpenAI.APIError ? error.status : undefined;
}

export class RetrievalClient {
  constructor(
    private readonly backend: VectorStoreBackend,
    private readonly vectorStoreId: string
  ) {}

  /**
   * Semantic search over the configured store. Upstream failures are
   * logged and reported as an empty result list.
   */
  async search(query: string, limit: number = DEFAULT_SEARCH_LIMIT): Promise<Match[]> {
    if (!query.trim()) {
      return [];
    }

    const startTime = Date.now();
    logger.info("Executing vector store search", {
      query: query.substring(0, 100),
      vectorStoreId: this.vectorStoreId,
    });

    try {
      const response = await this.backend.search(this.vectorStoreId, {
        query,
        maxResults: clampLimit(limit),
      });
      const matches = toSearchItems(response).map(toMatch);

      logger.info("Search completed successfully", {
        query: query.substring(0, 50),
        resultCount: matches.length,
        duration: `${Date.now() - startTime}ms`,
      });
      return matches;
    } catch (error) {
      // TODO: surface degraded searches to callers (e.g. a `degraded` flag) once clients can handle it
      logger.error("Vector store search failed", {
        query: query.substring(0, 50),
        error: errorMessage(error, "Unknown search error"),
        upstreamStatus: upstreamStatus(error),
        duration: `${Date.now() - startTime}ms`,
      });
      return [];
    }
  }

  async fetchById(id: string): Promise<FetchResponse> {
    if (!isValidFileId(id)) {
      throw new ClientInputError("Invalid document ID format");
    }

    logger.info("Fetching document content", {
      id,
      vectorStoreId: this.vectorStoreId,
    });

    let contentResponse: unknown;
    let infoResponse: unknown;
    try {
      [contentResponse, infoResponse] = await Promise.all([
        this.backend.fileContent(this.vectorStoreId, id),
        this.backend.fileInfo(this.vectorStoreId, id),
      ]);
    } catch (error) {
      const message = errorMessage(error, "Unknown fetch error");
      logger.error("Fetch operation failed", { id, error: message });
      throw new UpstreamError(message, upstreamStatus(error));
    }

    const chunks = toFileContent(contentResponse);
    const info = toFileInfo(infoResponse);
    const title = info.filename ?? `Document ${id}`;
    const text =
      chunks.length > 0 ? chunks.map((chunk) => chunk.text).join("\n") : NO_CONTENT;

    logger.info("Document fetched successfully", {
      id,
      title,
      contentLength: text.length,
    });

    return {
      id,
      title,
      text,
      url: fileUrl(id),
      metadata: info.attributes,
    };
  }
}
