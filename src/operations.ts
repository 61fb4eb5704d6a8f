import { z } from "zod";
import { SerializationError, UpstreamError } from "./errors.js";
import { reserialize, toJsonValue } from "./json.js";
import { logger } from "./logger.js";
import { OperationRegistry, describeInput } from "./operation-registry.js";
import { isValidFileId, type RetrievalClient } from "./retrieval-client.js";
import type {
  HandlerResult,
  JsonValue,
  Operation,
  SearchResult,
  ServiceInfo,
} from "./types.js";

export const HEALTH_OPERATION = "health_check";

export const searchInputSchema = z.object({
  query: z
    .string()
    .describe(
      "Search query string. Natural language queries work best for semantic search."
    ),
});

export const fetchInputSchema = z.object({
  id: z
    .string()
    .describe("File ID from the vector store (file-xxx format)"),
});

export const healthInputSchema = z.object({});

function ok(value: JsonValue): HandlerResult {
  return { ok: true, value };
}

function validationFailure(error: z.ZodError): HandlerResult {
  return {
    ok: false,
    kind: "validation",
    message: "Validation error",
    details: toJsonValue(error.issues) ?? null,
  };
}

/**
 * Search handler. Blank queries and upstream failures both produce an
 * empty result list.
 */
export function createSearchOperation(client: RetrievalClient): Operation {
  return {
    name: "search",
    description:
      "Search for documents using OpenAI Vector Store semantic search. Returns a list of relevant documents with snippets; use fetch to retrieve the full text.",
    inputSchema: describeInput(searchInputSchema),
    handler: async (args) => {
      const parsed = searchInputSchema.safeParse(args);
      if (!parsed.success) {
        return validationFailure(parsed.error);
      }

      const { query } = parsed.data;
      if (!query.trim()) {
        logger.warn("Empty search query provided");
        return ok({ results: [] });
      }

      const matches = await client.search(query);
      const results: SearchResult[] = matches.map((match) => ({
        id: match.id,
        title: match.title,
        text: match.snippet,
        url: match.url,
      }));

      logger.info("Vector store search returned results", {
        resultCount: results.length,
      });
      return ok({ results });
    },
  };
}

export function createFetchOperation(client: RetrievalClient): Operation {
  return {
    name: "fetch",
    description:
      "Fetch complete document content by file ID from the vector store, with title, citation URL and metadata.",
    inputSchema: describeInput(fetchInputSchema),
    handler: async (args) => {
      const parsed = fetchInputSchema.safeParse(args);
      if (!parsed.success) {
        return validationFailure(parsed.error);
      }

      const { id } = parsed.data;
      if (!isValidFileId(id)) {
        logger.warn("Rejected fetch with invalid document ID", {
          id: id.substring(0, 50),
        });
        return {
          ok: false,
          kind: "invalid_input",
          message: "Invalid document ID format",
        };
      }

      try {
        return ok(await client.fetchById(id));
      } catch (error) {
        if (error instanceof UpstreamError) {
          logger.warn("Fetch operation returned upstream failure", {
            id,
            upstreamStatus: error.upstreamStatus,
          });
          return {
            ok: false,
            kind: "upstream",
            message: `Fetch failed: ${error.message}`,
          };
        }
        throw error;
      }
    },
  };
}

export function createHealthOperation(
  service: ServiceInfo,
  now: () => Date = () => new Date()
): Operation {
  return {
    name: HEALTH_OPERATION,
    description: "Health check that returns the server status.",
    inputSchema: describeInput(healthInputSchema),
    handler: async () => {
      const result = {
        status: "ok",
        timestamp: now().toISOString(),
        service: service.name,
        version: service.version,
      };

      try {
        return ok(reserialize(result));
      } catch (error) {
        if (error instanceof SerializationError) {
          logger.error("Health payload failed to serialize", {
            error: error.message,
            stack: error.stack,
          });
          return { ok: false, kind: "serialization", message: error.message };
        }
        throw error;
      }
    },
  };
}

/**
 * Build the registry served by the HTTP layer: health first, then the two
 * retrieval operations.
 */
export function createOperationRegistry(
  client: RetrievalClient,
  service: ServiceInfo
): OperationRegistry {
  const registry = new OperationRegistry()
    .register(createHealthOperation(service))
    .register(createSearchOperation(client))
    .register(createFetchOperation(client));

  logger.info("Operations registered", { operations: registry.names() });
  return registry;
}
