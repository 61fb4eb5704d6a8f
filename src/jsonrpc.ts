import { z } from "zod";
import {
  ErrorCode,
  LATEST_PROTOCOL_VERSION,
} from "@modelcontextprotocol/sdk/types.js";
import { ProtocolError } from "./errors.js";
import { isJsonObject, toJsonValue } from "./json.js";
import { logger } from "./logger.js";
import type { OperationRegistry } from "./operation-registry.js";
import { HEALTH_OPERATION } from "./operations.js";
import type {
  JsonObject,
  JsonValue,
  McpError,
  McpResponse,
  RequestId,
  ServiceInfo,
} from "./types.js";

export interface RpcContext {
  registry: OperationRegistry;
  service: ServiceInfo;
}

export type RpcOutcome =
  | { kind: "response"; statusCode: number; body: McpResponse }
  /** Notification: nothing to answer. */
  | { kind: "accepted" }
  /** No JSON-RPC method in the body; the caller serves the service envelope. */
  | { kind: "info" };

const requestIdSchema = z.union([z.string(), z.number(), z.null()]);

const toolCallParamsSchema = z.object({
  name: z.string().min(1),
  arguments: z.record(z.unknown()).optional(),
});

export function rpcResult(id: RequestId | null, result: JsonValue): McpResponse {
  return { jsonrpc: "2.0", id, result };
}

export function rpcError(
  id: RequestId | null,
  code: number,
  message: string,
  data?: JsonValue
): McpResponse {
  const error: McpError = { code, message };
  if (data !== undefined) {
    error.data = data;
  }
  return { jsonrpc: "2.0", id, error };
}

/** `initialize` result, also carried by the event stream's `init` event. */
export function initializeResult({ registry, service }: RpcContext): JsonObject {
  return {
    protocolVersion: LATEST_PROTOCOL_VERSION,
    capabilities: {
      tools: {
        allowedTools: registry.names().filter((name) => name !== HEALTH_OPERATION),
      },
    },
    serverInfo: {
      name: service.name,
      version: service.version,
    },
  };
}

function readId(body: Record<string, unknown>): RequestId | null {
  const parsed = requestIdSchema.optional().safeParse(body.id);
  if (!parsed.success) {
    return null;
  }
  return parsed.data === undefined ? 1 : parsed.data;
}

async function callTool(params: unknown, context: RpcContext): Promise<JsonValue> {
  const parsed = toolCallParamsSchema.safeParse(params);
  if (!parsed.success) {
    throw new ProtocolError(
      ErrorCode.InvalidParams,
      "Invalid tools/call params",
      toJsonValue(parsed.error.issues) ?? null
    );
  }

  const { name, arguments: args } = parsed.data;
  const result = await context.registry.invoke(name, args ?? {});
  if (!result) {
    throw new ProtocolError(ErrorCode.InvalidParams, `Unknown tool: ${name}`);
  }

  if (!result.ok) {
    return {
      content: [{ type: "text", text: result.message }],
      isError: true,
    };
  }

  const toolResult: JsonObject = {
    content: [{ type: "text", text: JSON.stringify(result.value) }],
    isError: false,
  };
  if (isJsonObject(result.value)) {
    toolResult.structuredContent = result.value;
  }
  return toolResult;
}

async function callOperation(
  method: string,
  params: unknown,
  context: RpcContext
): Promise<JsonValue> {
  const result = await context.registry.invoke(method, params ?? {});
  if (!result) {
    throw new ProtocolError(ErrorCode.MethodNotFound, "Method not found");
  }
  if (result.ok) {
    return result.value;
  }

  const code =
    result.kind === "invalid_input" || result.kind === "validation"
      ? ErrorCode.InvalidParams
      : ErrorCode.InternalError;
  throw new ProtocolError(code, result.message, result.details);
}

async function dispatch(
  method: string,
  params: unknown,
  context: RpcContext
): Promise<JsonValue> {
  switch (method) {
    case "initialize":
      return initializeResult(context);
    case "ping":
      return {};
    case "tools/list":
      return { tools: context.registry.describe() };
    case "tools/call":
      return callTool(params, context);
    default:
      if (context.registry.has(method)) {
        return callOperation(method, params, context);
      }
      throw new ProtocolError(ErrorCode.MethodNotFound, "Method not found");
  }
}

/**
 * Answer a JSON-RPC envelope posted to the root endpoint. Every RPC-level
 * failure, a missing or non-string method included, travels over HTTP 200.
 * The `jsonrpc` member is not checked.
 */
export async function handleRpcRequest(
  body: unknown,
  context: RpcContext
): Promise<RpcOutcome> {
  if (typeof body !== "object" || body === null || Array.isArray(body)) {
    return { kind: "info" };
  }
  const record: Record<string, unknown> = { ...body };
  if (record.method === undefined) {
    return { kind: "info" };
  }

  const id = readId(record);
  const { method, params } = record;
  if (typeof method !== "string" || method === "") {
    logger.warn("JSON-RPC request without a usable method", {
      methodType: typeof method,
    });
    return {
      kind: "response",
      statusCode: 200,
      body: rpcError(id, ErrorCode.MethodNotFound, "Method not found"),
    };
  }

  if (record.id === undefined && method.startsWith("notifications/")) {
    logger.debug("JSON-RPC notification received", { method });
    return { kind: "accepted" };
  }

  try {
    const result = await dispatch(method, params, context);
    return { kind: "response", statusCode: 200, body: rpcResult(id, result) };
  } catch (error) {
    if (error instanceof ProtocolError) {
      logger.warn("JSON-RPC request failed", {
        method,
        code: error.code,
        message: error.message,
      });
      return {
        kind: "response",
        statusCode: 200,
        body: rpcError(id, error.code, error.message, error.data),
      };
    }
    throw error;
  }
}
