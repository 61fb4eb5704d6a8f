import express from "express";
import { ErrorCode } from "@modelcontextprotocol/sdk/types.js";
import { rpcError } from "./jsonrpc.js";
import { logger } from "./logger.js";
import type { RequestId } from "./types.js";

/** Paths answered with JSON-RPC envelopes rather than REST envelopes. */
export const RPC_PATHS: readonly string[] = ["/", "/sse"];

const AUTH_EXEMPT_PATHS: readonly string[] = ["/health"];

/** Server-defined JSON-RPC code for authentication failures. */
export const UNAUTHORIZED_RPC_CODE = -32003;

export function isRpcPath(path: string): boolean {
  return RPC_PATHS.includes(path);
}

export function respondWithRpcError(
  res: express.Response,
  statusCode: number,
  rpcCode: number,
  message: string,
  id: RequestId | null = null
): void {
  res.status(statusCode).json(rpcError(id, rpcCode, message));
}

export function respondWithRestError(
  res: express.Response,
  statusCode: number,
  message: string
): void {
  res.status(statusCode).json({
    status: "error",
    error: message,
    timestamp: new Date().toISOString(),
  });
}

function rejectUnauthorized(
  req: express.Request,
  res: express.Response,
  message: string
): void {
  if (isRpcPath(req.path)) {
    respondWithRpcError(res, 401, UNAUTHORIZED_RPC_CODE, message);
  } else {
    respondWithRestError(res, 401, message);
  }
}

/**
 * Bearer token check against `API_KEY`. A no-op when no key is configured;
 * `/health` stays open either way.
 */
export function bearerAuth(apiKey: string): express.RequestHandler {
  return (req, res, next) => {
    if (!apiKey || AUTH_EXEMPT_PATHS.includes(req.path)) {
      next();
      return;
    }

    const authHeader = req.headers["authorization"];
    if (!authHeader) {
      logger.warn("Missing Authorization header", {
        ip: req.ip,
        url: req.url,
      });
      rejectUnauthorized(req, res, "Missing Authorization header");
      return;
    }

    if (!authHeader.startsWith("Bearer ")) {
      logger.warn("Invalid Authorization header format", {
        ip: req.ip,
        authHeader: authHeader.substring(0, 20) + "...",
      });
      rejectUnauthorized(req, res, "Authorization header must use Bearer token");
      return;
    }

    const token = authHeader.slice("Bearer ".length).trim();
    if (token !== apiKey) {
      logger.warn("Invalid API key", {
        ip: req.ip,
        tokenPrefix: token.substring(0, 4) + "...",
      });
      rejectUnauthorized(req, res, "Invalid API key");
      return;
    }

    next();
  };
}

interface BodyParserError {
  type: string;
  status: number;
}

function isBodyParserError(error: unknown): error is BodyParserError {
  return (
    typeof error === "object" &&
    error !== null &&
    "type" in error &&
    typeof error.type === "string" &&
    "status" in error &&
    typeof error.status === "number"
  );
}

export function errorHandler(
  error: unknown,
  req: express.Request,
  res: express.Response,
  next: express.NextFunction
): void {
  if (res.headersSent) {
    next(error);
    return;
  }

  if (isBodyParserError(error) && error.status < 500) {
    logger.warn("Rejected request body", {
      type: error.type,
      url: req.url,
      method: req.method,
      ip: req.ip,
    });
    // JSON-RPC errors travel over HTTP 200.
    if (isRpcPath(req.path)) {
      const code =
        error.type === "entity.parse.failed"
          ? ErrorCode.ParseError
          : ErrorCode.InvalidRequest;
      respondWithRpcError(
        res,
        200,
        code,
        code === ErrorCode.ParseError ? "Parse error" : "Invalid request body"
      );
    } else {
      respondWithRestError(
        res,
        error.status,
        error.type === "entity.parse.failed"
          ? "Invalid JSON body"
          : "Invalid request body"
      );
    }
    return;
  }

  logger.error("Unhandled express error", {
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
    url: req.url,
    method: req.method,
    ip: req.ip,
    userAgent: req.headers["user-agent"],
  });
  respondWithRestError(res, 500, "Internal server error");
}
