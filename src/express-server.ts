import express from "express";
import helmet from "helmet";
import cors from "cors";
import type { Config } from "./config.js";
import { openEventStream } from "./event-stream.js";
import { errorMessage } from "./errors.js";
import { handleRpcRequest, initializeResult, type RpcContext } from "./jsonrpc.js";
import { logger } from "./logger.js";
import { bearerAuth, errorHandler } from "./middleware.js";
import type { OperationRegistry } from "./operation-registry.js";
import { HEALTH_OPERATION } from "./operations.js";
import { normalizeResult } from "./response-normalizer.js";
import type { JsonObject } from "./types.js";

export interface AppDependencies {
  config: Config;
  registry: OperationRegistry;
}

export function wantsEventStream(req: express.Request): boolean {
  const accept = req.headers["accept"] ?? "";
  return accept.toLowerCase().includes("text/event-stream");
}

function serviceEnvelope(context: RpcContext): JsonObject {
  return {
    status: "ok",
    server: context.service.name,
    version: context.service.version,
    ...initializeResult(context),
    endpoints: {
      mcp_initialize: { method: "POST", path: "/" },
      events: { method: "GET", path: "/sse" },
      tools: { method: "GET", path: "/tools" },
      search: { method: "POST", path: "/search" },
      fetch: { method: "POST", path: "/fetch" },
      health: { method: "GET", path: "/health" },
    },
    timestamp: new Date().toISOString(),
  };
}

function sendNotFound(req: express.Request, res: express.Response): void {
  logger.warn("404 Not Found", {
    url: req.originalUrl,
    method: req.method,
    ip: req.ip,
    userAgent: req.headers["user-agent"],
  });

  res.status(404).json({
    error: "Not Found",
    message: `The endpoint '${req.method} ${req.originalUrl}' was not found on this server`,
    timestamp: new Date().toISOString(),
  });
}

export function createExpressApp({ config, registry }: AppDependencies): express.Application {
  const app = express();
  const context: RpcContext = { registry, service: config.service };

  app.use(
    helmet({
      contentSecurityPolicy: {
        useDefaults: false,
        directives: { defaultSrc: ["'self'"] },
      },
      frameguard: { action: "deny" },
    })
  );

  const anyOrigin = config.api.corsOrigins === "*";
  app.use(
    cors({
      origin: config.api.corsOrigins,
      methods: ["GET", "POST", "OPTIONS"],
      allowedHeaders: ["Content-Type", "Authorization"],
      credentials: !anyOrigin,
    })
  );

  app.disable("x-powered-by");

  // Event streams stay open indefinitely and are exempt.
  app.use((req, res, next) => {
    if (wantsEventStream(req)) {
      next();
      return;
    }

    req.setTimeout(config.api.requestTimeoutMs, () => {
      logger.warn("Request timeout", {
        url: req.url,
        method: req.method,
        ip: req.ip,
      });
      if (!res.headersSent) {
        res.status(408).json({
          status: "error",
          error: "Request timeout",
          message: "The request took too long to process",
          timestamp: new Date().toISOString(),
        });
      }
    });

    next();
  });

  app.use((req, res, next) => {
    const start = Date.now();

    logger.info("Incoming request", {
      method: req.method,
      url: req.url,
      ip: req.ip,
      userAgent: req.headers["user-agent"],
      contentType: req.headers["content-type"],
    });

    res.on("finish", () => {
      logger.info("Request completed", {
        method: req.method,
        url: req.url,
        statusCode: res.statusCode,
        duration: `${Date.now() - start}ms`,
        ip: req.ip,
      });
    });

    next();
  });

  app.use(bearerAuth(config.api.key));
  app.use(express.json({ limit: "10mb" }));

  const invoke = async (
    name: string,
    args: unknown,
    req: express.Request,
    res: express.Response,
    next: express.NextFunction
  ): Promise<void> => {
    const startTime = Date.now();
    try {
      const result = await registry.invoke(name, args);
      if (!result) {
        sendNotFound(req, res);
        return;
      }

      const { statusCode, body } = normalizeResult(result);
      if (!result.ok) {
        logger.warn("Operation failed", {
          operation: name,
          kind: result.kind,
          statusCode,
          error: result.message,
        });
      }
      logger.debug("Operation completed", {
        operation: name,
        statusCode,
        duration: `${Date.now() - startTime}ms`,
      });
      res.status(statusCode).json(body);
    } catch (error) {
      next(error);
    }
  };

  app.get("/health", (req, res, next) => {
    void invoke(HEALTH_OPERATION, {}, req, res, next);
  });

  app.get("/tools", (req, res) => {
    res.json({
      jsonrpc: "2.0",
      id: 1,
      result: { tools: registry.describe() },
    });
  });

  app.get(["/", "/sse"], async (req, res, next) => {
    if (!wantsEventStream(req)) {
      res.json(serviceEnvelope(context));
      return;
    }

    const startTime = Date.now();
    logger.info("Event stream opened", { ip: req.ip, path: req.path });
    try {
      const reason = await openEventStream(res, {
        init: { jsonrpc: "2.0", id: 1, result: initializeResult(context) },
        intervalMs: config.stream.keepaliveIntervalMs,
      });
      logger.info("Event stream closed", {
        reason,
        ip: req.ip,
        duration: `${Date.now() - startTime}ms`,
      });
    } catch (error) {
      logger.error("Event stream error", { error: errorMessage(error) });
      next(error);
    }
  });

  app.post(["/", "/sse"], async (req, res, next) => {
    try {
      const outcome = await handleRpcRequest(req.body, context);
      switch (outcome.kind) {
        case "info":
          res.json(serviceEnvelope(context));
          return;
        case "accepted":
          res.status(202).end();
          return;
        case "response":
          res.status(outcome.statusCode).json(outcome.body);
          return;
      }
    } catch (error) {
      next(error);
    }
  });

  app.post("/:operation", (req, res, next) => {
    void invoke(req.params.operation, req.body ?? {}, req, res, next);
  });

  app.use(sendNotFound);

  app.use(errorHandler);

  return app;
}
