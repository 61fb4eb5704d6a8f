import { isLogLevel, type LogLevel } from "./logger.js";

export interface Config {
  api: {
    host: string;
    port: number;
    /** Bearer token required on every route but /health; auth is off when empty. */
    key: string;
    corsOrigins: "*" | string[];
    requestTimeoutMs: number;
  };
  openai: {
    apiKey: string;
    /** API root override; the SDK default is used when unset. */
    baseUrl: string | undefined;
    vectorStoreId: string;
    timeoutMs: number;
    maxRetries: number;
  };
  stream: {
    keepaliveIntervalMs: number;
  };
  service: {
    name: string;
    version: string;
  };
  logging: {
    level: LogLevel;
  };
  environment: {
    nodeEnv: string;
    isDevelopment: boolean;
    isProduction: boolean;
  };
}

export type Env = Record<string, string | undefined>;

function validateEnvVar(name: string, value: string | undefined): string {
  if (!value || !value.trim()) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return value.trim();
}

function parseIntVar(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === "") {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new Error(`Invalid integer for environment variable ${name}: ${value}`);
  }
  return parsed;
}

export function parseCorsOrigins(value: string | undefined): "*" | string[] {
  const raw = (value ?? "*").trim();
  if (raw === "" || raw === "*") {
    return "*";
  }
  const origins = raw
    .split(",")
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
  return origins.includes("*") || origins.length === 0 ? "*" : origins;
}

/**
 * Build the process configuration from an environment map.
 * Called once at startup; the result is frozen and passed around explicitly.
 */
export function loadConfig(env: Env = process.env): Config {
  const nodeEnv = env.NODE_ENV || "development";
  const logLevel = env.LOG_LEVEL || "info";
  if (!isLogLevel(logLevel)) {
    throw new Error(`Invalid LOG_LEVEL: ${logLevel}`);
  }

  const config: Config = {
    api: {
      host: env.HOST || "0.0.0.0",
      port: parseIntVar("PORT", env.PORT, 8000),
      key: env.API_KEY?.trim() ?? "",
      corsOrigins: parseCorsOrigins(env.ALLOWED_ORIGINS),
      requestTimeoutMs: parseIntVar("REQUEST_TIMEOUT_MS", env.REQUEST_TIMEOUT_MS, 30000),
    },
    openai: {
      apiKey: validateEnvVar("OPENAI_API_KEY", env.OPENAI_API_KEY),
      baseUrl: env.OPENAI_BASE_URL?.trim() || undefined,
      vectorStoreId: validateEnvVar("VECTOR_STORE_ID", env.VECTOR_STORE_ID),
      timeoutMs: parseIntVar("OPENAI_TIMEOUT_MS", env.OPENAI_TIMEOUT_MS, 30000),
      maxRetries: parseIntVar("OPENAI_MAX_RETRIES", env.OPENAI_MAX_RETRIES, 0),
    },
    stream: {
      keepaliveIntervalMs: parseIntVar("SSE_KEEPALIVE_MS", env.SSE_KEEPALIVE_MS, 15000),
    },
    service: {
      name: env.SERVICE_NAME || "vector-search-mcp",
      version: env.SERVICE_VERSION || "1.0.0",
    },
    logging: {
      level: logLevel,
    },
    environment: {
      nodeEnv,
      isDevelopment: nodeEnv !== "production",
      isProduction: nodeEnv === "production",
    },
  };

  return Object.freeze(config);
}
