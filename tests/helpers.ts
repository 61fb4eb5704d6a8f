import type { Server } from "node:http";
import type express from "express";
import { vi } from "vitest";
import { loadConfig, type Config, type Env } from "../src/config.js";
import { createExpressApp } from "../src/express-server.js";
import type { OperationRegistry } from "../src/operation-registry.js";
import { createOperationRegistry } from "../src/operations.js";
import {
  RetrievalClient,
  type VectorStoreSearchParams,
} from "../src/retrieval-client.js";

export const TEST_STORE_ID = "vs_test";

export function createFakeBackend() {
  return {
    search: vi.fn<(vectorStoreId: string, params: VectorStoreSearchParams) => Promise<unknown>>(
      async () => ({ data: [] })
    ),
    fileContent: vi.fn<(vectorStoreId: string, fileId: string) => Promise<unknown>>(
      async () => ({ data: [] })
    ),
    fileInfo: vi.fn<(vectorStoreId: string, fileId: string) => Promise<unknown>>(
      async () => ({})
    ),
  };
}

export type FakeBackend = ReturnType<typeof createFakeBackend>;

export function testConfig(overrides: Env = {}): Config {
  return loadConfig({
    OPENAI_API_KEY: "test-key",
    VECTOR_STORE_ID: TEST_STORE_ID,
    SERVICE_NAME: "test-service",
    SERVICE_VERSION: "0.0.1",
    LOG_LEVEL: "error",
    ...overrides,
  });
}

export function buildRegistry(backend: FakeBackend, config: Config = testConfig()): OperationRegistry {
  return createOperationRegistry(new RetrievalClient(backend, TEST_STORE_ID), config.service);
}

export function buildApp(backend: FakeBackend, overrides: Env = {}): express.Application {
  const config = testConfig(overrides);
  return createExpressApp({ config, registry: buildRegistry(backend, config) });
}

export interface RunningServer {
  baseUrl: string;
  close(): Promise<void>;
}

/** Listen on an ephemeral localhost port inside the test process. */
export async function startServer(app: express.Application): Promise<RunningServer> {
  const server = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, "127.0.0.1", () => resolve(listening));
  });

  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("Server is not listening on a TCP port");
  }

  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((error) => (error ? reject(error) : resolve()));
      }),
  };
}

export function searchPage(
  items: Array<{ file_id?: string; filename?: string; content?: unknown[] }>
) {
  return { object: "vector_store.search_results.page", data: items, has_more: false };
}
