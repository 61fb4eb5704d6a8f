import express from "express";
import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { loadConfig, type Config } from "../src/config.js";
import { ClientInputError, UpstreamError } from "../src/errors.js";
import { logger } from "../src/logger.js";
import {
  RetrievalClient,
  VECTOR_STORE_MAX_RESULTS,
  createOpenAIBackend,
  createOpenAIClient,
  isValidFileId,
  toSnippet,
} from "../src/retrieval-client.js";
import { NO_CONTENT } from "../src/upstream-adapter.js";
import {
  TEST_STORE_ID,
  createFakeBackend,
  searchPage,
  startServer,
  type FakeBackend,
  type RunningServer,
} from "./helpers.js";

describe("RetrievalClient.search", () => {
  let backend: FakeBackend;
  let client: RetrievalClient;

  beforeEach(() => {
    backend = createFakeBackend();
    client = new RetrievalClient(backend, TEST_STORE_ID);
  });

  it.each(["", " ", "   ", "\t\n"])(
    "returns no matches for blank query %j without calling upstream",
    async (query) => {
      await expect(client.search(query)).resolves.toEqual([]);
      expect(backend.search).not.toHaveBeenCalled();
    }
  );

  it("maps upstream items to matches in upstream order", async () => {
    backend.search.mockResolvedValue(
      searchPage([
        { file_id: "file_b", filename: "b.txt", content: [{ type: "text", text: "beta" }] },
        { file_id: "file_a", filename: "a.txt", content: [{ type: "text", text: "alpha" }] },
      ])
    );

    const matches = await client.search("greek letters");

    expect(matches).toEqual([
      {
        id: "file_b",
        title: "b.txt",
        snippet: "beta",
        url: "https://platform.openai.com/storage/files/file_b",
      },
      {
        id: "file_a",
        title: "a.txt",
        snippet: "alpha",
        url: "https://platform.openai.com/storage/files/file_a",
      },
    ]);
    expect(backend.search).toHaveBeenCalledWith(TEST_STORE_ID, {
      query: "greek letters",
      maxResults: VECTOR_STORE_MAX_RESULTS,
    });
  });

  it("passes smaller limits through", async () => {
    await client.search("anything", 10);

    expect(backend.search).toHaveBeenCalledWith(TEST_STORE_ID, {
      query: "anything",
      maxResults: 10,
    });
  });

  it("truncates long content to a 200 character snippet", async () => {
    const long = "x".repeat(250);
    const exact = "y".repeat(200);
    backend.search.mockResolvedValue(
      searchPage([
        { file_id: "file_long", content: [{ type: "text", text: long }] },
        { file_id: "file_exact", content: [{ type: "text", text: exact }] },
      ])
    );

    const [first, second] = await client.search("lengths");

    expect(first.snippet).toBe("x".repeat(200) + "...");
    expect(first.snippet).toHaveLength(203);
    expect(second.snippet).toBe(exact);
  });

  it("degrades to no matches when upstream fails and logs the failure", async () => {
    const errorSpy = vi.spyOn(logger, "error");
    backend.search.mockRejectedValue(new Error("401 Incorrect API key provided"));

    await expect(client.search("outage")).resolves.toEqual([]);
    expect(errorSpy).toHaveBeenCalledWith(
      "Vector store search failed",
      expect.objectContaining({ error: "401 Incorrect API key provided" })
    );
  });
});

describe("RetrievalClient.fetchById", () => {
  let backend: FakeBackend;
  let client: RetrievalClient;

  beforeEach(() => {
    backend = createFakeBackend();
    client = new RetrievalClient(backend, TEST_STORE_ID);
  });

  it.each(["", "invalid_id", "file", "file_", "../file_1", "file_1/../../secrets", "FILE_1"])(
    "rejects %j before any upstream call",
    async (id) => {
      await expect(client.fetchById(id)).rejects.toBeInstanceOf(ClientInputError);
      expect(backend.fileContent).not.toHaveBeenCalled();
      expect(backend.fileInfo).not.toHaveBeenCalled();
    }
  );

  it("joins content chunks and attaches metadata", async () => {
    backend.fileContent.mockResolvedValue({
      data: [
        { type: "text", text: "part one" },
        { type: "text", text: "part two" },
      ],
    });
    backend.fileInfo.mockResolvedValue({
      id: "file_123",
      filename: "notes.txt",
      attributes: { author: "test" },
    });

    await expect(client.fetchById("file_123")).resolves.toEqual({
      id: "file_123",
      title: "notes.txt",
      text: "part one\npart two",
      url: "https://platform.openai.com/storage/files/file_123",
      metadata: { author: "test" },
    });
    expect(backend.fileContent).toHaveBeenCalledWith(TEST_STORE_ID, "file_123");
    expect(backend.fileInfo).toHaveBeenCalledWith(TEST_STORE_ID, "file_123");
  });

  it("uses placeholders when upstream has no content, filename or attributes", async () => {
    backend.fileContent.mockResolvedValue({ data: [] });
    backend.fileInfo.mockResolvedValue({ id: "file-xyz", attributes: {} });

    await expect(client.fetchById("file-xyz")).resolves.toEqual({
      id: "file-xyz",
      title: "Document file-xyz",
      text: NO_CONTENT,
      url: "https://platform.openai.com/storage/files/file-xyz",
      metadata: null,
    });
  });

  it("propagates upstream failures with the upstream message", async () => {
    backend.fileContent.mockRejectedValue(new Error("No such file: file_404"));

    const failure = client.fetchById("file_404");

    await expect(failure).rejects.toBeInstanceOf(UpstreamError);
    await expect(failure).rejects.toThrow("No such file: file_404");
  });
});

describe("helpers", () => {
  it("accepts both file id spellings", () => {
    expect(isValidFileId("file-AbC123")).toBe(true);
    expect(isValidFileId("file_123")).toBe(true);
    expect(isValidFileId("vs_123")).toBe(false);
    expect(isValidFileId(123)).toBe(false);
  });

  it("leaves short text alone", () => {
    expect(toSnippet("short")).toBe("short");
  });
});

describe("OpenAI backend", () => {
  interface RecordedRequest {
    method: string;
    path: string;
    body: unknown;
    authorization: string | undefined;
  }

  let requests: RecordedRequest[];
  let upstream: RunningServer;

  beforeEach(async () => {
    requests = [];
    const api = express();
    api.use(express.json());
    api.use((req, _res, next) => {
      requests.push({
        method: req.method,
        path: req.path,
        body: req.method === "POST" ? req.body : undefined,
        authorization: req.headers.authorization,
      });
      next();
    });

    api.post("/v1/vector_stores/:storeId/search", (_req, res) => {
      res.json({
        object: "vector_store.search_results.page",
        search_query: "hello",
        data: [
          {
            file_id: "file_1",
            filename: "a.txt",
            score: 0.9,
            attributes: {},
            content: [{ type: "text", text: "hello world" }],
          },
        ],
        has_more: false,
        next_page: null,
      });
    });

    api.get("/v1/vector_stores/:storeId/files/:fileId/content", (req, res) => {
      if (req.params.fileId === "file_missing") {
        res.status(404).json({ error: { message: "No file found", type: "invalid_request_error" } });
        return;
      }
      res.json({
        object: "vector_store.file_content.page",
        data: [
          { type: "text", text: "A" },
          { type: "text", text: "B" },
        ],
        has_more: false,
        next_page: null,
      });
    });

    api.get("/v1/vector_stores/:storeId/files/:fileId", (req, res) => {
      if (req.params.fileId === "file_missing") {
        res.status(404).json({ error: { message: "No file found", type: "invalid_request_error" } });
        return;
      }
      res.json({
        id: req.params.fileId,
        object: "vector_store.file",
        vector_store_id: req.params.storeId,
        status: "completed",
        attributes: { k: "v" },
      });
    });

    upstream = await startServer(api);
  });

  afterEach(async () => {
    await upstream.close();
  });

  function openaiSettings(): Config["openai"] {
    return loadConfig({
      OPENAI_API_KEY: "test-key",
      VECTOR_STORE_ID: TEST_STORE_ID,
      OPENAI_BASE_URL: `${upstream.baseUrl}/v1`,
    }).openai;
  }

  function realClient(): RetrievalClient {
    return new RetrievalClient(
      createOpenAIBackend(createOpenAIClient(openaiSettings())),
      TEST_STORE_ID
    );
  }

  it("builds the SDK client with the configured timeout and no retries", () => {
    const openai = createOpenAIClient(openaiSettings());

    expect(openai.timeout).toBe(30000);
    expect(openai.maxRetries).toBe(0);
    expect(openai.baseURL).toBe(`${upstream.baseUrl}/v1`);
  });

  it("posts searches to the vector store search endpoint", async () => {
    const matches = await realClient().search("hello");

    expect(matches).toEqual([
      {
        id: "file_1",
        title: "a.txt",
        snippet: "hello world",
        url: "https://platform.openai.com/storage/files/file_1",
      },
    ]);
    expect(requests).toEqual([
      {
        method: "POST",
        path: "/v1/vector_stores/vs_test/search",
        body: { query: "hello", max_num_results: VECTOR_STORE_MAX_RESULTS },
        authorization: "Bearer test-key",
      },
    ]);
  });

  it("reads file content and file info for a fetch", async () => {
    await expect(realClient().fetchById("file_1")).resolves.toEqual({
      id: "file_1",
      title: "Document file_1",
      text: "A\nB",
      url: "https://platform.openai.com/storage/files/file_1",
      metadata: { k: "v" },
    });
    expect(requests.map((request) => `${request.method} ${request.path}`).sort()).toEqual([
      "GET /v1/vector_stores/vs_test/files/file_1",
      "GET /v1/vector_stores/vs_test/files/file_1/content",
    ]);
  });

  it("carries the upstream status of a failed fetch", async () => {
    const failure = realClient().fetchById("file_missing");

    await expect(failure).rejects.toBeInstanceOf(UpstreamError);
    await expect(failure).rejects.toMatchObject({
      message: "404 No file found",
      upstreamStatus: 404,
    });
  });
});
