import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { OllamaEmbeddings } from "./ollama.js";

const fetchMock = vi.fn<typeof fetch>();

const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });

describe("OllamaEmbeddings", () => {
  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it("should use known model dimensions", () => {
    expect(new OllamaEmbeddings().getDimensions()).toBe(768);
    expect(new OllamaEmbeddings("mxbai-embed-large").getDimensions()).toBe(1024);
    expect(new OllamaEmbeddings("all-minilm").getDimensions()).toBe(384);
    expect(new OllamaEmbeddings("unknown-model", 512).getDimensions()).toBe(512);
    expect(new OllamaEmbeddings().getModel()).toBe("nomic-embed-text");
  });

  it("should post the whole batch to /api/embed", async () => {
    fetchMock.mockResolvedValue(jsonResponse({ model: "nomic-embed-text", embeddings: [[1], [2]] }));
    const embeddings = new OllamaEmbeddings("nomic-embed-text", 1, undefined, "http://ollama.local:11434");

    const results = await embeddings.embedBatch(["a", "b"]);

    expect(fetchMock).toHaveBeenCalledWith("http://ollama.local:11434/api/embed", {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ model: "nomic-embed-text", input: ["a", "b"] }),
    });
    expect(results).toEqual([
      { embedding: [1], dimensions: 1 },
      { embedding: [2], dimensions: 1 },
    ]);
  });

  it("should embed a single text through the batch endpoint", async () => {
    fetchMock.mockResolvedValue(jsonResponse({ model: "nomic-embed-text", embeddings: [[0.5, 0.5]] }));

    const result = await new OllamaEmbeddings().embed("hello");

    expect(result).toEqual({ embedding: [0.5, 0.5], dimensions: 768 });
  });

  it("should return nothing for no texts", async () => {
    expect(await new OllamaEmbeddings().embedBatch([])).toEqual([]);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("should throw when the vector count does not match", async () => {
    fetchMock.mockResolvedValue(jsonResponse({ model: "nomic-embed-text", embeddings: [[1]] }));

    await expect(new OllamaEmbeddings().embedBatch(["a", "b"])).rejects.toThrow("Ollama returned 1 embeddings for 2 texts");
  });

  it("should reject a response without embeddings", async () => {
    fetchMock.mockResolvedValue(jsonResponse({ model: "nomic-embed-text", error: "unexpected" }));

    await expect(new OllamaEmbeddings().embedBatch(["a"])).rejects.toThrow(
      'Unexpected Ollama response for model "nomic-embed-text"',
    );
  });

  it("should report HTTP errors with the status and body", async () => {
    fetchMock.mockResolvedValue(new Response("model not found", { status: 404 }));

    await expect(new OllamaEmbeddings().embedBatch(["a"])).rejects.toMatchObject({
      status: 404,
      message: 'Ollama batch API error (404) for model "nomic-embed-text": model not found',
    });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("should explain connection failures", async () => {
    fetchMock.mockRejectedValue(new Error("connect ECONNREFUSED"));

    await expect(new OllamaEmbeddings().embedBatch(["a"])).rejects.toThrow(
      "Failed to call Ollama API at http://localhost:11434 with model nomic-embed-text: connect ECONNREFUSED",
    );
  });

  it("should retry a 429 response", async () => {
    fetchMock
      .mockResolvedValueOnce(new Response("slow down", { status: 429 }))
      .mockResolvedValueOnce(jsonResponse({ model: "nomic-embed-text", embeddings: [[1]] }));
    const embeddings = new OllamaEmbeddings("nomic-embed-text", undefined, { retryDelayMs: 1 });

    await expect(embeddings.embedBatch(["a"])).resolves.toEqual([{ embedding: [1], dimensions: 768 }]);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });
});
