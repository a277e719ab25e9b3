import { describe, expect, it } from "vitest";

import { ConfigError, loadConfig } from "../src/config.js";

describe("loadConfig", () => {
  it("should apply defaults", () => {
    const config = loadConfig({ OPENAI_API_KEY: "test-secret" });

    expect(config.transcripts).toEqual({
      dataDir: "./data",
      channelDisplayName: "",
      segmenter: { targetDuration: 75, minDuration: 45, maxDuration: 120 },
      chunkCheckpointEvery: 100,
      embeddingBatchSize: 100,
      embeddingPricePerMillionTokens: 0.02,
      collectionName: "transcripts",
      namespace: "youtube",
      upsertBatchSize: 100,
      checkpointEveryBatches: 10,
      interBatchDelayMs: 100,
    });
    expect(config.embedding).toMatchObject({
      provider: "openai",
      model: "text-embedding-3-small",
      apiKey: "test-secret",
    });
    expect(config.qdrant).toEqual({ url: "http://localhost:6333", apiKey: undefined });
  });

  it("should coerce numeric variables", () => {
    const config = loadConfig({
      EMBEDDING_PROVIDER: "ollama",
      TARGET_CHUNK_DURATION: "60",
      MIN_CHUNK_DURATION: "30",
      MAX_CHUNK_DURATION: "90",
      EMBEDDING_BATCH_SIZE: "32",
      EMBEDDING_DIMENSIONS: "384",
      INTER_BATCH_DELAY_MS: "0",
    });

    expect(config.transcripts.segmenter).toEqual({ targetDuration: 60, minDuration: 30, maxDuration: 90 });
    expect(config.transcripts.embeddingBatchSize).toBe(32);
    expect(config.transcripts.interBatchDelayMs).toBe(0);
    expect(config.embedding).toMatchObject({ provider: "ollama", model: "nomic-embed-text", dimensions: 384 });
  });

  it("should treat empty strings as unset", () => {
    const config = loadConfig({ EMBEDDING_PROVIDER: "ollama", EMBEDDING_MODEL: "", QDRANT_API_KEY: "" });

    expect(config.embedding.model).toBe("nomic-embed-text");
    expect(config.qdrant.apiKey).toBeUndefined();
  });

  it("should require an OpenAI key for the openai provider", () => {
    expect(() => loadConfig({})).toThrow(ConfigError);
    expect(() => loadConfig({})).toThrow("OPENAI_API_KEY: OPENAI_API_KEY is required when EMBEDDING_PROVIDER is openai");
  });

  it("should reject inconsistent chunk durations", () => {
    expect(() =>
      loadConfig({ EMBEDDING_PROVIDER: "ollama", MIN_CHUNK_DURATION: "80", TARGET_CHUNK_DURATION: "75" }),
    ).toThrow("chunk durations must satisfy MIN (80) <= TARGET (75) <= MAX (120)");
  });

  it("should list every invalid variable", () => {
    try {
      loadConfig({ EMBEDDING_PROVIDER: "unknown-provider", EMBEDDING_BATCH_SIZE: "0" });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      const message = error instanceof Error ? error.message : "";
      expect(message.startsWith("Invalid configuration:\n")).toBe(true);
      expect(message).toContain("  EMBEDDING_PROVIDER: ");
      expect(message).toContain("  EMBEDDING_BATCH_SIZE: ");
    }
  });
});
