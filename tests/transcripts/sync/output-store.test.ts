import { promises as fs } from "node:fs";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import {
  createChunksCodec,
  createEmbeddingsCodec,
  JsonDocumentStore,
} from "../../../src/transcripts/sync/output-store.js";
import type { EmbeddedChunk, TranscriptChunk } from "../../../src/transcripts/types.js";
import { cleanupTempDir, createTempDataDir, makeChunk, makeEmbeddedChunk, readJson } from "../indexer/test-helpers.js";

const segmenter = { targetDuration: 75, minDuration: 45, maxDuration: 120 };

describe("JsonDocumentStore", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await createTempDataDir();
  });

  afterEach(async () => {
    await cleanupTempDir(tempDir);
  });

  describe("chunks document", () => {
    const createStore = () =>
      new JsonDocumentStore<TranscriptChunk[]>(
        join(tempDir, "chunks", "all_chunks.json"),
        createChunksCodec({ channelDisplayName: "Test Channel", segmenter }),
        2,
      );

    it("should return an empty record set when the file is missing", async () => {
      const store = createStore();

      expect(await store.exists()).toBe(false);
      expect(await store.load()).toEqual({ createdAt: null, records: new Map() });
    });

    it("should write the flattened chunk list with counts", async () => {
      const store = createStore();
      const records = new Map([
        ["v1", [makeChunk("v1", 0, 0, 80), makeChunk("v1", 1, 80, 160)]],
        ["v2", [makeChunk("v2", 0, 0, 90)]],
      ]);

      await store.save(records);

      const written = await readJson(store.getPath());
      expect(written).toMatchObject({
        channelDisplayName: "Test Channel",
        totalChunks: 3,
        totalVideos: 2,
        chunkingParameters: segmenter,
      });
      expect(written).toHaveProperty("createdAt");
      const raw = await fs.readFile(store.getPath(), "utf-8");
      expect(raw.startsWith('{\n  "createdAt"')).toBe(true);
    });

    it("should group chunks back per video on load", async () => {
      const store = createStore();
      const first = makeChunk("v1", 0, 0, 80);
      const second = makeChunk("v1", 1, 80, 160);
      const other = makeChunk("v2", 0, 0, 90);

      await store.save(
        new Map([
          ["v1", [first, second]],
          ["v2", [other]],
        ]),
      );
      const loaded = await store.load();

      expect(Array.from(loaded.records.keys())).toEqual(["v1", "v2"]);
      expect(loaded.records.get("v1")).toEqual([first, second]);
      expect(loaded.records.get("v2")).toEqual([other]);
      expect(typeof loaded.createdAt).toBe("string");
    });

    it("should reject a document with an unexpected layout", async () => {
      const store = createStore();
      await fs.mkdir(join(tempDir, "chunks"), { recursive: true });
      await fs.writeFile(store.getPath(), JSON.stringify({ createdAt: "2024-01-01T00:00:00.000Z", items: [] }));

      await expect(store.load()).rejects.toThrow("Chunks document has an unexpected layout");
    });

    it("should reject invalid JSON", async () => {
      const store = createStore();
      await fs.mkdir(join(tempDir, "chunks"), { recursive: true });
      await fs.writeFile(store.getPath(), "[");

      await expect(store.load()).rejects.toThrow("is not valid JSON");
    });
  });

  describe("embeddings document", () => {
    const createStore = () =>
      new JsonDocumentStore<EmbeddedChunk>(
        join(tempDir, "embeddings", "embeddings.json"),
        createEmbeddingsCodec({ channelDisplayName: "Test Channel", model: "mock-model", dimensions: 4 }),
      );

    it("should write model details and key records by chunk id", async () => {
      const store = createStore();
      const a = makeEmbeddedChunk("v1", 0);
      const b = makeEmbeddedChunk("v2", 1);

      await store.save(
        new Map([
          [a.chunkId, a],
          [b.chunkId, b],
        ]),
      );

      expect(await readJson(store.getPath())).toMatchObject({
        model: "mock-model",
        dimensions: 4,
        totalChunks: 2,
        totalVideos: 2,
      });
      const raw = await fs.readFile(store.getPath(), "utf-8");
      expect(raw.includes("\n")).toBe(false);

      const loaded = await store.load();
      expect(Array.from(loaded.records.keys())).toEqual(["v1-0000", "v2-0001"]);
      expect(loaded.records.get("v2-0001")).toEqual(b);
    });

    it("should reject chunks without embeddings", async () => {
      const store = createStore();
      await fs.mkdir(join(tempDir, "embeddings"), { recursive: true });
      await fs.writeFile(
        store.getPath(),
        JSON.stringify({ createdAt: "2024-01-01T00:00:00.000Z", chunks: [makeChunk("v1", 0, 0, 80)] }),
      );

      await expect(store.load()).rejects.toThrow("Embeddings document has an unexpected layout");
    });
  });
});
