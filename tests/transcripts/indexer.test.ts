import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { QdrantManager } from "../../src/qdrant/client.js";
import { TranscriptIndexer } from "../../src/transcripts/indexer.js";
import { mockQdrantStorage } from "../mocks/qdrant-client.js";
import {
  cleanupTempDir,
  createTempDataDir,
  defaultTestConfig,
  MockEmbeddingProvider,
  TWO_CHUNK_SEGMENTS,
  writeRawFile,
  writeTranscript,
} from "./indexer/test-helpers.js";

vi.mock("@qdrant/js-client-rest", async () => {
  const { setupQdrantClientMock, mockQdrantStorage } = await import("../mocks/qdrant-client.js");
  return setupQdrantClientMock(mockQdrantStorage);
});

describe("TranscriptIndexer", () => {
  let dataDir: string;
  let indexer: TranscriptIndexer;

  beforeEach(async () => {
    mockQdrantStorage.clear();
    dataDir = await createTempDataDir();
    indexer = new TranscriptIndexer(new QdrantManager(), new MockEmbeddingProvider(), defaultTestConfig(dataDir));
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await cleanupTempDir(dataDir);
  });

  describe("getStatus", () => {
    it("should report empty stages before anything ran", async () => {
      const status = await indexer.getStatus();

      expect(status).toEqual({
        chunking: { completed: 0, failed: 0, recordsInOutput: 0 },
        embedding: { completed: 0, failed: 0, recordsInOutput: 0 },
        upload: { completed: 0, failed: 0, recordsInOutput: 0 },
      });
    });
  });

  describe("full pipeline", () => {
    beforeEach(async () => {
      await writeTranscript(dataDir, "v1", TWO_CHUNK_SEGMENTS, { title: "Pipeline Talk" });
      await writeTranscript(dataDir, "v2", [{ text: "brief aside", start: 0, duration: 10 }]);
      await writeRawFile(dataDir, "transcripts/broken.json", "not json");
    });

    it("should chunk, embed, upload and search", async () => {
      const chunking = await indexer.chunkTranscripts({ incremental: true });
      const embedding = await indexer.generateEmbeddings({ incremental: true });
      const upload = await indexer.uploadEmbeddings({ incremental: true });

      expect(chunking).toMatchObject({ videosProcessed: 2, videosFailed: 1, totalChunksInOutput: 3 });
      expect(embedding).toMatchObject({ chunksEmbedded: 3, totalEmbeddingsInOutput: 3 });
      expect(upload).toMatchObject({ pointsUploaded: 3, namespacePointsAfter: 3 });

      const results = await indexer.searchTranscripts("talk", { videoId: "v1" });
      expect(results.map((r) => [r.chunkId, r.videoTitle, r.text])).toEqual([
        ["v1-0000", "Pipeline Talk", "intro words"],
        ["v1-0001", "Pipeline Talk", "closing words"],
      ]);
    });

    it("should report per-stage progress", async () => {
      await indexer.chunkTranscripts({ incremental: true });
      await indexer.generateEmbeddings({ incremental: true });
      await indexer.uploadEmbeddings({ incremental: true });

      const status = await indexer.getStatus();

      expect(status.chunking).toMatchObject({ completed: 2, failed: 1, recordsInOutput: 3 });
      expect(typeof status.chunking.outputCreatedAt).toBe("string");
      expect(status.embedding).toMatchObject({ completed: 3, failed: 0, recordsInOutput: 3 });
      expect(status.upload).toEqual({ completed: 3, failed: 0, recordsInOutput: 3 });
    });

    it("should be a no-op on a second incremental pass", async () => {
      await indexer.chunkTranscripts({ incremental: true });
      await indexer.generateEmbeddings({ incremental: true });
      await indexer.uploadEmbeddings({ incremental: true });

      const embedding = await indexer.generateEmbeddings({ incremental: true });
      const upload = await indexer.uploadEmbeddings({ incremental: true });

      expect(embedding.status).toBe("noop");
      expect(upload.status).toBe("noop");
      expect(upload.namespacePointsAfter).toBe(3);
    });

    it("should clear the namespace and its upload progress", async () => {
      await indexer.chunkTranscripts();
      await indexer.generateEmbeddings();
      await indexer.uploadEmbeddings();

      const deleted = await indexer.deleteNamespace();
      const status = await indexer.getStatus();

      expect(deleted.pointsDeleted).toBe(3);
      expect(status.upload).toEqual({ completed: 0, failed: 0, recordsInOutput: 0 });
      expect(status.embedding.recordsInOutput).toBe(3);
    });
  });
});
